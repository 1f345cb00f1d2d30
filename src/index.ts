/**
 * edr-profile-gen library entry point
 */

export * from './types/index.js';
export * from './core/catalog/index.js';
export * from './core/generator/index.js';
export {
  parseProfileConfig,
  createProfileConfig,
  toPersistedConfig,
  type ProfileConfigInput,
  type PersistedConfig,
} from './core/services/config-schema.js';
export {
  CONFIG_FILE_NAME,
  serializeConfig,
  deserializeConfig,
  readProfileConfig,
  profileConfigExists,
} from './core/services/config-manager.js';
export { ProfileGenError, isProfileGenError, errors, type ErrorCode } from './utils/errors.js';
export { Logger, logger, configureLogger } from './utils/logger.js';
