/**
 * Configuration management service
 *
 * Serializes profile configurations to profile_config.yml and reads them back.
 * serializeConfig and deserializeConfig are exact inverses for valid
 * configurations.
 */

import { access, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import YAML from 'yaml';
import { DEFAULT_CATALOGS, type Catalogs } from '../catalog/index.js';
import { parseProfileConfig, toPersistedConfig } from './config-schema.js';
import { errors } from '../../utils/errors.js';
import type { ProfileConfig } from '../../types/index.js';

export const CONFIG_FILE_NAME = 'profile_config.yml';

/**
 * Check if a file exists
 */
async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Persisted YAML form of a configuration
 */
export function serializeConfig(config: ProfileConfig): string {
  return YAML.stringify(toPersistedConfig(config), { lineWidth: 0 });
}

/**
 * Parse and validate a persisted configuration
 *
 * @param source - Label used in error messages, usually the file path
 */
export function deserializeConfig(
  text: string,
  catalogs: Catalogs = DEFAULT_CATALOGS,
  source = CONFIG_FILE_NAME
): ProfileConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    throw errors.invalidConfig(source, error instanceof Error ? error.message : String(error));
  }
  return parseProfileConfig(raw, catalogs, source);
}

/**
 * Read a profile configuration file
 */
export async function readProfileConfig(
  configPath: string,
  catalogs: Catalogs = DEFAULT_CATALOGS
): Promise<ProfileConfig> {
  if (!(await fileExists(configPath))) {
    throw errors.configNotFound(configPath);
  }

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    throw errors.fileReadError(configPath, error instanceof Error ? error.message : String(error));
  }

  return deserializeConfig(content, catalogs, configPath);
}

/**
 * Check if a profile directory already holds a configuration
 */
export async function profileConfigExists(profileDir: string): Promise<boolean> {
  return fileExists(join(profileDir, CONFIG_FILE_NAME));
}
