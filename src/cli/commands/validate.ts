/**
 * edr-profile-gen validate command
 *
 * Loads a configuration and runs the whole pipeline in memory, reporting
 * counts or the first failed check. Nothing is written.
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { handleError, isProfileGenError, errors } from '../../utils/errors.js';
import { readProfileConfig } from '../../core/services/config-manager.js';
import { generateProfile } from '../../core/generator/profile-pipeline.js';
import { DEFAULT_CATALOGS } from '../../core/catalog/index.js';
import type { ErrorCode } from '../../utils/errors.js';
import type { ValidateOptions } from '../../types/index.js';

export type ValidationReport =
  | {
      valid: true;
      profileName: string;
      requirements: number;
      tests: number;
      narrativeFiles: number;
      asyncapi: boolean;
      files: number;
    }
  | {
      valid: false;
      error: { code: ErrorCode; message: string; suggestion?: string };
    };

export async function validateConfig(configPath: string): Promise<ValidationReport> {
  try {
    const config = await readProfileConfig(configPath, DEFAULT_CATALOGS);
    const set = generateProfile(config, { catalogs: DEFAULT_CATALOGS });
    return {
      valid: true,
      profileName: set.profileName,
      ...set.summary,
      files: set.artifacts.length,
    };
  } catch (error) {
    const failure = isProfileGenError(error) ? error : errors.unknown(error);
    return {
      valid: false,
      error: {
        code: failure.code,
        message: failure.message,
        ...(failure.suggestion !== undefined ? { suggestion: failure.suggestion } : {}),
      },
    };
  }
}

export const validateCommand = new Command('validate')
  .description('Check a profile_config.yml and every cross-file invariant without writing files')
  .argument('<config>', 'Path to profile_config.yml')
  .option('--json', 'Print the report as JSON', false)
  .action(async (configPath: string, options: Partial<ValidateOptions>) => {
    try {
      if (!options.json) {
        logger.discovery(`Validating ${configPath}`);
      }
      const report = await validateConfig(configPath);

      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
        if (!report.valid) process.exitCode = 1;
        return;
      }

      if (!report.valid) {
        logger.error(`[${report.error.code}] ${report.error.message}`);
        if (report.error.suggestion) logger.discovery(report.error.suggestion);
        process.exitCode = 1;
        return;
      }

      logger.success(`Profile ${report.profileName} is valid`);
      logger.info('Requirements', report.requirements);
      logger.info('Abstract tests', report.tests);
      logger.info('Narrative files', report.narrativeFiles);
      logger.info('AsyncAPI', report.asyncapi ? 'yes' : 'no');
      logger.info('Files', report.files);
    } catch (error) {
      handleError(error);
    }
  });
