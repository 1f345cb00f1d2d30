/**
 * edr-profile-gen generate command
 *
 * Regenerates a profile from a persisted profile_config.yml.
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { handleError } from '../../utils/errors.js';
import { readProfileConfig } from '../../core/services/config-manager.js';
import { generateProfile } from '../../core/generator/profile-pipeline.js';
import { writeProfile } from '../../core/generator/profile-writer.js';
import { DEFAULT_CATALOGS } from '../../core/catalog/index.js';
import type { ArtifactSet, GenerateOptions } from '../../types/index.js';

export interface GenerateResult {
  artifacts: ArtifactSet;
  /** Absent on a dry run */
  outputDir?: string;
}

/**
 * Load, generate and (unless dry-running) write a profile
 */
export async function runGenerate(
  configPath: string,
  options: Pick<GenerateOptions, 'output' | 'force' | 'dryRun'>
): Promise<GenerateResult> {
  logger.discovery(`Reading ${configPath}`);
  const config = await readProfileConfig(configPath, DEFAULT_CATALOGS);

  logger.analysis(`Generating profile ${config.profileName}`);
  const artifacts = generateProfile(config, { catalogs: DEFAULT_CATALOGS });

  if (options.dryRun) {
    logger.section('Dry run');
    for (const artifact of artifacts.artifacts) {
      logger.listItem(`${artifact.path} (${artifact.kind})`);
    }
    logger.blank();
    logger.info('Requirements', artifacts.summary.requirements);
    logger.info('Abstract tests', artifacts.summary.tests);
    logger.success('No files written');
    return { artifacts };
  }

  const report = await writeProfile(artifacts, {
    outputDir: options.output ?? `./${config.profileName}`,
    force: options.force,
  });
  return { artifacts, outputDir: report.outputDir };
}

export const generateCommand = new Command('generate')
  .description('Generate a profile from a profile_config.yml file')
  .argument('<config>', 'Path to profile_config.yml')
  .option('-o, --output <dir>', 'Directory to write the profile to (default: ./<profile-name>)')
  .option('--force', 'Write into a non-empty output directory', false)
  .option('--dry-run', 'List the files that would be written without writing them', false)
  .addHelpText(
    'after',
    `
Examples:
  $ edr-profile-gen generate profile_config.yml
  $ edr-profile-gen generate wx/profile_config.yml --output wx --force
                                     Regenerate a profile in place
  $ edr-profile-gen generate profile_config.yml --dry-run
`
  )
  .action(async (configPath: string, options: Partial<GenerateOptions>) => {
    try {
      await runGenerate(configPath, {
        output: options.output,
        force: options.force ?? false,
        dryRun: options.dryRun ?? false,
      });
    } catch (error) {
      handleError(error);
    }
  });
