/**
 * Profile Writer
 *
 * Persists a generated artifact set under an output directory and reports
 * what was written.
 */

import { mkdir, readdir, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import logger from '../../utils/logger.js';
import { errors } from '../../utils/errors.js';
import type { ArtifactSet } from '../../types/index.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ProfileWriterOptions {
  /** Directory the profile is written to; created when missing */
  outputDir: string;
  /** Write into a non-empty directory, overwriting files with the same name */
  force?: boolean;
}

export interface WriteReport {
  outputDir: string;
  filesWritten: string[];
  nextSteps: string[];
}

// ============================================================================
// WRITER
// ============================================================================

async function listDirectory(path: string): Promise<string[] | undefined> {
  try {
    return await readdir(path);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw errors.fileReadError(path, error instanceof Error ? error.message : String(error));
  }
}

function nextSteps(set: ArtifactSet, outputDir: string): string[] {
  const steps = [
    `Review the requirements in ${join(outputDir, 'requirements', 'core')}`,
    `Compile the document with: cd ${outputDir} && make`,
    `Validate the HTTP API against ${join(outputDir, 'openapi.yaml')}`,
  ];
  if (set.summary.asyncapi) {
    steps.push(`Validate the PubSub description in ${join(outputDir, 'asyncapi.yaml')}`);
  }
  steps.push(`Regenerate after editing ${join(outputDir, 'profile_config.yml')}`);
  return steps;
}

function logSummary(set: ArtifactSet, report: WriteReport): void {
  logger.blank();
  logger.success('=== Profile Generated ===');
  logger.blank();
  logger.info('Profile', set.profileName);
  logger.info('Location', report.outputDir);
  logger.info('Requirements', set.summary.requirements);
  logger.info('Abstract tests', set.summary.tests);
  logger.info('Files written', report.filesWritten.length);
  logger.info('AsyncAPI', set.summary.asyncapi ? 'yes' : 'no');
  logger.blank();
  logger.discovery('Next steps:');
  report.nextSteps.forEach((step, i) => logger.listItem(`${i + 1}. ${step}`));
  logger.blank();
}

/**
 * Write every artifact of a profile
 */
export async function writeProfile(set: ArtifactSet, options: ProfileWriterOptions): Promise<WriteReport> {
  const outputDir = resolve(options.outputDir);

  const existing = await listDirectory(outputDir);
  if (existing && existing.length > 0 && !options.force) {
    throw errors.outputExists(outputDir);
  }

  const filesWritten: string[] = [];
  for (const artifact of set.artifacts) {
    const fullPath = join(outputDir, ...artifact.path.split('/'));
    try {
      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, artifact.content, 'utf-8');
    } catch (error) {
      throw errors.fileWriteError(fullPath, error instanceof Error ? error.message : String(error));
    }
    logger.debug(`Wrote ${artifact.path}`);
    filesWritten.push(artifact.path);
  }

  const report: WriteReport = { outputDir, filesWritten, nextSteps: nextSteps(set, outputDir) };
  logSummary(set, report);
  return report;
}
