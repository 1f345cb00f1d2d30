/**
 * edr-profile-gen create command
 *
 * Builds a profile configuration interactively, lets the user review the
 * suggested requirements and abstract tests, then generates the profile.
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { handleError, isProfileGenError } from '../../utils/errors.js';
import {
  confirmOverwrite,
  confirmSuggestions,
  isInteractive,
  promptAuthor,
  promptCollections,
  promptFilters,
  promptMessaging,
  promptOutputDir,
  promptProfileName,
  promptTitle,
  reviseRequirement,
  reviseTest,
  type RequirementRevision,
  type TestRevision,
} from '../../utils/prompts.js';
import { DEFAULT_CATALOGS } from '../../core/catalog/index.js';
import { createProfileConfig, type ProfileConfigInput } from '../../core/services/config-schema.js';
import { synthesizeProfile } from '../../core/generator/requirement-synthesizer.js';
import { generateProfile } from '../../core/generator/profile-pipeline.js';
import { writeProfile } from '../../core/generator/profile-writer.js';
import type {
  CreateOptions,
  ProfileConfig,
  RequirementEdit,
  RequirementNode,
  TestEdit,
  TestNode,
} from '../../types/index.js';

// ============================================================================
// EDITS
// ============================================================================

function sameLines(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((line, i) => line === b[i]);
}

/**
 * Edit recording only what the revision changed; undefined when nothing did
 */
export function requirementEditFrom(node: RequirementNode, revision: RequirementRevision): RequirementEdit | undefined {
  const edit: RequirementEdit = { id: node.id };
  if (revision.statement.length > 0 && revision.statement !== node.statement) {
    edit.statement = revision.statement;
  }
  if (revision.parts.length > 0 && !sameLines(revision.parts, node.parts)) {
    edit.parts = revision.parts;
  }
  return edit.statement !== undefined || edit.parts !== undefined ? edit : undefined;
}

export function testEditFrom(node: TestNode, revision: TestRevision): TestEdit | undefined {
  const edit: TestEdit = { id: node.id };
  if (revision.purpose.length > 0 && revision.purpose !== node.purpose) {
    edit.purpose = revision.purpose;
  }
  if (revision.steps.length > 0 && !sameLines(revision.steps, node.steps)) {
    edit.steps = revision.steps;
  }
  return edit.purpose !== undefined || edit.steps !== undefined ? edit : undefined;
}

// ============================================================================
// FLOW
// ============================================================================

async function gatherInput(): Promise<ProfileConfigInput> {
  logger.section('Profile');
  const profileName = await promptProfileName();
  const title = await promptTitle(profileName);

  logger.section('Collections');
  const collections = await promptCollections(DEFAULT_CATALOGS);

  logger.section('Messaging');
  const includeMessaging = await promptMessaging();
  const filters = includeMessaging ? await promptFilters() : [];

  logger.section('Editor');
  const author = await promptAuthor();

  return { profileName, title, collections, includeMessaging, filters, ...author };
}

/**
 * Show the synthesized pairs and collect edits where the user declines them
 */
async function reviewSuggestions(input: ProfileConfigInput): Promise<ProfileConfig> {
  const config = createProfileConfig(input, DEFAULT_CATALOGS);
  const graph = synthesizeProfile(config, DEFAULT_CATALOGS);

  logger.section('Suggested requirements');
  for (const requirement of graph.requirements) {
    logger.listItem(`${requirement.id}: ${requirement.statement}`);
  }
  logger.blank();

  if (await confirmSuggestions()) {
    return config;
  }

  const requirementEdits: RequirementEdit[] = [];
  for (const requirement of graph.requirements) {
    const revision = await reviseRequirement(requirement);
    const edit = revision && requirementEditFrom(requirement, revision);
    if (edit) requirementEdits.push(edit);
  }

  const testEdits: TestEdit[] = [];
  for (const test of graph.tests) {
    const revision = await reviseTest(test);
    const edit = revision && testEditFrom(test, revision);
    if (edit) testEdits.push(edit);
  }

  return createProfileConfig({ ...input, requirementEdits, testEdits }, DEFAULT_CATALOGS);
}

export const createCommand = new Command('create')
  .description('Create a new EDR Part 3 profile interactively')
  .option('-o, --output <dir>', 'Directory to write the profile to (default: ./<profile-name>)')
  .option('--force', 'Write into a non-empty output directory', false)
  .addHelpText(
    'after',
    `
Examples:
  $ edr-profile-gen create                        Answer the prompts, write ./<profile-name>
  $ edr-profile-gen create --output profiles/wx   Choose the output directory
`
  )
  .action(async (options: Partial<CreateOptions>) => {
    if (!isInteractive()) {
      logger.error('create needs an interactive terminal');
      logger.discovery("Use 'edr-profile-gen generate <config>' to build a profile from a configuration file.");
      process.exitCode = 1;
      return;
    }

    try {
      const input = await gatherInput();
      const config = await reviewSuggestions(input);

      logger.analysis('Generating profile');
      const artifacts = generateProfile(config, { catalogs: DEFAULT_CATALOGS });

      const outputDir = options.output ?? (await promptOutputDir(`./${config.profileName}`));
      try {
        await writeProfile(artifacts, { outputDir, force: options.force ?? false });
      } catch (error) {
        if (!isProfileGenError(error) || error.code !== 'OUTPUT_EXISTS' || !(await confirmOverwrite(outputDir))) {
          throw error;
        }
        await writeProfile(artifacts, { outputDir, force: true });
      }
    } catch (error) {
      handleError(error);
    }
  });
