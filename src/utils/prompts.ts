/**
 * Interactive prompts for building a profile configuration
 *
 * Thin wrappers around @inquirer/prompts. Every function returns plain data;
 * validation of the assembled configuration happens in the config schema.
 */

import { checkbox, confirm, input, select } from '@inquirer/prompts';
import logger from './logger.js';
import { NAME_PATTERN, PROFILE_NAME_PATTERN } from '../core/services/config-schema.js';
import type { Catalogs } from '../core/catalog/index.js';
import type { FilterConfig, FilterValueType, RequirementNode, TestNode } from '../types/index.js';

let interactiveOverride: boolean | undefined;

/**
 * Whether prompts can be shown (both stdin and stdout are terminals)
 */
export function isInteractive(): boolean {
  if (interactiveOverride !== undefined) return interactiveOverride;
  return process.stdin.isTTY === true && process.stdout.isTTY === true;
}

export function setInteractiveMode(enabled: boolean): void {
  interactiveOverride = enabled;
}

/**
 * Split a delimited answer into trimmed, non-empty items
 */
export function splitList(text: string, separator = ','): string[] {
  return text
    .split(separator)
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function validateName(value: string): true | string {
  return NAME_PATTERN.test(value.trim()) || 'Use letters, digits, "_" and "-", starting with a letter or digit';
}

// ============================================================================
// PROFILE METADATA
// ============================================================================

export async function promptProfileName(): Promise<string> {
  const name = await input({
    message: 'Profile name (lowercase, hyphen-delimited, e.g. weather-stations):',
    validate: value =>
      PROFILE_NAME_PATTERN.test(value.trim()) || 'Use lowercase letters and digits separated by single hyphens',
  });
  return name.trim();
}

export async function promptTitle(profileName: string): Promise<string> {
  const suggested = profileName
    .split('-')
    .map(word => word[0].toUpperCase() + word.slice(1))
    .join(' ');
  const title = await input({
    message: 'Profile title:',
    default: suggested,
    validate: value => value.trim().length > 0 || 'A title is required',
  });
  return title.trim();
}

export interface AuthorAnswers {
  author?: string;
  email?: string;
  organization?: string;
}

export async function promptAuthor(): Promise<AuthorAnswers> {
  const answers: AuthorAnswers = {};
  const author = (await input({ message: 'Editor name (optional):' })).trim();
  const email = (await input({ message: 'Editor email (optional):' })).trim();
  const organization = (await input({ message: 'Organization (optional):' })).trim();
  if (author) answers.author = author;
  if (email) answers.email = email;
  if (organization) answers.organization = organization;
  return answers;
}

// ============================================================================
// COLLECTIONS
// ============================================================================

export interface CollectionAnswers {
  name: string;
  queryTypes: string[];
  formats: string[];
  properties: string[];
}

async function promptQueryTypes(name: string, catalogs: Catalogs): Promise<string[]> {
  const choices = [...catalogs.queryTypes.keys()].map(id => ({ name: id, value: id }));
  for (;;) {
    const selected = await checkbox({ message: `Query types for ${name}:`, choices });
    if (selected.length > 0) return selected;
    logger.warning('Select at least one query type');
  }
}

export async function promptCollection(catalogs: Catalogs, taken: readonly string[]): Promise<CollectionAnswers> {
  const name = (
    await input({
      message: 'Collection name:',
      validate: value => {
        const valid = validateName(value);
        if (valid !== true) return valid;
        return !taken.includes(value.trim()) || `Collection "${value.trim()}" already exists`;
      },
    })
  ).trim();

  const queryTypes = await promptQueryTypes(name, catalogs);

  const formats = await checkbox({
    message: `Output formats for ${name}:`,
    choices: [...catalogs.formats.values()].map(entry => ({
      name: `${entry.id} (${entry.mediaType})`,
      value: entry.id,
    })),
  });

  let properties: string[] = [];
  if (queryTypes.some(qt => catalogs.queryTypes.get(qt)?.acceptsProperties === true)) {
    properties = splitList(await input({ message: `Feature properties for ${name} (comma-separated, optional):` }));
  }

  return { name, queryTypes, formats, properties };
}

export async function promptCollections(catalogs: Catalogs): Promise<CollectionAnswers[]> {
  const collections: CollectionAnswers[] = [];
  do {
    collections.push(await promptCollection(catalogs, collections.map(c => c.name)));
  } while (await confirm({ message: 'Add another collection?', default: false }));
  return collections;
}

// ============================================================================
// MESSAGING
// ============================================================================

export async function promptMessaging(): Promise<boolean> {
  return confirm({ message: 'Include PubSub messaging (AsyncAPI)?', default: false });
}

export async function promptFilters(): Promise<FilterConfig[]> {
  const filters: FilterConfig[] = [];
  while (await confirm({ message: filters.length === 0 ? 'Add a subscription filter?' : 'Add another filter?', default: false })) {
    const taken = filters.map(f => f.name);
    const name = (
      await input({
        message: 'Filter name:',
        validate: value => {
          const valid = validateName(value);
          if (valid !== true) return valid;
          return !taken.includes(value.trim()) || `Filter "${value.trim()}" already exists`;
        },
      })
    ).trim();
    const description = (await input({ message: 'Filter description:' })).trim();
    const type = await select<FilterValueType>({
      message: 'Filter value type:',
      choices: [
        { name: 'string', value: 'string' },
        { name: 'number', value: 'number' },
        { name: 'enum', value: 'enum' },
      ],
    });

    const filter: FilterConfig = { name, description, type };
    if (type === 'enum') {
      filter.values = splitList(
        await input({
          message: 'Allowed values (comma-separated):',
          validate: value => splitList(value).length > 0 || 'An enum filter needs at least one value',
        })
      );
    }
    filters.push(filter);
  }
  return filters;
}

// ============================================================================
// REVIEW
// ============================================================================

export async function confirmSuggestions(): Promise<boolean> {
  return confirm({ message: 'Use the suggested requirements and abstract tests as they are?', default: true });
}

export interface RequirementRevision {
  statement: string;
  parts: string[];
}

export interface TestRevision {
  purpose: string;
  steps: string[];
}

const LINE_SEPARATOR = '|';

/**
 * Ask for a revised statement and parts; undefined when the user keeps it
 */
export async function reviseRequirement(node: RequirementNode): Promise<RequirementRevision | undefined> {
  if (!(await confirm({ message: `Edit ${node.id}?`, default: false }))) return undefined;
  const statement = await input({ message: 'Statement:', default: node.statement });
  const parts = splitList(
    await input({ message: `Parts (separated by "${LINE_SEPARATOR}"):`, default: node.parts.join(` ${LINE_SEPARATOR} `) }),
    LINE_SEPARATOR
  );
  return { statement: statement.trim(), parts };
}

export async function reviseTest(node: TestNode): Promise<TestRevision | undefined> {
  if (!(await confirm({ message: `Edit ${node.id}?`, default: false }))) return undefined;
  const purpose = await input({ message: 'Test purpose:', default: node.purpose });
  const steps = splitList(
    await input({ message: `Steps (separated by "${LINE_SEPARATOR}"):`, default: node.steps.join(` ${LINE_SEPARATOR} `) }),
    LINE_SEPARATOR
  );
  return { purpose: purpose.trim(), steps };
}

export async function promptOutputDir(defaultDir: string): Promise<string> {
  return (await input({ message: 'Output directory:', default: defaultDir })).trim();
}

export async function confirmOverwrite(dir: string): Promise<boolean> {
  return confirm({ message: `${dir} is not empty. Write into it anyway?`, default: false });
}
