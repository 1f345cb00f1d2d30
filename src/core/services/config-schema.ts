/**
 * Profile configuration schema
 *
 * Validates the persisted (snake_case) configuration form and converts it to
 * a frozen ProfileConfig. Query types and formats are checked against the
 * catalogs after the shape is valid, so a misspelled entry fails with
 * UNKNOWN_QUERY_TYPE / UNKNOWN_FORMAT instead of a generic schema error.
 */

import { z, type ZodIssue } from 'zod';
import { DEFAULT_CATALOGS, type Catalogs } from '../catalog/index.js';
import { lookupQueryType } from '../catalog/query-types.js';
import { formatKey, lookupFormat } from '../catalog/formats.js';
import { pascalCase } from '../generator/identifiers.js';
import { errors } from '../../utils/errors.js';
import { deepFreeze } from '../../utils/freeze.js';
import type {
  CollectionConfig,
  FilterConfig,
  ProfileConfig,
  RequirementEdit,
  TestEdit,
} from '../../types/index.js';

// ============================================================================
// SCHEMA
// ============================================================================

export const PROFILE_NAME_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;
export const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

// Rendered into one-line AsciiDoc attributes, headings and block entries
const singleLine = z.string().regex(/^[^\r\n]*$/, 'must be a single line');
const singleLineText = singleLine.min(1);

const nameField = z
  .string()
  .regex(NAME_PATTERN, 'must start with a letter or digit and contain only letters, digits, "_" and "-"');

function uniqueBy<T>(items: readonly T[], key: (item: T) => string): string[] {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const item of items) {
    const k = key(item);
    if (seen.has(k) && !duplicates.includes(k)) duplicates.push(k);
    seen.add(k);
  }
  return duplicates;
}

function refineUnique<T>(
  items: readonly T[],
  key: (item: T) => string,
  what: string,
  ctx: z.RefinementCtx,
  path: (string | number)[] = []
): void {
  for (const duplicate of uniqueBy(items, key)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `duplicate ${what} "${duplicate}"`,
      path,
    });
  }
}

/**
 * Collections whose names differ only in case or separators would share an
 * OpenAPI schema and AsyncAPI message name
 */
function refineSchemaNames(collections: ReadonlyArray<{ name: string }>, ctx: z.RefinementCtx): void {
  const seen = new Map<string, string>();
  collections.forEach((collection, index) => {
    const pascal = pascalCase(collection.name);
    const first = seen.get(pascal);
    if (first === undefined) {
      seen.set(pascal, collection.name);
    } else if (first !== collection.name) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `collections "${first}" and "${collection.name}" both map to the schema name ${pascal}Feature`,
        path: ['collections', index, 'name'],
      });
    }
  });
}

export const CollectionSchema = z
  .object({
    name: nameField,
    query_types: z.array(z.string().min(1)).min(1, 'a collection needs at least one query type'),
    formats: z.array(z.string().min(1)).default([]),
    properties: z.array(z.string().regex(/^\S+$/, 'property names cannot contain whitespace')).default([]),
  })
  .strict()
  .superRefine((collection, ctx) => {
    refineUnique(collection.query_types, q => q, 'query type', ctx, ['query_types']);
    refineUnique(collection.formats, formatKey, 'format', ctx, ['formats']);
    refineUnique(collection.properties, p => p, 'property', ctx, ['properties']);
  });

export const FilterSchema = z
  .object({
    name: nameField,
    description: singleLine.default(''),
    type: z.enum(['string', 'number', 'enum']),
    values: z.array(singleLineText).optional(),
  })
  .strict()
  .superRefine((filter, ctx) => {
    if (filter.type === 'enum' && (filter.values === undefined || filter.values.length === 0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'enum filters need at least one value', path: ['values'] });
    }
    if (filter.type !== 'enum' && filter.values !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'only enum filters take values', path: ['values'] });
    }
  });

export const RequirementEditSchema = z
  .object({
    id: z.string().startsWith('/req/'),
    statement: singleLineText.optional(),
    parts: z.array(singleLineText).min(1).optional(),
  })
  .strict();

export const TestEditSchema = z
  .object({
    id: z.string().startsWith('/conf/'),
    purpose: singleLineText.optional(),
    steps: z.array(singleLineText).min(1).optional(),
  })
  .strict();

export const PersistedConfigSchema = z
  .object({
    profile_name: z.string().regex(PROFILE_NAME_PATTERN, 'must be lowercase and hyphen-delimited, e.g. weather-stations'),
    title: singleLineText,
    author: singleLine.optional(),
    email: singleLine.optional(),
    organization: singleLine.optional(),
    include_messaging: z.boolean().default(false),
    collections: z.array(CollectionSchema).min(1, 'a profile needs at least one collection'),
    filters: z.array(FilterSchema).default([]),
    requirements: z.array(RequirementEditSchema).default([]),
    tests: z.array(TestEditSchema).default([]),
  })
  .strict()
  .superRefine((config, ctx) => {
    refineUnique(config.collections, c => c.name, 'collection', ctx, ['collections']);
    refineSchemaNames(config.collections, ctx);
    refineUnique(config.filters, f => f.name, 'filter', ctx, ['filters']);
    refineUnique(config.requirements, r => r.id, 'requirement edit', ctx, ['requirements']);
    refineUnique(config.tests, t => t.id, 'test edit', ctx, ['tests']);
  });

export type PersistedConfig = z.infer<typeof PersistedConfigSchema>;

/** Persisted form before defaults are applied */
export type PersistedConfigInput = z.input<typeof PersistedConfigSchema>;

// ============================================================================
// CONVERSION
// ============================================================================

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

function toCollection(
  raw: PersistedConfig['collections'][number],
  catalogs: Catalogs
): CollectionConfig {
  for (const queryType of raw.query_types) {
    lookupQueryType(catalogs.queryTypes, queryType, raw.name);
  }
  return {
    name: raw.name,
    queryTypes: [...raw.query_types],
    formats: raw.formats.map(f => lookupFormat(catalogs.formats, f, raw.name).id),
    properties: [...raw.properties],
  };
}

function toFilter(raw: PersistedConfig['filters'][number]): FilterConfig {
  const filter: FilterConfig = { name: raw.name, description: raw.description, type: raw.type };
  if (raw.values !== undefined) filter.values = [...raw.values];
  return filter;
}

function toRequirementEdit(raw: PersistedConfig['requirements'][number]): RequirementEdit {
  const edit: RequirementEdit = { id: raw.id };
  if (raw.statement !== undefined) edit.statement = raw.statement;
  if (raw.parts !== undefined) edit.parts = [...raw.parts];
  return edit;
}

function toTestEdit(raw: PersistedConfig['tests'][number]): TestEdit {
  const edit: TestEdit = { id: raw.id };
  if (raw.purpose !== undefined) edit.purpose = raw.purpose;
  if (raw.steps !== undefined) edit.steps = [...raw.steps];
  return edit;
}

/**
 * Validate a raw persisted configuration and convert it to a frozen ProfileConfig
 *
 * @param source - File name or other label used in error messages
 */
export function parseProfileConfig(
  input: unknown,
  catalogs: Catalogs = DEFAULT_CATALOGS,
  source = 'configuration'
): ProfileConfig {
  const result = PersistedConfigSchema.safeParse(input);
  if (!result.success) {
    throw errors.invalidConfig(source, formatIssues(result.error.issues));
  }

  const raw = result.data;
  const config: ProfileConfig = {
    profileName: raw.profile_name,
    title: raw.title,
    collections: raw.collections.map(c => toCollection(c, catalogs)),
    includeMessaging: raw.include_messaging,
    filters: raw.filters.map(toFilter),
    requirementEdits: raw.requirements.map(toRequirementEdit),
    testEdits: raw.tests.map(toTestEdit),
  };
  if (raw.author !== undefined) config.author = raw.author;
  if (raw.email !== undefined) config.email = raw.email;
  if (raw.organization !== undefined) config.organization = raw.organization;

  return deepFreeze(config);
}

/**
 * Persisted form of a configuration with a fixed key order
 */
export function toPersistedConfig(config: ProfileConfig): PersistedConfig {
  return {
    profile_name: config.profileName,
    title: config.title,
    ...(config.author !== undefined ? { author: config.author } : {}),
    ...(config.email !== undefined ? { email: config.email } : {}),
    ...(config.organization !== undefined ? { organization: config.organization } : {}),
    include_messaging: config.includeMessaging,
    collections: config.collections.map(c => ({
      name: c.name,
      query_types: [...c.queryTypes],
      formats: [...c.formats],
      properties: [...c.properties],
    })),
    filters: config.filters.map(f => ({
      name: f.name,
      description: f.description,
      type: f.type,
      ...(f.values !== undefined ? { values: [...f.values] } : {}),
    })),
    requirements: config.requirementEdits.map(e => ({
      id: e.id,
      ...(e.statement !== undefined ? { statement: e.statement } : {}),
      ...(e.parts !== undefined ? { parts: [...e.parts] } : {}),
    })),
    tests: config.testEdits.map(e => ({
      id: e.id,
      ...(e.purpose !== undefined ? { purpose: e.purpose } : {}),
      ...(e.steps !== undefined ? { steps: [...e.steps] } : {}),
    })),
  };
}

/**
 * Programmatic configuration input; omitted lists default to empty
 */
export interface ProfileConfigInput {
  profileName: string;
  title: string;
  collections: Array<{
    name: string;
    queryTypes: string[];
    formats?: string[];
    properties?: string[];
  }>;
  includeMessaging?: boolean;
  filters?: FilterConfig[];
  author?: string;
  email?: string;
  organization?: string;
  requirementEdits?: RequirementEdit[];
  testEdits?: TestEdit[];
}

/**
 * Build a validated ProfileConfig from programmatic input
 */
export function createProfileConfig(
  input: ProfileConfigInput,
  catalogs: Catalogs = DEFAULT_CATALOGS
): ProfileConfig {
  return parseProfileConfig(
    toPersistedConfig({
      profileName: input.profileName,
      title: input.title,
      collections: input.collections.map(c => ({
        name: c.name,
        queryTypes: c.queryTypes,
        formats: c.formats ?? [],
        properties: c.properties ?? [],
      })),
      includeMessaging: input.includeMessaging ?? false,
      filters: input.filters ?? [],
      author: input.author,
      email: input.email,
      organization: input.organization,
      requirementEdits: input.requirementEdits ?? [],
      testEdits: input.testEdits ?? [],
    }),
    catalogs
  );
}
