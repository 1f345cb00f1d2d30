/**
 * Core type definitions for edr-profile-gen
 */

// Configuration types
export type FilterValueType = 'string' | 'number' | 'enum';

export interface ProfileConfig {
  profileName: string;
  title: string;
  collections: CollectionConfig[];
  includeMessaging: boolean;
  filters: FilterConfig[];
  author?: string;
  email?: string;
  organization?: string;
  requirementEdits: RequirementEdit[];
  testEdits: TestEdit[];
}

export interface CollectionConfig {
  name: string;
  queryTypes: string[];
  formats: string[];
  properties: string[];
}

export interface FilterConfig {
  name: string;
  description: string;
  type: FilterValueType;
  values?: string[];
}

/**
 * User edit applied verbatim over a synthesized requirement
 */
export interface RequirementEdit {
  id: string;
  statement?: string;
  parts?: string[];
}

/**
 * User edit applied verbatim over a synthesized abstract test
 */
export interface TestEdit {
  id: string;
  purpose?: string;
  steps?: string[];
}

// Identifier types
declare const requirementIdBrand: unique symbol;
declare const testIdBrand: unique symbol;
declare const channelIdBrand: unique symbol;

export type RequirementId = string & { readonly [requirementIdBrand]: true };
export type TestId = string & { readonly [testIdBrand]: true };
export type ChannelId = string & { readonly [channelIdBrand]: true };

export type FeatureKey =
  | { name: 'openapi' }
  | { name: 'asyncapi' }
  | { name: 'filter'; filter: string };

export type IdentifierScope =
  | { kind: 'collection'; collection: string }
  | { kind: 'query-type'; collection: string; queryType: string }
  | { kind: 'format'; collection: string; format: string }
  | { kind: 'feature'; feature: FeatureKey };

export interface IdentifierRef<T extends string> {
  /** URI path, e.g. /req/{profile}/collections/{collection} */
  path: T;
  /** Document anchor, e.g. req.{profile}.collections.{collection} */
  anchor: string;
  /** Fragment file name, e.g. REQ_collections.{collection}.adoc */
  fileName: string;
}

// Synthesis output types
export interface RequirementNode {
  readonly id: RequirementId;
  readonly anchor: string;
  readonly fileName: string;
  readonly statement: string;
  readonly parts: readonly string[];
  readonly classId: string;
}

export interface TestNode {
  readonly id: TestId;
  readonly anchor: string;
  readonly fileName: string;
  readonly target: RequirementId;
  readonly purpose: string;
  readonly steps: readonly string[];
  readonly classId: string;
}

export interface RequirementsClass {
  readonly id: string;
  readonly anchor: string;
  readonly targetType: string;
  readonly requirements: readonly RequirementId[];
}

export interface ConformanceClass {
  readonly id: string;
  readonly anchor: string;
  readonly target: string;
  readonly tests: readonly TestId[];
}

export interface ProfileGraph {
  readonly profileName: string;
  readonly requirements: readonly RequirementNode[];
  readonly tests: readonly TestNode[];
  readonly requirementsClass: RequirementsClass;
  readonly conformanceClass: ConformanceClass;
}

// Artifact types
export type ArtifactKind = 'narrative' | 'openapi' | 'asyncapi' | 'config' | 'support';

export interface Artifact {
  /** Path relative to the profile output directory */
  path: string;
  content: string;
  kind: ArtifactKind;
}

export interface ArtifactSet {
  profileName: string;
  artifacts: Artifact[];
  summary: {
    requirements: number;
    tests: number;
    narrativeFiles: number;
    asyncapi: boolean;
  };
}

// CLI option types
export interface GlobalOptions {
  quiet: boolean;
  verbose: boolean;
  noColor: boolean;
}

export interface CreateOptions extends GlobalOptions {
  output?: string;
  force: boolean;
}

export interface GenerateOptions extends GlobalOptions {
  output?: string;
  force: boolean;
  dryRun: boolean;
}

export interface ValidateOptions extends GlobalOptions {
  json: boolean;
}
