/**
 * Requirement/Test Synthesizer
 *
 * Expands a profile configuration into the complete set of requirement and
 * abstract test nodes, in canonical order:
 *
 *   1. OpenAPI presence
 *   2. per collection: collection metadata
 *   3. per collection x query type
 *   4. per collection x output format
 *   5. AsyncAPI presence (messaging only)
 *   6. per filter
 *
 * Every requirement gets exactly one test whose target is derived from the
 * requirement id by prefix swap. Any catalog miss aborts the whole run.
 */

import { DEFAULT_CATALOGS, type Catalogs } from '../catalog/index.js';
import { lookupQueryType } from '../catalog/query-types.js';
import { lookupFormat } from '../catalog/formats.js';
import { renderAll, renderTemplate } from '../catalog/template.js';
import {
  IdentifierRegistry,
  conformanceClassUri,
  channelIdFor,
  requirementId,
  requirementsClassUri,
  targetOf,
  testId,
} from './identifiers.js';
import { errors } from '../../utils/errors.js';
import { deepFreeze } from '../../utils/freeze.js';
import type {
  CollectionConfig,
  FilterConfig,
  IdentifierScope,
  ProfileConfig,
  ProfileGraph,
  RequirementNode,
  TestNode,
} from '../../types/index.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Content of one requirement/test pair before identifiers are attached
 */
interface PairDraft {
  scope: IdentifierScope;
  statement: string;
  parts: string[];
  purpose: string;
  steps: string[];
}

// ============================================================================
// FIXED PAIRS
// ============================================================================

function openApiPair(): PairDraft {
  return {
    scope: { kind: 'feature', feature: { name: 'openapi' } },
    statement: 'OpenAPI specification',
    parts: [
      'The service SHALL provide an OpenAPI 3.0 specification',
      'The OpenAPI SHALL document all collection endpoints',
      'The OpenAPI SHALL include GeoJSON schemas',
    ],
    purpose: 'Validate that the service publishes an OpenAPI 3.0 description of every collection endpoint.',
    steps: [
      'Send GET request to /openapi',
      'Verify response is valid OpenAPI 3.0 document',
      'Verify all collection endpoints are documented',
      'Verify GeoJSON schemas are defined',
    ],
  };
}

function collectionPair(collection: CollectionConfig): PairDraft {
  const name = collection.name;
  return {
    scope: { kind: 'collection', collection: name },
    statement: `${name} collection metadata`,
    parts: [
      `The service SHALL provide a /collections/${name} endpoint`,
      'The endpoint SHALL return collection metadata including extent and available query types',
      'The response SHALL conform to OGC API - EDR collection schema',
    ],
    purpose: `Validate that the ${name} collection metadata is published and complete.`,
    steps: [
      `Send GET request to /collections/${name}`,
      'Verify response contains collection metadata including extent',
      `Verify data_queries lists: ${collection.queryTypes.join(', ')}`,
      'Verify response conforms to OGC API - EDR collection schema',
    ],
  };
}

function asyncApiPair(collections: readonly CollectionConfig[]): PairDraft {
  const channels = collections.map(c => channelIdFor(c.name));
  return {
    scope: { kind: 'feature', feature: { name: 'asyncapi' } },
    statement: 'AsyncAPI specification and PubSub messaging',
    parts: [
      'The service SHALL provide an AsyncAPI 3.0 specification',
      `The AsyncAPI SHALL define the notification channels: ${channels.join(', ')}`,
      'The service SHALL support AMQP protocol',
      ...collections.map(
        c => `The service SHALL publish ${c.name} messages to the collections/${c.name}/items/# channel`
      ),
      'Messages SHALL conform to the AsyncAPI schema',
    ],
    purpose: 'Validate that the service describes and operates its PubSub notification channels.',
    steps: [
      'Send GET request to /asyncapi.yaml',
      'Verify response is valid AsyncAPI 3.0 document',
      'Verify channels are defined for notifications',
      'Verify AMQP server is configured',
      'Connect to AMQP broker',
      'Subscribe to notification channel',
      'Verify messages are received',
      'Verify messages conform to AsyncAPI schema',
    ],
  };
}

function describeFilterValues(filter: FilterConfig): string {
  switch (filter.type) {
    case 'string':
      return 'string values';
    case 'number':
      return 'numeric values';
    case 'enum':
      return `one of the values: ${(filter.values ?? []).join(', ')}`;
  }
}

function sampleValues(filter: FilterConfig): { matching: string; other: string } {
  const values = filter.values ?? [];
  if (filter.type === 'enum' && values.length > 0) {
    return {
      matching: `"${values[0]}"`,
      other: values.length > 1 ? `"${values[1]}"` : 'a value outside the enumeration',
    };
  }
  return filter.type === 'number'
    ? { matching: 'a test number', other: 'a different number' }
    : { matching: 'a test value', other: 'a different value' };
}

function filterPair(filter: FilterConfig): PairDraft {
  const { matching, other } = sampleValues(filter);
  return {
    scope: { kind: 'feature', feature: { name: 'filter', filter: filter.name } },
    statement: `${filter.name} subscription filter`,
    parts: [
      `The service SHALL support the ${filter.name} subscription filter: ${filter.description}`,
      `The ${filter.name} filter SHALL accept ${describeFilterValues(filter)}`,
      `The ${filter.name} filter SHALL be declared in the x-ogc-subscription extension of every notification channel`,
      `A subscriber using the ${filter.name} filter SHALL receive only messages whose ${filter.name} matches the filter value`,
    ],
    purpose: `Validate that the ${filter.name} filter narrows delivered notifications to matching messages.`,
    steps: [
      `Verify the x-ogc-subscription extension in the AsyncAPI document declares the ${filter.name} filter`,
      `Subscribe to a notification channel with the ${filter.name} filter set to ${matching}`,
      `Publish a message whose ${filter.name} is ${matching}`,
      `Publish a message whose ${filter.name} is ${other}`,
      'Verify the matching message is received',
      'Verify the non-matching message is not received',
    ],
  };
}

// ============================================================================
// SYNTHESIZER
// ============================================================================

/**
 * Builds one profile graph; instances are single-use
 */
export class ProfileSynthesizer {
  private registry = new IdentifierRegistry();
  private requirements: RequirementNode[] = [];
  private tests: TestNode[] = [];
  private readonly reqClass: string;
  private readonly confClass: string;

  constructor(
    private readonly config: ProfileConfig,
    private readonly catalogs: Catalogs = DEFAULT_CATALOGS
  ) {
    this.reqClass = requirementsClassUri(config.profileName);
    this.confClass = conformanceClassUri(config.profileName);
  }

  synthesize(): ProfileGraph {
    const { config } = this;

    this.emit(openApiPair());

    for (const collection of config.collections) {
      this.emit(collectionPair(collection));
    }

    for (const collection of config.collections) {
      for (const queryType of collection.queryTypes) {
        this.emit(this.queryTypePair(collection, queryType));
      }
    }

    for (const collection of config.collections) {
      for (const format of collection.formats) {
        this.emit(this.formatPair(collection, format));
      }
    }

    if (config.includeMessaging) {
      this.emit(asyncApiPair(config.collections));
    }

    for (const filter of config.filters) {
      this.emit(filterPair(filter));
    }

    this.applyEdits();

    const graph: ProfileGraph = {
      profileName: config.profileName,
      requirements: this.requirements,
      tests: this.tests,
      requirementsClass: {
        id: this.reqClass,
        anchor: `req-class.${config.profileName}.core`,
        targetType: `${config.title} Profile Standard`,
        requirements: this.requirements.map(r => r.id),
      },
      conformanceClass: {
        id: this.confClass,
        anchor: `ats-class.${config.profileName}.core`,
        target: this.reqClass,
        tests: this.tests.map(t => t.id),
      },
    };

    verifyTraceability(graph);
    return deepFreeze(graph);
  }

  private queryTypePair(collection: CollectionConfig, queryType: string): PairDraft {
    const entry = lookupQueryType(this.catalogs.queryTypes, queryType, collection.name);
    const values = { collection: collection.name, profile: this.config.profileName };
    const source = `query type "${entry.id}"`;
    const parts = renderAll(source, entry.parts, values);
    const steps = renderAll(source, entry.steps, values);

    if (entry.acceptsProperties && collection.properties.length > 0) {
      const list = collection.properties.join(', ');
      parts.push(`The response SHALL include properties: ${list}`);
      steps.push(`Verify each Feature includes properties: ${list}`);
    }

    return {
      scope: { kind: 'query-type', collection: collection.name, queryType },
      statement: renderTemplate(source, entry.statement, values),
      parts,
      purpose: `Validate that the ${queryType} query of the ${collection.name} collection is correctly implemented.`,
      steps,
    };
  }

  private formatPair(collection: CollectionConfig, format: string): PairDraft {
    const entry = lookupFormat(this.catalogs.formats, format, collection.name);
    const values = {
      collection: collection.name,
      profile: this.config.profileName,
      format: entry.id,
      label: entry.label,
      mediaType: entry.mediaType,
    };
    const source = `format "${entry.id}"`;

    return {
      scope: { kind: 'format', collection: collection.name, format: entry.id },
      statement: `${collection.name} ${entry.id} output format support`,
      parts: [`Collection ${collection.name} SHALL support the ${entry.id} output format`, ...renderAll(source, entry.parts, values)],
      purpose: `Validate that the ${collection.name} collection provides ${entry.id} output.`,
      steps: renderAll(source, entry.steps, values),
    };
  }

  private emit(draft: PairDraft): void {
    const profile = this.config.profileName;
    const req = requirementId(profile, draft.scope);
    const test = testId(profile, draft.scope);

    this.registry.register(req.path, 'requirement identifier');
    this.registry.register(req.anchor, 'anchor');
    this.registry.register(req.fileName, 'requirement file');
    this.registry.register(test.path, 'test identifier');
    this.registry.register(test.anchor, 'anchor');
    this.registry.register(test.fileName, 'test file');

    this.requirements.push({
      id: req.path,
      anchor: req.anchor,
      fileName: req.fileName,
      statement: draft.statement,
      parts: draft.parts,
      classId: this.reqClass,
    });

    this.tests.push({
      id: test.path,
      anchor: test.anchor,
      fileName: test.fileName,
      target: targetOf(test.path),
      purpose: draft.purpose,
      steps: draft.steps,
      classId: this.confClass,
    });
  }

  /**
   * Persisted edits are authoritative and replace synthesized text verbatim
   */
  private applyEdits(): void {
    for (const edit of this.config.requirementEdits) {
      const index = this.requirements.findIndex(r => r.id === edit.id);
      if (index === -1) {
        throw errors.danglingReference(
          'requirement edit',
          edit.id,
          'an edit must name a requirement synthesized from this configuration'
        );
      }
      const node = this.requirements[index];
      this.requirements[index] = {
        ...node,
        statement: edit.statement ?? node.statement,
        parts: edit.parts ? [...edit.parts] : node.parts,
      };
    }

    for (const edit of this.config.testEdits) {
      const index = this.tests.findIndex(t => t.id === edit.id);
      if (index === -1) {
        throw errors.danglingReference(
          'test edit',
          edit.id,
          'an edit must name an abstract test synthesized from this configuration'
        );
      }
      const node = this.tests[index];
      this.tests[index] = {
        ...node,
        purpose: edit.purpose ?? node.purpose,
        steps: edit.steps ? [...edit.steps] : node.steps,
      };
    }
  }
}

/**
 * Every test targets exactly one existing requirement and every requirement
 * is verified by exactly one test
 */
export function verifyTraceability(graph: Pick<ProfileGraph, 'requirements' | 'tests'>): void {
  const requirementIds = new Set<string>(graph.requirements.map(r => r.id));
  const verified = new Map<string, string>();

  for (const test of graph.tests) {
    if (!requirementIds.has(test.target)) {
      throw errors.danglingReference(test.id, test.target, 'a test target must resolve to a requirement');
    }
    const previous = verified.get(test.target);
    if (previous !== undefined) {
      throw errors.duplicateIdentifier(test.target, `test target (already verified by ${previous})`);
    }
    verified.set(test.target, test.id);
  }

  for (const requirement of graph.requirements) {
    if (!verified.has(requirement.id)) {
      throw errors.danglingReference(requirement.id, '(no test)', 'every requirement needs exactly one abstract test');
    }
  }
}

/**
 * Synthesize the requirement/test graph for a configuration
 */
export function synthesizeProfile(config: ProfileConfig, catalogs: Catalogs = DEFAULT_CATALOGS): ProfileGraph {
  return new ProfileSynthesizer(config, catalogs).synthesize();
}
