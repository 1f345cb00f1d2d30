/**
 * Identifier Scheme
 *
 * Maps (profile, scope) to the canonical requirement and test identifiers,
 * their document anchors and fragment file names. A test identifier is its
 * requirement identifier with /req/ swapped for /conf/.
 *
 * Names are restricted to [A-Za-z0-9_-], so joining segments with "/" or "."
 * cannot make two distinct scopes collide.
 */

import { formatKey } from '../catalog/formats.js';
import { errors } from '../../utils/errors.js';
import type {
  ChannelId,
  IdentifierRef,
  IdentifierScope,
  RequirementId,
  TestId,
} from '../../types/index.js';

export const SPEC_BASE_URI = 'http://www.opengis.net/spec/ogcapi-edr-3/1.0';

const REQ_PREFIX = '/req/';
const CONF_PREFIX = '/conf/';
const CHANNEL_SUFFIX = '_notifications';

export function isRequirementId(value: string): value is RequirementId {
  return value.startsWith(REQ_PREFIX);
}

export function isTestId(value: string): value is TestId {
  return value.startsWith(CONF_PREFIX);
}

export function isChannelId(value: string): value is ChannelId {
  return value.endsWith(CHANNEL_SUFFIX) && value.length > CHANNEL_SUFFIX.length;
}

/**
 * Path segments below the profile for a scope
 */
export function scopeSegments(scope: IdentifierScope): string[] {
  switch (scope.kind) {
    case 'collection':
      return ['collections', scope.collection];
    case 'query-type':
      return ['collections', scope.collection, 'query', scope.queryType];
    case 'format':
      return ['collections', scope.collection, 'format', formatKey(scope.format)];
    case 'feature':
      switch (scope.feature.name) {
        case 'openapi':
          return ['openapi'];
        case 'asyncapi':
          return ['asyncapi'];
        case 'filter':
          return ['filters', scope.feature.filter];
      }
  }
}

export function requirementId(profile: string, scope: IdentifierScope): IdentifierRef<RequirementId> {
  const segments = scopeSegments(scope);
  return {
    path: parseRequirementId(`${REQ_PREFIX}${profile}/${segments.join('/')}`),
    anchor: `req.${profile}.${segments.join('.')}`,
    fileName: `REQ_${segments.join('.')}.adoc`,
  };
}

export function testId(profile: string, scope: IdentifierScope): IdentifierRef<TestId> {
  const segments = scopeSegments(scope);
  return {
    path: parseTestId(`${CONF_PREFIX}${profile}/${segments.join('/')}`),
    anchor: `ats.${profile}.${segments.join('.')}`,
    fileName: `ATS_${segments.join('.')}.adoc`,
  };
}

export function parseRequirementId(value: string): RequirementId {
  if (!isRequirementId(value)) {
    throw errors.danglingReference(value, REQ_PREFIX, `requirement identifiers start with ${REQ_PREFIX}`);
  }
  return value;
}

export function parseTestId(value: string): TestId {
  if (!isTestId(value)) {
    throw errors.danglingReference(value, CONF_PREFIX, `test identifiers start with ${CONF_PREFIX}`);
  }
  return value;
}

/** Requirement a test verifies, by prefix swap */
export function targetOf(test: TestId): RequirementId {
  return parseRequirementId(REQ_PREFIX + test.slice(CONF_PREFIX.length));
}

/** Test verifying a requirement, by prefix swap */
export function testIdFor(requirement: RequirementId): TestId {
  return parseTestId(CONF_PREFIX + requirement.slice(REQ_PREFIX.length));
}

export function channelIdFor(collection: string): ChannelId {
  const id = `${collection}${CHANNEL_SUFFIX}`;
  if (!isChannelId(id)) {
    throw errors.danglingReference(collection, id, 'channel identifiers end with _notifications');
  }
  return id;
}

/** weather_stations -> WeatherStations */
export function pascalCase(name: string): string {
  return name
    .split(/[_-]+/)
    .filter(segment => segment.length > 0)
    .map(segment => segment[0].toUpperCase() + segment.slice(1))
    .join('');
}

export function requirementsClassUri(profile: string): string {
  return `${SPEC_BASE_URI}/req/${profile}`;
}

export function conformanceClassUri(profile: string): string {
  return `${SPEC_BASE_URI}/conf/${profile}`;
}

/**
 * Record of issued identifiers for one run; a repeat is a synthesis bug
 */
export class IdentifierRegistry {
  private issued = new Set<string>();

  register(id: string, what = 'identifier'): void {
    if (this.issued.has(id)) {
      throw errors.duplicateIdentifier(id, what);
    }
    this.issued.add(id);
  }

  has(id: string): boolean {
    return this.issued.has(id);
  }

  get size(): number {
    return this.issued.size;
  }
}
