/**
 * Query-Type Catalog
 *
 * Requirement, abstract test and HTTP endpoint templates for each supported
 * OGC API - EDR query type. Templates use the {{collection}} marker.
 */

import { errors } from '../../utils/errors.js';
import { deepFreeze } from '../../utils/freeze.js';

// ============================================================================
// TYPES
// ============================================================================

export interface EndpointParameter {
  name: string;
  in: 'query' | 'path';
  required?: boolean;
  description?: string;
  type: 'string' | 'number';
}

/**
 * One HTTP path contributed by a query type, relative to /collections/{collection}/
 */
export interface EndpointTemplate {
  suffix: string;
  summary: string;
  parameters: readonly EndpointParameter[];
  responseDescription: string;
}

export interface QueryTypeEntry {
  id: string;
  statement: string;
  parts: readonly string[];
  steps: readonly string[];
  endpoints: readonly EndpointTemplate[];
  /** Whether configured feature properties become an extra normative part */
  acceptsProperties?: boolean;
}

export type QueryTypeCatalog = ReadonlyMap<string, Readonly<QueryTypeEntry>>;

export const BUILTIN_QUERY_TYPES = [
  'items',
  'position',
  'area',
  'radius',
  'cube',
  'trajectory',
  'corridor',
  'locations',
  'instances',
] as const;

export type BuiltinQueryType = (typeof BUILTIN_QUERY_TYPES)[number];

// ============================================================================
// CATALOG CONSTRUCTION
// ============================================================================

const QUERY_TYPE_ID = /^[a-z][a-z0-9-]*$/;

export function defineQueryTypeCatalog(entries: readonly QueryTypeEntry[]): QueryTypeCatalog {
  const map = new Map<string, Readonly<QueryTypeEntry>>();
  for (const entry of entries) {
    if (!QUERY_TYPE_ID.test(entry.id)) {
      throw errors.invalidConfig('query-type catalog', `"${entry.id}" is not a lowercase hyphenated identifier`);
    }
    if (map.has(entry.id)) {
      throw errors.duplicateIdentifier(entry.id, 'query type');
    }
    map.set(entry.id, deepFreeze({ ...entry }));
  }
  return map;
}

/**
 * Return a new catalog with extra entries appended; the base is untouched
 */
export function extendQueryTypeCatalog(
  base: QueryTypeCatalog,
  entries: readonly QueryTypeEntry[]
): QueryTypeCatalog {
  return defineQueryTypeCatalog([...base.values(), ...entries]);
}

export function lookupQueryType(
  catalog: QueryTypeCatalog,
  queryType: string,
  collection?: string
): Readonly<QueryTypeEntry> {
  const entry = catalog.get(queryType);
  if (!entry) {
    throw errors.unknownQueryType(queryType, [...catalog.keys()], collection);
  }
  return entry;
}

// ============================================================================
// BUILT-IN ENTRIES
// ============================================================================

const DATETIME: EndpointParameter = {
  name: 'datetime',
  in: 'query',
  description: 'Date-time instant or interval',
  type: 'string',
};

const COORDS: EndpointParameter = {
  name: 'coords',
  in: 'query',
  required: true,
  description: 'Well-Known Text geometry',
  type: 'string',
};

function coordsEndpoint(suffix: string, noun: string, extra: EndpointParameter[] = []): EndpointTemplate {
  return {
    suffix,
    summary: `Query {{collection}} by ${noun}`,
    parameters: [COORDS, DATETIME, ...extra],
    responseDescription: 'Query results',
  };
}

const BUILTIN_ENTRIES: QueryTypeEntry[] = [
  {
    id: 'items',
    statement: '{{collection}} items query support',
    parts: [
      'The service SHALL provide a /collections/{{collection}}/items endpoint',
      'The Items query SHALL return GeoJSON FeatureCollection formatted data',
      'The Items query SHALL support GET method',
      'Each Feature SHALL contain the required properties defined in the profile',
      'The service SHALL provide a /collections/{{collection}}/items/{featureId} endpoint for individual items',
    ],
    steps: [
      'Send GET request to /collections/{{collection}}/items',
      'Verify response is valid GeoJSON FeatureCollection',
      'Verify response contains required properties',
      'Send GET request to /collections/{{collection}}/items/{featureId}',
      'Verify response is valid GeoJSON Feature',
    ],
    endpoints: [
      {
        suffix: 'items',
        summary: 'Query {{collection}} items',
        parameters: [
          DATETIME,
          { name: 'bbox', in: 'query', description: 'Bounding box filter', type: 'string' },
        ],
        responseDescription: 'GeoJSON FeatureCollection',
      },
      {
        suffix: 'items/{featureId}',
        summary: 'Get specific {{collection}} item',
        parameters: [{ name: 'featureId', in: 'path', required: true, type: 'string' }],
        responseDescription: 'GeoJSON Feature',
      },
    ],
    acceptsProperties: true,
  },
  {
    id: 'position',
    statement: '{{collection}} position query support',
    parts: [
      'The service SHALL provide a /collections/{{collection}}/position endpoint',
      'The Position query SHALL accept coords parameter with POINT geometry',
      'The Position query SHALL support datetime parameter',
      'The response SHALL return data for the specified position',
    ],
    steps: [
      'Send GET request to /collections/{{collection}}/position with coords parameter',
      'Verify response contains data for the specified position',
      'Verify datetime parameter is supported',
    ],
    endpoints: [coordsEndpoint('position', 'position')],
  },
  {
    id: 'area',
    statement: '{{collection}} area query support',
    parts: [
      'The service SHALL provide a /collections/{{collection}}/area endpoint',
      'The Area query SHALL accept coords parameter with POLYGON or MULTIPOLYGON geometry',
      'The Area query SHALL support datetime parameter',
      'The response SHALL return data within the specified area',
    ],
    steps: [
      'Send GET request to /collections/{{collection}}/area with coords parameter',
      'Verify response contains data within the specified area',
      'Verify POLYGON and MULTIPOLYGON geometries are supported',
    ],
    endpoints: [coordsEndpoint('area', 'area')],
  },
  {
    id: 'radius',
    statement: '{{collection}} radius query support',
    parts: [
      'The service SHALL provide a /collections/{{collection}}/radius endpoint',
      'The Radius query SHALL accept coords parameter with POINT or MULTIPOINT geometry',
      'The Radius query SHALL accept within and within-units parameters',
      'The Radius query SHALL support datetime parameter',
      'The response SHALL return data within the specified distance of the given position',
    ],
    steps: [
      'Send GET request to /collections/{{collection}}/radius with coords, within and within-units parameters',
      'Verify response contains data within the specified radius',
      'Verify a request without within-units is rejected',
    ],
    endpoints: [
      coordsEndpoint('radius', 'radius', [
        { name: 'within', in: 'query', required: true, description: 'Search radius', type: 'number' },
        { name: 'within-units', in: 'query', required: true, description: 'Distance units', type: 'string' },
      ]),
    ],
  },
  {
    id: 'cube',
    statement: '{{collection}} cube query support',
    parts: [
      'The service SHALL provide a /collections/{{collection}}/cube endpoint',
      'The Cube query SHALL accept bbox parameter',
      'The Cube query SHALL support datetime and z parameters',
      'The response SHALL return data within the specified cube',
    ],
    steps: [
      'Send GET request to /collections/{{collection}}/cube with bbox parameter',
      'Verify response contains data within the specified cube',
      'Verify datetime and z parameters are supported',
    ],
    endpoints: [
      {
        suffix: 'cube',
        summary: 'Query {{collection}} by cube',
        parameters: [
          { name: 'bbox', in: 'query', required: true, description: 'Bounding box', type: 'string' },
          DATETIME,
          { name: 'z', in: 'query', description: 'Vertical level or range', type: 'string' },
        ],
        responseDescription: 'Query results',
      },
    ],
  },
  {
    id: 'trajectory',
    statement: '{{collection}} trajectory query support',
    parts: [
      'The service SHALL provide a /collections/{{collection}}/trajectory endpoint',
      'The Trajectory query SHALL accept coords parameter with LINESTRING geometry',
      'The Trajectory query SHALL support datetime parameter',
      'The response SHALL return data along the specified trajectory',
    ],
    steps: [
      'Send GET request to /collections/{{collection}}/trajectory with coords parameter',
      'Verify response contains data along the trajectory',
      'Verify LINESTRING geometry is supported',
    ],
    endpoints: [coordsEndpoint('trajectory', 'trajectory')],
  },
  {
    id: 'corridor',
    statement: '{{collection}} corridor query support',
    parts: [
      'The service SHALL provide a /collections/{{collection}}/corridor endpoint',
      'The Corridor query SHALL accept coords and corridor-width parameters',
      'The Corridor query SHALL support datetime parameter',
      'The response SHALL return data within the specified corridor',
    ],
    steps: [
      'Send GET request to /collections/{{collection}}/corridor with coords and corridor-width parameters',
      'Verify response contains data within the corridor',
      'Verify datetime parameter is supported',
    ],
    endpoints: [
      coordsEndpoint('corridor', 'corridor', [
        { name: 'corridor-width', in: 'query', required: true, description: 'Corridor width', type: 'number' },
      ]),
    ],
  },
  {
    id: 'locations',
    statement: '{{collection}} locations query support',
    parts: [
      'The service SHALL provide a /collections/{{collection}}/locations endpoint',
      'The Locations query SHALL accept locationId parameter',
      'The Locations query SHALL support datetime parameter',
      'The response SHALL return data for the specified location',
    ],
    steps: [
      'Send GET request to /collections/{{collection}}/locations',
      'Verify response lists available locations',
      'Send GET request to /collections/{{collection}}/locations/{locationId}',
      'Verify response contains data for the specified location',
    ],
    endpoints: [
      {
        suffix: 'locations',
        summary: 'Get available locations for {{collection}}',
        parameters: [DATETIME],
        responseDescription: 'GeoJSON FeatureCollection of available locations',
      },
    ],
  },
  {
    id: 'instances',
    statement: '{{collection}} instances query support',
    parts: [
      'The service SHALL provide a /collections/{{collection}}/instances endpoint',
      'The Instances endpoint SHALL list available time instances',
      'Each instance SHALL support the same query types as the collection',
    ],
    steps: [
      'Send GET request to /collections/{{collection}}/instances',
      'Verify response lists available time instances',
      "Verify each instance supports the collection's query types",
    ],
    endpoints: [
      {
        suffix: 'instances',
        summary: 'List {{collection}} instances',
        parameters: [],
        responseDescription: 'Available time instances',
      },
    ],
  },
];

export const QUERY_TYPE_CATALOG: QueryTypeCatalog = defineQueryTypeCatalog(BUILTIN_ENTRIES);
