/**
 * OpenAPI Generator
 *
 * Builds the OpenAPI 3.0.3 description of a profile from its collections and
 * the endpoint templates of the query-type catalog. Filters never appear
 * here; they belong to the AsyncAPI document.
 */

import { DEFAULT_CATALOGS, type Catalogs } from '../catalog/index.js';
import { lookupQueryType, type EndpointParameter, type EndpointTemplate } from '../catalog/query-types.js';
import { lookupFormat } from '../catalog/formats.js';
import { renderTemplate } from '../catalog/template.js';
import { IdentifierRegistry, channelIdFor, pascalCase } from './identifiers.js';
import { errors } from '../../utils/errors.js';
import type { CollectionConfig, ProfileConfig } from '../../types/index.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ParameterObject {
  name: string;
  in: 'query' | 'path';
  required?: boolean;
  description?: string;
  schema: { type: 'string' | 'number' };
}

export interface ResponseObject {
  description: string;
  content?: Record<string, Record<string, never>>;
}

export interface OperationObject {
  summary: string;
  parameters?: ParameterObject[];
  responses: Record<string, ResponseObject>;
}

export interface PathItemObject {
  get: OperationObject;
}

/**
 * Link from an entity schema to its notification channel
 */
export interface ChannelPointer {
  asyncapi: string;
  channel: string;
}

type ExtensionKey = `x-${string}`;

export interface EntitySchema {
  type: 'object';
  properties: {
    type: { type: 'string'; enum: ['Feature'] };
    properties: {
      type: 'object';
      properties: Record<string, { type: 'string' }>;
    };
  };
  [extension: ExtensionKey]: ChannelPointer | undefined;
}

export interface OpenApiDocument {
  openapi: '3.0.3';
  info: { title: string; version: string; description: string };
  servers: Array<{ url: string; description: string }>;
  paths: Record<string, PathItemObject>;
  components: { schemas: Record<string, EntitySchema> };
}

export const ASYNCAPI_FILE = 'asyncapi.yaml';

const PUBSUB_KEY = /^x-ogc-edr-.+-pubsub$/;

// ============================================================================
// HELPERS
// ============================================================================

export function entitySchemaName(collection: string): string {
  return `${pascalCase(collection)}Feature`;
}

export function pubSubExtensionKey(profileName: string): ExtensionKey {
  return `x-ogc-edr-${profileName}-pubsub`;
}

function isPubSubKey(key: string): key is ExtensionKey {
  return PUBSUB_KEY.test(key);
}

function toParameter(param: EndpointParameter): ParameterObject {
  const result: ParameterObject = { name: param.name, in: param.in, schema: { type: param.type } };
  if (param.required) result.required = true;
  if (param.description) result.description = param.description;
  return result;
}

function responseContent(mediaTypes: readonly string[]): Record<string, Record<string, never>> | undefined {
  if (mediaTypes.length === 0) return undefined;
  const content: Record<string, Record<string, never>> = {};
  for (const mediaType of mediaTypes) {
    content[mediaType] = {};
  }
  return content;
}

function toPathItem(endpoint: EndpointTemplate, collection: string, mediaTypes: readonly string[]): PathItemObject {
  const response: ResponseObject = { description: endpoint.responseDescription };
  const content = responseContent(mediaTypes);
  if (content) response.content = content;

  const operation: OperationObject = {
    summary: renderTemplate(`endpoint ${endpoint.suffix}`, endpoint.summary, { collection }),
    responses: { '200': response },
  };
  if (endpoint.parameters.length > 0) {
    operation.parameters = endpoint.parameters.map(toParameter);
  }
  return { get: operation };
}

function entitySchema(collection: CollectionConfig): EntitySchema {
  const properties: Record<string, { type: 'string' }> = Object.fromEntries(
    collection.properties.map((property): [string, { type: 'string' }] => [property, { type: 'string' }])
  );
  return {
    type: 'object',
    properties: {
      type: { type: 'string', enum: ['Feature'] },
      properties: { type: 'object', properties },
    },
  };
}

// ============================================================================
// GENERATOR
// ============================================================================

export function generateOpenApi(config: ProfileConfig, catalogs: Catalogs = DEFAULT_CATALOGS): OpenApiDocument {
  const paths: Record<string, PathItemObject> = {};
  const schemas: Record<string, EntitySchema> = {};
  const schemaNames = new IdentifierRegistry();

  for (const collection of config.collections) {
    const mediaTypes = collection.formats.map(f => lookupFormat(catalogs.formats, f, collection.name).mediaType);

    for (const queryType of collection.queryTypes) {
      const entry = lookupQueryType(catalogs.queryTypes, queryType, collection.name);
      for (const endpoint of entry.endpoints) {
        const path = `/collections/${collection.name}/${endpoint.suffix}`;
        if (path in paths) {
          throw errors.duplicateIdentifier(path, 'OpenAPI path');
        }
        paths[path] = toPathItem(endpoint, collection.name, mediaTypes);
      }
    }

    const name = entitySchemaName(collection.name);
    schemaNames.register(name, 'OpenAPI schema name');

    const schema = entitySchema(collection);
    if (config.includeMessaging) {
      schema[pubSubExtensionKey(config.profileName)] = {
        asyncapi: `./${ASYNCAPI_FILE}`,
        channel: channelIdFor(collection.name),
      };
    }
    schemas[name] = schema;
  }

  return {
    openapi: '3.0.3',
    info: {
      title: `${config.title} Profile API`,
      version: '1.0.0',
      description: `OGC API - EDR ${config.title} Profile`,
    },
    servers: [{ url: 'http://localhost:5000', description: 'Development server' }],
    paths,
    components: { schemas },
  };
}

/**
 * Channel pointers carried by the entity schemas, keyed by schema name
 */
export function channelPointers(openapi: OpenApiDocument): Array<{ schema: string; pointer: ChannelPointer }> {
  const result: Array<{ schema: string; pointer: ChannelPointer }> = [];
  for (const [name, schema] of Object.entries(openapi.components.schemas)) {
    for (const key of Object.keys(schema)) {
      if (!isPubSubKey(key)) continue;
      const pointer = schema[key];
      if (pointer) result.push({ schema: name, pointer });
    }
  }
  return result;
}
