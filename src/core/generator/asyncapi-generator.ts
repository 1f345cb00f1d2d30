/**
 * AsyncAPI Generator
 *
 * One notification channel per collection, with the configured subscription
 * filters projected into the x-ogc-subscription extension. Only produced when
 * messaging is enabled.
 */

import { IdentifierRegistry, channelIdFor, pascalCase } from './identifiers.js';
import { channelPointers, type OpenApiDocument } from './openapi-generator.js';
import { errors } from '../../utils/errors.js';
import type { CollectionConfig, FilterConfig, ProfileConfig } from '../../types/index.js';

// ============================================================================
// TYPES
// ============================================================================

export type FilterValueSchema = { type: 'string' } | { type: 'number' } | { type: 'string'; enum: string[] };

export interface SubscriptionFilter {
  name: string;
  description: string;
  schema: FilterValueSchema;
}

export interface AsyncApiChannel {
  address: string;
  description: string;
  'x-ogc-subscription': { filters: SubscriptionFilter[] };
  messages: Record<string, { $ref: string }>;
}

export interface AsyncApiOperation {
  action: 'receive';
  channel: { $ref: string };
  messages: Array<{ $ref: string }>;
}

interface PayloadProperty {
  type: 'string';
  format?: 'date-time';
}

export interface AsyncApiMessage {
  payload: {
    type: 'object';
    required: ['type', 'properties'];
    properties: {
      type: { type: 'string'; const: 'Feature' };
      properties: {
        type: 'object';
        required: ['id', 'timestamp'];
        properties: Record<string, PayloadProperty>;
      };
    };
  };
}

export interface AsyncApiDocument {
  asyncapi: '3.0.0';
  info: { title: string; version: string; description: string };
  servers: Record<string, { host: string; protocol: 'amqp'; description: string }>;
  channels: Record<string, AsyncApiChannel>;
  operations: Record<string, AsyncApiOperation>;
  components: { messages: Record<string, AsyncApiMessage> };
}

// ============================================================================
// PROJECTIONS
// ============================================================================

export function filterValueSchema(filter: FilterConfig): FilterValueSchema {
  switch (filter.type) {
    case 'string':
      return { type: 'string' };
    case 'number':
      return { type: 'number' };
    case 'enum':
      return { type: 'string', enum: [...(filter.values ?? [])] };
  }
}

export function subscriptionFilters(filters: readonly FilterConfig[]): SubscriptionFilter[] {
  return filters.map(f => ({ name: f.name, description: f.description, schema: filterValueSchema(f) }));
}

const ENVELOPE_PROPERTIES = new Set(['id', 'timestamp']);

function messagePayload(collection: CollectionConfig): AsyncApiMessage {
  const entries: Array<[string, PayloadProperty]> = [
    ['id', { type: 'string' }],
    ['timestamp', { type: 'string', format: 'date-time' }],
  ];
  for (const property of collection.properties) {
    if (!ENVELOPE_PROPERTIES.has(property)) entries.push([property, { type: 'string' }]);
  }
  // own keys even for names like __proto__
  const properties: Record<string, PayloadProperty> = Object.fromEntries(entries);
  return {
    payload: {
      type: 'object',
      required: ['type', 'properties'],
      properties: {
        type: { type: 'string', const: 'Feature' },
        properties: { type: 'object', required: ['id', 'timestamp'], properties },
      },
    },
  };
}

function humanize(name: string): string {
  return name
    .split(/[_-]+/)
    .filter(s => s.length > 0)
    .map(s => s[0].toUpperCase() + s.slice(1))
    .join(' ');
}

// ============================================================================
// GENERATOR
// ============================================================================

export function generateAsyncApi(config: ProfileConfig): AsyncApiDocument {
  const channels: Record<string, AsyncApiChannel> = {};
  const operations: Record<string, AsyncApiOperation> = {};
  const messages: Record<string, AsyncApiMessage> = {};
  const names = new IdentifierRegistry();

  for (const collection of config.collections) {
    const channel = channelIdFor(collection.name);
    const pascal = pascalCase(collection.name);
    const messageName = `${pascal}Observation`;
    const channelMessage = `${collection.name}Update`;

    names.register(messageName, 'AsyncAPI message name');

    channels[channel] = {
      address: `collections/${collection.name}/items/#`,
      description: `${humanize(collection.name)} notifications`,
      'x-ogc-subscription': { filters: subscriptionFilters(config.filters) },
      messages: {
        [channelMessage]: { $ref: `#/components/messages/${messageName}` },
      },
    };

    operations[`receive${pascal}Update`] = {
      action: 'receive',
      channel: { $ref: `#/channels/${channel}` },
      messages: [{ $ref: `#/channels/${channel}/messages/${channelMessage}` }],
    };

    messages[messageName] = messagePayload(collection);
  }

  return {
    asyncapi: '3.0.0',
    info: {
      title: `${config.title} Profile AsyncAPI`,
      version: '1.0.0',
      description: `Real-time notifications for ${config.collections.map(c => c.name).join(', ')}`,
    },
    servers: {
      production: { host: 'localhost:5672', protocol: 'amqp', description: 'AMQP broker' },
    },
    channels,
    operations,
    components: { messages },
  };
}

/**
 * Every channel pointer in the OpenAPI document must name an AsyncAPI channel
 */
export function verifyChannelLinks(openapi: OpenApiDocument, asyncapi: AsyncApiDocument | undefined): void {
  const known = new Set(asyncapi ? Object.keys(asyncapi.channels) : []);
  for (const { schema, pointer } of channelPointers(openapi)) {
    if (!known.has(pointer.channel)) {
      throw errors.danglingReference(
        `OpenAPI schema ${schema}`,
        pointer.channel,
        'a channel pointer must name a channel of the AsyncAPI document'
      );
    }
  }
}
