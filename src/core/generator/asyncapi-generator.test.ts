/**
 * Tests for the AsyncAPI generator and channel cross-links
 */

import { describe, it, expect } from 'vitest';
import { filterValueSchema, generateAsyncApi, verifyChannelLinks } from './asyncapi-generator.js';
import { generateOpenApi } from './openapi-generator.js';
import { createProfileConfig, type ProfileConfigInput } from '../services/config-schema.js';
import { ProfileGenError, isProfileGenError } from '../../utils/errors.js';

function thrown(fn: () => unknown): ProfileGenError {
  try {
    fn();
  } catch (error) {
    if (isProfileGenError(error)) return error;
    throw error;
  }
  throw new Error('expected a ProfileGenError');
}

const SCENARIO_2: ProfileConfigInput = {
  profileName: 'weather-stations',
  title: 'Weather Stations',
  collections: [
    { name: 'stations', queryTypes: ['items'], formats: ['GeoJSON'], properties: ['station_id', 'temperature'] },
  ],
  includeMessaging: true,
  filters: [{ name: 'vessel_type', description: 'Type of vessel', type: 'string' }],
};

describe('generateAsyncApi', () => {
  const config = createProfileConfig(SCENARIO_2);
  const asyncapi = generateAsyncApi(config);

  it('should emit one channel with the configured filter', () => {
    expect(Object.keys(asyncapi.channels)).toEqual(['stations_notifications']);

    const channel = asyncapi.channels.stations_notifications;
    expect(channel.address).toBe('collections/stations/items/#');
    expect(channel.description).toBe('Stations notifications');
    expect(channel['x-ogc-subscription']).toEqual({
      filters: [{ name: 'vessel_type', description: 'Type of vessel', schema: { type: 'string' } }],
    });
    expect(channel.messages).toEqual({
      stationsUpdate: { $ref: '#/components/messages/StationsObservation' },
    });
  });

  it('should emit a receive operation per channel', () => {
    expect(asyncapi.operations).toEqual({
      receiveStationsUpdate: {
        action: 'receive',
        channel: { $ref: '#/channels/stations_notifications' },
        messages: [{ $ref: '#/channels/stations_notifications/messages/stationsUpdate' }],
      },
    });
  });

  it('should describe the message payload with the feature properties', () => {
    const payload = asyncapi.components.messages.StationsObservation.payload;

    expect(payload.required).toEqual(['type', 'properties']);
    expect(Object.keys(payload.properties.properties.properties)).toEqual([
      'id',
      'timestamp',
      'station_id',
      'temperature',
    ]);
    expect(payload.properties.properties.properties.timestamp).toEqual({ type: 'string', format: 'date-time' });
  });

  it('should declare an AMQP server', () => {
    expect(asyncapi.asyncapi).toBe('3.0.0');
    expect(asyncapi.servers.production.protocol).toBe('amqp');
    expect(asyncapi.info.description).toBe('Real-time notifications for stations');
  });

  it('should keep properties named like built-in object members', () => {
    const withReserved = generateAsyncApi(
      createProfileConfig({
        ...SCENARIO_2,
        collections: [{ name: 'stations', queryTypes: ['items'], properties: ['constructor', '__proto__', 'id', 'temp'] }],
      })
    );
    const properties = withReserved.components.messages.StationsObservation.payload.properties.properties.properties;

    expect(Object.keys(properties)).toEqual(['id', 'timestamp', 'constructor', '__proto__', 'temp']);
    expect(properties.id).toEqual({ type: 'string' });
  });

  it('should give every channel its own filter list', () => {
    const two = generateAsyncApi(
      createProfileConfig({
        ...SCENARIO_2,
        collections: [
          { name: 'stations', queryTypes: ['items'] },
          { name: 'buoys', queryTypes: ['items'] },
        ],
      })
    );

    expect(two.channels.stations_notifications['x-ogc-subscription'].filters).toEqual(
      two.channels.buoys_notifications['x-ogc-subscription'].filters
    );
    expect(two.channels.stations_notifications['x-ogc-subscription'].filters).not.toBe(
      two.channels.buoys_notifications['x-ogc-subscription'].filters
    );
  });
});

describe('filterValueSchema', () => {
  it('should map each declared type', () => {
    expect(filterValueSchema({ name: 'a', description: '', type: 'string' })).toEqual({ type: 'string' });
    expect(filterValueSchema({ name: 'b', description: '', type: 'number' })).toEqual({ type: 'number' });
    expect(filterValueSchema({ name: 'c', description: '', type: 'enum', values: ['cargo', 'tanker'] })).toEqual({
      type: 'string',
      enum: ['cargo', 'tanker'],
    });
  });
});

describe('verifyChannelLinks', () => {
  const config = createProfileConfig(SCENARIO_2);
  const openapi = generateOpenApi(config);

  it('should accept pointers that name existing channels', () => {
    expect(() => verifyChannelLinks(openapi, generateAsyncApi(config))).not.toThrow();
  });

  it('should reject pointers when no AsyncAPI document exists', () => {
    const error = thrown(() => verifyChannelLinks(openapi, undefined));

    expect(error.code).toBe('DANGLING_REFERENCE');
    expect(error.message).toBe(
      'Dangling reference from "OpenAPI schema StationsFeature" to "stations_notifications": ' +
        'a channel pointer must name a channel of the AsyncAPI document'
    );
  });

  it('should reject pointers to a channel of another profile', () => {
    const other = generateAsyncApi(
      createProfileConfig({ ...SCENARIO_2, collections: [{ name: 'buoys', queryTypes: ['items'] }] })
    );

    expect(thrown(() => verifyChannelLinks(openapi, other)).code).toBe('DANGLING_REFERENCE');
  });

  it('should accept a document without pointers', () => {
    const plain = generateOpenApi(createProfileConfig({ ...SCENARIO_2, includeMessaging: false }));

    expect(() => verifyChannelLinks(plain, undefined)).not.toThrow();
  });
});
