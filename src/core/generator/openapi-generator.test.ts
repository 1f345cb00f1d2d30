/**
 * Tests for the OpenAPI generator
 */

import { describe, it, expect } from 'vitest';
import { channelPointers, entitySchemaName, generateOpenApi, pubSubExtensionKey } from './openapi-generator.js';
import { createProfileConfig, type ProfileConfigInput } from '../services/config-schema.js';
import { FORMAT_CATALOG, QUERY_TYPE_CATALOG, extendQueryTypeCatalog } from '../catalog/index.js';
import { ProfileGenError, isProfileGenError } from '../../utils/errors.js';
import type { ProfileConfig } from '../../types/index.js';

function thrown(fn: () => unknown): ProfileGenError {
  try {
    fn();
  } catch (error) {
    if (isProfileGenError(error)) return error;
    throw error;
  }
  throw new Error('expected a ProfileGenError');
}

const SCENARIO_1: ProfileConfigInput = {
  profileName: 'weather-stations',
  title: 'Weather Stations',
  collections: [
    { name: 'stations', queryTypes: ['items'], formats: ['GeoJSON'], properties: ['station_id', 'temperature'] },
  ],
};

describe('generateOpenApi', () => {
  describe('single collection with items', () => {
    const openapi = generateOpenApi(createProfileConfig(SCENARIO_1));

    it('should describe the document', () => {
      expect(openapi.openapi).toBe('3.0.3');
      expect(openapi.info).toEqual({
        title: 'Weather Stations Profile API',
        version: '1.0.0',
        description: 'OGC API - EDR Weather Stations Profile',
      });
    });

    it('should emit exactly the two items paths', () => {
      expect(Object.keys(openapi.paths)).toEqual([
        '/collections/stations/items',
        '/collections/stations/items/{featureId}',
      ]);
    });

    it('should describe the items operation', () => {
      expect(openapi.paths['/collections/stations/items'].get).toEqual({
        summary: 'Query stations items',
        parameters: [
          { name: 'datetime', in: 'query', description: 'Date-time instant or interval', schema: { type: 'string' } },
          { name: 'bbox', in: 'query', description: 'Bounding box filter', schema: { type: 'string' } },
        ],
        responses: {
          '200': { description: 'GeoJSON FeatureCollection', content: { 'application/geo+json': {} } },
        },
      });
    });

    it('should mark path parameters as required', () => {
      expect(openapi.paths['/collections/stations/items/{featureId}'].get.parameters).toEqual([
        { name: 'featureId', in: 'path', required: true, schema: { type: 'string' } },
      ]);
    });

    it('should define one entity schema with the feature properties', () => {
      expect(openapi.components.schemas).toEqual({
        StationsFeature: {
          type: 'object',
          properties: {
            type: { type: 'string', enum: ['Feature'] },
            properties: {
              type: 'object',
              properties: { station_id: { type: 'string' }, temperature: { type: 'string' } },
            },
          },
        },
      });
      expect(channelPointers(openapi)).toEqual([]);
    });
  });

  describe('other query types', () => {
    it('should emit one path per query type and list every format media type', () => {
      const openapi = generateOpenApi(
        createProfileConfig({
          profileName: 'forecast',
          title: 'Forecast',
          collections: [
            { name: 'model', queryTypes: ['position', 'radius', 'instances'], formats: ['CoverageJSON', 'NetCDF'] },
          ],
        })
      );

      expect(Object.keys(openapi.paths)).toEqual([
        '/collections/model/position',
        '/collections/model/radius',
        '/collections/model/instances',
      ]);

      const radius = openapi.paths['/collections/model/radius'].get;
      expect(radius.summary).toBe('Query model by radius');
      expect(radius.parameters?.map(p => p.name)).toEqual(['coords', 'datetime', 'within', 'within-units']);
      expect(radius.responses['200'].content).toEqual({
        'application/prs.coverage+json': {},
        'application/x-netcdf': {},
      });

      expect(openapi.paths['/collections/model/instances'].get.parameters).toBeUndefined();
    });

    it('should reject a catalog summary with a marker the generator does not fill', () => {
      const queryTypes = extendQueryTypeCatalog(QUERY_TYPE_CATALOG, [
        {
          id: 'tiles',
          statement: '{{collection}} tiles support',
          parts: [],
          steps: [],
          endpoints: [{ suffix: 'tiles', summary: 'Tiles of {{colection}}', parameters: [], responseDescription: 'Tiles' }],
        },
      ]);
      const catalogs = { queryTypes, formats: FORMAT_CATALOG };
      const config = createProfileConfig({ profileName: 'maps', title: 'Maps', collections: [{ name: 'relief', queryTypes: ['tiles'] }] }, catalogs);

      const error = thrown(() => generateOpenApi(config, catalogs));
      expect(error.code).toBe('UNRESOLVED_PLACEHOLDER');
      expect(error.message).toBe(
        'Unresolved placeholder(s) "{{colection}}" in endpoint tiles: rendered templates must not contain substitution markers'
      );
    });

    it('should omit response content when no format is configured', () => {
      const openapi = generateOpenApi(
        createProfileConfig({ profileName: 'p', title: 'P', collections: [{ name: 'c', queryTypes: ['cube'] }] })
      );

      expect(openapi.paths['/collections/c/cube'].get.responses['200']).toEqual({ description: 'Query results' });
    });
  });

  describe('messaging', () => {
    it('should point each entity schema at its notification channel', () => {
      const openapi = generateOpenApi(createProfileConfig({ ...SCENARIO_1, includeMessaging: true }));

      expect(openapi.components.schemas.StationsFeature['x-ogc-edr-weather-stations-pubsub']).toEqual({
        asyncapi: './asyncapi.yaml',
        channel: 'stations_notifications',
      });
      expect(channelPointers(openapi)).toEqual([
        { schema: 'StationsFeature', pointer: { asyncapi: './asyncapi.yaml', channel: 'stations_notifications' } },
      ]);
    });

    it('should leave filters out of the document', () => {
      const withFilters = generateOpenApi(
        createProfileConfig({
          ...SCENARIO_1,
          includeMessaging: true,
          filters: [{ name: 'vessel_type', description: 'Type of vessel', type: 'string' }],
        })
      );
      const withoutFilters = generateOpenApi(createProfileConfig({ ...SCENARIO_1, includeMessaging: true }));

      expect(withFilters).toEqual(withoutFilters);
    });
  });

  describe('feature properties', () => {
    it('should keep properties named like built-in object members', () => {
      const openapi = generateOpenApi(
        createProfileConfig({
          ...SCENARIO_1,
          collections: [{ name: 'stations', queryTypes: ['items'], properties: ['constructor', '__proto__', 'temp'] }],
        })
      );
      const properties = openapi.components.schemas.StationsFeature.properties.properties.properties;

      expect(Object.keys(properties)).toEqual(['constructor', '__proto__', 'temp']);
      expect(Object.getPrototypeOf(properties)).toBe(Object.prototype);
    });
  });

  describe('schema names', () => {
    it('should derive names from the collection', () => {
      expect(entitySchemaName('weather_stations')).toBe('WeatherStationsFeature');
      expect(pubSubExtensionKey('ais')).toBe('x-ogc-edr-ais-pubsub');
    });

    it('should reject colliding collection names before generation', () => {
      const error = thrown(() =>
        createProfileConfig({
          profileName: 'p',
          title: 'P',
          collections: [
            { name: 'sea_ice', queryTypes: ['area'] },
            { name: 'sea-ice', queryTypes: ['area'] },
          ],
        })
      );

      expect(error.code).toBe('INVALID_CONFIG');
      expect(error.message).toContain('collections "sea_ice" and "sea-ice" both map to the schema name SeaIceFeature');
    });

    it('should still refuse a duplicate schema name in an unvalidated configuration', () => {
      const config: ProfileConfig = {
        profileName: 'p',
        title: 'P',
        collections: [
          { name: 'sea_ice', queryTypes: ['area'], formats: [], properties: [] },
          { name: 'sea-ice', queryTypes: ['area'], formats: [], properties: [] },
        ],
        includeMessaging: false,
        filters: [],
        requirementEdits: [],
        testEdits: [],
      };

      const error = thrown(() => generateOpenApi(config));
      expect(error.code).toBe('DUPLICATE_IDENTIFIER');
      expect(error.message).toBe(
        'Duplicate OpenAPI schema name "SeaIceFeature": identifiers must be unique within a profile'
      );
    });
  });
});
