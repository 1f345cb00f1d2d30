/**
 * Tests for configuration persistence
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CONFIG_FILE_NAME,
  deserializeConfig,
  profileConfigExists,
  readProfileConfig,
  serializeConfig,
} from './config-manager.js';
import { createProfileConfig } from './config-schema.js';

const config = createProfileConfig({
  profileName: 'weather-stations',
  title: 'Weather Stations',
  collections: [
    { name: 'stations', queryTypes: ['items'], formats: ['GeoJSON'], properties: ['station_id', 'temperature'] },
  ],
});

describe('config-manager', () => {
  describe('serializeConfig', () => {
    it('should write snake_case keys in a fixed order', () => {
      const lines = serializeConfig(config).split('\n');

      expect(lines.slice(0, 4)).toEqual([
        'profile_name: weather-stations',
        'title: Weather Stations',
        'include_messaging: false',
        'collections:',
      ]);
    });

    it('should write empty lists inline', () => {
      const text = serializeConfig(config);

      expect(text).toContain('\nfilters: []\n');
      expect(text).toContain('\nrequirements: []\n');
      expect(text).toContain('\ntests: []\n');
    });

    it('should be stable across calls', () => {
      expect(serializeConfig(config)).toBe(serializeConfig(config));
    });
  });

  describe('deserializeConfig', () => {
    it('should invert serializeConfig', () => {
      expect(deserializeConfig(serializeConfig(config))).toEqual(config);
    });

    it('should round-trip messaging, filters and edits', () => {
      const full = createProfileConfig({
        profileName: 'ais',
        title: 'Vessel Tracking',
        author: 'Test Editor',
        email: 'editor@example.com',
        collections: [{ name: 'vessels', queryTypes: ['items', 'trajectory'], formats: ['GeoJSON', 'CSV'] }],
        includeMessaging: true,
        filters: [
          { name: 'vessel_type', description: 'Type of vessel', type: 'enum', values: ['cargo', 'tanker'] },
          { name: 'speed', description: 'Speed over ground', type: 'number' },
        ],
        requirementEdits: [{ id: '/req/ais/openapi', parts: ['The service SHALL publish an OpenAPI document'] }],
        testEdits: [{ id: '/conf/ais/asyncapi', purpose: 'Check the broker' }],
      });

      expect(deserializeConfig(serializeConfig(full))).toEqual(full);
    });

    it('should report YAML syntax errors as invalid configuration', () => {
      try {
        deserializeConfig('profile_name: [unclosed', undefined, 'broken.yml');
        expect.unreachable();
      } catch (error) {
        expect(error).toMatchObject({ code: 'INVALID_CONFIG' });
      }
    });
  });

  describe('file access', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'edr-config-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should read a persisted configuration', async () => {
      const path = join(dir, CONFIG_FILE_NAME);
      await writeFile(path, serializeConfig(config), 'utf-8');

      await expect(readProfileConfig(path)).resolves.toEqual(config);
      await expect(profileConfigExists(dir)).resolves.toBe(true);
    });

    it('should report a missing file', async () => {
      await expect(readProfileConfig(join(dir, CONFIG_FILE_NAME))).rejects.toMatchObject({
        code: 'CONFIG_NOT_FOUND',
      });
      await expect(profileConfigExists(dir)).resolves.toBe(false);
    });

    it('should name the file in validation errors', async () => {
      const path = join(dir, CONFIG_FILE_NAME);
      await writeFile(path, 'profile_name: weather-stations\n', 'utf-8');

      await expect(readProfileConfig(path)).rejects.toMatchObject({
        code: 'INVALID_CONFIG',
        message: expect.stringContaining(`Invalid profile configuration in ${path}:`),
      });
    });
  });
});
