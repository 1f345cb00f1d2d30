/**
 * Tests for edr-profile-gen generate command
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { access, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { generateCommand, runGenerate } from './generate.js';
import { logger } from '../../utils/logger.js';

vi.mock('../../utils/logger.js', () => {
  const logger = {
    section: vi.fn(),
    info: vi.fn(),
    warning: vi.fn(),
    error: vi.fn(),
    success: vi.fn(),
    discovery: vi.fn(),
    analysis: vi.fn(),
    blank: vi.fn(),
    debug: vi.fn(),
    listItem: vi.fn(),
  };
  return { logger, default: logger };
});

const CONFIG = `profile_name: weather-stations
title: Weather Stations
collections:
  - name: stations
    query_types: [items]
    formats: [GeoJSON]
    properties: [station_id, temperature]
`;

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('generate command', () => {
  describe('command configuration', () => {
    it('should have correct name and description', () => {
      expect(generateCommand.name()).toBe('generate');
      expect(generateCommand.description()).toContain('profile_config.yml');
    });

    it('should have --dry-run option', () => {
      const dryRunOption = generateCommand.options.find(o => o.long === '--dry-run');
      expect(dryRunOption).toBeDefined();
      expect(dryRunOption?.defaultValue).toBe(false);
    });

    it('should have -o/--output option', () => {
      const outputOption = generateCommand.options.find(o => o.long === '--output');
      expect(outputOption?.short).toBe('-o');
    });
  });

  describe('runGenerate', () => {
    let dir: string;
    let configPath: string;

    beforeEach(async () => {
      vi.clearAllMocks();
      dir = await mkdtemp(join(tmpdir(), 'edr-generate-'));
      configPath = join(dir, 'profile_config.yml');
      await writeFile(configPath, CONFIG, 'utf-8');
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should list artifacts without writing on a dry run', async () => {
      const outputDir = join(dir, 'out');
      const result = await runGenerate(configPath, { output: outputDir, force: false, dryRun: true });

      expect(result.outputDir).toBeUndefined();
      expect(result.artifacts.summary.requirements).toBe(4);
      expect(logger.listItem).toHaveBeenCalledWith('openapi.yaml (openapi)');
      expect(logger.success).toHaveBeenCalledWith('No files written');
      await expect(exists(outputDir)).resolves.toBe(false);
    });

    it('should write the profile to the output directory', async () => {
      const outputDir = join(dir, 'out');
      const result = await runGenerate(configPath, { output: outputDir, force: false, dryRun: false });

      expect(result.outputDir).toBe(outputDir);
      await expect(exists(join(outputDir, 'weather-stations_profile.adoc'))).resolves.toBe(true);
      await expect(exists(join(outputDir, 'asyncapi.yaml'))).resolves.toBe(false);
    });

    it('should regenerate identical files from the persisted configuration', async () => {
      const first = join(dir, 'first');
      const second = join(dir, 'second');
      await runGenerate(configPath, { output: first, force: false, dryRun: false });
      await runGenerate(join(first, 'profile_config.yml'), { output: second, force: false, dryRun: false });

      for (const file of ['openapi.yaml', 'sections/clause_7_weather-stations.adoc', 'profile_config.yml']) {
        const a = await readFile(join(first, file), 'utf-8');
        const b = await readFile(join(second, file), 'utf-8');
        expect(b).toBe(a);
      }
    });

    it('should write nothing when the configuration names an unknown query type', async () => {
      await writeFile(configPath, CONFIG.replace('[items]', '[speed]'), 'utf-8');
      const outputDir = join(dir, 'out');

      await expect(runGenerate(configPath, { output: outputDir, force: false, dryRun: false })).rejects.toMatchObject({
        code: 'UNKNOWN_QUERY_TYPE',
      });
      await expect(exists(outputDir)).resolves.toBe(false);
    });

    it('should report a missing configuration file', async () => {
      await expect(
        runGenerate(join(dir, 'missing.yml'), { output: undefined, force: false, dryRun: true })
      ).rejects.toMatchObject({ code: 'CONFIG_NOT_FOUND' });
    });
  });
});
