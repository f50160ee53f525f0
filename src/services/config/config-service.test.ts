/**
 * Tests for the configuration service
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { ConfigService, DEFAULT_CONFIG_FILE } from './config-service.js';
import { ConfigError } from '../../core/errors.js';
import type { FixityConfig } from '../../core/schemas.js';
import { CHECKSUM_TYPES } from '../../models/types.js';

const TEST_DIR = '.fixity-test-config';

describe('ConfigService', () => {
  let configService: ConfigService;
  const configFile = path.join(TEST_DIR, DEFAULT_CONFIG_FILE);

  beforeEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
    await fs.mkdir(TEST_DIR, { recursive: true });
    configService = new ConfigService({ baseDir: TEST_DIR });
  });

  afterEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  async function writeConfig(config: FixityConfig): Promise<void> {
    await fs.writeFile(configFile, yaml.stringify(config));
    configService.clearCache();
  }

  describe('defaults', () => {
    it('should look for fixity.yaml in the base directory', () => {
      expect(configService.getConfigPath()).toBe(configFile);
    });

    it('should treat a missing file as an empty config', async () => {
      expect(await configService.loadConfig()).toEqual({});
      expect(await configService.getConnection()).toEqual({});
      expect(await configService.getModelUri()).toBe('info:fedora/fedora-system:FedoraObject-3.0');
      expect(await configService.getRepairConfig()).toEqual({
        checksumType: 'DEFAULT',
        logMessage: 'updating missing checksum'
      });
    });

    it('should treat an empty file as an empty config', async () => {
      await fs.writeFile(configFile, '');
      expect(await configService.loadConfig()).toEqual({});
    });
  });

  describe('loading', () => {
    it('should read connection, discovery and repair settings', async () => {
      await writeConfig({
        fedora: { root: 'http://localhost:8080/fedora', user: 'fedoraAdmin', password: 'test-secret', timeoutMs: 5000 },
        discovery: { modelUri: 'info:fedora/test:ImageModel' },
        repair: { checksumType: 'SHA-256', logMessage: 'adding checksum' }
      });

      expect(await configService.getConnection()).toEqual({
        root: 'http://localhost:8080/fedora',
        user: 'fedoraAdmin',
        password: 'test-secret',
        timeoutMs: 5000
      });
      expect(await configService.getModelUri()).toBe('info:fedora/test:ImageModel');
      expect(await configService.getRepairConfig()).toEqual({ checksumType: 'SHA-256', logMessage: 'adding checksum' });
    });

    it('should cache until cleared', async () => {
      await writeConfig({ discovery: { modelUri: 'info:fedora/test:First' } });
      expect(await configService.getModelUri()).toBe('info:fedora/test:First');

      await fs.writeFile(configFile, yaml.stringify({ discovery: { modelUri: 'info:fedora/test:Second' } }));
      expect(await configService.getModelUri()).toBe('info:fedora/test:First');

      configService.clearCache();
      expect(await configService.getModelUri()).toBe('info:fedora/test:Second');
    });

    it('should accept every repairable checksum type (property test)', async () => {
      await fc.assert(
        fc.asyncProperty(fc.constantFrom(...CHECKSUM_TYPES), async checksumType => {
          await writeConfig({ repair: { checksumType } });
          expect((await configService.getRepairConfig()).checksumType).toBe(checksumType);
        }),
        { numRuns: 12 }
      );
    });
  });

  describe('errors', () => {
    it('should reject malformed YAML', async () => {
      await fs.writeFile(configFile, 'fedora: [unclosed');

      await expect(configService.loadConfig()).rejects.toBeInstanceOf(ConfigError);
      await expect(configService.loadConfig()).rejects.toThrow(/^Invalid YAML in config file/);
    });

    it('should list schema violations with their paths', async () => {
      await fs.writeFile(configFile, yaml.stringify({ fedora: { timeoutMs: -1 }, repair: { checksumType: 'DISABLED' } }));

      const failure = configService.loadConfig();

      await expect(failure).rejects.toThrow(/^Invalid config file: /);
      await expect(failure).rejects.toThrow(/fedora\.timeoutMs: /);
      await expect(failure).rejects.toThrow(/repair\.checksumType: /);
    });

    it('should reject unknown keys', async () => {
      await fs.writeFile(configFile, yaml.stringify({ fedora: { host: 'localhost' } }));

      await expect(configService.loadConfig()).rejects.toMatchObject({ configPath: configFile });
    });

    it('should report a path that cannot be read', async () => {
      const service = new ConfigService({ configPath: TEST_DIR });

      await expect(service.loadConfig()).rejects.toThrow(/^Cannot read config file/);
    });
  });
});
