/**
 * Unit Tests for Config Loading Module
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { freezeConfig, loadConnectionConfig, substituteEnvVars } from '../../src/utils/config.js';
import { ConfigurationError, ERROR_CODES } from '../../src/contracts/errors.js';

describe('Config Module', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cohort-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
    delete process.env.COHORT_TEST_PASSWORD;
  });

  async function writeConfig(content: string): Promise<string> {
    const configPath = path.join(tempDir, 'db_connection.yaml');
    await fs.writeFile(configPath, content);
    return configPath;
  }

  describe('loadConnectionConfig', () => {
    it('loads a PostgreSQL section from YAML', async () => {
      const configPath = await writeConfig(`
postgres:
  user: analyst
  password: test-secret
  host: db.internal
  port: 5433
  database: claims
  schema: clinical
`);

      const config = await loadConnectionConfig(configPath);

      expect(config.postgres?.host).toBe('db.internal');
      expect(config.postgres?.port).toBe(5433);
      expect(config.postgres?.schema).toBe('clinical');
      expect(config.postgres?.pool_size).toBe(5);
    });

    it('substitutes environment variables before parsing', async () => {
      process.env.COHORT_TEST_PASSWORD = 'test-secret';
      const configPath = await writeConfig(`
postgres:
  user: analyst
  password: \${COHORT_TEST_PASSWORD}
  database: claims
`);

      const config = await loadConnectionConfig(configPath);

      expect(config.postgres?.password).toBe('test-secret');
    });

    it('returns a frozen configuration', async () => {
      const configPath = await writeConfig('duckdb:\n  path: claims.db\n');

      const config = await loadConnectionConfig(configPath);

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.duckdb)).toBe(true);
    });

    it('throws CONFIG_NOT_FOUND for a missing file', async () => {
      const error = await loadConnectionConfig(path.join(tempDir, 'absent.yaml')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.code).toBe(ERROR_CODES.CONFIG_NOT_FOUND);
    });

    it('throws CONFIG_INVALID for malformed YAML', async () => {
      const configPath = await writeConfig('postgres: [unclosed\n');

      const error = await loadConnectionConfig(configPath).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.code).toBe(ERROR_CODES.CONFIG_INVALID);
      expect(error.message).toContain('Failed to parse YAML');
    });

    it('throws CONFIG_INVALID when a required key is missing', async () => {
      const configPath = await writeConfig('postgres:\n  user: analyst\n');

      await expect(loadConnectionConfig(configPath)).rejects.toThrow(
        `Invalid ${configPath}: postgres.database: Required`
      );
    });
  });

  describe('substituteEnvVars', () => {
    it('replaces set variables and keeps unset ones', () => {
      const result = substituteEnvVars('user: ${DB_USER}\nhost: ${DB_HOST}', { DB_USER: 'analyst' });

      expect(result).toBe('user: analyst\nhost: ${DB_HOST}');
    });
  });

  describe('freezeConfig', () => {
    it('freezes nested objects and arrays', () => {
      const value = freezeConfig({ tables: [{ name: 'members' }] });

      expect(Object.isFrozen(value.tables)).toBe(true);
      expect(Object.isFrozen(value.tables[0])).toBe(true);
    });
  });
});
