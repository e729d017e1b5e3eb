/**
 * Configuration Management
 *
 * Loads db_connection.yaml, substitutes environment variables and validates
 * the result.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { logger } from './logger.js';
import { ConfigurationError, ERROR_CODES, describeError } from '../contracts/errors.js';
import { parseConnectionConfig, type ConnectionConfig } from '../config/schema.js';

export const DEFAULT_CONFIG_PATH = path.join('configs', 'db_connection.yaml');

/**
 * Load and validate the connection configuration.
 */
export async function loadConnectionConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<ConnectionConfig> {
  const resolvedPath = path.resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = await fs.readFile(resolvedPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Config file not found: ${configPath}`,
      ERROR_CODES.CONFIG_NOT_FOUND,
      { path: resolvedPath },
      error
    );
  }

  const config = parseConnectionConfig(parseYaml(content, configPath), configPath);
  logger.debug('Configuration loaded', { path: resolvedPath });
  return freezeConfig(config);
}

/**
 * Substitute environment variables in a string.
 * Supports ${VAR_NAME} syntax.
 */
export function substituteEnvVars(content: string, env: NodeJS.ProcessEnv = process.env): string {
  return content.replace(/\$\{([^}]+)\}/g, (match: string, varName: string) => {
    const value = env[varName];
    if (value === undefined) {
      logger.warn(`Environment variable ${varName} is not set`);
      return match; // Keep original if not set
    }
    return value;
  });
}

/**
 * Parse YAML content with environment variable substitution
 */
function parseYaml(content: string, source: string): unknown {
  try {
    return yaml.load(substituteEnvVars(content));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse YAML in ${source}: ${describeError(error)}`,
      ERROR_CODES.CONFIG_INVALID,
      { source },
      error
    );
  }
}

/**
 * Recursively freeze a parsed configuration.
 */
export function freezeConfig<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      freezeConfig(child);
    }
  }
  return value;
}
