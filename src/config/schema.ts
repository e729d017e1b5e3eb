/**
 * Configuration Zod Schemas
 *
 * Validation schemas for db_connection.yaml. Every optional key gets its
 * default here so downstream code never re-applies fallbacks.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { ConfigurationError, ERROR_CODES } from '../contracts/errors.js';
import type { BackendKind } from '../contracts/types.js';

/** Identifiers are interpolated into SQL, so they are restricted */
export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const DEFAULT_DUCKDB_PATH = 'claims.db';
export const DEFAULT_POSTGRES_SCHEMA = 'public';

// =============================================================================
// BACKEND SECTIONS
// =============================================================================

/**
 * Embedded engine: a single database file
 */
export const DuckDBConfigSchema = z.object({
  path: z.string().min(1).default(DEFAULT_DUCKDB_PATH),
});

/**
 * Networked server plus pool tuning
 */
export const PostgresConfigSchema = z.object({
  user: z.string().min(1),
  password: z.string().default(''),
  host: z.string().min(1).default('localhost'),
  port: z.coerce.number().int().positive().default(5432),
  database: z.string().min(1),
  schema: z.string().regex(IDENTIFIER_PATTERN, 'schema must be a plain identifier').default(DEFAULT_POSTGRES_SCHEMA),

  // Pool options
  pool_pre_ping: z.boolean().default(true),
  pool_size: z.number().int().positive().default(5),
  max_overflow: z.number().int().min(0).default(10),
  /** Seconds allowed for establishing a connection */
  connect_timeout: z.number().positive().default(10),
});

// =============================================================================
// TABLE REQUIREMENTS
// =============================================================================

export const TableRequirementSchema = z.object({
  name: z.string().regex(IDENTIFIER_PATTERN, 'table name must be a plain identifier'),
  required: z.boolean().default(true),
  eager: z.boolean().default(false),
  columns: z.array(z.string().min(1)).default([]),
});

// =============================================================================
// ROOT
// =============================================================================

export const ConnectionConfigSchema = z.object({
  backend: z.enum(['duckdb', 'postgres']).optional(),
  duckdb: DuckDBConfigSchema.optional(),
  postgres: PostgresConfigSchema.optional(),
  tables: z.array(TableRequirementSchema).min(1).optional(),
});

// =============================================================================
// TYPE EXPORTS
// =============================================================================

export type DuckDBConfig = z.output<typeof DuckDBConfigSchema>;
export type PostgresConfig = z.output<typeof PostgresConfigSchema>;
export type TableRequirementInput = z.input<typeof TableRequirementSchema>;
export type ConnectionConfigInput = z.input<typeof ConnectionConfigSchema>;
export type ConnectionConfig = z.output<typeof ConnectionConfigSchema>;

export type ResolvedBackendConfig =
  | { kind: 'duckdb'; duckdb: DuckDBConfig }
  | { kind: 'postgres'; postgres: PostgresConfig };

// =============================================================================
// VALIDATION HELPERS
// =============================================================================

/**
 * Parse and validate db_connection.yaml content.
 */
export function parseConnectionConfig(content: unknown, source = 'configuration'): ConnectionConfig {
  if (content === null || content === undefined) {
    throw new ConfigurationError(`Invalid ${source}: file is empty`, ERROR_CODES.CONFIG_INVALID, { source });
  }

  const result = ConnectionConfigSchema.safeParse(content);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(
      `Invalid ${source}: ${issues.join('; ')}`,
      ERROR_CODES.CONFIG_INVALID,
      { source, issues }
    );
  }
  return result.data;
}

/**
 * Pick the backend section the connector will use.
 *
 * An explicit `backend` key wins. Without it exactly one section must be
 * present.
 */
export function resolveBackendConfig(config: ConnectionConfig): ResolvedBackendConfig {
  const kind = resolveBackendKind(config);
  if (kind === 'postgres' && config.postgres) {
    return { kind, postgres: config.postgres };
  }
  if (kind === 'duckdb' && config.duckdb) {
    return { kind, duckdb: config.duckdb };
  }
  throw new ConfigurationError(
    `No '${kind}' section found in configuration`,
    ERROR_CODES.CONFIG_BACKEND_MISSING,
    { backend: kind }
  );
}

export function resolveBackendKind(config: ConnectionConfig): BackendKind {
  if (config.backend) {
    return config.backend;
  }

  const present: BackendKind[] = [];
  if (config.duckdb) present.push('duckdb');
  if (config.postgres) present.push('postgres');

  if (present.length === 1) {
    return present[0];
  }
  if (present.length === 0) {
    throw new ConfigurationError(
      "No 'duckdb' or 'postgres' section found in configuration",
      ERROR_CODES.CONFIG_BACKEND_MISSING
    );
  }
  throw new ConfigurationError(
    "Both 'duckdb' and 'postgres' sections are present; set 'backend' to choose one",
    ERROR_CODES.CONFIG_BACKEND_MISSING,
    { present }
  );
}
