/**
 * Database Connectors
 *
 * Provides a unified catalog interface over the supported backends.
 * Currently supports DuckDB (embedded file) and PostgreSQL (networked server).
 */

import type { BackendKind, ColumnDescriptor, QueryParam, QueryResult } from '../contracts/types.js';
import type { ResolvedBackendConfig } from '../config/schema.js';
import { ConfigurationError, ERROR_CODES } from '../contracts/errors.js';

/**
 * Catalog operations bound to one logical session.
 */
export interface CatalogSession {
  hasTable(table: string, schema: string): Promise<boolean>;
  getColumns(table: string, schema: string): Promise<ColumnDescriptor[]>;
  execute(sql: string, params?: QueryParam[]): Promise<QueryResult>;
  /**
   * Run `work` so that its failure leaves the session usable for the next
   * statement. The rejection is passed on unchanged.
   */
  isolate<T>(work: () => Promise<T>): Promise<T>;
}

// Database backend interface
export interface DatabaseBackend {
  readonly kind: BackendKind;
  /** Connection description with credentials redacted */
  readonly target: string;
  /** Schema used when the configuration names none */
  readonly defaultSchema: string;
  connect(): Promise<void>;
  close(): Promise<void>;
  /**
   * Run `work` inside one read-only snapshot. The transaction is committed
   * when `work` resolves and rolled back when it rejects.
   */
  withReadSession<T>(work: (session: CatalogSession) => Promise<T>): Promise<T>;
  query(sql: string, params?: QueryParam[]): Promise<QueryResult>;
  listSchemas(): Promise<string[]>;
  serverVersion(): Promise<string>;
}

// Connector implementations
import { PostgresBackend } from './postgres.js';
import { DuckDBBackend } from './duckdb.js';

/**
 * Get database backend for the resolved configuration section
 */
export function createBackend(resolved: ResolvedBackendConfig): DatabaseBackend {
  switch (resolved.kind) {
    case 'postgres':
      return new PostgresBackend(resolved.postgres);
    case 'duckdb':
      return new DuckDBBackend(resolved.duckdb);
    default: {
      const unknownKind: never = resolved;
      throw new ConfigurationError(
        `Unsupported database type: ${JSON.stringify(unknownKind)}`,
        ERROR_CODES.CONFIG_INVALID
      );
    }
  }
}

export { PostgresBackend, buildPostgresUrl, buildPoolOptions } from './postgres.js';
export { DuckDBBackend } from './duckdb.js';
export { createCatalogSession, quoteIdentifier, quoteQualified, type Isolator } from './catalog.js';
