/**
 * DuckDB Database Connector
 *
 * Embedded, file-backed engine. Opening a path that does not exist creates an
 * empty database file; table validation reports what is missing afterwards.
 */

import { DuckDBInstance, type DuckDBConnection } from '@duckdb/node-api';
import { logger } from '../utils/logger.js';
import { ConnectionError, ConnectorError, ERROR_CODES, describeError } from '../contracts/errors.js';
import type { QueryParam, QueryResult } from '../contracts/types.js';
import type { DuckDBConfig } from '../config/schema.js';
import type { CatalogSession, DatabaseBackend } from './index.js';
import { createCatalogSession, listSchemas, restartIsolator, serverVersion } from './catalog.js';

const BEGIN_READ_SESSION = 'BEGIN TRANSACTION';

export class DuckDBBackend implements DatabaseBackend {
  readonly kind = 'duckdb' as const;
  readonly target: string;
  readonly defaultSchema = 'main';
  private instance: DuckDBInstance | null = null;
  private connection: DuckDBConnection | null = null;

  constructor(private readonly config: DuckDBConfig) {
    this.target = config.path;
  }

  async connect(): Promise<void> {
    if (this.connection) {
      return;
    }

    let instance: DuckDBInstance | null = null;
    try {
      instance = await DuckDBInstance.create(this.config.path);
      this.connection = await instance.connect();
      this.instance = instance;
      logger.debug('Opened DuckDB database', { path: this.config.path });
    } catch (error) {
      instance?.closeSync();
      throw new ConnectionError(
        `Failed to open DuckDB database at ${this.config.path}: ${describeError(error)}`,
        { target: this.target },
        error
      );
    }
  }

  async close(): Promise<void> {
    this.connection?.closeSync();
    this.instance?.closeSync();
    this.connection = null;
    this.instance = null;
    logger.debug('Closed DuckDB database');
  }

  async withReadSession<T>(work: (session: CatalogSession) => Promise<T>): Promise<T> {
    const run = (sql: string, params?: QueryParam[]) => this.run(sql, params);
    await run(BEGIN_READ_SESSION);
    try {
      const result = await work(createCatalogSession(run, restartIsolator(run, BEGIN_READ_SESSION)));
      await run('COMMIT');
      return result;
    } catch (error) {
      await run('ROLLBACK').catch((rollbackError: unknown) => {
        logger.warn('Failed to roll back read session', { error: describeError(rollbackError) });
      });
      throw error;
    }
  }

  async query(sql: string, params?: QueryParam[]): Promise<QueryResult> {
    try {
      return await this.run(sql, params);
    } catch (error) {
      logger.error('Query failed', error);
      throw error;
    }
  }

  async listSchemas(): Promise<string[]> {
    return listSchemas((sql, params) => this.run(sql, params));
  }

  async serverVersion(): Promise<string> {
    return serverVersion((sql, params) => this.run(sql, params));
  }

  private async run(sql: string, params?: QueryParam[]): Promise<QueryResult> {
    if (!this.connection) {
      throw new ConnectorError(ERROR_CODES.CONNECTOR_CLOSED, 'Not connected to database', { target: this.target });
    }
    const reader = await this.connection.runAndReadAll(sql, params);
    return {
      columns: reader.columnNames(),
      rows: reader.getRowObjectsJS(),
    };
  }
}
