/**
 * Data Connector
 *
 * Produces a validated, ready-to-query data-access object from a connection
 * configuration. A DataConnector only exists once every required table has
 * been found and every eager table has been read; there is no partially
 * ready state.
 *
 * @module connector
 */

import { logger } from '../utils/logger.js';
import { freezeConfig, loadConnectionConfig } from '../utils/config.js';
import { ConnectorError, ERROR_CODES, describeError } from '../contracts/errors.js';
import type {
  BackendKind,
  ConnectorEvent,
  ConnectorEventListener,
  MaterializedTable,
  QualifiedTableName,
  QueryParam,
  QueryResult,
  TableRequirement,
} from '../contracts/types.js';
import {
  DEFAULT_POSTGRES_SCHEMA,
  parseConnectionConfig,
  resolveBackendConfig,
  type ConnectionConfig,
  type ConnectionConfigInput,
} from '../config/schema.js';
import { createBackend, type DatabaseBackend } from '../connectors/index.js';
import { qualifyTableName, resolveRequirements, validateRequirements } from './requirements.js';
import { materializeTables, validateTables } from './load.js';

export interface ConnectorOptions {
  /** Overrides `tables` from the configuration and the default table contract */
  requirements?: readonly TableRequirement[];
  /** Receives lifecycle events; may be omitted to discard them */
  onEvent?: ConnectorEventListener;
  /** Use this backend instead of building one from the configuration */
  backend?: DatabaseBackend;
}

/**
 * Schema every lookup uses for this connector's session. PostgreSQL takes
 * `postgres.schema`; DuckDB always uses its default schema.
 */
export function resolveSchema(config: ConnectionConfig, backend: DatabaseBackend): string {
  if (backend.kind === 'postgres') {
    return config.postgres?.schema ?? DEFAULT_POSTGRES_SCHEMA;
  }
  return backend.defaultSchema;
}

export class DataConnector {
  private closed = false;

  private constructor(
    readonly config: ConnectionConfig,
    readonly backend: DatabaseBackend,
    readonly schema: string,
    readonly tables: ReadonlyMap<string, MaterializedTable>,
    readonly lazyTables: readonly string[],
    readonly notes: readonly string[]
  ) {}

  get kind(): BackendKind {
    return this.backend.kind;
  }

  /**
   * Load configuration from a YAML file, then open the connector.
   */
  static async fromFile(configPath?: string, options: ConnectorOptions = {}): Promise<DataConnector> {
    return DataConnector.open(await loadConnectionConfig(configPath), options);
  }

  /**
   * Resolve the backend, validate the table contract and load eager tables.
   *
   * @throws ConfigurationError when the configuration is malformed
   * @throws ConnectionError when the backend cannot be reached
   * @throws MissingTableError when a required table is absent
   */
  static async open(input: ConnectionConfigInput, options: ConnectorOptions = {}): Promise<DataConnector> {
    const config = freezeConfig(parseConnectionConfig(input));
    const requirements = options.requirements
      ? validateRequirements(options.requirements)
      : resolveRequirements(config);
    const backend = options.backend ?? createBackend(resolveBackendConfig(config));
    const emit = createEmitter(options.onEvent);

    emit({ type: 'backend_resolved', kind: backend.kind, target: backend.target });
    logger.info(`Connecting to ${backend.kind} backend`, { target: backend.target });

    const schema = resolveSchema(config, backend);
    emit({ type: 'schema_resolved', schema });

    await backend.connect();

    try {
      const { tables, lazy, notes } = await backend.withReadSession(async (session) => {
        const validation = await validateTables(session, requirements, schema, emit);
        const materialized = await materializeTables(session, validation.present, schema, emit);
        return {
          tables: materialized,
          lazy: validation.present.filter((r) => !r.eager).map((r) => r.name),
          notes: validation.notes,
        };
      });

      const materializedNames = [...tables.keys()];
      emit({ type: 'ready', schema, materialized: materializedNames, lazy });
      logger.info('Data connector ready', { schema, materialized: materializedNames, lazy });

      return new DataConnector(config, backend, schema, tables, Object.freeze(lazy), Object.freeze(notes));
    } catch (error) {
      await backend.close().catch((closeError: unknown) => {
        logger.warn('Failed to close backend after construction failure', { error: describeError(closeError) });
      });
      throw error;
    }
  }

  /**
   * A materialized table by logical name.
   */
  table(name: string): MaterializedTable {
    const table = this.tables.get(name);
    if (!table) {
      const reason = this.lazyTables.includes(name)
        ? 'is not loaded eagerly; query it through the backend'
        : 'is not part of the materialized table set';
      throw new ConnectorError(
        ERROR_CODES.TABLE_NOT_MATERIALIZED,
        `Table '${qualifyTableName(this.schema, name)}' ${reason}`,
        { table: name }
      );
    }
    return table;
  }

  hasTable(name: string): boolean {
    return this.tables.has(name) || this.lazyTables.includes(name);
  }

  qualify(name: string): QualifiedTableName {
    return qualifyTableName(this.schema, name);
  }

  /**
   * Ad hoc query against the live backend, typically a filtered read of a
   * lazy table.
   */
  async query(sql: string, params?: QueryParam[]): Promise<QueryResult> {
    if (this.closed) {
      throw new ConnectorError(ERROR_CODES.CONNECTOR_CLOSED, 'Data connector has been closed');
    }
    return this.backend.query(sql, params);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.backend.close();
  }
}

function createEmitter(listener?: ConnectorEventListener): ConnectorEventListener {
  return (event: ConnectorEvent) => {
    logger.debug(`Connector event: ${event.type}`, event);
    listener?.(event);
  };
}

export { DEFAULT_TABLE_REQUIREMENTS, qualifyTableName, resolveRequirements, validateRequirements } from './requirements.js';
export { materializeTables, validateTables, type TableValidation } from './load.js';
