/**
 * Catalog Queries
 *
 * information_schema lookups shared by both backends. DuckDB and PostgreSQL
 * both accept $n placeholders, so only the query runner differs.
 */

import type { ColumnDescriptor, QueryParam, QueryResult } from '../contracts/types.js';
import type { CatalogSession } from './index.js';

export type QueryRunner = (sql: string, params?: QueryParam[]) => Promise<QueryResult>;

/** Recovers a session after a failed statement; see `CatalogSession.isolate` */
export type Isolator = <T>(work: () => Promise<T>) => Promise<T>;

const passThrough: Isolator = (work) => work();

export const TABLE_EXISTS_SQL = `
  SELECT 1 AS found
  FROM information_schema.tables
  WHERE table_schema = $1 AND table_name = $2
  LIMIT 1
`;

export const TABLE_COLUMNS_SQL = `
  SELECT column_name, data_type, is_nullable, ordinal_position
  FROM information_schema.columns
  WHERE table_schema = $1 AND table_name = $2
  ORDER BY ordinal_position
`;

// System schemas are never candidates for the claims tables
export const LIST_SCHEMAS_SQL = `
  SELECT DISTINCT schema_name
  FROM information_schema.schemata
  WHERE schema_name NOT IN ('information_schema', 'pg_catalog', 'pg_toast')
    AND schema_name NOT LIKE 'pg_temp%'
    AND schema_name NOT LIKE 'pg_toast_temp%'
  ORDER BY schema_name
`;

export const SERVER_VERSION_SQL = 'SELECT version() AS version';

export function quoteIdentifier(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

export function quoteQualified(schema: string, table: string): string {
  return `${quoteIdentifier(schema)}.${quoteIdentifier(table)}`;
}

/**
 * Build catalog operations on top of a backend's query runner.
 */
export function createCatalogSession(run: QueryRunner, isolate: Isolator = passThrough): CatalogSession {
  return {
    async hasTable(table: string, schema: string): Promise<boolean> {
      const result = await run(TABLE_EXISTS_SQL, [schema, table]);
      return result.rows.length > 0;
    },

    async getColumns(table: string, schema: string): Promise<ColumnDescriptor[]> {
      const result = await run(TABLE_COLUMNS_SQL, [schema, table]);
      return result.rows.map((row) => ({
        name: String(row.column_name),
        dataType: String(row.data_type),
        nullable: String(row.is_nullable).toUpperCase() === 'YES',
        ordinalPosition: Number(row.ordinal_position),
      }));
    },

    execute: run,
    isolate,
  };
}

/**
 * PostgreSQL aborts the whole transaction on a failed statement; a savepoint
 * around each unit of work rolls back only that unit.
 */
export function savepointIsolator(run: QueryRunner): Isolator {
  let counter = 0;
  return async (work) => {
    const savepoint = `catalog_check_${++counter}`;
    await run(`SAVEPOINT ${savepoint}`);
    try {
      const result = await work();
      await run(`RELEASE SAVEPOINT ${savepoint}`);
      return result;
    } catch (error) {
      await run(`ROLLBACK TO SAVEPOINT ${savepoint}`);
      throw error;
    }
  };
}

/**
 * For engines without savepoints: roll back the failed transaction and open a
 * new one in its place.
 */
export function restartIsolator(run: QueryRunner, begin: string): Isolator {
  return async (work) => {
    try {
      return await work();
    } catch (error) {
      await run('ROLLBACK');
      await run(begin);
      throw error;
    }
  };
}

export async function listSchemas(run: QueryRunner): Promise<string[]> {
  const result = await run(LIST_SCHEMAS_SQL);
  return result.rows.map((row) => String(row.schema_name));
}

export async function serverVersion(run: QueryRunner): Promise<string> {
  const result = await run(SERVER_VERSION_SQL);
  const version = result.rows[0]?.version;
  return version === undefined || version === null ? 'unknown' : String(version);
}
