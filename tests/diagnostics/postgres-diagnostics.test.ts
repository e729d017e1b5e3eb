/**
 * Diagnostics over the PostgreSQL Backend
 *
 * node-postgres is replaced by a client that behaves like a server inside a
 * transaction: after a failed statement everything up to the next rollback is
 * refused.
 *
 * @module tests/diagnostics/postgres-diagnostics
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const pgMock = vi.hoisted(() => {
  const client = {
    query: vi.fn(),
    release: vi.fn(),
  };
  const pool = {
    connect: vi.fn(),
    end: vi.fn(),
    on: vi.fn(),
  };
  return { client, pool };
});

vi.mock('pg', () => {
  class Pool {
    connect = pgMock.pool.connect;
    end = pgMock.pool.end;
    on = pgMock.pool.on;
  }
  return { default: { Pool } };
});

import { runDiagnostics } from '../../src/diagnostics/index.js';
import { parseConnectionConfig } from '../../src/config/schema.js';

const config = parseConnectionConfig({
  postgres: { user: 'analyst', password: 'test-secret', database: 'claims', schema: 'clinical', pool_pre_ping: false },
});

const PRESENT_TABLES = ['claims_entries', 'claims_diagnoses', 'claims_procedures', 'claims_drugs', 'members'];

function queryResult(rows: Record<string, unknown>[]) {
  return { rows, fields: rows.length > 0 ? Object.keys(rows[0]).map((name) => ({ name })) : [] };
}

/**
 * Catalog lookups for `failingTable` raise an error and abort the transaction.
 */
function transactionalServer(failingTable: string) {
  let aborted = false;
  return async (sql: string, params?: unknown[]) => {
    if (aborted && !sql.startsWith('ROLLBACK')) {
      throw new Error('current transaction is aborted, commands ignored until end of transaction block');
    }
    if (sql.startsWith('ROLLBACK')) {
      aborted = false;
      return queryResult([]);
    }

    const table = params?.[1];
    if (sql.includes('information_schema.tables')) {
      if (table === failingTable) {
        aborted = true;
        throw new Error(`permission denied for table ${failingTable}`);
      }
      return queryResult(typeof table === 'string' && PRESENT_TABLES.includes(table) ? [{ found: 1 }] : []);
    }
    if (sql.includes('information_schema.columns')) {
      return queryResult([{ column_name: 'claim_entry_id', data_type: 'text', is_nullable: 'NO', ordinal_position: 1 }]);
    }
    if (sql.includes('information_schema.schemata')) {
      return queryResult([{ schema_name: 'clinical' }]);
    }
    if (sql.includes('version()')) {
      return queryResult([{ version: 'PostgreSQL 16.2' }]);
    }
    if (sql.startsWith('SELECT COUNT(*)')) {
      return queryResult([{ row_count: '3' }]);
    }
    return queryResult([]);
  };
}

describe('runDiagnostics on PostgreSQL', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    pgMock.pool.connect.mockResolvedValue(pgMock.client);
    pgMock.pool.end.mockResolvedValue(undefined);
  });

  it('confines a failed table lookup to that table', async () => {
    pgMock.client.query.mockImplementation(transactionalServer('claims_diagnoses'));

    const report = await runDiagnostics(config);

    expect(report.connected).toBe(true);
    expect(report.missingTables).toEqual(['clinical.claims_diagnoses']);
    expect(report.tables.map((t) => [t.name, t.found])).toEqual([
      ['claims_entries', true],
      ['claims_diagnoses', false],
      ['claims_procedures', true],
      ['claims_drugs', true],
      ['members', true],
      ['claims_members_monthly_utilization', false],
    ]);
    expect(report.tables[1].error).toBe('permission denied for table claims_diagnoses');
    expect(report.tables.filter((t) => t.error !== undefined)).toHaveLength(1);
    expect(report.sampleQuery).toEqual({ table: 'clinical.claims_entries', rowCount: 3 });
    expect(report.success).toBe(false);
  });

  it('rolls back only to the savepoint of the failed table', async () => {
    pgMock.client.query.mockImplementation(transactionalServer('claims_diagnoses'));

    await runDiagnostics(config);

    const statements = pgMock.client.query.mock.calls.map((call) => String(call[0]));
    expect(statements.filter((sql) => sql.startsWith('ROLLBACK'))).toEqual(['ROLLBACK TO SAVEPOINT catalog_check_2']);
    expect(statements[statements.length - 1]).toBe('COMMIT');
    expect(pgMock.pool.end).toHaveBeenCalledTimes(1);
  });
});
