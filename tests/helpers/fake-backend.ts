/**
 * In-process stand-in for a database backend.
 *
 * Holds schemas as plain objects and understands the handful of statements the
 * connector and diagnostics issue.
 */

import type { CatalogSession, DatabaseBackend } from '../../src/connectors/index.js';
import type { BackendKind, ColumnDescriptor, QueryParam, QueryResult, Row } from '../../src/contracts/types.js';
import { ConnectionError } from '../../src/contracts/errors.js';

export interface FakeTable {
  columns: string[];
  rows: Row[];
}

export type FakeSchemas = Record<string, Record<string, FakeTable>>;

export interface FakeBackendOptions {
  kind?: BackendKind;
  schemas?: FakeSchemas;
  defaultSchema?: string;
  /** connect() rejects with a ConnectionError carrying this message */
  failConnect?: string;
  version?: string;
}

const SELECT_PATTERN = /^SELECT (\*|COUNT\(\*\) AS row_count) FROM "([^"]+)"\."([^"]+)"$/;

export class FakeBackend implements DatabaseBackend {
  readonly kind: BackendKind;
  readonly target = 'fake://claims';
  readonly defaultSchema: string;
  readonly schemas: FakeSchemas;
  /** Every catalog call and statement, in order */
  readonly calls: string[] = [];
  connected = false;
  closed = false;

  constructor(private readonly options: FakeBackendOptions = {}) {
    this.kind = options.kind ?? 'postgres';
    this.defaultSchema = options.defaultSchema ?? (this.kind === 'duckdb' ? 'main' : 'public');
    this.schemas = options.schemas ?? {};
  }

  async connect(): Promise<void> {
    this.calls.push('connect');
    if (this.options.failConnect) {
      throw new ConnectionError(this.options.failConnect, { target: this.target });
    }
    this.connected = true;
  }

  async close(): Promise<void> {
    this.calls.push('close');
    this.connected = false;
    this.closed = true;
  }

  async withReadSession<T>(work: (session: CatalogSession) => Promise<T>): Promise<T> {
    this.calls.push('BEGIN');
    try {
      const result = await work(this.session());
      this.calls.push('COMMIT');
      return result;
    } catch (error) {
      this.calls.push('ROLLBACK');
      throw error;
    }
  }

  async query(sql: string, _params?: QueryParam[]): Promise<QueryResult> {
    return this.execute(sql);
  }

  async listSchemas(): Promise<string[]> {
    this.calls.push('listSchemas');
    return Object.keys(this.schemas).sort();
  }

  async serverVersion(): Promise<string> {
    return this.options.version ?? 'FakeSQL 1.0';
  }

  /** Count of full-table reads issued so far */
  get selectAllCount(): number {
    return this.calls.filter((call) => call.startsWith('SELECT *')).length;
  }

  private session(): CatalogSession {
    return {
      hasTable: async (table: string, schema: string) => {
        this.calls.push(`hasTable ${schema}.${table}`);
        return this.schemas[schema]?.[table] !== undefined;
      },
      getColumns: async (table: string, schema: string): Promise<ColumnDescriptor[]> => {
        this.calls.push(`getColumns ${schema}.${table}`);
        const found = this.schemas[schema]?.[table];
        return (found?.columns ?? []).map((name, index) => ({
          name,
          dataType: 'VARCHAR',
          nullable: true,
          ordinalPosition: index + 1,
        }));
      },
      execute: async (sql: string) => this.execute(sql),
      isolate: async <T>(work: () => Promise<T>) => work(),
    };
  }

  private execute(sql: string): QueryResult {
    this.calls.push(sql);
    const match = SELECT_PATTERN.exec(sql);
    if (!match) {
      throw new Error(`Unsupported SQL in fake backend: ${sql}`);
    }

    const [, projection, schema, name] = match;
    const table = this.schemas[schema]?.[name];
    if (!table) {
      throw new Error(`relation "${schema}.${name}" does not exist`);
    }

    if (projection === '*') {
      return { columns: [...table.columns], rows: table.rows.map((row) => ({ ...row })) };
    }
    return { columns: ['row_count'], rows: [{ row_count: BigInt(table.rows.length) }] };
  }
}

// =============================================================================
// FIXTURE BUILDERS
// =============================================================================

export function memberRows(count: number): Row[] {
  return Array.from({ length: count }, (_, i) => ({
    member_id_hash: `member-${i + 1}`,
    birth_year: 1950 + i,
  }));
}

/**
 * The five required claims tables (members with `memberCount` rows), plus the
 * optional utilization table when requested. `omit` drops tables by name.
 */
export function claimsSchema(
  options: { memberCount?: number; withUtilization?: boolean; omit?: string[] } = {}
): Record<string, FakeTable> {
  const tables: Record<string, FakeTable> = {
    claims_entries: {
      columns: ['claim_entry_id', 'member_id_hash', 'date_of_service', 'claim_type'],
      rows: [
        { claim_entry_id: 'c-1', member_id_hash: 'member-1', date_of_service: '2024-01-05', claim_type: 'medical' },
        { claim_entry_id: 'c-2', member_id_hash: 'member-2', date_of_service: '2024-02-11', claim_type: 'pharmacy' },
        { claim_entry_id: 'c-3', member_id_hash: 'member-1', date_of_service: '2024-03-20', claim_type: 'medical' },
      ],
    },
    claims_diagnoses: { columns: ['claim_entry_id', 'icd_code'], rows: [{ claim_entry_id: 'c-1', icd_code: 'E11.9' }] },
    claims_procedures: { columns: ['claim_entry_id', 'cpt_code'], rows: [] },
    claims_drugs: { columns: ['claim_entry_id', 'ndc_code'], rows: [] },
    members: { columns: ['member_id_hash', 'birth_year'], rows: memberRows(options.memberCount ?? 10) },
  };

  if (options.withUtilization) {
    tables.claims_members_monthly_utilization = {
      columns: ['member_id_hash', 'month', 'visits'],
      rows: [{ member_id_hash: 'member-1', month: '2024-01', visits: 2 }],
    };
  }

  for (const name of options.omit ?? []) {
    delete tables[name];
  }
  return tables;
}
