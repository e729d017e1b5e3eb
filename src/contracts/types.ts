/**
 * Contract Types - Interface Definitions
 *
 * Shared types between the configuration layer, the backend drivers and the
 * data connector.
 *
 * @module contracts/types
 */

// =============================================================================
// COMMON TYPES
// =============================================================================

/** Backend engine identifier */
export type BackendKind = 'duckdb' | 'postgres';

/** Schema-qualified table name: schema.table */
export type QualifiedTableName = string;

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** A single result row keyed by column name */
export type Row = Record<string, unknown>;

/** Positional query parameter ($1, $2, ...) */
export type QueryParam = string | number | boolean | null;

// =============================================================================
// CATALOG TYPES
// =============================================================================

/**
 * Column as reported by the backend catalog, in ordinal order.
 */
export interface ColumnDescriptor {
  name: string;
  dataType: string;
  nullable: boolean;
  ordinalPosition: number;
}

/**
 * Rows plus the column names in the order the backend returned them.
 */
export interface QueryResult {
  columns: string[];
  rows: Row[];
}

// =============================================================================
// TABLE REQUIREMENTS
// =============================================================================

/**
 * One entry of the contract the connector enforces.
 */
export interface TableRequirement {
  /** Logical (unqualified) table name */
  name: string;
  /** Absence is fatal when true, informational otherwise */
  required: boolean;
  /** Read fully into memory at construction time */
  eager: boolean;
  /** Columns the diagnostic expects to find; not enforced by the connector */
  columns: string[];
}

/**
 * A table read into memory at construction time.
 */
export interface MaterializedTable {
  name: string;
  qualifiedName: QualifiedTableName;
  columns: readonly string[];
  rows: readonly Readonly<Row>[];
}

// =============================================================================
// CONNECTOR EVENTS
// =============================================================================

export type ConnectorEvent =
  | { type: 'backend_resolved'; kind: BackendKind; target: string }
  | { type: 'schema_resolved'; schema: string }
  | { type: 'table_found'; table: QualifiedTableName; required: boolean }
  | { type: 'required_table_missing'; table: QualifiedTableName }
  | { type: 'optional_table_missing'; table: QualifiedTableName }
  | { type: 'table_materialized'; table: QualifiedTableName; rowCount: number; columnCount: number }
  | { type: 'ready'; schema: string; materialized: string[]; lazy: string[] };

export type ConnectorEventType = ConnectorEvent['type'];

export type ConnectorEventListener = (event: ConnectorEvent) => void;
