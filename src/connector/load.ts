/**
 * Table Validation and Selective Materialization
 *
 * Runs inside one read session: every required table is checked before
 * anything is read, and only eager tables that exist are loaded.
 *
 * @module connector/load
 */

import { logger } from '../utils/logger.js';
import { MissingTableError } from '../contracts/errors.js';
import type {
  ConnectorEventListener,
  MaterializedTable,
  QualifiedTableName,
  TableRequirement,
} from '../contracts/types.js';
import type { CatalogSession } from '../connectors/index.js';
import { quoteQualified } from '../connectors/catalog.js';
import { qualifyTableName } from './requirements.js';

export interface TableValidation {
  /** Requirements whose table exists, in requirement order */
  present: TableRequirement[];
  /** Optional tables that were not found */
  missingOptional: QualifiedTableName[];
  /** Informational notes, one per missing optional table */
  notes: string[];
}

/**
 * Check existence of every required and optional table.
 *
 * All required tables are checked before failing so the error lists every
 * missing one. Optional tables are only checked once the required ones pass.
 */
export async function validateTables(
  session: CatalogSession,
  requirements: readonly TableRequirement[],
  schema: string,
  emit: ConnectorEventListener
): Promise<TableValidation> {
  const present: TableRequirement[] = [];
  const missingRequired: QualifiedTableName[] = [];

  for (const requirement of requirements.filter((r) => r.required)) {
    const table = qualifyTableName(schema, requirement.name);
    if (await session.hasTable(requirement.name, schema)) {
      present.push(requirement);
      emit({ type: 'table_found', table, required: true });
    } else {
      missingRequired.push(table);
      emit({ type: 'required_table_missing', table });
    }
  }

  if (missingRequired.length > 0) {
    throw new MissingTableError(missingRequired);
  }

  const missingOptional: QualifiedTableName[] = [];
  const notes: string[] = [];

  for (const requirement of requirements.filter((r) => !r.required)) {
    const table = qualifyTableName(schema, requirement.name);
    if (await session.hasTable(requirement.name, schema)) {
      present.push(requirement);
      emit({ type: 'table_found', table, required: false });
    } else {
      const note = `Optional table '${table}' not found; skipping`;
      missingOptional.push(table);
      notes.push(note);
      logger.info(note);
      emit({ type: 'optional_table_missing', table });
    }
  }

  // Keep requirement order regardless of the required/optional passes
  present.sort((a, b) => requirements.indexOf(a) - requirements.indexOf(b));

  return { present, missingOptional, notes };
}

/**
 * Read every eager table in full. Lazy tables issue no query.
 */
export async function materializeTables(
  session: CatalogSession,
  present: readonly TableRequirement[],
  schema: string,
  emit: ConnectorEventListener
): Promise<Map<string, MaterializedTable>> {
  const tables = new Map<string, MaterializedTable>();

  for (const requirement of present.filter((r) => r.eager)) {
    const qualifiedName = qualifyTableName(schema, requirement.name);
    const result = await session.execute(`SELECT * FROM ${quoteQualified(schema, requirement.name)}`);

    tables.set(requirement.name, {
      name: requirement.name,
      qualifiedName,
      columns: Object.freeze([...result.columns]),
      rows: Object.freeze(result.rows.map((row) => Object.freeze({ ...row }))),
    });

    logger.debug(`Materialized ${qualifiedName}`, { rows: result.rows.length, columns: result.columns.length });
    emit({
      type: 'table_materialized',
      table: qualifiedName,
      rowCount: result.rows.length,
      columnCount: result.columns.length,
    });
  }

  return tables;
}
