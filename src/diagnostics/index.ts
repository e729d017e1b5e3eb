/**
 * Connection Diagnostics
 *
 * Walks the same table contract as the data connector but never throws on a
 * failed step: every outcome is recorded in a report for the `check` command.
 *
 * Unlike the connector, the diagnostic falls back to the first available
 * schema when the configured one does not exist, and says so in the report.
 *
 * @module diagnostics
 */

import { logger } from '../utils/logger.js';
import { describeError } from '../contracts/errors.js';
import type { BackendKind, QualifiedTableName, TableRequirement } from '../contracts/types.js';
import { resolveBackendConfig, type ConnectionConfig } from '../config/schema.js';
import { createBackend, type CatalogSession, type DatabaseBackend } from '../connectors/index.js';
import { quoteQualified } from '../connectors/catalog.js';
import { qualifyTableName, resolveRequirements, validateRequirements } from '../connector/requirements.js';
import { resolveSchema } from '../connector/index.js';

export interface TableCheck {
  name: string;
  qualifiedName: QualifiedTableName;
  required: boolean;
  found: boolean;
  columns: string[];
  /** Expected columns absent from a found table */
  missingColumns: string[];
  error?: string;
}

export interface SampleQueryResult {
  table: QualifiedTableName;
  rowCount?: number;
  error?: string;
}

export interface DiagnosticReport {
  backend: BackendKind;
  target: string;
  /** Human-readable connection settings, no secrets */
  settings: Record<string, string>;
  connected: boolean;
  serverVersion?: string;
  /** Set when a step aborted the run (connection or schema discovery) */
  failure?: string;
  schemas: string[];
  configuredSchema: string;
  schema: string;
  schemaFallback: boolean;
  tables: TableCheck[];
  sampleQuery?: SampleQueryResult;
  missingTables: QualifiedTableName[];
  warnings: string[];
  success: boolean;
}

export interface DiagnosticOptions {
  backend?: DatabaseBackend;
  requirements?: readonly TableRequirement[];
}

/**
 * Run every diagnostic step and close the backend afterwards.
 */
export async function runDiagnostics(
  config: ConnectionConfig,
  options: DiagnosticOptions = {}
): Promise<DiagnosticReport> {
  const requirements = options.requirements
    ? validateRequirements(options.requirements)
    : resolveRequirements(config);
  const backend = options.backend ?? createBackend(resolveBackendConfig(config));
  const configuredSchema = resolveSchema(config, backend);

  const report: DiagnosticReport = {
    backend: backend.kind,
    target: backend.target,
    settings: describeSettings(config, backend),
    connected: false,
    schemas: [],
    configuredSchema,
    schema: configuredSchema,
    schemaFallback: false,
    tables: [],
    missingTables: [],
    warnings: [],
    success: false,
  };

  try {
    await backend.connect();
    report.connected = true;
  } catch (error) {
    report.failure = `Connection failed: ${describeError(error)}`;
    logger.error('Diagnostic connection failed', error);
    return report;
  }

  try {
    report.serverVersion = await backend.serverVersion();
    await inspect(backend, requirements, report);
  } catch (error) {
    report.failure = `Diagnostic query failed: ${describeError(error)}`;
    logger.error('Diagnostic query failed', error);
  } finally {
    await backend.close();
  }

  report.success = report.failure === undefined && report.missingTables.length === 0;
  return report;
}

async function inspect(
  backend: DatabaseBackend,
  requirements: readonly TableRequirement[],
  report: DiagnosticReport
): Promise<void> {
  try {
    report.schemas = await backend.listSchemas();
  } catch (error) {
    report.failure = `Failed to discover schemas: ${describeError(error)}`;
    logger.error('Schema discovery failed', error);
    return;
  }

  if (!report.schemas.includes(report.configuredSchema)) {
    report.warnings.push(
      `Configured schema '${report.configuredSchema}' not found. Available schemas: ${report.schemas.join(', ')}`
    );
    if (report.schemas.length > 0) {
      report.schema = report.schemas[0];
      report.schemaFallback = true;
      report.warnings.push(`Using first available schema: ${report.schema}`);
    }
  }

  await backend.withReadSession(async (session) => {
    for (const requirement of requirements) {
      const check = await checkTable(session, requirement, report.schema);
      report.tables.push(check);

      if (check.required && !check.found) {
        report.missingTables.push(check.qualifiedName);
      }
      if (!check.required && check.error) {
        report.warnings.push(`Error checking optional table ${check.qualifiedName}: ${check.error}`);
      }
      if (check.found && check.missingColumns.length > 0) {
        report.warnings.push(
          `Table ${check.qualifiedName} is missing expected columns: ${check.missingColumns.join(', ')}`
        );
      }
    }

    report.sampleQuery = await sampleRowCount(session, requirements, report);
  });
}

async function checkTable(
  session: CatalogSession,
  requirement: TableRequirement,
  schema: string
): Promise<TableCheck> {
  const check: TableCheck = {
    name: requirement.name,
    qualifiedName: qualifyTableName(schema, requirement.name),
    required: requirement.required,
    found: false,
    columns: [],
    missingColumns: [],
  };

  try {
    // A failed lookup must not take the remaining tables down with it
    await session.isolate(async () => {
      if (await session.hasTable(requirement.name, schema)) {
        check.found = true;
        check.columns = (await session.getColumns(requirement.name, schema)).map((column) => column.name);
        check.missingColumns = requirement.columns.filter((column) => !check.columns.includes(column));
      }
    });
  } catch (error) {
    check.error = describeError(error);
    logger.warn(`Error checking table ${check.qualifiedName}`, { error: check.error });
  }

  return check;
}

/**
 * Count rows of the first required table, when it was found.
 */
async function sampleRowCount(
  session: CatalogSession,
  requirements: readonly TableRequirement[],
  report: DiagnosticReport
): Promise<SampleQueryResult | undefined> {
  const first = requirements.find((r) => r.required);
  const check = first && report.tables.find((t) => t.name === first.name);
  if (!first || !check?.found) {
    return undefined;
  }

  try {
    const result = await session.isolate(() =>
      session.execute(`SELECT COUNT(*) AS row_count FROM ${quoteQualified(report.schema, first.name)}`)
    );
    return { table: check.qualifiedName, rowCount: Number(result.rows[0]?.row_count ?? 0) };
  } catch (error) {
    return { table: check.qualifiedName, error: describeError(error) };
  }
}

function describeSettings(config: ConnectionConfig, backend: DatabaseBackend): Record<string, string> {
  if (backend.kind === 'postgres' && config.postgres) {
    return {
      Host: config.postgres.host,
      Database: config.postgres.database,
      User: config.postgres.user,
    };
  }
  if (backend.kind === 'duckdb' && config.duckdb) {
    return { Path: config.duckdb.path };
  }
  return { Target: backend.target };
}
