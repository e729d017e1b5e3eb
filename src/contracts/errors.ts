/**
 * Error Code Registry
 *
 * Every failure the connector surfaces carries one of these codes. All of them
 * are terminal: nothing in this layer retries or downgrades them.
 *
 * @module contracts/errors
 */

import type { QualifiedTableName } from './types.js';

// =============================================================================
// ERROR CODE CONSTANTS
// =============================================================================

export const ERROR_CODES = {
  /** Configuration file does not exist */
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  /** Configuration file has invalid YAML or fails schema validation */
  CONFIG_INVALID: 'CONFIG_INVALID',
  /** The active backend's section is absent, or the backend is ambiguous */
  CONFIG_BACKEND_MISSING: 'CONFIG_BACKEND_MISSING',
  /** Backend unreachable or authentication failed */
  DB_UNREACHABLE: 'DB_UNREACHABLE',
  /** Required table absent under the resolved schema */
  TABLE_MISSING: 'TABLE_MISSING',
  /** Table was validated but not loaded into memory */
  TABLE_NOT_MATERIALIZED: 'TABLE_NOT_MATERIALIZED',
  /** Connector used after close() */
  CONNECTOR_CLOSED: 'CONNECTOR_CLOSED',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

type ConfigurationErrorCode =
  | typeof ERROR_CODES.CONFIG_NOT_FOUND
  | typeof ERROR_CODES.CONFIG_INVALID
  | typeof ERROR_CODES.CONFIG_BACKEND_MISSING;

// =============================================================================
// ERROR CLASSES
// =============================================================================

export class ConnectorError extends Error {
  code: ErrorCode;
  context?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ConnectorError';
    this.code = code;
    this.context = context;
  }
}

/**
 * Malformed or missing configuration. The user must fix the config file.
 */
export class ConfigurationError extends ConnectorError {
  constructor(
    message: string,
    code: ConfigurationErrorCode = ERROR_CODES.CONFIG_INVALID,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(code, message, context, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Backend unreachable or authentication failure.
 */
export class ConnectionError extends ConnectorError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(ERROR_CODES.DB_UNREACHABLE, message, context, cause);
    this.name = 'ConnectionError';
  }
}

/**
 * One or more required tables are absent. `table` is the first in
 * requirement order; `tables` lists every missing one.
 */
export class MissingTableError extends ConnectorError {
  readonly table: QualifiedTableName;
  readonly tables: readonly QualifiedTableName[];

  constructor(tables: QualifiedTableName[]) {
    const message =
      tables.length === 1
        ? `Missing required table: ${tables[0]}`
        : `Missing required tables: ${tables.join(', ')}`;
    super(ERROR_CODES.TABLE_MISSING, message, { tables });
    this.name = 'MissingTableError';
    this.table = tables[0];
    this.tables = [...tables];
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Type guard to check if an error is a ConnectorError
 */
export function isConnectorError(error: unknown): error is ConnectorError {
  return error instanceof ConnectorError;
}

/**
 * Best-effort message for an unknown thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : String(error);
}
