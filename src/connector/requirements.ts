/**
 * Table Requirement Spec
 *
 * The tables the cohort analytics depend on. Only the member roster is small
 * enough to load eagerly; the claims fact tables stay in the database.
 *
 * @module connector/requirements
 */

import { ConfigurationError, ERROR_CODES } from '../contracts/errors.js';
import type { QualifiedTableName, TableRequirement } from '../contracts/types.js';
import { IDENTIFIER_PATTERN, type ConnectionConfig } from '../config/schema.js';

export const DEFAULT_TABLE_REQUIREMENTS: readonly TableRequirement[] = Object.freeze([
  {
    name: 'claims_entries',
    required: true,
    eager: false,
    columns: ['claim_entry_id', 'member_id_hash', 'date_of_service', 'claim_type'],
  },
  { name: 'claims_diagnoses', required: true, eager: false, columns: ['claim_entry_id', 'icd_code'] },
  { name: 'claims_procedures', required: true, eager: false, columns: ['claim_entry_id'] },
  { name: 'claims_drugs', required: true, eager: false, columns: ['claim_entry_id'] },
  { name: 'members', required: true, eager: true, columns: ['member_id_hash'] },
  { name: 'claims_members_monthly_utilization', required: false, eager: false, columns: ['member_id_hash'] },
]);

/**
 * Requirements from configuration, falling back to the default table contract.
 */
export function resolveRequirements(config: ConnectionConfig): readonly TableRequirement[] {
  return validateRequirements(config.tables ?? DEFAULT_TABLE_REQUIREMENTS);
}

/**
 * Reject specs with duplicate or non-identifier table names.
 */
export function validateRequirements(requirements: readonly TableRequirement[]): readonly TableRequirement[] {
  if (requirements.length === 0) {
    throw new ConfigurationError('Table requirement spec is empty', ERROR_CODES.CONFIG_INVALID);
  }

  const seen = new Set<string>();
  for (const requirement of requirements) {
    if (!IDENTIFIER_PATTERN.test(requirement.name)) {
      throw new ConfigurationError(
        `Invalid table name in requirement spec: '${requirement.name}'`,
        ERROR_CODES.CONFIG_INVALID,
        { table: requirement.name }
      );
    }
    if (seen.has(requirement.name)) {
      throw new ConfigurationError(
        `Duplicate table in requirement spec: '${requirement.name}'`,
        ERROR_CODES.CONFIG_INVALID,
        { table: requirement.name }
      );
    }
    seen.add(requirement.name);
  }

  return Object.freeze([...requirements]);
}

export function qualifyTableName(schema: string, table: string): QualifiedTableName {
  return `${schema}.${table}`;
}
