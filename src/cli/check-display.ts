/**
 * Diagnostic Display Module
 *
 * Human-readable pass/fail output for the `check` command.
 *
 * @module cli/check-display
 */

import chalk from 'chalk';
import type { DiagnosticReport, TableCheck } from '../diagnostics/index.js';

const RULE = '='.repeat(60);
const PREVIEW_COLUMNS = 5;

/**
 * Display a diagnostic report, one numbered section per step.
 */
export function displayDiagnosticReport(report: DiagnosticReport, configPath: string): void {
  console.log(RULE);
  console.log(chalk.bold(`${report.backend === 'postgres' ? 'PostgreSQL' : 'DuckDB'} Connection Check`));
  console.log(RULE);

  console.log('\n' + chalk.cyan('1. Configuration'));
  console.log(chalk.green(`   ✓ Configuration loaded from ${configPath}`));
  for (const [label, value] of Object.entries(report.settings)) {
    console.log(`   ${label}: ${value}`);
  }

  console.log('\n' + chalk.cyan('2. Connection'));
  if (!report.connected) {
    console.log(chalk.red(`   ✗ ${report.failure ?? 'Connection failed'}`));
    return;
  }
  console.log(chalk.green('   ✓ Connected successfully'));
  if (report.serverVersion) {
    console.log(`   Version: ${truncate(report.serverVersion, 50)}`);
  }

  console.log('\n' + chalk.cyan('3. Schemas'));
  console.log(`   Found ${report.schemas.length} schema(s): ${report.schemas.join(', ')}`);
  if (report.schemaFallback) {
    console.log(chalk.yellow(`   ⚠ Configured schema '${report.configuredSchema}' not found`));
    console.log(chalk.yellow(`   Using first available schema: ${report.schema}`));
  } else {
    console.log(chalk.green(`   ✓ Using schema: ${report.schema}`));
  }

  console.log('\n' + chalk.cyan('4. Required tables'));
  for (const check of report.tables.filter((t) => t.required)) {
    console.log(formatTableCheck(check));
  }

  console.log('\n' + chalk.cyan('5. Optional tables'));
  for (const check of report.tables.filter((t) => !t.required)) {
    console.log(formatTableCheck(check));
  }

  if (report.sampleQuery) {
    console.log('\n' + chalk.cyan('6. Sample query'));
    const sample = report.sampleQuery;
    if (sample.error) {
      console.log(chalk.red(`   ✗ Sample query failed: ${sample.error}`));
    } else {
      console.log(chalk.green(`   ✓ ${sample.table} row count: ${(sample.rowCount ?? 0).toLocaleString('en-US')}`));
    }
  }

  displaySummary(report);
}

export function formatTableCheck(check: TableCheck): string {
  if (check.error) {
    const icon = check.required ? chalk.red('✗') : chalk.yellow('⚠');
    return `   ${icon} Error checking table ${check.qualifiedName}: ${check.error}`;
  }
  if (!check.found) {
    return check.required
      ? chalk.red(`   ✗ Missing table: ${check.qualifiedName}`)
      : chalk.yellow(`   ⚠ Optional table not found: ${check.qualifiedName} (this is OK)`);
  }

  const preview = check.columns.slice(0, PREVIEW_COLUMNS).join(', ');
  const more = check.columns.length > PREVIEW_COLUMNS ? '...' : '';
  const lines = [
    chalk.green(`   ✓ Found table: ${check.qualifiedName}`),
    `      Columns (${check.columns.length}): ${preview}${more}`,
  ];
  if (check.missingColumns.length > 0) {
    lines.push(chalk.yellow(`      ⚠ Missing expected columns: ${check.missingColumns.join(', ')}`));
  }
  return lines.join('\n');
}

function displaySummary(report: DiagnosticReport): void {
  console.log('\n' + RULE);
  console.log(chalk.bold('SUMMARY'));
  console.log(RULE);

  if (report.failure) {
    console.log(chalk.red(`\n✗ FAILED: ${report.failure}`));
    return;
  }

  if (report.missingTables.length > 0) {
    console.log(chalk.red(`\n✗ FAILED: Missing ${report.missingTables.length} required table(s):`));
    for (const table of report.missingTables) {
      console.log(`   - ${table}`);
    }
    console.log(chalk.yellow('\n⚠ Please verify:'));
    console.log(`   1. Schema name is correct (currently: ${report.schema})`);
    console.log('   2. Tables exist in the database');
    console.log('   3. User has read permissions');
    return;
  }

  console.log(chalk.green('\n✓ SUCCESS: All required tables found!'));
  if (report.backend === 'postgres') {
    console.log('\nRecommended configuration:');
    console.log(`  schema: "${report.schema}"`);
  }
  if (report.warnings.length > 0) {
    console.log('\n' + chalk.yellow('Warnings:'));
    for (const warning of report.warnings) {
      console.log(chalk.yellow(`  ⚠ ${warning}`));
    }
  }
}

function truncate(value: string, length: number): string {
  return value.length > length ? `${value.slice(0, length)}...` : value;
}
