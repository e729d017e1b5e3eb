/**
 * Check CLI Command
 *
 * Verifies the connection and the table contract without building a
 * connector. Exits 0 when every required table exists, 1 otherwise.
 * Usage: npm run check [-- --config <path>]
 *
 * @module cli/check
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_CONFIG_PATH, loadConnectionConfig } from '../utils/config.js';
import { describeError } from '../contracts/errors.js';
import { runDiagnostics, type DiagnosticOptions } from '../diagnostics/index.js';
import { displayDiagnosticReport } from './check-display.js';

/**
 * Load configuration, run diagnostics, print the report; returns the exit code.
 */
export async function runCheck(configPath: string = DEFAULT_CONFIG_PATH, options: DiagnosticOptions = {}): Promise<number> {
  try {
    const config = await loadConnectionConfig(configPath);
    const report = await runDiagnostics(config, options);
    displayDiagnosticReport(report, configPath);
    return report.success ? 0 : 1;
  } catch (error) {
    console.error(chalk.red(`\n✗ Check failed: ${describeError(error)}`));
    return 1;
  }
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Test the database connection and verify the required tables exist')
    .option('--config <path>', 'Path to db_connection.yaml', DEFAULT_CONFIG_PATH)
    .action(async (options: { config: string }) => {
      process.exit(await runCheck(options.config));
    });
}
