/**
 * Load CLI Command
 *
 * Builds a data connector from configuration and reports what was loaded.
 *
 * @module cli/load
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DataConnector, type ConnectorOptions } from '../connector/index.js';
import { DEFAULT_CONFIG_PATH } from '../utils/config.js';
import { describeError, isConnectorError } from '../contracts/errors.js';
import type { BackendKind } from '../contracts/types.js';

export interface ConnectorSummary {
  backend: BackendKind;
  target: string;
  schema: string;
  materialized: Array<{ name: string; rows: number; columns: number }>;
  lazy: string[];
  notes: string[];
}

export function summarizeConnector(connector: DataConnector): ConnectorSummary {
  return {
    backend: connector.kind,
    target: connector.backend.target,
    schema: connector.schema,
    materialized: [...connector.tables.values()].map((table) => ({
      name: table.name,
      rows: table.rows.length,
      columns: table.columns.length,
    })),
    lazy: [...connector.lazyTables],
    notes: [...connector.notes],
  };
}

export function displayConnectorSummary(summary: ConnectorSummary): void {
  console.log('\n' + chalk.bold('=== Data Connector ===\n'));
  console.log(`  Backend:  ${summary.backend} (${summary.target})`);
  console.log(`  Schema:   ${summary.schema}`);

  console.log('\n' + chalk.cyan('Loaded into memory:'));
  for (const table of summary.materialized) {
    console.log(`  ● ${table.name}: ${table.rows} rows × ${table.columns} columns`);
  }

  console.log('\n' + chalk.cyan('Queried on demand:'));
  for (const name of summary.lazy) {
    console.log(`  ○ ${name}`);
  }

  if (summary.notes.length > 0) {
    console.log('\n' + chalk.yellow('Notes:'));
    for (const note of summary.notes) {
      console.log(chalk.yellow(`  ⚠ ${note}`));
    }
  }
}

/**
 * Open the connector, print its summary and close it; returns the exit code.
 */
export async function runLoad(
  configPath: string = DEFAULT_CONFIG_PATH,
  options: { json?: boolean } & ConnectorOptions = {}
): Promise<number> {
  const { json, ...connectorOptions } = options;
  try {
    const connector = await DataConnector.fromFile(configPath, connectorOptions);
    try {
      const summary = summarizeConnector(connector);
      if (json) {
        console.log(JSON.stringify(summary, null, 2));
      } else {
        displayConnectorSummary(summary);
      }
    } finally {
      await connector.close();
    }
    return 0;
  } catch (error) {
    const label = isConnectorError(error) ? error.name : 'Error';
    console.error(chalk.red(`\n✗ ${label}: ${describeError(error)}`));
    return 1;
  }
}

/**
 * Create the load command.
 */
export function createLoadCommand(): Command {
  return new Command('load')
    .description('Validate the table contract and load reference tables into memory')
    .option('--config <path>', 'Path to db_connection.yaml', DEFAULT_CONFIG_PATH)
    .option('--json', 'Output the summary as JSON')
    .action(async (options: { config: string; json?: boolean }) => {
      process.exit(await runLoad(options.config, { json: options.json }));
    });
}
