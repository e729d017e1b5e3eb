#!/usr/bin/env node

/**
 * Cohort Data Connector
 *
 * Main entry point. Validates the claims table contract against DuckDB or
 * PostgreSQL and loads the reference tables cohort analytics need.
 */

import 'dotenv/config';
import { Command } from 'commander';
import { createCheckCommand } from './cli/check.js';
import { createLoadCommand } from './cli/load.js';
import { logger } from './utils/logger.js';

const program = new Command();

program
  .name('cohort-db')
  .description('Validate and load the claims dataset from DuckDB or PostgreSQL')
  .version('0.1.0');

program.addCommand(createCheckCommand());
program.addCommand(createLoadCommand());

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Command failed', error);
  process.exit(1);
});
