#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import { parseSqlCommandArgs, runSqlCommand } from './command/sql-command.js';
import { loadConfig } from './config.js';
import { MetricSqlError } from './errors.js';
import { configureLogger, logger } from './utils/logger.js';

async function main() {
  configureLogger(loadConfig());
  const options = parseSqlCommandArgs(hideBin(process.argv));
  if (!options) return;
  await runSqlCommand(options);
}

main().catch((e) => {
  if (e instanceof MetricSqlError) {
    logger.debug('Command failed', { code: e.code, stack: e.stack });
    console.error(`Error: ${e.message}`);
  } else {
    console.error(e);
  }
  process.exit(1);
});
