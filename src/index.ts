#!/usr/bin/env node
// index.ts - Scheduled entry point: one health run per invocation
import { Command } from 'commander';
import Logger, { LogLevel } from './common/logger';
import { ConfigurationError, errorMessage } from './common/errors';
import { loadConfig, MonitorConfig, createDefaultConfig } from './config/config';
import { createHealthRun, RunOutcome } from './service/health-run';
import { AirtableRecordSink, ConnectionCheck } from './server/record-sink';
import { expectedFieldNames } from './service/record-assembler';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 2;

export function exitCodeFor(outcome: RunOutcome): number {
  switch (outcome.status) {
    case 'submitted':
    case 'busy':
      return EXIT_OK;
    case 'rejected':
      return EXIT_FAILURE;
  }
}

interface CliOptions {
  config?: string;
  envFile?: string;
  checkSink?: boolean;
}

function describeConnection(check: ConnectionCheck, tableName: string, expected: string[]): string[] {
  if (!check.ok) {
    return [`Connection failed (${check.status ?? 'no response'}): ${check.reason}`];
  }
  const lines = [`Connection OK. Tables: ${check.tables.join(', ')}`];
  if (!check.tableFound) {
    lines.push(`Table "${tableName}" not found in base`);
    return lines;
  }
  const missing = expected.filter(field => !check.fieldNames.includes(field));
  lines.push(missing.length > 0
    ? `Fields missing from "${tableName}": ${missing.join(', ')}`
    : `All ${expected.length} record fields exist in "${tableName}"`);
  return lines;
}

async function checkSink(config: MonitorConfig, logger: Logger): Promise<number> {
  const sink = new AirtableRecordSink(config.sink, logger, { rules: config.classifier.rules });
  const check = await sink.verifyConnection();
  const expected = expectedFieldNames(config.classifier.rules);
  for (const line of describeConnection(check, config.sink.tableName, expected)) {
    logger.info(line);
  }
  return check.ok && check.tableFound ? EXIT_OK : EXIT_FAILURE;
}

export async function main(argv: string[]): Promise<number> {
  const program = new Command();
  program
    .name('host-pulse')
    .description('Samples host health signals once and posts one record to the table store')
    .option('--config <path>', 'JSON configuration file (default: ./monitor.config.json)')
    .option('--env-file <path>', 'file with AIRTABLE_* credentials (default: ./.env)')
    .option('--check-sink', 'verify the table store credentials and field names, then exit')
    .parse(argv);
  const options = program.opts<CliOptions>();

  let config: MonitorConfig;
  try {
    config = loadConfig({ configPath: options.config, envFile: options.envFile });
  } catch (error) {
    const fallback = new Logger('host-pulse', createDefaultConfig().logging.dir);
    fallback.critical('Configuration error; aborting before any collection', error);
    return error instanceof ConfigurationError ? EXIT_CONFIG : EXIT_FAILURE;
  }

  const logger = new Logger('host-pulse', config.logging.dir, { minLevel: LogLevel[config.logging.level] });

  if (options.checkSink) {
    return checkSink(config, logger);
  }

  const { run, guard } = createHealthRun(config, logger);

  // The lease must not outlive the process, whatever ends it
  const releaseAndExit = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal}; releasing lease`);
    guard.releaseSync();
    process.exit(EXIT_FAILURE);
  };
  process.once('SIGINT', releaseAndExit);
  process.once('SIGTERM', releaseAndExit);
  process.once('exit', () => guard.releaseSync());

  logger.startOperation('health run');
  try {
    const outcome = await run.execute();
    switch (outcome.status) {
      case 'busy':
        logger.endOperation('health run', true, { skipped: outcome.reason });
        break;
      case 'submitted':
        logger.endOperation('health run', true, { recordId: outcome.recordId, severity: outcome.verdict.severity });
        break;
      case 'rejected':
        logger.endOperation('health run', false, { reason: outcome.reason, status: outcome.httpStatus });
        break;
    }
    return exitCodeFor(outcome);
  } catch (error) {
    logger.error(`Health run failed: ${errorMessage(error)}`, error);
    return EXIT_FAILURE;
  }
}

if (require.main === module) {
  main(process.argv)
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('Fatal error:', error);
      process.exitCode = EXIT_FAILURE;
    });
}
