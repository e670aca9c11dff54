#!/usr/bin/env node
// trend-report.ts - Offline trend analysis and threshold calibration over the record history
import * as fs from 'fs';
import { Command } from 'commander';
import Logger, { LogLevel } from './common/logger';
import { ConfigurationError, errorMessage } from './common/errors';
import { loadConfig, MonitorConfig, createDefaultConfig } from './config/config';
import { AirtableRecordSink } from './server/record-sink';
import { parseChangeLog, ChangeEvent } from './trend/change-log';
import { analyzeTrend, HistoryRow } from './trend/coverage-normalizer';
import { HistoryLoader } from './trend/history-loader';
import { renderTrendCsv, renderTrendReport } from './trend/report-writer';
import { applyCalibration, calibrateThresholds, renderCalibration } from './trend/threshold-calibrator';

interface SourceOptions {
  config?: string;
  history?: string;
}

interface ReportOptions extends SourceOptions {
  changelog?: string;
  exclude?: string[];
  includeToday?: boolean;
  csv?: string;
}

function openConfig(options: SourceOptions): MonitorConfig {
  // Reading an exported file needs no credentials
  return loadConfig({ configPath: options.config, requireSink: options.history === undefined });
}

async function loadHistory(config: MonitorConfig, options: SourceOptions, logger: Logger): Promise<HistoryRow[]> {
  const loader = new HistoryLoader(logger);
  if (options.history) {
    return loader.fromFile(options.history);
  }
  return loader.fromStore(new AirtableRecordSink(config.sink, logger));
}

function readEvents(file: string | undefined): ChangeEvent[] {
  if (!file) return [];
  return parseChangeLog(fs.readFileSync(file, 'utf8'));
}

export async function runReport(options: ReportOptions, output: (text: string) => void = console.log): Promise<void> {
  const config = openConfig(options);
  const logger = new Logger('trend', config.logging.dir, { minLevel: LogLevel[config.logging.level], console: false });

  const rows = await loadHistory(config, options, logger);
  const events = readEvents(options.changelog);
  const report = analyzeTrend(rows, {
    streams: config.trend.streams,
    errorField: config.trend.errorField,
    divisor: config.trend.rescaleDivisor,
    smoothingWindowDays: config.trend.smoothingWindowDays,
    // The current day is partial unless asked for
    excludeDates: options.includeToday ? (options.exclude ?? []) : options.exclude
  });
  logger.info('Trend computed', { days: report.points.length, skipped: report.skipped.length, excluded: report.excludedDates });

  output(renderTrendReport(report, events));
  if (options.csv) {
    fs.writeFileSync(options.csv, renderTrendCsv(report, events));
    output(`\nCSV written to ${options.csv}`);
  }
}

export async function runCalibrate(options: SourceOptions, output: (text: string) => void = console.log): Promise<void> {
  const config = openConfig(options);
  const logger = new Logger('trend', config.logging.dir, { minLevel: LogLevel[config.logging.level], console: false });

  const rows = await loadHistory(config, options, logger);
  const calibration = calibrateThresholds(rows);
  output(renderCalibration(calibration, applyCalibration(config.thresholds, calibration)));
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export async function main(argv: string[]): Promise<number> {
  const program = new Command();
  program
    .name('host-pulse-trend')
    .description('Coverage-normalized error trend and threshold calibration from the health record history');

  program
    .command('report')
    .description('print the daily trend, annotated with change-log events')
    .option('--config <path>', 'JSON configuration file')
    .option('--history <file>', 'exported records (JSON) instead of reading the table store')
    .option('--changelog <file>', 'markdown change log to annotate events from')
    .option('--exclude <date>', 'exclude a day (YYYY-MM-DD); repeatable, replaces the default of today', collect)
    .option('--include-today', 'keep the current (partial) UTC day')
    .option('--csv <file>', 'also write the series as CSV')
    .action(async (options: ReportOptions) => {
      await runReport(options);
    });

  program
    .command('calibrate')
    .description('derive warning (mean + 2 sd) and critical (mean + 3 sd) thresholds')
    .option('--config <path>', 'JSON configuration file')
    .option('--history <file>', 'exported records (JSON) instead of reading the table store')
    .action(async (options: SourceOptions) => {
      await runCalibrate(options);
    });

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    const logger = new Logger('trend', createDefaultConfig().logging.dir);
    logger.error(`Trend job failed: ${errorMessage(error)}`, error);
    return error instanceof ConfigurationError ? 2 : 1;
  }
}

if (require.main === module) {
  main(process.argv)
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    });
}
