// signal-collector.ts - Bounded log windows and hardware/backup/update sub-queries
import * as path from 'path';
import { ComponentLogger } from '../common/logger';
import { errorMessage } from '../common/errors';
import { QueryConfig, WindowConfig, PathConfig } from '../config/config';
import {
  CrashReportSummary,
  HardwareStatus,
  SignalWindow,
  SystemInfo,
  WindowName
} from '../types';
import { describeOutcome, outputOf } from './command-runner';
import { OsSignalSource } from './os-signal-source';

// ============================================
// CONSTANTS
// ============================================

export const LOG_TIMEOUT_REASON = 'Log collection timed out';

const GPU_PREDICATE =
  'eventMessage CONTAINS[c] "gpu" OR eventMessage CONTAINS[c] "WindowServer" ' +
  'OR eventMessage CONTAINS[c] "display" OR eventMessage CONTAINS[c] "metal"';

const CRASH_EXTENSIONS = ['.crash', '.ips', '.panic', '.diag'];
const DAY_MS = 24 * 60 * 60 * 1000;

export interface SignalCollectorOptions {
  clock?: () => Date;
}

export interface CollectorSettings {
  windows: WindowConfig;
  queries: QueryConfig;
  paths: PathConfig;
}

// ============================================
// SIGNAL COLLECTOR
// ============================================

export class SignalCollector {
  private source: OsSignalSource;
  private settings: CollectorSettings;
  private logger: ComponentLogger;
  private clock: () => Date;

  constructor(source: OsSignalSource, settings: CollectorSettings, logger: ComponentLogger, options: SignalCollectorOptions = {}) {
    this.source = source;
    this.settings = settings;
    this.logger = logger;
    this.clock = options.clock ?? (() => new Date());
  }

  // ============================================
  // LOG WINDOWS
  // ============================================

  async collectWindow(name: WindowName): Promise<SignalWindow> {
    const windowSettings = this.settings.windows[name];
    const args = name === 'gpu'
      ? ['show', '--last', windowSettings.duration, '--predicate', GPU_PREDICATE]
      : ['show', '--style', 'syslog', '--last', windowSettings.duration];

    const started = Date.now();
    const outcome = await this.source.queryLog(args, windowSettings.timeoutSeconds * 1000);
    const elapsedMs = Date.now() - started;

    if (outcome.status === 'timed-out') {
      this.logger.warn(`Log window ${name} timed out`, { duration: windowSettings.duration, timeoutSeconds: windowSettings.timeoutSeconds });
      return { name, duration: windowSettings.duration, outcome: 'timed-out', content: '', reason: LOG_TIMEOUT_REASON };
    }

    const content = outputOf(outcome);
    if (content === null) {
      const reason = `Log collection failed: ${describeOutcome(outcome)}`;
      this.logger.warn(`Log window ${name} unavailable`, { duration: windowSettings.duration, reason });
      return { name, duration: windowSettings.duration, outcome: 'failed', content: '', reason };
    }

    this.logger.debug(`Log window ${name} collected`, { duration: windowSettings.duration, bytes: content.length, elapsedMs });
    return { name, duration: windowSettings.duration, outcome: 'success', content };
  }

  // ============================================
  // HARDWARE / BACKUP / UPDATES
  // ============================================

  async collectHardware(): Promise<HardwareStatus> {
    const bootDevice = await this.isolated('boot device', 'disk0', () => this.readBootDevice());
    const smartStatus = await this.isolated('SMART status', 'Unknown', () => this.readSmartStatus(bootDevice));
    const kernelPanics24h = await this.isolated('kernel panics', 0, () => this.countKernelPanics());
    const backupAgeDays = await this.isolated('backup age', -1, () => this.readBackupAgeDays());
    const softwareUpdates = await this.isolated<HardwareStatus['softwareUpdates']>(
      'software updates', 'Unknown', () => this.readSoftwareUpdates()
    );

    return { bootDevice, smartStatus, kernelPanics24h, backupAgeDays, softwareUpdates };
  }

  async readBootDevice(): Promise<string> {
    const outcome = await this.source.exec('diskutil', ['info', '/'], this.settings.queries.smartTimeoutSeconds * 1000);
    const text = outputOf(outcome);
    const match = text?.match(/Device Node:\s*(\S+)/);
    if (!match) return 'disk0';
    return match[1].replace(/s[0-9]*$/, '');
  }

  async readSmartStatus(device: string): Promise<string> {
    const outcome = await this.source.exec('diskutil', ['info', device], this.settings.queries.smartTimeoutSeconds * 1000);
    if (outcome.status === 'timed-out') {
      this.logger.warn('SMART status query timed out', { device });
    }
    const match = outputOf(outcome)?.match(/SMART Status:\s*(.+)/);
    const status = match ? match[1].trim() : '';
    return status || 'Unknown';
  }

  /** Panic reports written in the last 24 hours, judged by file modification time. */
  async countKernelPanics(): Promise<number> {
    const cutoff = this.clock().getTime() - DAY_MS;
    const files = await this.source.listFiles(this.settings.paths.systemReportDir, ['.panic']);
    let count = 0;
    for (const file of files) {
      const mtime = await this.source.modifiedAt(file);
      if (mtime && mtime.getTime() >= cutoff) count++;
    }
    return count;
  }

  /** Whole days since the latest backup, or -1 when it cannot be determined. */
  async readBackupAgeDays(): Promise<number> {
    const outcome = await this.source.exec('tmutil', ['latestbackup'], this.settings.queries.backupTimeoutSeconds * 1000);
    const latest = outputOf(outcome)?.split('\n')[0].trim();
    if (!latest) return -1;

    const mtime = await this.source.modifiedAt(latest);
    if (!mtime) return -1;

    return Math.floor((this.clock().getTime() - mtime.getTime()) / DAY_MS);
  }

  async readSoftwareUpdates(): Promise<HardwareStatus['softwareUpdates']> {
    const outcome = await this.source.exec('softwareupdate', ['--list'], this.settings.queries.updatesTimeoutSeconds * 1000);
    if (outcome.status !== 'ok') {
      this.logger.warn('Software update query unavailable', { reason: describeOutcome(outcome) });
      return 'Unknown';
    }
    // The tool reports "no updates" on stderr
    const text = `${outcome.stdout}\n${outcome.stderr}`;
    if (text.includes('No new software available')) return 'Up to Date';
    if (/^\s*\*\s+/m.test(text)) return 'Updates Available';
    return 'Unknown';
  }

  // ============================================
  // SYSTEM INFO / CRASH REPORTS
  // ============================================

  async collectSystemInfo(): Promise<SystemInfo> {
    const driveSpace = await this.isolated<string | undefined>('drive space', undefined, () => this.readDriveSpace());
    const uptime = await this.isolated<string | undefined>('uptime', undefined, () => this.readUptime());
    const memoryPressure = await this.isolated<string | undefined>('memory pressure', undefined, () => this.readMemoryPressure());
    const cpuTemperature = await this.isolated('CPU temperature', 'N/A', () => this.readCpuTemperature());
    return { driveSpace, uptime, memoryPressure, cpuTemperature };
  }

  async readDriveSpace(): Promise<string | undefined> {
    const timeoutMs = this.settings.queries.commandTimeoutSeconds * 1000;
    for (const mount of ['/System/Volumes/Data', '/']) {
      const text = outputOf(await this.source.exec('df', ['-h', mount], timeoutMs));
      const line = text?.split('\n')[1];
      if (!line) continue;
      const cols = line.trim().split(/\s+/);
      if (cols.length < 5) continue;
      return `Total: ${cols[1]}, Used: ${cols[2]} (${cols[4]}), Available: ${cols[3]}`;
    }
    return undefined;
  }

  async readUptime(): Promise<string | undefined> {
    const text = outputOf(await this.source.exec('uptime', [], this.settings.queries.commandTimeoutSeconds * 1000));
    if (!text) return undefined;
    const cols = text.trim().split(/\s+/);
    if (cols.length < 4) return undefined;
    return `${cols[2]} ${cols[3]}`.replace(/,$/, '');
  }

  async readMemoryPressure(): Promise<string | undefined> {
    const text = outputOf(await this.source.exec('memory_pressure', [], this.settings.queries.commandTimeoutSeconds * 1000));
    const line = text?.split('\n').find(l => l.includes('System-wide'));
    const match = line?.match(/(\d+)%/);
    if (!match) return undefined;
    return `${100 - parseInt(match[1], 10)}%`;
  }

  async readCpuTemperature(): Promise<string> {
    const text = outputOf(await this.source.exec('osx-cpu-temp', [], this.settings.queries.commandTimeoutSeconds * 1000));
    return text?.trim() || 'N/A';
  }

  async collectCrashReports(): Promise<CrashReportSummary> {
    return this.isolated<CrashReportSummary>('crash reports', { count: 0, newest: [] }, async () => {
      const files = await this.source.listFiles(this.settings.paths.userReportDir, CRASH_EXTENSIONS);
      const dated = await Promise.all(files.map(async file => ({
        file,
        time: (await this.source.modifiedAt(file))?.getTime() ?? 0
      })));
      dated.sort((a, b) => b.time - a.time);
      return {
        count: dated.length,
        newest: dated.slice(0, 3).map(entry => path.basename(entry.file))
      };
    });
  }

  async readOsVersion(): Promise<string | undefined> {
    return this.isolated<string | undefined>('OS version', undefined, async () => {
      const text = outputOf(await this.source.exec('sw_vers', ['-productVersion'], this.settings.queries.commandTimeoutSeconds * 1000));
      return text?.trim() || undefined;
    });
  }

  /**
   * Runs one sub-query; any exception is logged and replaced by the fallback so
   * the remaining sub-queries still run.
   */
  private async isolated<T>(label: string, fallback: T, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      this.logger.warn(`Sub-query failed: ${label}; using default`, { fallback, error: errorMessage(error) });
      return fallback;
    }
  }
}
