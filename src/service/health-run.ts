// health-run.ts - One scheduled assessment: guard, collect, classify, assemble, submit
import * as os from 'os';
import { ComponentLogger } from '../common/logger';
import { MonitorConfig } from '../config/config';
import { ErrorClassifier } from '../detection/error-classifier';
import { GpuFreezeDetector } from '../detection/gpu-freeze-detector';
import { SeverityClassifier } from '../detection/severity-classifier';
import { MacOsSignalSource, OsSignalSource } from '../monitoring/os-signal-source';
import { SignalCollector } from '../monitoring/signal-collector';
import { AirtableRecordSink, RecordSink } from '../server/record-sink';
import { HealthRecord, SeverityVerdict } from '../types';
import { ActivityCollector } from './activity-collector';
import { ExecutionGuard } from './execution-guard';
import { ReachabilityProbe } from './reachability-probe';
import { assembleRecord, formatTimestamp } from './record-assembler';

// ============================================
// INTERFACES
// ============================================

export interface RunLogger extends ComponentLogger {
  getSessionLog(): string;
}

export type RunOutcome =
  | { status: 'busy'; reason: string }
  | { status: 'submitted'; recordId: string; verdict: SeverityVerdict }
  | { status: 'rejected'; reason: string; httpStatus: number | null; verdict: SeverityVerdict };

/** Fixed at the start of a run and shared read-only by every stage. */
export interface RunContext {
  readonly startedAt: Date;
  readonly hostname: string;
  readonly config: Readonly<MonitorConfig>;
}

export interface HealthRunDeps {
  config: MonitorConfig;
  logger: RunLogger;
  guard: ExecutionGuard;
  collector: SignalCollector;
  activity: ActivityCollector;
  reachability: ReachabilityProbe;
  sink: RecordSink;
  clock?: () => Date;
  hostname?: string;
}

// ============================================
// HEALTH RUN
// ============================================

export class HealthRun {
  private deps: HealthRunDeps;
  private classifier: ErrorClassifier;
  private gpuDetector: GpuFreezeDetector;
  private severity: SeverityClassifier;
  private clock: () => Date;

  constructor(deps: HealthRunDeps) {
    this.deps = deps;
    this.classifier = new ErrorClassifier(deps.config.classifier.rules);
    this.gpuDetector = new GpuFreezeDetector();
    this.severity = new SeverityClassifier(deps.config.thresholds);
    this.clock = deps.clock ?? (() => new Date());
  }

  async execute(): Promise<RunOutcome> {
    const { logger, guard, sink } = this.deps;

    const guarded = await guard.withLease(async () => {
      const context: RunContext = Object.freeze({
        startedAt: this.clock(),
        hostname: this.deps.hostname ?? os.hostname(),
        config: this.deps.config
      });

      const record = await this.assess(context);
      const result = await sink.submit(record);
      return { record, result };
    });

    if (guarded.status === 'busy') {
      logger.info('Skipping run: execution lease is held', { reason: guarded.reason, holder: guarded.holder });
      return { status: 'busy', reason: guarded.reason };
    }

    const { record, result } = guarded.value;
    if (result.ok) {
      return { status: 'submitted', recordId: result.recordId, verdict: record.verdict };
    }
    return { status: 'rejected', reason: result.reason, httpStatus: result.status, verdict: record.verdict };
  }

  async assess(context: RunContext): Promise<HealthRecord> {
    const { logger, collector, activity, reachability } = this.deps;

    logger.info('Health assessment started', { hostname: context.hostname });

    const primary = await collector.collectWindow('primary');
    const recent = await collector.collectWindow('recent');
    const gpuWindow = await collector.collectWindow('gpu');

    const osVersion = await collector.readOsVersion();
    const hardware = await collector.collectHardware();
    const system = await collector.collectSystemInfo();
    const crashes = await collector.collectCrashReports();

    const errors = this.classifier.classify(primary);
    const recentErrors = this.classifier.countErrorLines(recent);
    const gpuFreeze = this.gpuDetector.detect(gpuWindow);
    const verdict = this.severity.classify({ hardware, errors, recentErrors, crashes, gpuFreeze });
    logger.info('Severity determined', verdict);

    const activitySnapshot = await activity.collect();
    const reachabilitySnapshot = await reachability.probe();

    const runDurationSeconds = Math.round((this.clock().getTime() - context.startedAt.getTime()) / 1000);
    logger.info('Health assessment complete', { runDurationSeconds });

    return assembleRecord({
      timestamp: formatTimestamp(context.startedAt),
      hostname: context.hostname,
      osVersion,
      hardware,
      system,
      crashes,
      errors,
      recentErrors,
      verdict,
      gpuFreeze,
      activity: activitySnapshot,
      reachability: reachabilitySnapshot,
      runDurationSeconds,
      debugLog: logger.getSessionLog()
    });
  }
}

/** Wires the production collaborators for a config. */
export function createHealthRun(
  config: MonitorConfig,
  logger: RunLogger,
  source: OsSignalSource = new MacOsSignalSource({ maxOutputBytes: config.windows.maxOutputMb * 1024 * 1024 })
): { run: HealthRun; guard: ExecutionGuard; sink: AirtableRecordSink } {
  const guard = new ExecutionGuard(config.guard, logger);
  const sink = new AirtableRecordSink(config.sink, logger, { rules: config.classifier.rules });
  const run = new HealthRun({
    config,
    logger,
    guard,
    collector: new SignalCollector(source, config, logger),
    activity: new ActivityCollector(source, config.activity, config.queries.commandTimeoutSeconds, logger),
    reachability: new ReachabilityProbe(source, config.activity, config.queries.commandTimeoutSeconds, logger),
    sink
  });
  return { run, guard, sink };
}
