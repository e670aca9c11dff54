// error-rules.ts - Declarative rule table for classifying unified-log lines into subsystem buckets
import { ErrorBucketName } from '../types';

/**
 * A bucket counts a line only when the line matches BOTH the subsystem pattern
 * and the failure pattern. Patterns are case-insensitive regular expressions kept
 * as strings so the table can be replaced from the config file.
 */
export interface ErrorRuleDefinition {
  bucket: ErrorBucketName;
  field: string;          // sink column the count is written to
  subsystem: string;
  failure: string;
}

export interface CompiledErrorRule {
  bucket: ErrorBucketName;
  field: string;
  subsystem: RegExp;
  failure: RegExp;
}

export const DEFAULT_ERROR_RULES: ReadonlyArray<ErrorRuleDefinition> = [
  { bucket: 'kernel', field: 'error_kernel_1h', subsystem: 'kernel', failure: 'error|fail|panic' },
  { bucket: 'windowServer', field: 'error_windowserver_1h', subsystem: 'WindowServer', failure: 'error|fail|crash' },
  { bucket: 'spotlight', field: 'error_spotlight_1h', subsystem: 'metadata|spotlight', failure: 'error|fail' },
  { bucket: 'icloud', field: 'error_icloud_1h', subsystem: 'icloud|CloudKit', failure: 'error|fail|timeout' },
  { bucket: 'diskIo', field: 'error_disk_io_1h', subsystem: 'I/O|disk|read|write', failure: 'I/O error|disk.*error|read.*fail|write.*fail' },
  { bucket: 'network', field: 'error_network_1h', subsystem: 'network|dns|resolver', failure: 'error|fail|timeout|unreachable' },
  { bucket: 'gpu', field: 'error_gpu_1h', subsystem: 'GPU|AMDRadeon|Metal', failure: 'error|fail|timeout|hang|reset' },
  { bucket: 'systemstats', field: 'error_systemstats_1h', subsystem: 'systemstats', failure: 'error|fail' },
  { bucket: 'power', field: 'error_power_1h', subsystem: 'powerd', failure: 'error|fail|warning' },
];

// Line markers shared by every rule set
export const ERROR_MARKER = /error/i;
export const FAULT_MARKER = /<Fault>|<Critical>|\[critical\]|\[fatal\]/i;
export const THERMAL_THROTTLE_MARKER = /thermal.*throttl|throttl.*thermal|cpu.*throttl/i;
export const FAN_MAX_MARKER = /fan.*max|fan.*speed.*high|fan.*rpm/i;

export function compileRules(definitions: ReadonlyArray<ErrorRuleDefinition>): CompiledErrorRule[] {
  return definitions.map(def => {
    try {
      return {
        bucket: def.bucket,
        field: def.field,
        subsystem: new RegExp(def.subsystem, 'i'),
        failure: new RegExp(def.failure, 'i')
      };
    } catch (error) {
      throw new Error(`Invalid pattern in error rule for bucket "${def.bucket}": ${error instanceof Error ? error.message : String(error)}`);
    }
  });
}
