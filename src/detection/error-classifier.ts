// error-classifier.ts - Counts error lines in a log window and sorts them into subsystem buckets
import {
  ErrorBucketCounts,
  ErrorClassification,
  LineCount,
  SignalWindow,
  isWindowAvailable
} from '../types';
import {
  CompiledErrorRule,
  DEFAULT_ERROR_RULES,
  ERROR_MARKER,
  ErrorRuleDefinition,
  FAN_MAX_MARKER,
  FAULT_MARKER,
  THERMAL_THROTTLE_MARKER,
  compileRules
} from './error-rules';

const TOP_MESSAGE_LIMIT = 3;
export const TOP_MESSAGE_SEPARATOR = ' | ';

export function emptyBuckets(): ErrorBucketCounts {
  return {
    kernel: 0,
    windowServer: 0,
    spotlight: 0,
    icloud: 0,
    diskIo: 0,
    network: 0,
    gpu: 0,
    systemstats: 0,
    power: 0
  };
}

export class ErrorClassifier {
  private rules: CompiledErrorRule[];

  constructor(rules: ReadonlyArray<ErrorRuleDefinition> = DEFAULT_ERROR_RULES) {
    this.rules = compileRules(rules);
  }

  classify(window: SignalWindow): ErrorClassification {
    if (!isWindowAvailable(window)) {
      return { available: false, reason: window.reason };
    }

    const buckets = emptyBuckets();
    const errorLines: string[] = [];
    let criticalFaults = 0;
    let thermalThrottles = 0;
    let fanMaxEvents = 0;

    for (const line of splitLines(window.content)) {
      if (ERROR_MARKER.test(line)) errorLines.push(line);
      if (FAULT_MARKER.test(line)) criticalFaults++;
      if (THERMAL_THROTTLE_MARKER.test(line)) thermalThrottles++;
      if (FAN_MAX_MARKER.test(line)) fanMaxEvents++;

      for (const rule of this.rules) {
        if (rule.subsystem.test(line) && rule.failure.test(line)) {
          buckets[rule.bucket]++;
        }
      }
    }

    const totalErrors = errorLines.length;
    return {
      available: true,
      totalErrors,
      criticalFaults: Math.min(criticalFaults, totalErrors),
      buckets,
      thermalThrottles,
      fanMaxEvents,
      topMessages: topMessages(errorLines)
    };
  }

  /** Error-line count for a secondary window such as the recent 5-minute one. */
  countErrorLines(window: SignalWindow): LineCount {
    if (!isWindowAvailable(window)) {
      return { available: false, reason: window.reason };
    }
    let count = 0;
    for (const line of splitLines(window.content)) {
      if (ERROR_MARKER.test(line)) count++;
    }
    return { available: true, count };
  }
}

function splitLines(content: string): string[] {
  return content.split('\n').filter(line => line.length > 0);
}

/**
 * The most frequent distinct messages. A message is the line from its last
 * "error" onward, so timestamps and process prefixes do not split identical
 * failures. Ties keep first-seen order.
 */
export function topMessages(errorLines: string[], limit: number = TOP_MESSAGE_LIMIT): string[] {
  const counts = new Map<string, number>();
  for (const line of errorLines) {
    const residue = line.replace(/.*error/i, 'error').trim();
    counts.set(residue, (counts.get(residue) ?? 0) + 1);
  }

  // Map iteration follows insertion order and Array.sort is stable
  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([message]) => message);
}

export function totalOrZero(count: LineCount): number {
  return count.available ? count.count : 0;
}
