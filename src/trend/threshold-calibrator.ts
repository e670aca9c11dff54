// threshold-calibrator.ts - Warning/critical thresholds as mean + 2σ / mean + 3σ of the history
import { ThresholdConfig } from '../config/config';
import { HistoryRow } from './coverage-normalizer';

export interface SeriesStats {
  field: string;
  samples: number;
  mean: number;
  stdDev: number;
  warning: number;
  critical: number;
}

export interface CalibrationFields {
  primary: string;
  recent: string;
  fault: string;
}

export const DEFAULT_CALIBRATION_FIELDS: CalibrationFields = {
  primary: 'Error Count',
  recent: 'Recent Error Count (5 min)',
  fault: 'Critical Fault Count (1h)'
};

export interface Calibration {
  primary: SeriesStats | null;
  recent: SeriesStats | null;
  fault: SeriesStats | null;
}

/** Sample statistics (n - 1); null with fewer than two samples. */
export function seriesStats(field: string, values: number[]): SeriesStats | null {
  if (values.length < 2) return null;
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (values.length - 1);
  const stdDev = Math.sqrt(variance);
  return {
    field,
    samples: values.length,
    mean,
    stdDev,
    warning: Math.ceil(mean + 2 * stdDev),
    critical: Math.ceil(mean + 3 * stdDev)
  };
}

function valuesOf(rows: HistoryRow[], field: string): number[] {
  return rows
    .map(row => row.fields[field])
    .filter((value): value is number => typeof value === 'number' && Number.isFinite(value));
}

export function calibrateThresholds(
  rows: HistoryRow[],
  fields: CalibrationFields = DEFAULT_CALIBRATION_FIELDS
): Calibration {
  return {
    primary: seriesStats(fields.primary, valuesOf(rows, fields.primary)),
    recent: seriesStats(fields.recent, valuesOf(rows, fields.recent)),
    fault: seriesStats(fields.fault, valuesOf(rows, fields.fault))
  };
}

/** Calibrated values over `base`; series without enough samples keep their current thresholds. */
export function applyCalibration(base: ThresholdConfig, calibration: Calibration): ThresholdConfig {
  const next = { ...base };
  if (calibration.primary) {
    next.primaryWarning = calibration.primary.warning;
    next.primaryCritical = calibration.primary.critical;
  }
  if (calibration.recent) {
    next.recentWarning = calibration.recent.warning;
    next.recentCritical = calibration.recent.critical;
  }
  if (calibration.fault) {
    next.faultWarning = calibration.fault.warning;
    next.faultCritical = calibration.fault.critical;
  }
  return next;
}

export function renderCalibration(calibration: Calibration, thresholds: ThresholdConfig): string {
  const lines: string[] = [];
  for (const stats of [calibration.primary, calibration.recent, calibration.fault]) {
    if (!stats) continue;
    lines.push(
      `${stats.field}: n=${stats.samples}, mean=${stats.mean.toFixed(1)}, sd=${stats.stdDev.toFixed(1)}, ` +
      `warning=${stats.warning}, critical=${stats.critical}`
    );
  }
  if (lines.length === 0) {
    lines.push('Not enough samples to calibrate any threshold');
  }
  lines.push('', JSON.stringify({ thresholds }, null, 2));
  return lines.join('\n');
}
