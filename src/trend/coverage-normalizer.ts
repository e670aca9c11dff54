// coverage-normalizer.ts - Daily error trend corrected for the growth of the instrumented stream set
//
// The set of per-subsystem error streams grew over the history, so raw daily
// counts from early days undercount. Each day's mean is divided by the fraction
// of streams that existed on that day before it is compared with later days.

// ============================================
// INTERFACES
// ============================================

/** One historical record reduced to its timestamp and numeric fields. */
export interface HistoryRow {
  timestamp: string;
  fields: Record<string, number>;
}

export interface TrendOptions {
  /** Catalog of every known error stream (column name). */
  streams: string[];
  errorField: string;
  divisor: number;
  smoothingWindowDays: number;
  /** Days (YYYY-MM-DD, UTC) to drop; defaults to the current UTC day. */
  excludeDates?: string[];
  now?: Date;
}

export interface StreamCoverage {
  stream: string;
  firstSeen: string | null;
}

export interface TrendPoint {
  date: string;
  samples: number;
  rawMean: number;
  coverage: number;
  activeStreams: number;
  normalized: number;
  scaled: number;
  smoothed: number;
}

export interface SkippedDay {
  date: string;
  reason: string;
}

export interface TrendLabels {
  normalization: string;
  rescale: string;
  excluded: string;
  smoothing: string;
}

export interface TrendReport {
  points: TrendPoint[];
  skipped: SkippedDay[];
  catalog: StreamCoverage[];
  excludedDates: string[];
  divisor: number;
  labels: TrendLabels;
}

// ============================================
// HELPERS
// ============================================

export function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function dayOfTimestamp(timestamp: string): string | null {
  const ms = Date.parse(timestamp);
  return Number.isNaN(ms) ? null : utcDay(new Date(ms));
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Earliest day each stream reported a positive value. A stream stays covered
 * from that day on, including days on which it reports zero.
 */
export function firstSeenDates(rowsByDay: Map<string, HistoryRow[]>, streams: string[]): StreamCoverage[] {
  const days = Array.from(rowsByDay.keys()).sort();
  return streams.map(stream => {
    const firstSeen = days.find(day =>
      (rowsByDay.get(day) ?? []).some(row => (row.fields[stream] ?? 0) > 0)
    );
    return { stream, firstSeen: firstSeen ?? null };
  });
}

export function coverageOn(day: string, catalog: StreamCoverage[]): { ratio: number; active: number } {
  const active = catalog.filter(entry => entry.firstSeen !== null && entry.firstSeen <= day).length;
  return { ratio: catalog.length > 0 ? active / catalog.length : 0, active };
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Centered moving average over calendar days. A point averages every point dated
 * within half the window of it, so a skipped or excluded day narrows the window
 * rather than pulling in a farther day. The ends use the neighbours they have.
 */
export function centeredMovingAverage(series: Array<{ date: string; value: number }>, windowDays: number): number[] {
  const half = Math.floor(windowDays / 2);
  const days = series.map(point => Date.parse(`${point.date}T00:00:00Z`) / DAY_MS);
  return series.map((_, i) => {
    const inWindow = series.filter((__, j) => Math.abs(days[j] - days[i]) <= half);
    return mean(inWindow.map(point => point.value));
  });
}

export function buildLabels(errorField: string, divisor: number, excludedDates: string[], window: number): TrendLabels {
  return {
    normalization: `Coverage-normalized: daily mean "${errorField}" divided by the fraction of error streams instrumented that day`,
    rescale: `Scaled by 1/${divisor.toLocaleString('en-US')} (1.0 = ${divisor.toLocaleString('en-US')} errors)`,
    excluded: excludedDates.length > 0 ? `Excluded dates: ${excludedDates.join(', ')}` : 'Excluded dates: none',
    smoothing: `${window}-day centered moving average (display only)`
  };
}

// ============================================
// ANALYSIS
// ============================================

export function analyzeTrend(rows: HistoryRow[], options: TrendOptions): TrendReport {
  if (options.streams.length === 0) {
    throw new Error('Stream catalog is empty; coverage is undefined');
  }
  if (!(options.divisor > 0)) {
    throw new Error(`Rescale divisor must be positive, got ${options.divisor}`);
  }

  const excludedDates = [...(options.excludeDates ?? [utcDay(options.now ?? new Date())])].sort();
  const excluded = new Set(excludedDates);

  const rowsByDay = new Map<string, HistoryRow[]>();
  for (const row of rows) {
    const day = dayOfTimestamp(row.timestamp);
    if (day === null || excluded.has(day)) continue;
    const bucket = rowsByDay.get(day);
    if (bucket) bucket.push(row);
    else rowsByDay.set(day, [row]);
  }

  const catalog = firstSeenDates(rowsByDay, options.streams);
  const points: Omit<TrendPoint, 'smoothed'>[] = [];
  const skipped: SkippedDay[] = [];

  for (const day of Array.from(rowsByDay.keys()).sort()) {
    const counts = (rowsByDay.get(day) ?? [])
      .map(row => row.fields[options.errorField])
      .filter((value): value is number => typeof value === 'number' && Number.isFinite(value));

    if (counts.length === 0) {
      skipped.push({ date: day, reason: `no "${options.errorField}" samples` });
      continue;
    }

    const coverage = coverageOn(day, catalog);
    if (coverage.active === 0) {
      skipped.push({ date: day, reason: 'no error streams instrumented' });
      continue;
    }

    const rawMean = mean(counts);
    const normalized = rawMean / coverage.ratio;
    points.push({
      date: day,
      samples: counts.length,
      rawMean,
      coverage: coverage.ratio,
      activeStreams: coverage.active,
      normalized,
      scaled: normalized / options.divisor
    });
  }

  const smoothed = centeredMovingAverage(
    points.map(p => ({ date: p.date, value: p.scaled })),
    options.smoothingWindowDays
  );

  return {
    points: points.map((point, i) => ({ ...point, smoothed: smoothed[i] })),
    skipped,
    catalog,
    excludedDates,
    divisor: options.divisor,
    labels: buildLabels(options.errorField, options.divisor, excludedDates, options.smoothingWindowDays)
  };
}
