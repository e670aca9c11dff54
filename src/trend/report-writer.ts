// report-writer.ts - Text table and CSV renderings of a trend report
import { ChangeEvent, eventsOn } from './change-log';
import { TrendReport } from './coverage-normalizer';

function pad(value: string, width: number): string {
  return value.length >= width ? value : value + ' '.repeat(width - value.length);
}

function csvCell(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function renderTrendReport(report: TrendReport, events: ChangeEvent[] = []): string {
  const lines: string[] = [
    'Error trend (coverage-normalized)',
    report.labels.normalization,
    report.labels.rescale,
    report.labels.smoothing,
    report.labels.excluded,
    ''
  ];

  const header = ['Date', 'Samples', 'Raw mean', 'Coverage', 'Scaled', 'Smoothed', 'Events'];
  const widths = [10, 7, 10, 8, 8, 8, 0];
  lines.push(header.map((h, i) => pad(h, widths[i])).join('  ').trimEnd());

  for (const point of report.points) {
    const marks = eventsOn(events, point.date).map(e => e.label).join(',');
    const cells = [
      point.date,
      String(point.samples),
      point.rawMean.toFixed(0),
      `${(point.coverage * 100).toFixed(0)}%`,
      point.scaled.toFixed(3),
      point.smoothed.toFixed(3),
      marks
    ];
    lines.push(cells.map((c, i) => pad(c, widths[i])).join('  ').trimEnd());
  }

  if (report.skipped.length > 0) {
    lines.push('', 'Skipped days (not imputed):');
    for (const day of report.skipped) lines.push(`  ${day.date}: ${day.reason}`);
  }

  lines.push('', 'Stream first-seen dates:');
  for (const entry of report.catalog) {
    lines.push(`  ${entry.stream}: ${entry.firstSeen ?? 'never reported'}`);
  }

  if (events.length > 0) {
    lines.push('', 'Events:');
    for (const event of events) {
      lines.push(`  ${event.label} ${event.date} [${event.category}] ${event.title}`);
    }
  }

  return lines.join('\n');
}

/** Labels lead the file as `#` lines so the scale is never separated from the numbers. */
export function renderTrendCsv(report: TrendReport, events: ChangeEvent[] = []): string {
  const lines = [
    `# ${report.labels.normalization}`,
    `# ${report.labels.rescale}`,
    `# ${report.labels.excluded}`,
    `date,samples,raw_mean,coverage,normalized,scaled_per_${report.divisor},smoothed,events`
  ];
  for (const point of report.points) {
    lines.push([
      point.date,
      String(point.samples),
      String(point.rawMean),
      String(point.coverage),
      String(point.normalized),
      String(point.scaled),
      String(point.smoothed),
      csvCell(eventsOn(events, point.date).map(e => e.label).join(','))
    ].join(','));
  }
  return lines.join('\n') + '\n';
}
