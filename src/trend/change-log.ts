// change-log.ts - Dated events from the project change log, for annotating the trend

export type EventCategory = 'Version' | 'Incident' | 'Note';

export interface ChangeEvent {
  date: string;
  category: EventCategory;
  title: string;
  label: string;
}

const DATE = '(\\d{4}-\\d{2}-\\d{2})';

// `## v3.2.4 - 2025-12-03`
const VERSION_HEADER = new RegExp(`^##\\s+(v?\\d+(?:\\.\\d+)*)\\s+[-–]\\s+${DATE}\\s*$`);
// `### Note (2025-11-20): text`
const NOTE_HEADER = new RegExp(`^###\\s+Note\\s+\\(${DATE}\\):\\s*(.+)$`);
// `### 2025-12-03 - Remote access outage`
const INCIDENT_HEADER = new RegExp(`^###\\s+${DATE}\\s+[-–]\\s+(.+)$`);

function isCalendarDate(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/**
 * Events in chronological order, labelled E1..En regardless of category.
 * Events on the same day keep their order in the document.
 */
export function parseChangeLog(markdown: string): ChangeEvent[] {
  const found: Omit<ChangeEvent, 'label'>[] = [];

  for (const rawLine of markdown.split(/\r?\n/)) {
    const line = rawLine.trim();
    let match: RegExpMatchArray | null;

    if ((match = line.match(VERSION_HEADER))) {
      found.push({ date: match[2], category: 'Version', title: match[1] });
    } else if ((match = line.match(NOTE_HEADER))) {
      found.push({ date: match[1], category: 'Note', title: match[2].trim() });
    } else if ((match = line.match(INCIDENT_HEADER))) {
      found.push({ date: match[1], category: 'Incident', title: match[2].trim() });
    }
  }

  return found
    .filter(event => isCalendarDate(event.date))
    .sort((a, b) => a.date.localeCompare(b.date))
    .map((event, index) => ({ ...event, label: `E${index + 1}` }));
}

export function eventsOn(events: ChangeEvent[], date: string): ChangeEvent[] {
  return events.filter(event => event.date === date);
}
