// history-loader.ts - Historical health records from an export file or from the record store
import { z } from 'zod';
import { ComponentLogger } from '../common/logger';
import { safeReadJSONFile } from '../security';
import { StoredRecord } from '../server/record-sink';
import { HistoryRow } from './coverage-normalizer';

const FieldMapSchema = z.record(z.unknown());

const StoredRecordSchema = z.object({
  id: z.string().optional(),
  createdTime: z.string().optional(),
  fields: FieldMapSchema
});

// A list-records page, a list of pages, a list of records, or a list of bare field maps
export const HistoryFileSchema = z.union([
  z.object({ records: z.array(StoredRecordSchema) }),
  z.array(z.object({ records: z.array(StoredRecordSchema) })),
  z.array(StoredRecordSchema),
  z.array(FieldMapSchema)
]);

export type HistoryFile = z.infer<typeof HistoryFileSchema>;

interface RawRecord {
  createdTime?: string;
  fields: Record<string, unknown>;
}

export interface HistorySource {
  listRecords(): Promise<StoredRecord[]>;
}

function isPage(value: unknown): value is { records: RawRecord[] } {
  return typeof value === 'object' && value !== null && 'records' in value;
}

function isStoredRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && 'fields' in value &&
    typeof value.fields === 'object' && value.fields !== null;
}

export function flattenHistoryFile(file: HistoryFile): RawRecord[] {
  if (!Array.isArray(file)) return file.records;
  const records: RawRecord[] = [];
  for (const entry of file) {
    if (isPage(entry)) records.push(...entry.records);
    else if (isStoredRecord(entry)) records.push(entry);
    else records.push({ fields: entry });
  }
  return records;
}

/**
 * Keeps the numeric fields of a record. The timestamp comes from its
 * `Timestamp` field, falling back to the store's creation time; records
 * with neither are dropped.
 */
export function toHistoryRow(record: RawRecord): HistoryRow | null {
  const stamp = record.fields.Timestamp;
  const timestamp = typeof stamp === 'string' && stamp.trim() !== '' ? stamp : record.createdTime;
  if (!timestamp) return null;

  const fields: Record<string, number> = {};
  for (const [key, value] of Object.entries(record.fields)) {
    if (typeof value === 'number' && Number.isFinite(value)) {
      fields[key] = value;
    }
  }
  return { timestamp, fields };
}

export class HistoryLoader {
  private logger: ComponentLogger;

  constructor(logger: ComponentLogger) {
    this.logger = logger;
  }

  fromFile(filePath: string): HistoryRow[] {
    const result = safeReadJSONFile(filePath, HistoryFileSchema);
    if (!result.success) {
      throw new Error(`Cannot read history file ${filePath}: ${result.error}`);
    }
    return this.toRows(flattenHistoryFile(result.data), filePath);
  }

  async fromStore(source: HistorySource): Promise<HistoryRow[]> {
    return this.toRows(await source.listRecords(), 'record store');
  }

  private toRows(records: RawRecord[], origin: string): HistoryRow[] {
    const rows: HistoryRow[] = [];
    let dropped = 0;
    for (const record of records) {
      const row = toHistoryRow(record);
      if (row) rows.push(row);
      else dropped++;
    }
    if (dropped > 0) {
      this.logger.warn(`Dropped ${dropped} history record(s) without a timestamp`, { origin });
    }
    this.logger.info(`Loaded ${rows.length} history record(s)`, { origin });
    return rows;
  }
}
