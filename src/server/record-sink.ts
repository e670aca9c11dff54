// record-sink.ts - Airtable REST client: record submission, history listing and connection check
import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ComponentLogger } from '../common/logger';
import { errorMessage } from '../common/errors';
import { SinkConfig } from '../config/config';
import { ErrorRuleDefinition } from '../detection/error-rules';
import { sanitizeLogData } from '../security';
import { toSinkFields } from '../service/record-assembler';
import { HealthRecord, SinkFields } from '../types';

// ============================================
// INTERFACES
// ============================================

export type SubmitResult =
  | { ok: true; recordId: string }
  | { ok: false; reason: string; status: number | null };

export type ConnectionCheck =
  | { ok: true; tables: string[]; tableFound: boolean; fieldNames: string[] }
  | { ok: false; reason: string; status: number | null };

export interface StoredRecord {
  id: string;
  createdTime?: string;
  fields: Record<string, unknown>;
}

export interface ListOptions {
  pageSize?: number;
  maxPages?: number;
  fields?: string[];
}

export interface RecordSink {
  submit(record: HealthRecord): Promise<SubmitResult>;
}

export interface AirtableSinkOptions {
  rules?: ReadonlyArray<ErrorRuleDefinition>;
  client?: AxiosInstance;
}

// ============================================
// RESPONSE SCHEMAS
// ============================================

const CreateResponseSchema = z.object({
  records: z.array(z.object({ id: z.string() })).min(1)
});

const StoredRecordSchema = z.object({
  id: z.string(),
  createdTime: z.string().optional(),
  fields: z.record(z.unknown())
});

const ListResponseSchema = z.object({
  records: z.array(StoredRecordSchema),
  offset: z.string().optional()
});

const TablesResponseSchema = z.object({
  tables: z.array(z.object({
    name: z.string(),
    fields: z.array(z.object({ name: z.string() })).default([])
  }))
});

// The API answers with either {error: {type, message}} or {error: "NOT_FOUND"}
const ApiErrorSchema = z.object({
  error: z.union([
    z.string(),
    z.object({ type: z.string(), message: z.string().optional() })
  ])
});

export function describeFailure(error: unknown): { reason: string; status: number | null } {
  if (!axios.isAxiosError(error)) {
    return { reason: errorMessage(error), status: null };
  }
  const status = error.response?.status ?? null;
  const body = ApiErrorSchema.safeParse(error.response?.data);
  if (body.success) {
    const apiError = body.data.error;
    const reason = typeof apiError === 'string'
      ? apiError
      : apiError.message ? `${apiError.type}: ${apiError.message}` : apiError.type;
    return { reason, status };
  }
  return { reason: error.message, status };
}

// ============================================
// AIRTABLE SINK
// ============================================

export class AirtableRecordSink implements RecordSink {
  private config: SinkConfig;
  private logger: ComponentLogger;
  private client: AxiosInstance;
  private rules: ReadonlyArray<ErrorRuleDefinition> | undefined;

  constructor(config: SinkConfig, logger: ComponentLogger, options: AirtableSinkOptions = {}) {
    this.config = config;
    this.logger = logger;
    this.rules = options.rules;

    this.client = options.client ?? axios.create({
      baseURL: config.apiUrl,
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${config.token}`
      }
    });
  }

  private tablePath(): string {
    return `/v0/${encodeURIComponent(this.config.baseId)}/${encodeURIComponent(this.config.tableName)}`;
  }

  async submit(record: HealthRecord): Promise<SubmitResult> {
    return this.submitFields(toSinkFields(record, this.rules));
  }

  /** One POST, no retry; the next scheduled run is the retry. */
  async submitFields(fields: SinkFields): Promise<SubmitResult> {
    try {
      const response = await this.client.post(this.tablePath(), { records: [{ fields }] });
      const parsed = CreateResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        const reason = 'Unexpected response from record store';
        this.logger.error('Record submission returned no record id', undefined, { status: response.status, body: response.data });
        return { ok: false, reason, status: response.status };
      }

      const recordId = parsed.data.records[0].id;
      this.logger.info('Health record submitted', { recordId, table: this.config.tableName });
      return { ok: true, recordId };
    } catch (error) {
      const failure = describeFailure(error);
      this.logger.error('Record store rejected the health record', error, {
        status: failure.status,
        reason: failure.reason,
        payload: sanitizeLogData(fields)
      });
      return { ok: false, ...failure };
    }
  }

  async listRecords(options: ListOptions = {}): Promise<StoredRecord[]> {
    const records: StoredRecord[] = [];
    const maxPages = options.maxPages ?? Number.POSITIVE_INFINITY;
    let offset: string | undefined;
    let pages = 0;

    do {
      const params: Record<string, string | number | string[]> = { pageSize: options.pageSize ?? 100 };
      if (offset) params.offset = offset;
      if (options.fields) params['fields[]'] = options.fields;

      const response = await this.client.get(this.tablePath(), { params });
      const parsed = ListResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new Error(`Unexpected list response: ${parsed.error.issues.map(i => i.message).join('; ')}`);
      }

      records.push(...parsed.data.records);
      offset = parsed.data.offset;
      pages++;
      this.logger.debug('Fetched record page', { page: pages, count: parsed.data.records.length });
    } while (offset && pages < maxPages);

    this.logger.info(`Fetched ${records.length} records in ${pages} page(s)`);
    return records;
  }

  async verifyConnection(): Promise<ConnectionCheck> {
    try {
      const response = await this.client.get(`/v0/meta/bases/${encodeURIComponent(this.config.baseId)}/tables`);
      const parsed = TablesResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        return { ok: false, reason: 'Unexpected schema response', status: response.status };
      }

      const table = parsed.data.tables.find(t => t.name === this.config.tableName);
      return {
        ok: true,
        tables: parsed.data.tables.map(t => t.name),
        tableFound: table !== undefined,
        fieldNames: table ? table.fields.map(f => f.name) : []
      };
    } catch (error) {
      const failure = describeFailure(error);
      this.logger.error('Record store connection check failed', error, failure);
      return { ok: false, ...failure };
    }
  }
}
