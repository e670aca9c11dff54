import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { HistoryLoader, toHistoryRow } from '../src/trend/history-loader';
import { mockLogger } from './helpers/fake-signal-source';

let tmpDir: string;
let logger: ReturnType<typeof mockLogger>;
let loader: HistoryLoader;

function writeHistory(name: string, content: unknown): string {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, JSON.stringify(content));
  return file;
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'host-pulse-history-'));
  logger = mockLogger();
  loader = new HistoryLoader(logger);
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('toHistoryRow', () => {
  it('keeps numeric fields and prefers the Timestamp field', () => {
    expect(toHistoryRow({
      createdTime: '2025-05-01T10:00:05.000Z',
      fields: { Timestamp: '2025-05-01T10:00:00Z', 'Error Count': 10, Hostname: 'studio-mac', Bad: Number.NaN }
    })).toEqual({ timestamp: '2025-05-01T10:00:00Z', fields: { 'Error Count': 10 } });
  });

  it('falls back to the creation time and drops records with neither', () => {
    expect(toHistoryRow({ createdTime: '2025-05-03T00:00:00.000Z', fields: { 'Error Count': 1 } }))
      .toEqual({ timestamp: '2025-05-03T00:00:00.000Z', fields: { 'Error Count': 1 } });
    expect(toHistoryRow({ fields: { 'Error Count': 1 } })).toBeNull();
  });
});

describe('HistoryLoader - fromFile', () => {
  it('reads a single list page', () => {
    const file = writeHistory('page.json', {
      records: [{ id: 'rec1', createdTime: '2025-05-01T10:00:05.000Z', fields: { Timestamp: '2025-05-01T10:00:00Z', 'Error Count': 10 } }],
      offset: 'itr1'
    });
    expect(loader.fromFile(file)).toEqual([{ timestamp: '2025-05-01T10:00:00Z', fields: { 'Error Count': 10 } }]);
  });

  it('reads a list of pages', () => {
    const file = writeHistory('pages.json', [
      { records: [{ id: 'rec1', fields: { Timestamp: '2025-05-01T10:00:00Z', 'Error Count': 1 } }] },
      { records: [{ id: 'rec2', fields: { Timestamp: '2025-05-02T10:00:00Z', 'Error Count': 2 } }] }
    ]);
    expect(loader.fromFile(file).map(row => row.fields['Error Count'])).toEqual([1, 2]);
  });

  it('reads bare field maps and reports the ones without a timestamp', () => {
    const file = writeHistory('fields.json', [
      { Timestamp: '2025-05-02T00:00:00Z', 'Error Count': 5 },
      { 'Error Count': 7 }
    ]);
    expect(loader.fromFile(file)).toEqual([{ timestamp: '2025-05-02T00:00:00Z', fields: { 'Error Count': 5 } }]);
    expect(logger.warn).toHaveBeenCalledWith('Dropped 1 history record(s) without a timestamp', { origin: file });
  });

  it('rejects a file in an unknown shape', () => {
    const file = writeHistory('bad.json', { rows: [] });
    expect(() => loader.fromFile(file)).toThrow(`Cannot read history file ${file}`);
  });
});

describe('HistoryLoader - fromStore', () => {
  it('converts the listed records', async () => {
    const rows = await loader.fromStore({
      listRecords: async () => [
        { id: 'rec1', createdTime: '2025-05-01T10:00:05.000Z', fields: { 'Error Count': 3 } }
      ]
    });
    expect(rows).toEqual([{ timestamp: '2025-05-01T10:00:05.000Z', fields: { 'Error Count': 3 } }]);
    expect(logger.info).toHaveBeenCalledWith('Loaded 1 history record(s)', { origin: 'record store' });
  });
});
