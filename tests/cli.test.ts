import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { EXIT_FAILURE, EXIT_OK, exitCodeFor } from '../src/index';
import { main as trendMain, runCalibrate, runReport } from '../src/trend-report';

const VERDICT = { severity: 'Healthy' as const, label: 'Healthy', reason: 'System operating normally', ruleId: 'healthy' };

let tmpDir: string;
let configFile: string;
let historyFile: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'host-pulse-cli-'));
  configFile = path.join(tmpDir, 'monitor.config.json');
  fs.writeFileSync(configFile, JSON.stringify({
    trend: { streams: ['a', 'b'], rescaleDivisor: 1000, smoothingWindowDays: 3 },
    logging: { dir: path.join(tmpDir, 'logs') }
  }));
  historyFile = path.join(tmpDir, 'history.json');
  fs.writeFileSync(historyFile, JSON.stringify({
    records: [
      { id: 'rec1', fields: { Timestamp: '2025-05-01T10:00:00Z', 'Error Count': 1000, 'Critical Fault Count (1h)': 2, a: 1 } },
      { id: 'rec2', fields: { Timestamp: '2025-05-02T10:00:00Z', 'Error Count': 3000, 'Critical Fault Count (1h)': 4, a: 1, b: 1 } }
    ]
  }));
});

afterEach(() => {
  jest.restoreAllMocks();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('exitCodeFor', () => {
  it('succeeds for submitted and skipped runs and fails for rejected ones', () => {
    expect(exitCodeFor({ status: 'submitted', recordId: 'recTEST1', verdict: VERDICT })).toBe(EXIT_OK);
    expect(exitCodeFor({ status: 'busy', reason: 'Another instance (PID 1) is already running' })).toBe(EXIT_OK);
    expect(exitCodeFor({ status: 'rejected', reason: 'INVALID', httpStatus: 422, verdict: VERDICT })).toBe(EXIT_FAILURE);
  });
});

describe('trend report job', () => {
  it('prints the report from an exported history file and writes the CSV', async () => {
    const output: string[] = [];
    const csv = path.join(tmpDir, 'trend.csv');

    await runReport({ config: configFile, history: historyFile, exclude: [], csv }, text => output.push(text));

    const lines = output[0].split('\n');
    expect(lines[0]).toBe('Error trend (coverage-normalized)');
    expect(lines).toContain('Excluded dates: none');
    expect(output[1]).toBe(`\nCSV written to ${csv}`);
    expect(fs.readFileSync(csv, 'utf8').split('\n')[4]).toBe('2025-05-01,1,1000,0.5,2000,2,2.5,');
  });

  it('prints calibrated thresholds', async () => {
    const output: string[] = [];
    await runCalibrate({ config: configFile, history: historyFile }, text => output.push(text));
    expect(output[0].split('\n')[0]).toBe('Error Count: n=2, mean=2000.0, sd=1414.2, warning=4829, critical=6243');
  });

  it('parses the report subcommand and its repeatable exclusions', async () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const code = await trendMain([
      'node', 'host-pulse-trend', 'report',
      '--config', configFile,
      '--history', historyFile,
      '--exclude', '2025-05-02',
      '--exclude', '2099-01-01'
    ]);
    expect(code).toBe(0);
    expect(String(logSpy.mock.calls[0][0]).split('\n')).toContain('Excluded dates: 2025-05-02, 2099-01-01');
  });
});
