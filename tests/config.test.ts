import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigurationError } from '../src/common/errors';
import { DEFAULT_THRESHOLDS, loadConfig } from '../src/config/config';

const CREDENTIALS = { AIRTABLE_PAT: 'test-secret', AIRTABLE_BASE_ID: 'appTEST' };

let tmpDir: string;

function writeConfig(content: unknown): string {
  const file = path.join(tmpDir, 'monitor.config.json');
  fs.writeFileSync(file, JSON.stringify(content));
  return file;
}

function configError(run: () => unknown): ConfigurationError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'host-pulse-config-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ============================================
// DEFAULTS AND OVERRIDES
// ============================================

describe('loadConfig', () => {
  it('starts from the defaults and takes credentials from the environment', () => {
    const config = loadConfig({ configPath: writeConfig({}), env: CREDENTIALS });
    expect(config.sink.token).toBe('test-secret');
    expect(config.sink.baseId).toBe('appTEST');
    expect(config.sink.tableName).toBe('System Health');
    expect(config.thresholds).toEqual(DEFAULT_THRESHOLDS);
    expect(config.windows.primary).toEqual({ duration: '1h', timeoutSeconds: 300 });
  });

  it('merges a partial configuration file over the defaults', () => {
    const config = loadConfig({
      configPath: writeConfig({
        thresholds: { primaryWarning: 5000, primaryCritical: 9000 },
        windows: { primary: { timeoutSeconds: 120 } },
        logging: { level: 'DEBUG' }
      }),
      env: CREDENTIALS
    });
    expect(config.thresholds.primaryWarning).toBe(5000);
    expect(config.thresholds.primaryCritical).toBe(9000);
    expect(config.thresholds.recentWarning).toBe(DEFAULT_THRESHOLDS.recentWarning);
    expect(config.windows.primary).toEqual({ duration: '1h', timeoutSeconds: 120 });
    expect(config.logging.level).toBe('DEBUG');
  });

  it('accepts the table name and the legacy key variable from the environment', () => {
    const config = loadConfig({
      configPath: writeConfig({}),
      env: { AIRTABLE_API_KEY: ' test-secret ', AIRTABLE_BASE_ID: 'appTEST', AIRTABLE_TABLE_NAME: 'Fleet Health' }
    });
    expect(config.sink.token).toBe('test-secret');
    expect(config.sink.tableName).toBe('Fleet Health');
  });

  it('reads credentials from an env file without overriding the environment', () => {
    const envFile = path.join(tmpDir, '.env');
    fs.writeFileSync(envFile, 'AIRTABLE_PAT=test-secret\nAIRTABLE_BASE_ID=appFILE\n');

    const config = loadConfig({ configPath: writeConfig({}), envFile, env: { AIRTABLE_BASE_ID: 'appENV' } });

    expect(config.sink.token).toBe('test-secret');
    expect(config.sink.baseId).toBe('appENV');
  });

  it('loads the file named by HOST_PULSE_CONFIG', () => {
    const file = writeConfig({ guard: { staleLeaseSeconds: 60 } });
    const config = loadConfig({ env: { ...CREDENTIALS, HOST_PULSE_CONFIG: file } });
    expect(config.guard.staleLeaseSeconds).toBe(60);
  });
});

// ============================================
// FAILURES
// ============================================

describe('loadConfig - failures', () => {
  it('names every missing credential', () => {
    const error = configError(() => loadConfig({ configPath: writeConfig({}), env: {} }));
    expect(error.message).toBe('Missing required sink credentials: AIRTABLE_BASE_ID, AIRTABLE_PAT');
    expect(error.missing).toEqual(['AIRTABLE_PAT', 'AIRTABLE_BASE_ID']);
  });

  it('does not require credentials when told so', () => {
    expect(loadConfig({ configPath: writeConfig({}), env: {}, requireSink: false }).sink.token).toBe('');
  });

  it('rejects unknown keys and invalid values in the file', () => {
    expect(configError(() => loadConfig({ configPath: writeConfig({ bogus: 1 }), env: CREDENTIALS })).message)
      .toMatch(/^Invalid configuration file .*monitor\.config\.json: /);
    expect(configError(() => loadConfig({
      configPath: writeConfig({ windows: { recent: { duration: 'five minutes' } } }),
      env: CREDENTIALS
    })).message).toContain('windows.recent.duration: expected a duration such as 5m or 1h');
  });

  it('rejects patterns that do not compile', () => {
    expect(configError(() => loadConfig({
      configPath: writeConfig({ activity: { tailscalePeerPattern: '(' } }),
      env: CREDENTIALS
    })).message).toMatch(/: activity\.tailscalePeerPattern: expected a valid regular expression$/);

    expect(configError(() => loadConfig({
      configPath: writeConfig({
        classifier: { rules: [{ bucket: 'kernel', field: 'error_kernel_1h', subsystem: '(', failure: 'error' }] }
      }),
      env: CREDENTIALS
    })).message).toMatch(/: classifier\.rules\.0\.subsystem: expected a valid regular expression$/);
  });

  it('rejects warning thresholds above critical ones', () => {
    const error = configError(() => loadConfig({
      configPath: writeConfig({ thresholds: { faultWarning: 200 } }),
      env: CREDENTIALS
    }));
    expect(error.message).toBe('Warning thresholds exceed critical thresholds: fault');
  });

  it('fails when an explicitly named file is missing', () => {
    const missing = path.join(tmpDir, 'absent.json');
    expect(configError(() => loadConfig({ configPath: missing, env: CREDENTIALS })).message)
      .toBe(`Configuration file not found: ${missing}`);
  });
});
