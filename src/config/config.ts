import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../common/errors';
import { LogLevel } from '../common/logger';
import { ErrorRuleDefinition, DEFAULT_ERROR_RULES } from '../detection/error-rules';
import { safeReadJSONFile } from '../security';
import { ERROR_BUCKETS } from '../types';

// ============================================
// INTERFACES
// ============================================

/**
 * Severity thresholds. Warning is mean + 2 sigma and critical mean + 3 sigma of the
 * historical samples; regenerate with `host-pulse-trend calibrate`.
 */
export interface ThresholdConfig {
  primaryWarning: number;
  primaryCritical: number;
  recentWarning: number;
  recentCritical: number;
  faultWarning: number;
  faultCritical: number;
  backupOverdueDays: number;
}

export interface GuardConfig {
  lockFile: string;
  staleLeaseSeconds: number;
}

export interface WindowSpec {
  duration: string;
  timeoutSeconds: number;
}

export interface WindowConfig {
  primary: WindowSpec;
  recent: WindowSpec;
  gpu: WindowSpec;
  maxOutputMb: number;
}

export interface QueryConfig {
  smartTimeoutSeconds: number;
  backupTimeoutSeconds: number;
  updatesTimeoutSeconds: number;
  commandTimeoutSeconds: number;
}

export interface SinkConfig {
  apiUrl: string;
  baseId: string;
  tableName: string;
  token: string;
  timeoutMs: number;
}

export interface TrendConfig {
  rescaleDivisor: number;
  errorField: string;
  streams: string[];
  smoothingWindowDays: number;
}

export interface ActivityConfig {
  hogCpuPercent: number;
  hogMemoryGb: number;
  tailscaleBinary: string;
  tailscalePeerPattern: string;
  remoteAccessPatterns: string[];
  remoteAccessPaths: string[];
}

export interface PathConfig {
  systemReportDir: string;
  userReportDir: string;
}

export interface LoggingConfig {
  dir: string;
  level: keyof typeof LogLevel;
}

export interface MonitorConfig {
  thresholds: ThresholdConfig;
  guard: GuardConfig;
  windows: WindowConfig;
  queries: QueryConfig;
  sink: SinkConfig;
  trend: TrendConfig;
  activity: ActivityConfig;
  classifier: { rules: ErrorRuleDefinition[] };
  paths: PathConfig;
  logging: LoggingConfig;
}

// ============================================
// DEFAULTS
// ============================================

// Calibrated from 281 hourly samples; see DESIGN.md for the recalibration history.
export const DEFAULT_THRESHOLDS: ThresholdConfig = {
  primaryWarning: 75635,
  primaryCritical: 100684,
  recentWarning: 10872,
  recentCritical: 15081,
  faultWarning: 50,
  faultCritical: 100,
  backupOverdueDays: 7
};

export const DEFAULT_REMOTE_ACCESS_PATTERNS = [
  'anydesk', 'teamviewer', 'chrome remote desktop', 'remotedesktop',
  'splashtop', 'logmein', 'screenconnect', 'connectwise',
  'realvnc', 'vnc', 'todesk', 'rustdesk'
];

export function createDefaultConfig(homeDir: string = os.homedir()): MonitorConfig {
  return {
    thresholds: { ...DEFAULT_THRESHOLDS },
    guard: {
      lockFile: path.join(process.cwd(), '.health_monitor.lock'),
      staleLeaseSeconds: 1800
    },
    windows: {
      primary: { duration: '1h', timeoutSeconds: 300 },
      recent: { duration: '5m', timeoutSeconds: 10 },
      gpu: { duration: '2m', timeoutSeconds: 8 },
      maxOutputMb: 256
    },
    queries: {
      smartTimeoutSeconds: 5,
      backupTimeoutSeconds: 5,
      updatesTimeoutSeconds: 15,
      commandTimeoutSeconds: 10
    },
    sink: {
      apiUrl: 'https://api.airtable.com',
      baseId: '',
      tableName: 'System Health',
      token: '',
      timeoutMs: 30000
    },
    trend: {
      rescaleDivisor: 100000,
      errorField: 'Error Count',
      streams: DEFAULT_ERROR_RULES.map(rule => rule.field),
      smoothingWindowDays: 3
    },
    activity: {
      hogCpuPercent: 80,
      hogMemoryGb: 4,
      tailscaleBinary: '/Applications/Tailscale.app/Contents/MacOS/Tailscale',
      tailscalePeerPattern: '\\bactive\\b',
      remoteAccessPatterns: [...DEFAULT_REMOTE_ACCESS_PATTERNS],
      remoteAccessPaths: [
        '/Library/LaunchDaemons',
        '/Library/LaunchAgents',
        '/Library/LaunchDaemonsDisabled',
        '/Library/LaunchAgents.disabled',
        path.join(homeDir, 'Library/LaunchAgents'),
        '/Applications'
      ]
    },
    classifier: { rules: DEFAULT_ERROR_RULES.map(rule => ({ ...rule })) },
    paths: {
      systemReportDir: '/Library/Logs/DiagnosticReports',
      userReportDir: path.join(homeDir, 'Library/Logs/DiagnosticReports')
    },
    logging: {
      dir: path.join(process.cwd(), 'logs'),
      level: 'INFO'
    }
  };
}

// ============================================
// FILE SCHEMA
// ============================================

const positive = z.number().positive();

function isValidPattern(source: string): boolean {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
}

const pattern = z.string().min(1).refine(isValidPattern, 'expected a valid regular expression');
const windowSpecSchema = z.object({
  duration: z.string().regex(/^\d+[smhd]$/, 'expected a duration such as 5m or 1h'),
  timeoutSeconds: positive
}).partial();

const ruleSchema = z.object({
  bucket: z.enum(ERROR_BUCKETS),
  field: z.string().min(1),
  subsystem: pattern,
  failure: pattern
});

export const ConfigFileSchema = z.object({
  thresholds: z.object({
    primaryWarning: positive,
    primaryCritical: positive,
    recentWarning: positive,
    recentCritical: positive,
    faultWarning: positive,
    faultCritical: positive,
    backupOverdueDays: positive
  }).partial().optional(),
  guard: z.object({
    lockFile: z.string().min(1),
    staleLeaseSeconds: positive
  }).partial().optional(),
  windows: z.object({
    primary: windowSpecSchema,
    recent: windowSpecSchema,
    gpu: windowSpecSchema,
    maxOutputMb: positive
  }).partial().optional(),
  queries: z.object({
    smartTimeoutSeconds: positive,
    backupTimeoutSeconds: positive,
    updatesTimeoutSeconds: positive,
    commandTimeoutSeconds: positive
  }).partial().optional(),
  sink: z.object({
    apiUrl: z.string().url(),
    tableName: z.string().min(1),
    timeoutMs: positive
  }).partial().optional(),
  trend: z.object({
    rescaleDivisor: positive,
    errorField: z.string().min(1),
    streams: z.array(z.string().min(1)).min(1),
    smoothingWindowDays: z.number().int().positive()
  }).partial().optional(),
  activity: z.object({
    hogCpuPercent: positive,
    hogMemoryGb: positive,
    tailscaleBinary: z.string().min(1),
    tailscalePeerPattern: pattern,
    remoteAccessPatterns: z.array(z.string().min(1)),
    remoteAccessPaths: z.array(z.string().min(1))
  }).partial().optional(),
  classifier: z.object({
    rules: z.array(ruleSchema).min(1)
  }).partial().optional(),
  paths: z.object({
    systemReportDir: z.string().min(1),
    userReportDir: z.string().min(1)
  }).partial().optional(),
  logging: z.object({
    dir: z.string().min(1),
    level: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'CRITICAL'])
  }).partial().optional()
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================
// LOADING
// ============================================

export interface LoadConfigOptions {
  configPath?: string;
  envFile?: string;
  env?: Record<string, string | undefined>;
  /** The scheduled run needs sink credentials; the offline trend job reading a file does not. */
  requireSink?: boolean;
}

export function loadConfig(options: LoadConfigOptions = {}): MonitorConfig {
  const env: Record<string, string | undefined> = { ...(options.env ?? process.env) };

  // Variables already present in the environment win over the .env file
  const envFile = options.envFile ?? (options.env === undefined ? path.join(process.cwd(), '.env') : undefined);
  if (envFile !== undefined && fs.existsSync(envFile)) {
    const parsed = dotenv.parse(fs.readFileSync(envFile));
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key] === undefined) env[key] = value;
    }
  }

  const configPath = options.configPath ?? env.HOST_PULSE_CONFIG ?? path.join(process.cwd(), 'monitor.config.json');
  let userConfig: ConfigFile = {};

  if (fs.existsSync(configPath)) {
    const result = safeReadJSONFile(configPath, ConfigFileSchema);
    if (!result.success) {
      throw new ConfigurationError(`Invalid configuration file ${configPath}: ${result.error}`);
    }
    userConfig = result.data;
  } else if (options.configPath !== undefined || env.HOST_PULSE_CONFIG !== undefined) {
    throw new ConfigurationError(`Configuration file not found: ${configPath}`);
  }

  const config = mergeConfig(createDefaultConfig(), userConfig);

  config.sink.baseId = env.AIRTABLE_BASE_ID?.trim() ?? '';
  config.sink.token = (env.AIRTABLE_PAT ?? env.AIRTABLE_API_KEY ?? '').trim();
  if (env.AIRTABLE_TABLE_NAME?.trim()) {
    config.sink.tableName = env.AIRTABLE_TABLE_NAME.trim();
  }

  validateConfig(config, options.requireSink ?? true);
  return config;
}

export function mergeConfig(defaults: MonitorConfig, user: ConfigFile): MonitorConfig {
  return {
    thresholds: { ...defaults.thresholds, ...user.thresholds },
    guard: { ...defaults.guard, ...user.guard },
    windows: {
      primary: { ...defaults.windows.primary, ...user.windows?.primary },
      recent: { ...defaults.windows.recent, ...user.windows?.recent },
      gpu: { ...defaults.windows.gpu, ...user.windows?.gpu },
      maxOutputMb: user.windows?.maxOutputMb ?? defaults.windows.maxOutputMb
    },
    queries: { ...defaults.queries, ...user.queries },
    sink: { ...defaults.sink, ...user.sink },
    trend: { ...defaults.trend, ...user.trend },
    activity: { ...defaults.activity, ...user.activity },
    classifier: { rules: user.classifier?.rules ?? defaults.classifier.rules },
    paths: { ...defaults.paths, ...user.paths },
    logging: { ...defaults.logging, ...user.logging }
  };
}

function validateConfig(config: MonitorConfig, requireSink: boolean): void {
  if (requireSink) {
    const missing: string[] = [];
    if (!config.sink.token) missing.push('AIRTABLE_PAT');
    if (!config.sink.baseId) missing.push('AIRTABLE_BASE_ID');
    if (missing.length > 0) {
      throw new ConfigurationError('Missing required sink credentials', missing);
    }
  }

  const t = config.thresholds;
  const inverted: string[] = [];
  if (t.primaryWarning > t.primaryCritical) inverted.push('primary');
  if (t.recentWarning > t.recentCritical) inverted.push('recent');
  if (t.faultWarning > t.faultCritical) inverted.push('fault');
  if (inverted.length > 0) {
    throw new ConfigurationError('Warning thresholds exceed critical thresholds', inverted);
  }
}
