// Shared data model for the run-time pipeline

// ============================================
// SIGNAL WINDOWS
// ============================================

export type WindowName = 'primary' | 'recent' | 'gpu';

export type SignalWindow =
  | {
      name: WindowName;
      duration: string;
      outcome: 'success';
      content: string;
    }
  | {
      name: WindowName;
      duration: string;
      outcome: 'timed-out' | 'failed';
      content: '';
      reason: string;
    };

export function isWindowAvailable(
  window: SignalWindow
): window is Extract<SignalWindow, { outcome: 'success' }> {
  return window.outcome === 'success';
}

// ============================================
// HARDWARE / BACKUP / SYSTEM
// ============================================

export interface HardwareStatus {
  bootDevice: string;
  smartStatus: string;          // "Verified", "Failing", ... or "Unknown"
  kernelPanics24h: number;
  backupAgeDays: number;        // -1 when undeterminable
  softwareUpdates: 'Up to Date' | 'Updates Available' | 'Unknown';
}

export interface SystemInfo {
  driveSpace?: string;
  uptime?: string;
  memoryPressure?: string;
  cpuTemperature: string;       // "N/A" when no sensor tool is installed
}

export interface CrashReportSummary {
  count: number;
  newest: string[];
}

// ============================================
// ERROR CLASSIFICATION
// ============================================

export const ERROR_BUCKETS = [
  'kernel',
  'windowServer',
  'spotlight',
  'icloud',
  'diskIo',
  'network',
  'gpu',
  'systemstats',
  'power',
] as const;

export type ErrorBucketName = typeof ERROR_BUCKETS[number];

export type ErrorBucketCounts = Record<ErrorBucketName, number>;

export type ErrorClassification =
  | {
      available: true;
      totalErrors: number;
      criticalFaults: number;
      buckets: ErrorBucketCounts;
      thermalThrottles: number;
      fanMaxEvents: number;
      topMessages: string[];
    }
  | {
      available: false;
      reason: string;
    };

export type LineCount =
  | { available: true; count: number }
  | { available: false; reason: string };

// ============================================
// GPU FREEZE
// ============================================

export interface GpuPatternHit {
  pattern: string;
  count: number;
}

export interface GpuFreezeResult {
  available: boolean;
  detected: boolean;
  firedPatterns: GpuPatternHit[];
  summary: string;              // never blank: "None", "Unavailable (...)" or the hit list
}

// ============================================
// SEVERITY
// ============================================

export type Severity = 'Healthy' | 'Warning' | 'Critical';

export const SEVERITY_ORDER: Record<Severity, number> = {
  Healthy: 0,
  Warning: 1,
  Critical: 2,
};

export interface SeverityVerdict {
  severity: Severity;
  label: string;
  reason: string;
  ruleId: string;
}

// ============================================
// ACTIVITY / REACHABILITY
// ============================================

export interface ConsoleUser {
  name: string;
  idle: string;
}

export interface VmDetail {
  pid: number;
  user: string;
  guestOs: string;
  cpuPercent: number;
  memoryGb: number;
  runtime: string;
  guestRisk?: string;
}

export type VmState = 'Not Running' | 'Idle' | 'Light Activity' | 'Moderate Activity' | 'Active';

export interface ActivitySnapshot {
  users: ConsoleUser[];
  activeUsersText: string;
  totalGuiApps: number;
  applicationInventory: string;
  vmwareStatus: 'Running' | 'Not Running';
  vmState: VmState;
  vms: VmDetail[];
  vmActivity: string;
  vmwareCpuPercent: number;
  vmwareMemoryGb: number;
  highRiskApps: string;
  resourceHogs: string;
  legacySoftwareFlags: string;
}

export type YesNo = 'Yes' | 'No';

export interface ReachabilitySnapshot {
  sshdRunning: YesNo;
  sshPortListening: YesNo;
  screenSharingRunning: YesNo;
  vncPortListening: YesNo;
  tailscaleCliPresent: YesNo;
  tailscalePeerReachable: YesNo | 'Unknown';
  remoteAccessArtifacts: string[];
}

// ============================================
// HEALTH RECORD
// ============================================

export interface HealthRecord {
  readonly timestamp: string;
  readonly hostname: string;
  readonly osVersion?: string;
  readonly hardware: HardwareStatus;
  readonly system: SystemInfo;
  readonly crashes: CrashReportSummary;
  readonly errors: ErrorClassification;
  readonly recentErrors: LineCount;
  readonly verdict: SeverityVerdict;
  readonly gpuFreeze: GpuFreezeResult;
  readonly activity: ActivitySnapshot;
  readonly reachability: ReachabilitySnapshot;
  readonly runDurationSeconds: number;
  readonly debugLog?: string;
}

export type SinkFieldValue = string | number;
export type SinkFields = Record<string, SinkFieldValue>;
