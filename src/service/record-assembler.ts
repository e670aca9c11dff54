// record-assembler.ts - Freezes the run's findings into one record and flattens it for the table store
import { ErrorRuleDefinition, DEFAULT_ERROR_RULES } from '../detection/error-rules';
import { TOP_MESSAGE_SEPARATOR, emptyBuckets } from '../detection/error-classifier';
import { ERROR_BUCKETS, HealthRecord, SinkFieldValue, SinkFields } from '../types';

// Long-text cells hold 100,000 characters; keep the newest part of the log
export const DEBUG_LOG_LIMIT = 90000;
export const RAW_PAYLOAD_FIELD = 'Raw Payload';
export const DEBUG_LOG_FIELD = 'Debug Log';

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/** A detached, deeply frozen copy; later changes to the inputs cannot reach it. */
export function assembleRecord(parts: HealthRecord): HealthRecord {
  return deepFreeze(structuredClone(parts));
}

/** `2025-12-03T10:00:00Z`, the timestamp form the table's date field takes. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function backupStatusText(backupAgeDays: number, timestamp: string): string {
  if (backupAgeDays < 0) return 'Configured; Latest: Unable to determine';
  const latest = new Date(Date.parse(timestamp) - backupAgeDays * 24 * 60 * 60 * 1000);
  return `Configured; Latest: ${latest.toISOString().slice(0, 10)}`;
}

export function kernelPanicText(count: number): string {
  return count > 0
    ? `${count} kernel panic(s) detected in last 24 hours`
    : 'No kernel panics in last 24 hours';
}

class FieldMap {
  readonly fields: SinkFields = {};

  /** Absent values are left out; the store rejects empty strings in typed columns. */
  put(key: string, value: SinkFieldValue | null | undefined): void {
    if (value === undefined || value === null) return;
    if (typeof value === 'string' && value.trim() === '') return;
    if (typeof value === 'number' && !Number.isFinite(value)) return;
    this.fields[key] = value;
  }
}

export function toSinkFields(
  record: HealthRecord,
  rules: ReadonlyArray<ErrorRuleDefinition> = DEFAULT_ERROR_RULES
): SinkFields {
  const map = new FieldMap();
  const { errors, recentErrors, hardware, system, activity, reachability } = record;

  map.put('Timestamp', record.timestamp);
  map.put('Hostname', record.hostname);
  map.put('macOS Version', record.osVersion);
  map.put('Run Duration (seconds)', record.runDurationSeconds);

  map.put('SMART Status', hardware.smartStatus);
  map.put('Kernel Panics', kernelPanicText(hardware.kernelPanics24h));
  map.put('Time Machine', backupStatusText(hardware.backupAgeDays, record.timestamp));
  map.put('Software Updates', hardware.softwareUpdates);

  map.put('Drive Space', system.driveSpace);
  map.put('Uptime', system.uptime);
  map.put('Memory Pressure', system.memoryPressure);
  map.put('CPU Temperature', system.cpuTemperature);

  map.put('Severity', record.verdict.severity);
  map.put('Health Score', record.verdict.label);
  map.put('Reasons', record.verdict.reason);

  if (errors.available) {
    const recent = recentErrors.available ? `${recentErrors.count} recent` : 'recent unavailable';
    map.put('System Errors', `Log Activity: ${errors.totalErrors} errors (${recent}, ${errors.criticalFaults} critical)`);
    map.put('top_errors', errors.topMessages.join(TOP_MESSAGE_SEPARATOR));
    map.put('Error Count', errors.totalErrors);
    map.put('Critical Fault Count (1h)', errors.criticalFaults);
    for (const bucket of ERROR_BUCKETS) {
      const rule = rules.find(r => r.bucket === bucket);
      if (rule) map.put(rule.field, errors.buckets[bucket]);
    }
    map.put('thermal_throttles_1h', errors.thermalThrottles);
    map.put('fan_max_events_1h', errors.fanMaxEvents);
    map.put('Thermal Warning Active', errors.thermalThrottles > 0 ? 'Yes' : 'No');
  } else {
    map.put('System Errors', errors.reason);
    map.put('top_errors', errors.reason);
  }
  if (recentErrors.available) {
    map.put('Recent Error Count (5 min)', recentErrors.count);
  }

  map.put('crash_count', record.crashes.count);
  map.put('top_crashes', record.crashes.newest.join(','));

  map.put('GPU Freeze Detected', record.gpuFreeze.detected ? 'Yes' : 'No');
  map.put('GPU Freeze Events', record.gpuFreeze.summary);

  map.put('Active Users', activity.activeUsersText);
  map.put('user_count', activity.users.length);
  map.put('Application Inventory', activity.applicationInventory);
  map.put('total_gui_apps', activity.totalGuiApps);
  map.put('VMware Status', activity.vmwareStatus);
  map.put('VM State', activity.vmState);
  map.put('VM Activity', activity.vmActivity);
  map.put('vm_count', activity.vms.length);
  map.put('vmware_cpu_percent', activity.vmwareCpuPercent);
  map.put('vmware_memory_gb', activity.vmwareMemoryGb);
  map.put('High Risk Apps', activity.highRiskApps);
  map.put('Resource Hogs', activity.resourceHogs);
  map.put('Legacy Software Flags', activity.legacySoftwareFlags);

  map.put('sshd_running', reachability.sshdRunning);
  map.put('ssh_port_listening', reachability.sshPortListening);
  map.put('screensharing_running', reachability.screenSharingRunning);
  map.put('vnc_port_listening', reachability.vncPortListening);
  map.put('tailscale_cli_present', reachability.tailscaleCliPresent);
  map.put('tailscale_peer_reachable', reachability.tailscalePeerReachable);
  map.put('remote_access_artifacts', reachability.remoteAccessArtifacts.length > 0
    ? reachability.remoteAccessArtifacts.join(',')
    : 'None');
  map.put('remote_access_artifacts_count', reachability.remoteAccessArtifacts.length);

  // The echo covers every field above; the debug log is sent beside it, not inside it
  map.put(RAW_PAYLOAD_FIELD, JSON.stringify(map.fields));
  if (record.debugLog !== undefined) {
    map.put(DEBUG_LOG_FIELD, record.debugLog.slice(-DEBUG_LOG_LIMIT));
  }

  return map.fields;
}

// Every optional part present, so that flattening it lists every column a run can write
const FULL_RECORD: HealthRecord = {
  timestamp: '2000-01-01T00:00:00Z',
  hostname: 'sample',
  osVersion: '0',
  hardware: { bootDevice: 'disk0', smartStatus: 'Verified', kernelPanics24h: 0, backupAgeDays: 0, softwareUpdates: 'Up to Date' },
  system: { driveSpace: '-', uptime: '-', memoryPressure: '-', cpuTemperature: '-' },
  crashes: { count: 0, newest: ['-'] },
  errors: { available: true, totalErrors: 0, criticalFaults: 0, buckets: emptyBuckets(), thermalThrottles: 0, fanMaxEvents: 0, topMessages: ['-'] },
  recentErrors: { available: true, count: 0 },
  verdict: { severity: 'Healthy', label: 'Healthy', reason: '-', ruleId: 'healthy' },
  gpuFreeze: { available: true, detected: false, firedPatterns: [], summary: 'None' },
  activity: {
    users: [], activeUsersText: '-', totalGuiApps: 0, applicationInventory: '-', vmwareStatus: 'Not Running',
    vmState: 'Not Running', vms: [], vmActivity: '-', vmwareCpuPercent: 0, vmwareMemoryGb: 0,
    highRiskApps: '-', resourceHogs: '-', legacySoftwareFlags: '-'
  },
  reachability: {
    sshdRunning: 'No', sshPortListening: 'No', screenSharingRunning: 'No', vncPortListening: 'No',
    tailscaleCliPresent: 'No', tailscalePeerReachable: 'Unknown', remoteAccessArtifacts: []
  },
  runDurationSeconds: 0,
  debugLog: '-'
};

export function expectedFieldNames(rules: ReadonlyArray<ErrorRuleDefinition> = DEFAULT_ERROR_RULES): string[] {
  return Object.keys(toSinkFields(FULL_RECORD, rules));
}
