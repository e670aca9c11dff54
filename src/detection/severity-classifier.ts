// severity-classifier.ts - Ordered first-match-wins health cascade with backup escalation
import { ThresholdConfig } from '../config/config';
import {
  CrashReportSummary,
  ErrorClassification,
  GpuFreezeResult,
  HardwareStatus,
  LineCount,
  Severity,
  SEVERITY_ORDER,
  SeverityVerdict
} from '../types';
import { totalOrZero } from './error-classifier';

// ============================================
// INTERFACES
// ============================================

export interface SeverityInput {
  hardware: HardwareStatus;
  errors: ErrorClassification;
  recentErrors: LineCount;
  crashes: CrashReportSummary;
  gpuFreeze: GpuFreezeResult;
}

/** The numbers the cascade reads; unavailable windows count as zero. */
export interface CascadeFacts {
  smartStatus: string;
  kernelPanics: number;
  primaryErrors: number;
  recentErrors: number;
  criticalFaults: number;
  supportingSymptoms: boolean;
}

export interface SeverityRule {
  id: string;
  severity: Severity;
  label: string;
  matches(facts: CascadeFacts, thresholds: ThresholdConfig): boolean;
  reason(facts: CascadeFacts): string;
}

export const HEALTHY_REASON = 'System operating normally';
const SUPPORTING_CRASH_COUNT = 5;

// ============================================
// RULES
// ============================================

export const SEVERITY_RULES: ReadonlyArray<SeverityRule> = [
  {
    id: 'hardware-failure',
    severity: 'Critical',
    label: 'Hardware Failure',
    matches: f => f.smartStatus !== 'Verified' && f.smartStatus !== 'Unknown',
    reason: f => `SMART status: ${f.smartStatus} - Drive failure imminent`
  },
  {
    id: 'kernel-panic',
    severity: 'Critical',
    label: 'System Instability',
    matches: f => f.kernelPanics > 0,
    reason: f => `Kernel panic detected (${f.kernelPanics} in last 24h) - System crashed`
  },
  {
    id: 'error-burst-critical',
    severity: 'Critical',
    label: 'Attention Needed',
    matches: (f, t) => f.recentErrors >= t.recentCritical || f.primaryErrors >= t.primaryCritical,
    reason: f => `Severe error burst detected (1h: ${f.primaryErrors}, 5m: ${f.recentErrors})` +
      (f.supportingSymptoms
        ? ' with supporting symptoms (crashes/thermal/GPU)'
        : '; no crashes/thermal/GPU symptoms')
  },
  {
    id: 'fault-saturation-critical',
    severity: 'Critical',
    label: 'Attention Needed',
    matches: (f, t) => f.criticalFaults >= t.faultCritical,
    reason: f => `Excessive critical faults (${f.criticalFaults}/hour)`
  },
  {
    id: 'error-burst-warning',
    severity: 'Warning',
    label: 'Monitor Closely',
    matches: (f, t) => f.recentErrors >= t.recentWarning || f.primaryErrors >= t.primaryWarning,
    reason: f => `Elevated error burst activity (1h: ${f.primaryErrors}, 5m: ${f.recentErrors})`
  },
  {
    id: 'fault-warning',
    severity: 'Warning',
    label: 'Monitor Closely',
    matches: (f, t) => f.criticalFaults >= t.faultWarning,
    reason: f => `Elevated critical faults (${f.criticalFaults}/hour)`
  }
];

// ============================================
// CLASSIFIER
// ============================================

export class SeverityClassifier {
  private thresholds: ThresholdConfig;
  private rules: ReadonlyArray<SeverityRule>;

  constructor(thresholds: ThresholdConfig, rules: ReadonlyArray<SeverityRule> = SEVERITY_RULES) {
    this.thresholds = thresholds;
    this.rules = rules;
  }

  classify(input: SeverityInput): SeverityVerdict {
    const facts = toFacts(input);
    const matched = this.rules.find(rule => rule.matches(facts, this.thresholds));

    const verdict: SeverityVerdict = matched
      ? { severity: matched.severity, label: matched.label, reason: matched.reason(facts), ruleId: matched.id }
      : { severity: 'Healthy', label: 'Healthy', reason: HEALTHY_REASON, ruleId: 'healthy' };

    return this.applyBackupEscalation(verdict, input.hardware.backupAgeDays);
  }

  /** Raises Healthy to Warning when the backup is overdue; never lowers a verdict. */
  applyBackupEscalation(verdict: SeverityVerdict, backupAgeDays: number): SeverityVerdict {
    if (backupAgeDays <= this.thresholds.backupOverdueDays) {
      return verdict;
    }

    const note = `Time Machine backup overdue (${backupAgeDays} days)`;
    const reason = verdict.reason === HEALTHY_REASON ? note : `${verdict.reason}; ${note}`;

    if (SEVERITY_ORDER[verdict.severity] < SEVERITY_ORDER.Warning) {
      return { severity: 'Warning', label: 'Backup Overdue', reason, ruleId: 'backup-overdue' };
    }
    return { ...verdict, reason };
  }
}

function toFacts(input: SeverityInput): CascadeFacts {
  const errors = input.errors;
  const thermalThrottles = errors.available ? errors.thermalThrottles : 0;

  return {
    smartStatus: input.hardware.smartStatus,
    kernelPanics: input.hardware.kernelPanics24h,
    primaryErrors: errors.available ? errors.totalErrors : 0,
    recentErrors: totalOrZero(input.recentErrors),
    criticalFaults: errors.available ? errors.criticalFaults : 0,
    supportingSymptoms:
      input.crashes.count >= SUPPORTING_CRASH_COUNT ||
      thermalThrottles > 0 ||
      input.gpuFreeze.detected
  };
}
