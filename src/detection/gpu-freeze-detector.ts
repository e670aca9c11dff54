// gpu-freeze-detector.ts - Graphics freeze signatures in the short GPU log window
import { GpuFreezeResult, GpuPatternHit, SignalWindow, isWindowAvailable } from '../types';

// Matched case-sensitively, in this order, as the OS writes them
export const GPU_FREEZE_PATTERNS: ReadonlyArray<string> = [
  'GPU Reset',
  'GPU Hang',
  'AMDRadeon',
  'AGC::',
  'WindowServer.*stalled',
  'WindowServer.*overload',
  'IOSurface',
  'Metal.*timeout',
  'timed out waiting for',
  'GPU Debug Info'
];

export const NO_GPU_EVENTS = 'None';

export class GpuFreezeDetector {
  private signatures: Array<{ pattern: string; regex: RegExp }>;

  constructor(patterns: ReadonlyArray<string> = GPU_FREEZE_PATTERNS) {
    this.signatures = patterns.map(pattern => ({ pattern, regex: new RegExp(pattern) }));
  }

  detect(window: SignalWindow): GpuFreezeResult {
    if (!isWindowAvailable(window)) {
      return {
        available: false,
        detected: false,
        firedPatterns: [],
        summary: `Unavailable (${window.reason})`
      };
    }

    const lines = window.content.split('\n');
    const firedPatterns: GpuPatternHit[] = [];

    for (const { pattern, regex } of this.signatures) {
      const count = lines.filter(line => regex.test(line)).length;
      if (count > 0) firedPatterns.push({ pattern, count });
    }

    return {
      available: true,
      detected: firedPatterns.length > 0,
      firedPatterns,
      summary: firedPatterns.length > 0
        ? firedPatterns.map(hit => `${hit.pattern}: ${hit.count} events`).join('; ')
        : NO_GPU_EVENTS
    };
  }
}
