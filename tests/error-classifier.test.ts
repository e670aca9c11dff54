import { ErrorClassifier, topMessages } from '../src/detection/error-classifier';
import { DEFAULT_ERROR_RULES } from '../src/detection/error-rules';
import { SignalWindow } from '../src/types';

function window(lines: string[]): SignalWindow {
  return { name: 'primary', duration: '1h', outcome: 'success', content: lines.join('\n') + '\n' };
}

const TIMED_OUT: SignalWindow = {
  name: 'primary',
  duration: '1h',
  outcome: 'timed-out',
  content: '',
  reason: 'Log collection timed out'
};

const classifier = new ErrorClassifier();

// ============================================
// TOTALS AND FAULTS
// ============================================

describe('ErrorClassifier - totals', () => {
  it('counts lines containing "error" case-insensitively', () => {
    const result = classifier.classify(window([
      'host kernel[0]: ERROR reading sector',
      'host app[12]: all good',
      'host app[12]: Error: bad handle'
    ]));
    expect(result.available).toBe(true);
    if (!result.available) return;
    expect(result.totalErrors).toBe(2);
  });

  it('counts critical fault markers', () => {
    const result = classifier.classify(window([
      'proc <Fault> error in handler',
      'proc <Critical> error in handler',
      'proc [fatal] error: abort',
      'proc <Notice> error ignored'
    ]));
    if (!result.available) throw new Error('expected available');
    expect(result.criticalFaults).toBe(3);
    expect(result.totalErrors).toBe(4);
  });

  it('clamps critical faults to the total error count', () => {
    const result = classifier.classify(window([
      'proc <Fault> assertion',
      'proc <Fault> assertion',
      'proc <Fault> error'
    ]));
    if (!result.available) throw new Error('expected available');
    expect(result.totalErrors).toBe(1);
    expect(result.criticalFaults).toBe(1);
  });
});

// ============================================
// BUCKETS
// ============================================

describe('ErrorClassifier - buckets', () => {
  it('requires both the subsystem and the failure pattern', () => {
    const result = classifier.classify(window([
      'kernel[0]: disk panic imminent',          // kernel; disk alone is not a disk failure
      'kernel[0]: started normally',             // kernel only
      'WindowServer[99]: compositor crash',      // windowServer
      'mds: spotlight index failed',             // spotlight
      'cloudd: CloudKit request timeout',        // icloud
      'mDNSResponder: dns resolver unreachable', // network
      'AMDRadeon: GPU hang detected',            // gpu
      'systemstats: write failed',               // systemstats and diskIo
      'powerd: warning battery'                  // power
    ]));
    if (!result.available) throw new Error('expected available');
    expect(result.buckets).toEqual({
      kernel: 1,
      windowServer: 1,
      spotlight: 1,
      icloud: 1,
      diskIo: 1,
      network: 1,
      gpu: 1,
      systemstats: 1,
      power: 1
    });
  });

  it('counts thermal throttle and fan events', () => {
    const result = classifier.classify(window([
      'thermalmonitord: thermal pressure, throttling CPU',
      'kernel: CPU throttled by SMC',
      'smc: fan speed high 5200',
      'smc: fan at max'
    ]));
    if (!result.available) throw new Error('expected available');
    expect(result.thermalThrottles).toBe(2);
    expect(result.fanMaxEvents).toBe(2);
  });

  it('uses a replacement rule table', () => {
    const custom = new ErrorClassifier([
      { bucket: 'kernel', field: 'error_kernel_1h', subsystem: 'kext', failure: 'refused' }
    ]);
    const result = custom.classify(window(['kext load refused', 'kernel panic']));
    if (!result.available) throw new Error('expected available');
    expect(result.buckets.kernel).toBe(1);
    expect(result.buckets.gpu).toBe(0);
  });

  it('rejects an invalid pattern when the table is compiled', () => {
    expect(() => new ErrorClassifier([
      { ...DEFAULT_ERROR_RULES[0], subsystem: '(' }
    ])).toThrow('Invalid pattern in error rule for bucket "kernel"');
  });
});

// ============================================
// TOP MESSAGES
// ============================================

describe('topMessages', () => {
  it('keeps the text from the last "error" and orders by count, ties by first occurrence', () => {
    const lines = [
      '10:00 app[1]: Error: disk full',
      '10:01 other[2]: error: network down',
      '10:02 app[3]: ERROR: disk full',
      '10:03 x[4]: error: timeout',
      '10:04 y[5]: error: network down',
      '10:05 z[6]: error: late'
    ];
    expect(topMessages(lines)).toEqual(['error: disk full', 'error: network down', 'error: timeout']);
  });

  it('uses the last occurrence when a line mentions error twice', () => {
    expect(topMessages(['error in error handler'])).toEqual(['error handler']);
  });
});

// ============================================
// UNAVAILABLE WINDOWS
// ============================================

describe('ErrorClassifier - unavailable windows', () => {
  it('returns the unavailable state instead of zero counts', () => {
    expect(classifier.classify(TIMED_OUT)).toEqual({ available: false, reason: 'Log collection timed out' });
  });

  it('counts recent-window error lines with the same semantics', () => {
    expect(classifier.countErrorLines(window(['error a', 'fine', 'Error b']))).toEqual({ available: true, count: 2 });
    expect(classifier.countErrorLines({ ...TIMED_OUT, name: 'recent', duration: '5m' }))
      .toEqual({ available: false, reason: 'Log collection timed out' });
  });
});
