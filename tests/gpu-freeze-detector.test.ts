import { GpuFreezeDetector, NO_GPU_EVENTS } from '../src/detection/gpu-freeze-detector';
import { LOG_TIMEOUT_REASON } from '../src/monitoring/signal-collector';
import { SignalWindow } from '../src/types';

function gpuWindow(lines: string[]): SignalWindow {
  return { name: 'gpu', duration: '2m', outcome: 'success', content: lines.join('\n') };
}

const detector = new GpuFreezeDetector();

describe('GpuFreezeDetector', () => {
  it('reports None when nothing matches', () => {
    expect(detector.detect(gpuWindow([
      '2025-06-01 12:00:01 kernel[0]: AppleSMC fan check ok',
      '2025-06-01 12:00:02 WindowServer[150]: display reconfigured'
    ]))).toEqual({ available: true, detected: false, firedPatterns: [], summary: NO_GPU_EVENTS });
  });

  it('matches signatures case-sensitively', () => {
    const result = detector.detect(gpuWindow([
      'kernel[0]: gpu reset requested by driver',
      'kernel[0]: GPU hang detected'
    ]));
    expect(result.detected).toBe(false);
    expect(result.summary).toBe('None');
  });

  it('counts each fired signature and joins the summary in table order', () => {
    const result = detector.detect(gpuWindow([
      'kernel[0]: AMDRadeonX6000: GPU Hang on ring gfx',
      'kernel[0]: GPU Reset issued',
      'WindowServer[150]: main thread stalled for 4.2s',
      'kernel[0]: AMDRadeonX6000: GPU Hang on ring sdma0',
      'WindowServer[150]: IOSurface allocation failed'
    ]));

    expect(result.detected).toBe(true);
    expect(result.firedPatterns).toEqual([
      { pattern: 'GPU Reset', count: 1 },
      { pattern: 'GPU Hang', count: 2 },
      { pattern: 'AMDRadeon', count: 2 },
      { pattern: 'WindowServer.*stalled', count: 1 },
      { pattern: 'IOSurface', count: 1 }
    ]);
    expect(result.summary).toBe(
      'GPU Reset: 1 events; GPU Hang: 2 events; AMDRadeon: 2 events; WindowServer.*stalled: 1 events; IOSurface: 1 events'
    );
  });

  it('reports an unavailable window with its reason', () => {
    expect(detector.detect({ name: 'gpu', duration: '2m', outcome: 'timed-out', content: '', reason: LOG_TIMEOUT_REASON }))
      .toEqual({
        available: false,
        detected: false,
        firedPatterns: [],
        summary: 'Unavailable (Log collection timed out)'
      });
  });

  it('takes a custom signature list', () => {
    const custom = new GpuFreezeDetector(['GPU Restart']);
    expect(custom.detect(gpuWindow(['GPU Restart after GPU Reset'])).summary).toBe('GPU Restart: 1 events');
  });
});
