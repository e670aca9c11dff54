import { DEFAULT_THRESHOLDS } from '../src/config/config';
import { HistoryRow } from '../src/trend/coverage-normalizer';
import {
  applyCalibration,
  calibrateThresholds,
  renderCalibration,
  seriesStats
} from '../src/trend/threshold-calibrator';

const ROWS: HistoryRow[] = [
  { timestamp: '2025-05-01T10:00:00Z', fields: { 'Error Count': 10, 'Critical Fault Count (1h)': 1, 'Recent Error Count (5 min)': 5 } },
  { timestamp: '2025-05-01T11:00:00Z', fields: { 'Error Count': 20, 'Critical Fault Count (1h)': 1 } },
  { timestamp: '2025-05-01T12:00:00Z', fields: { 'Error Count': 30 } }
];

describe('seriesStats', () => {
  it('uses the sample standard deviation and rounds thresholds up', () => {
    expect(seriesStats('Error Count', [10, 20, 30])).toEqual({
      field: 'Error Count',
      samples: 3,
      mean: 20,
      stdDev: 10,
      warning: 40,
      critical: 50
    });
    expect(seriesStats('x', [1, 2])?.warning).toBe(Math.ceil(1.5 + 2 * Math.SQRT1_2));
  });

  it('needs at least two samples', () => {
    expect(seriesStats('x', [5])).toBeNull();
    expect(seriesStats('x', [])).toBeNull();
  });
});

describe('calibrateThresholds', () => {
  it('replaces only the thresholds it has enough samples for', () => {
    const calibration = calibrateThresholds(ROWS);
    expect(calibration.recent).toBeNull();

    expect(applyCalibration(DEFAULT_THRESHOLDS, calibration)).toEqual({
      ...DEFAULT_THRESHOLDS,
      primaryWarning: 40,
      primaryCritical: 50,
      faultWarning: 1,
      faultCritical: 1
    });
  });

  it('renders the statistics and a thresholds block', () => {
    const calibration = calibrateThresholds(ROWS);
    const thresholds = applyCalibration(DEFAULT_THRESHOLDS, calibration);
    const text = renderCalibration(calibration, thresholds);
    const lines = text.split('\n');

    expect(lines[0]).toBe('Error Count: n=3, mean=20.0, sd=10.0, warning=40, critical=50');
    expect(lines[1]).toBe('Critical Fault Count (1h): n=2, mean=1.0, sd=0.0, warning=1, critical=1');
    expect(lines[2]).toBe('');
    expect(JSON.parse(text.slice(text.indexOf('{')))).toEqual({ thresholds });
  });

  it('says so when nothing can be calibrated', () => {
    const text = renderCalibration(calibrateThresholds([]), DEFAULT_THRESHOLDS);
    expect(text.split('\n')[0]).toBe('Not enough samples to calibrate any threshold');
  });
});
