/**
 * Scoring Curve Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  PROFILE_OPTIONAL_CURVE,
  PROFILE_REQUIRED_CURVE,
  TECHNICAL_OPTIONAL_CURVE,
  TECHNICAL_REQUIRED_CURVE,
  applyCurve,
  formatScore,
  type Curve,
} from '../../domain/services/scoring/curves.js';

const CURVES: Array<[string, Curve, number]> = [
  ['technical required', TECHNICAL_REQUIRED_CURVE, 70],
  ['technical optional', TECHNICAL_OPTIONAL_CURVE, 30],
  ['profile required', PROFILE_REQUIRED_CURVE, 40],
  ['profile optional', PROFILE_OPTIONAL_CURVE, 10],
];

describe('scoring curves', () => {
  describe.each(CURVES)('%s', (_name, curve, ceiling) => {
    it('should start at zero and reach its ceiling', () => {
      expect(applyCurve(curve, 0)).toBe(0);
      expect(applyCurve(curve, 1)).toBeCloseTo(ceiling);
    });

    it('should be continuous at every breakpoint', () => {
      for (const segment of curve) {
        if (segment.from === 0) continue;
        expect(applyCurve(curve, segment.from - 1e-9)).toBeCloseTo(applyCurve(curve, segment.from), 5);
      }
    });

    it('should never decrease', () => {
      let previous = -1;
      for (let step = 0; step <= 100; step++) {
        const value = applyCurve(curve, step / 100);
        expect(value).toBeGreaterThanOrEqual(previous - 1e-9);
        previous = value;
      }
    });

    it('should clamp ratios outside [0, 1]', () => {
      expect(applyCurve(curve, -0.5)).toBe(0);
      expect(applyCurve(curve, 1.5)).toBeCloseTo(ceiling);
    });
  });

  it('should hit the documented points', () => {
    expect(applyCurve(TECHNICAL_REQUIRED_CURVE, 0.5)).toBe(25);
    expect(applyCurve(TECHNICAL_REQUIRED_CURVE, 0.75)).toBe(55);
    expect(applyCurve(PROFILE_REQUIRED_CURVE, 0.6)).toBe(22);
    expect(applyCurve(PROFILE_OPTIONAL_CURVE, 0.4)).toBe(4);
  });

  it('should format scores with one decimal', () => {
    expect(formatScore(72.345)).toBe('72.3/100');
  });
});
