/**
 * Piecewise-linear scoring curves.
 *
 * A curve is a list of segments ordered by descending lower bound. The first
 * segment whose bound the ratio reaches gives `base + (ratio - from) * slope`.
 * Every curve below is continuous and non-decreasing on [0, 1].
 */

export interface CurveSegment {
  from: number;
  base: number;
  slope: number;
}

export type Curve = readonly CurveSegment[];

export function applyCurve(curve: Curve, ratio: number): number {
  const r = Math.min(1, Math.max(0, ratio));
  for (const segment of curve) {
    if (r >= segment.from) {
      return segment.base + (r - segment.from) * segment.slope;
    }
  }
  return 0;
}

// Technical: required skills 0-70
export const TECHNICAL_REQUIRED_CURVE: Curve = [
  { from: 1, base: 70, slope: 0 },
  { from: 0.9, base: 65, slope: 50 },
  { from: 0.75, base: 55, slope: 10 / 0.15 },
  { from: 0.6, base: 40, slope: 100 },
  { from: 0.5, base: 25, slope: 150 },
  { from: 0, base: 0, slope: 50 },
];

// Technical: optional skills 0-30
export const TECHNICAL_OPTIONAL_CURVE: Curve = [
  { from: 0.8, base: 30, slope: 0 },
  { from: 0.6, base: 20, slope: 50 },
  { from: 0.4, base: 10, slope: 50 },
  { from: 0, base: 0, slope: 25 },
];

// Profile: required skills 0-40
export const PROFILE_REQUIRED_CURVE: Curve = [
  { from: 1, base: 40, slope: 0 },
  { from: 0.9, base: 36, slope: 40 },
  { from: 0.75, base: 30, slope: 40 },
  { from: 0.6, base: 22, slope: 160 / 3 },
  { from: 0.5, base: 15, slope: 70 },
  { from: 0, base: 0, slope: 30 },
];

// Profile: optional skills bonus 0-10
export const PROFILE_OPTIONAL_CURVE: Curve = [
  { from: 0.8, base: 10, slope: 0 },
  { from: 0.6, base: 7, slope: 15 },
  { from: 0.4, base: 4, slope: 15 },
  { from: 0, base: 0, slope: 10 },
];

export function clampScore(score: number): number {
  return Math.min(100, Math.max(0, score));
}

export function formatScore(score: number): string {
  return `${score.toFixed(1)}/100`;
}
