/**
 * sheetmotion/animation - Easing Curves
 * Map linear progress t ∈ [0, 1] to eased progress.
 */

import { contractError } from "../internal/assert";

/** Easing curve: f(0) = 0, f(1) = 1 */
export type Curve = (t: number) => number;

export const linear: Curve = (t) => t;

export const easeIn: Curve = (t) => t * t * t;

export const easeOut: Curve = (t) => 1 - Math.pow(1 - t, 3);

export const easeInOut: Curve = (t) =>
  t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2;

export const easeInOutQuad: Curve = (t) =>
  t < 0.5 ? 2 * t * t : -1 + (4 - 2 * t) * t;

/** Quadratic ease-out: fast start, gentle stop */
export const decelerate: Curve = (t) => 1 - (1 - t) * (1 - t);

// =============================================================================
// Cubic Bézier
// =============================================================================

const NEWTON_ITERATIONS = 8;
const NEWTON_EPSILON = 1e-6;
const BISECTION_ITERATIONS = 20;

/**
 * CSS-style cubic-bezier(x1, y1, x2, y2) curve.
 * x1 and x2 must lie in [0, 1] so the curve is a function of t.
 */
export const cubicBezier = (
  x1: number,
  y1: number,
  x2: number,
  y2: number,
): Curve => {
  if (x1 < 0 || x1 > 1 || x2 < 0 || x2 > 1) {
    throw contractError(
      `cubicBezier x values must be in [0, 1], got ${x1}, ${x2}`,
    );
  }

  // Polynomial coefficients for B(s) = ((a*s + b)*s + c)*s
  const cx = 3 * x1;
  const bx = 3 * (x2 - x1) - cx;
  const ax = 1 - cx - bx;
  const cy = 3 * y1;
  const by = 3 * (y2 - y1) - cy;
  const ay = 1 - cy - by;

  const sampleX = (s: number) => ((ax * s + bx) * s + cx) * s;
  const sampleY = (s: number) => ((ay * s + by) * s + cy) * s;
  const slopeX = (s: number) => (3 * ax * s + 2 * bx) * s + cx;

  const solveS = (x: number): number => {
    let s = x;
    for (let i = 0; i < NEWTON_ITERATIONS; i++) {
      const error = sampleX(s) - x;
      if (Math.abs(error) < NEWTON_EPSILON) return s;
      const slope = slopeX(s);
      if (Math.abs(slope) < NEWTON_EPSILON) break;
      s -= error / slope;
    }

    // Newton stalled on a flat segment; bisect instead
    let lo = 0;
    let hi = 1;
    s = x;
    for (let i = 0; i < BISECTION_ITERATIONS; i++) {
      const value = sampleX(s);
      if (Math.abs(value - x) < NEWTON_EPSILON) return s;
      if (value < x) lo = s;
      else hi = s;
      s = (lo + hi) / 2;
    }
    return s;
  };

  return (t) => {
    if (t <= 0) return 0;
    if (t >= 1) return 1;
    return sampleY(solveS(t));
  };
};

/** Clamp progress into [0, 1] and apply a curve */
export const transformProgress = (curve: Curve, t: number): number => {
  if (t <= 0) return curve(0);
  if (t >= 1) return curve(1);
  return curve(t);
};
