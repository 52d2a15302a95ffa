/**
 * sheetmotion/physics - Spring Simulation
 *
 * Closed-form damped harmonic oscillator. Unlike step integration the
 * position at any time is exact, so a ballistic activity can sample it at
 * whatever tick times the host delivers.
 */

import { contractError, requireFinite } from "../internal/assert";
import {
  DEFAULT_TOLERANCE,
  nearEqual,
  nearZero,
  type Simulation,
  type Tolerance,
} from "./simulation";

// =============================================================================
// Spring Description
// =============================================================================

export interface SpringDescription {
  readonly mass: number;
  readonly stiffness: number;
  readonly damping: number;
}

export const createSpringDescription = (
  spring: SpringDescription,
): SpringDescription => {
  const mass = requireFinite(spring.mass, "mass");
  const stiffness = requireFinite(spring.stiffness, "stiffness");
  const damping = requireFinite(spring.damping, "damping");
  if (mass <= 0) throw contractError(`mass must be > 0, got ${mass}`);
  if (stiffness <= 0) {
    throw contractError(`stiffness must be > 0, got ${stiffness}`);
  }
  if (damping < 0) throw contractError(`damping must be >= 0, got ${damping}`);
  return Object.freeze({ mass, stiffness, damping });
};

/**
 * Describe a spring by its damping ratio instead of the raw coefficient.
 * ratio = 1 is critically damped, < 1 oscillates, > 1 creeps.
 */
export const springWithDampingRatio = (
  mass: number,
  stiffness: number,
  ratio = 1,
): SpringDescription =>
  createSpringDescription({
    mass,
    stiffness,
    damping: ratio * 2 * Math.sqrt(mass * stiffness),
  });

// =============================================================================
// Solutions
// =============================================================================

/** Displacement from the resting point over time */
interface SpringSolution {
  x: (time: number) => number;
  dx: (time: number) => number;
}

const solveCritical = (r: number, x0: number, v0: number): SpringSolution => {
  const c1 = x0;
  const c2 = v0 - r * x0;
  return {
    x: (t) => (c1 + c2 * t) * Math.exp(r * t),
    dx: (t) => {
      const power = Math.exp(r * t);
      return r * (c1 + c2 * t) * power + c2 * power;
    },
  };
};

const solveOverdamped = (
  r1: number,
  r2: number,
  x0: number,
  v0: number,
): SpringSolution => {
  const c2 = (v0 - r1 * x0) / (r2 - r1);
  const c1 = x0 - c2;
  return {
    x: (t) => c1 * Math.exp(r1 * t) + c2 * Math.exp(r2 * t),
    dx: (t) => c1 * r1 * Math.exp(r1 * t) + c2 * r2 * Math.exp(r2 * t),
  };
};

const solveUnderdamped = (
  w: number,
  r: number,
  x0: number,
  v0: number,
): SpringSolution => {
  const c1 = x0;
  const c2 = (v0 - r * x0) / w;
  return {
    x: (t) =>
      Math.exp(r * t) * (c1 * Math.cos(w * t) + c2 * Math.sin(w * t)),
    dx: (t) => {
      const power = Math.exp(r * t);
      const cosine = Math.cos(w * t);
      const sine = Math.sin(w * t);
      return (
        power * (c2 * w * cosine - c1 * w * sine) +
        r * power * (c2 * sine + c1 * cosine)
      );
    },
  };
};

const solveSpring = (
  spring: SpringDescription,
  displacement: number,
  velocity: number,
): SpringSolution => {
  const { mass: m, stiffness: k, damping: c } = spring;
  const cmk = c * c - 4 * m * k;

  if (cmk === 0) {
    return solveCritical(-c / (2 * m), displacement, velocity);
  }
  if (cmk > 0) {
    const root = Math.sqrt(cmk);
    return solveOverdamped(
      (-c - root) / (2 * m),
      (-c + root) / (2 * m),
      displacement,
      velocity,
    );
  }
  return solveUnderdamped(
    Math.sqrt(4 * m * k - c * c) / (2 * m),
    -c / (2 * m),
    displacement,
    velocity,
  );
};

// =============================================================================
// Spring Simulation
// =============================================================================

export interface SpringSimulation extends Simulation {
  readonly start: number;
  readonly end: number;
  readonly finalX: number;
}

/**
 * Spring from `start` to `end` with an initial `velocity` (px/s).
 */
export const createSpringSimulation = (
  spring: SpringDescription,
  start: number,
  end: number,
  velocity: number,
  tolerance: Tolerance = DEFAULT_TOLERANCE,
): SpringSimulation => {
  const solution = solveSpring(spring, start - end, velocity);

  const x = (time: number): number => end + solution.x(time);
  const dx = (time: number): number => solution.dx(time);

  return {
    start,
    end,
    finalX: end,
    x,
    dx,
    isDone: (time) =>
      nearEqual(x(time), end, tolerance.distance) &&
      nearZero(dx(time), tolerance.velocity),
  };
};
