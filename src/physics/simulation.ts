/**
 * sheetmotion/physics - Simulation Contract
 */

import {
  DEFAULT_TOLERANCE_DISTANCE,
  DEFAULT_TOLERANCE_VELOCITY,
} from "../constants";

/**
 * A one-dimensional motion as a function of time.
 * Time is in seconds since the simulation started; positions in pixels.
 */
export interface Simulation {
  /** Position at `time` */
  x: (time: number) => number;

  /** Velocity (px/s) at `time` */
  dx: (time: number) => number;

  /** Whether the motion has come to rest at `time` */
  isDone: (time: number) => boolean;

  /**
   * Where the motion comes to rest, when known. A finished ballistic
   * activity lands here instead of on the last sample, which is only
   * within tolerance of it.
   */
  readonly finalX?: number;
}

/** How close to rest a simulation must be to count as finished */
export interface Tolerance {
  readonly distance: number;
  readonly velocity: number;
}

export const DEFAULT_TOLERANCE: Tolerance = Object.freeze({
  distance: DEFAULT_TOLERANCE_DISTANCE,
  velocity: DEFAULT_TOLERANCE_VELOCITY,
});

export const nearEqual = (a: number, b: number, epsilon: number): boolean =>
  Math.abs(a - b) <= epsilon;

export const nearZero = (a: number, epsilon: number): boolean =>
  nearEqual(a, 0, epsilon);
