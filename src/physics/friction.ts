/**
 * sheetmotion/physics - Friction Simulation
 * Exponentially decaying velocity, used for free flings.
 */

import { contractError, requireFinite } from "../internal/assert";
import {
  DEFAULT_TOLERANCE,
  nearZero,
  type Simulation,
  type Tolerance,
} from "./simulation";

export interface FrictionSimulation extends Simulation {
  /** Where the motion comes to rest */
  readonly finalX: number;

  /** Time at which the motion reaches `x`, or Infinity if it never does */
  timeAtX: (x: number) => number;
}

/**
 * @param drag - fraction of velocity retained after one second, in (0, 1)
 */
export const createFrictionSimulation = (
  drag: number,
  position: number,
  velocity: number,
  tolerance: Tolerance = DEFAULT_TOLERANCE,
): FrictionSimulation => {
  requireFinite(drag, "drag");
  if (drag <= 0 || drag >= 1) {
    throw contractError(`drag must be in (0, 1), got ${drag}`);
  }
  const logDrag = Math.log(drag);
  const finalX = position - velocity / logDrag;

  const x = (time: number): number =>
    position + (velocity * (Math.pow(drag, time) - 1)) / logDrag;
  const dx = (time: number): number => velocity * Math.pow(drag, time);

  const timeAtX = (target: number): number => {
    if (target === position) return 0;
    if (velocity === 0) return Infinity;
    const lo = Math.min(position, finalX);
    const hi = Math.max(position, finalX);
    if (target < lo || target > hi) return Infinity;
    return Math.log(((target - position) * logDrag) / velocity + 1) / logDrag;
  };

  return {
    finalX,
    timeAtX,
    x,
    dx,
    isDone: (time) => nearZero(dx(time), tolerance.velocity),
  };
};

/**
 * Friction clamped to [min, max]. The motion stops as soon as it hits
 * either bound.
 */
export const createBoundedFrictionSimulation = (
  drag: number,
  position: number,
  velocity: number,
  min: number,
  max: number,
  tolerance: Tolerance = DEFAULT_TOLERANCE,
): FrictionSimulation => {
  if (min > max) {
    throw contractError(`min (${min}) must not exceed max (${max})`);
  }
  const clamp = (value: number) => Math.min(max, Math.max(min, value));
  const friction = createFrictionSimulation(
    drag,
    clamp(position),
    velocity,
    tolerance,
  );

  const x = (time: number): number => clamp(friction.x(time));

  // Pinned against a bound while still pushing into it
  const isPinned = (time: number): boolean => {
    const value = x(time);
    const velocityAt = friction.dx(time);
    return (value <= min && velocityAt <= 0) || (value >= max && velocityAt >= 0);
  };

  return {
    finalX: clamp(friction.finalX),
    timeAtX: friction.timeAtX,
    x,
    dx: (time) => (isPinned(time) ? 0 : friction.dx(time)),
    isDone: (time) => friction.isDone(time) || isPinned(time),
  };
};
