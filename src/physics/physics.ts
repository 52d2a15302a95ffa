/**
 * sheetmotion/physics - Physics Policies
 *
 * A policy decides what the sheet does when released: fling freely, spring
 * back into bounds, or snap to one of a set of extents. Returning null means
 * no motion is needed and the sheet goes idle.
 *
 * Velocity is in px/s; positive values open the sheet further.
 */

import {
  DEFAULT_FRICTION_DRAG,
  DEFAULT_MIN_BALLISTIC_SPEED,
  DEFAULT_MIN_FLING_SPEED,
  DEFAULT_SPRING_DAMPING_RATIO,
  DEFAULT_SPRING_MASS,
  DEFAULT_SPRING_STIFFNESS,
  OFFSET_EPSILON,
} from "../constants";
import { resolveExtent, type Extent } from "../extent";
import { contractError } from "../internal/assert";
import type { SheetMetricsSnapshot } from "../metrics";
import { createBoundedFrictionSimulation } from "./friction";
import type { Simulation } from "./simulation";
import {
  createSpringSimulation,
  springWithDampingRatio,
  type SpringDescription,
} from "./spring";

// =============================================================================
// Contract
// =============================================================================

export interface SheetPhysics {
  /** Motion after a release with `velocity`, or null to stay put */
  createBallisticSimulation: (
    velocity: number,
    metrics: SheetMetricsSnapshot,
  ) => Simulation | null;

  /** Motion that brings the sheet to rest at an allowed position */
  createSettlingSimulation: (metrics: SheetMetricsSnapshot) => Simulation | null;

  /** Offset to use after the bounds changed under a static sheet */
  adjustOffsetForNewBounds: (
    offset: number,
    metrics: SheetMetricsSnapshot,
  ) => number;
}

export interface PhysicsConfig {
  /** Spring used for settling and snapping */
  spring?: SpringDescription;

  /** Friction drag for free flings, in (0, 1) (default: 0.135) */
  frictionDrag?: number;

  /** Speeds below this (px/s) do not start a fling (default: 1) */
  minBallisticSpeed?: number;
}

export const createDefaultSpring = (): SpringDescription =>
  springWithDampingRatio(
    DEFAULT_SPRING_MASS,
    DEFAULT_SPRING_STIFFNESS,
    DEFAULT_SPRING_DAMPING_RATIO,
  );

const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

// =============================================================================
// Clamping Physics
// =============================================================================

/**
 * Free flings between the bounds; springs back when out of bounds.
 */
export const createClampingPhysics = (config: PhysicsConfig = {}): SheetPhysics => {
  const spring = config.spring ?? createDefaultSpring();
  const drag = config.frictionDrag ?? DEFAULT_FRICTION_DRAG;
  const minSpeed = config.minBallisticSpeed ?? DEFAULT_MIN_BALLISTIC_SPEED;

  const springIntoBounds = (
    metrics: SheetMetricsSnapshot,
    velocity: number,
  ): Simulation => {
    const { offset, minOffset, maxOffset } = metrics;
    return createSpringSimulation(
      spring,
      offset,
      clamp(offset, minOffset, maxOffset),
      velocity,
    );
  };

  return {
    createBallisticSimulation: (velocity, metrics) => {
      if (metrics.isOutOfBounds) {
        return springIntoBounds(metrics, velocity);
      }
      const { offset, minOffset, maxOffset } = metrics;
      if (Math.abs(velocity) < minSpeed) return null;
      // Already against the bound it is pushing toward
      if (offset >= maxOffset && velocity > 0) return null;
      if (offset <= minOffset && velocity < 0) return null;
      return createBoundedFrictionSimulation(
        drag,
        offset,
        velocity,
        minOffset,
        maxOffset,
      );
    },

    createSettlingSimulation: (metrics) =>
      metrics.isOutOfBounds ? springIntoBounds(metrics, 0) : null,

    adjustOffsetForNewBounds: (offset, metrics) =>
      clamp(offset, metrics.minOffset, metrics.maxOffset),
  };
};

// =============================================================================
// Snapping Physics
// =============================================================================

export interface SnappingPhysicsConfig extends PhysicsConfig {
  /** Positions the sheet may rest at */
  snapExtents: readonly Extent[];

  /**
   * Fling speed (px/s) at or above which the sheet moves to the next snap
   * position in the fling direction instead of the nearest one (default: 50)
   */
  minFlingSpeed?: number;
}

/** Resolve snap extents into sorted, de-duplicated offsets within bounds */
export const resolveSnapOffsets = (
  snapExtents: readonly Extent[],
  metrics: SheetMetricsSnapshot,
): number[] => {
  const { contentDimensions, minOffset, maxOffset } = metrics;
  const offsets = snapExtents
    .map((extent) =>
      clamp(resolveExtent(extent, contentDimensions), minOffset, maxOffset),
    )
    .sort((a, b) => a - b);

  const unique: number[] = [];
  for (const value of offsets) {
    const last = unique[unique.length - 1];
    if (last === undefined || value - last > OFFSET_EPSILON) {
      unique.push(value);
    }
  }
  return unique;
};

/** Snap offset closest to `offset`; ties go to the lower one */
export const findNearestSnap = (offset: number, snaps: readonly number[]): number => {
  let nearest = snaps[0] ?? offset;
  for (const snap of snaps) {
    if (Math.abs(snap - offset) < Math.abs(nearest - offset)) {
      nearest = snap;
    }
  }
  return nearest;
};

/**
 * First snap offset past `offset` in the direction of `velocity`.
 * Falls back to the outermost snap on that side.
 */
export const findNextSnap = (
  offset: number,
  velocity: number,
  snaps: readonly number[],
): number => {
  if (velocity > 0) {
    const next = snaps.find((snap) => snap > offset + OFFSET_EPSILON);
    return next ?? snaps[snaps.length - 1] ?? offset;
  }
  for (let i = snaps.length - 1; i >= 0; i--) {
    const snap = snaps[i];
    if (snap !== undefined && snap < offset - OFFSET_EPSILON) return snap;
  }
  return snaps[0] ?? offset;
};

/**
 * Rest only at the given snap extents. Releases spring to the nearest one,
 * or to the next one in the fling direction for fast flings.
 */
export const createSnappingPhysics = (config: SnappingPhysicsConfig): SheetPhysics => {
  if (config.snapExtents.length === 0) {
    throw contractError("snapExtents must contain at least one extent");
  }
  const spring = config.spring ?? createDefaultSpring();
  const minFlingSpeed = config.minFlingSpeed ?? DEFAULT_MIN_FLING_SPEED;
  const minSpeed = config.minBallisticSpeed ?? DEFAULT_MIN_BALLISTIC_SPEED;
  const { snapExtents } = config;

  const springTo = (
    offset: number,
    target: number,
    velocity: number,
  ): Simulation | null => {
    if (
      Math.abs(target - offset) <= OFFSET_EPSILON &&
      Math.abs(velocity) < minSpeed
    ) {
      return null;
    }
    return createSpringSimulation(spring, offset, target, velocity);
  };

  return {
    createBallisticSimulation: (velocity, metrics) => {
      const snaps = resolveSnapOffsets(snapExtents, metrics);
      const { offset } = metrics;
      const target =
        Math.abs(velocity) >= minFlingSpeed
          ? findNextSnap(offset, velocity, snaps)
          : findNearestSnap(offset, snaps);
      return springTo(offset, target, velocity);
    },

    createSettlingSimulation: (metrics) => {
      const snaps = resolveSnapOffsets(snapExtents, metrics);
      return springTo(metrics.offset, findNearestSnap(metrics.offset, snaps), 0);
    },

    adjustOffsetForNewBounds: (offset, metrics) =>
      clamp(offset, metrics.minOffset, metrics.maxOffset),
  };
};
