/**
 * sheetmotion/sheet - Sheet Extent
 *
 * The orchestrator. Owns the bounds, the measured dimensions and the
 * current activity; the activity owns the offset value itself.
 *
 * Dimension changes arrive in batches: markDimensionsWillChange() and
 * markDimensionsChanged() nest, and only the outermost close tells the
 * activity that the batch is final. A dimension change outside any batch is
 * a batch of its own.
 *
 * Observers get one "change" event per public call that moved the offset,
 * the view offset or the bounds. Offset changes an activity makes on its own
 * (ticks) are forwarded as they happen.
 */

import {
  createAnimatedActivity,
  createBallisticActivity,
  createIdleActivity,
  type DimensionChanges,
  type SheetActivity,
} from "../activity";
import { easeInOut } from "../animation";
import { DEFAULT_ANIMATION_DURATION } from "../constants";
import { createEmitter } from "../events";
import { pixels, proportional, resolveExtent } from "../extent";
import { sizeEquals, viewportDimensionsEquals } from "../geometry";
import { assert, contractError, DEV, required } from "../internal/assert";
import { createLogger } from "../internal/log";
import {
  createMaybeMetrics,
  createMetricsSnapshot,
  createMetricsView,
  describeMetrics,
} from "../metrics";
import { createClampingPhysics, type Simulation } from "../physics";
import { scheduleEndOfFrame } from "../scheduler";
import type {
  SheetEvents,
  Size,
  Unsubscribe,
  ViewportDimensions,
} from "../types";
import type { SheetExtent, SheetExtentConfig, SheetExtentFactory } from "./types";

const log = createLogger("extent");

/** Values whose change observers are told about */
interface ObservedState {
  offset: number | null;
  viewOffset: number | null;
  minOffset: number | null;
  maxOffset: number | null;
}

const observedStateEquals = (a: ObservedState, b: ObservedState): boolean =>
  a.offset === b.offset &&
  a.viewOffset === b.viewOffset &&
  a.minOffset === b.minOffset &&
  a.maxOffset === b.maxOffset;

// =============================================================================
// Factory
// =============================================================================

export const createSheetExtent = (config: SheetExtentConfig): SheetExtent => {
  const { context } = config;
  const physics = config.physics ?? createClampingPhysics();
  const minExtent = config.minExtent ?? pixels(0);
  const maxExtent = config.maxExtent ?? proportional(1);
  const initialExtent = config.initialExtent ?? maxExtent;

  const emitter = createEmitter<SheetEvents>();

  // State
  let activity: SheetActivity | null = null;
  let unsubscribeActivity: Unsubscribe | null = null;
  let minOffset: number | null = null;
  let maxOffset: number | null = null;
  let contentDimensions: Size | null = null;
  let viewportDimensions: ViewportDimensions | null = null;
  let disposed = false;

  // Dimension batching
  let openBatches = 0;
  let contentChanged = false;
  let oldContentDimensions: Size | null = null;
  let viewportChanged = false;
  let oldViewportDimensions: ViewportDimensions | null = null;

  // Nesting depth of notifying operations; only the outermost one emits
  let mutationDepth = 0;

  const partial = createMaybeMetrics({
    get offset() {
      return activity?.offset ?? null;
    },
    get minOffset() {
      return minOffset;
    },
    get maxOffset() {
      return maxOffset;
    },
    get contentDimensions() {
      return contentDimensions;
    },
    get viewportDimensions() {
      return viewportDimensions;
    },
  });
  const metrics = createMetricsView(partial);

  // ===========================================================================
  // Notification
  // ===========================================================================

  const observe = (): ObservedState => ({
    offset: partial.offset,
    viewOffset: partial.viewOffset,
    minOffset,
    maxOffset,
  });

  const notify = (): void => {
    emitter.emit("change", { offset: partial.offset });
  };

  /** Run `mutate`; emit once afterwards if anything observable changed */
  const mutating = (mutate: () => void): void => {
    const before = mutationDepth === 0 ? observe() : null;
    mutationDepth++;
    try {
      mutate();
    } finally {
      mutationDepth--;
    }
    if (before !== null && !disposed && !observedStateEquals(before, observe())) {
      notify();
    }
  };

  const forwardActivityChange = (): void => {
    // Inside a mutation the outer call decides whether to notify
    if (mutationDepth === 0) notify();
  };

  // ===========================================================================
  // Guards
  // ===========================================================================

  const assertUsable = (): void => {
    assert(!disposed, "SheetExtent used after dispose()");
  };

  const assertMeasured = (operation: string): void => {
    assert(
      partial.isMeasured,
      `${operation}() requires a measured sheet (${describeMetrics(partial)})`,
    );
  };

  const currentActivity = (): SheetActivity => required(activity, "activity");

  // ===========================================================================
  // Dimensions
  // ===========================================================================

  const invalidateBounds = (content: Size): void => {
    const min = resolveExtent(minExtent, content);
    const max = resolveExtent(maxExtent, content);
    assert(min <= max, `minExtent resolves above maxExtent (${min} > ${max})`);
    minOffset = min;
    maxOffset = max;
  };

  const applyContent = (next: Size): void => {
    if (sizeEquals(contentDimensions, next)) return;
    const previous = contentDimensions;
    if (!contentChanged) {
      contentChanged = true;
      oldContentDimensions = previous;
    }
    contentDimensions = next;
    invalidateBounds(next);
    currentActivity().didChangeContentDimensions(previous);
  };

  const applyViewport = (next: ViewportDimensions): void => {
    if (viewportDimensionsEquals(viewportDimensions, next)) return;
    const previous = viewportDimensions;
    if (!viewportChanged) {
      viewportChanged = true;
      oldViewportDimensions = previous;
    }
    viewportDimensions = next;
    currentActivity().didChangeViewportDimensions(previous);
  };

  const finalizeDimensions = (): void => {
    assert(
      openBatches === 0,
      "Do not finalize dimensions until every batch is closed",
    );
    const changes: DimensionChanges = {
      contentChanged,
      oldContentDimensions,
      viewportChanged,
      oldViewportDimensions,
    };
    contentChanged = false;
    oldContentDimensions = null;
    viewportChanged = false;
    oldViewportDimensions = null;

    log.debug("dimensions finalized", changes);
    currentActivity().didFinalizeDimensions(changes);
  };

  const openBatch = (): void => {
    openBatches++;
  };

  const closeBatch = (): void => {
    openBatches--;
    if (openBatches === 0) {
      mutating(finalizeDimensions);
    }
  };

  /** Run inside the host's open batch, or a batch of its own */
  const inBatch = (apply: () => void): void => {
    openBatch();
    try {
      apply();
    } finally {
      closeBatch();
    }
  };

  const scheduleBalanceCheck = (): void => {
    const check = (): void => {
      if (disposed) return;
      if (openBatches !== 0) {
        throw contractError(
          openBatches > 0
            ? "markDimensionsWillChange() was called more times than markDimensionsChanged() in one update cycle"
            : "markDimensionsChanged() was called more times than markDimensionsWillChange() in one update cycle",
        );
      }
    };
    (context.scheduleEndOfCycle ?? scheduleEndOfFrame)(check);
  };

  // ===========================================================================
  // Activities
  // ===========================================================================

  const beginActivity = (next: SheetActivity): void => {
    assertUsable();
    mutating(() => {
      const previous = activity;
      unsubscribeActivity?.();
      unsubscribeActivity = null;

      // Attach first so the new activity's reads resolve against this extent
      activity = next;
      next.initWith(extent);
      unsubscribeActivity = next.onChange(forwardActivityChange);

      if (previous !== null) {
        next.takeOver(previous);
        previous.dispose();
      }
      log.debug(`activity ${previous?.kind ?? "none"} -> ${next.kind}`);
    });
  };

  const goIdle = (): void => {
    beginActivity(createIdleActivity());
  };

  const goBallisticWith = (simulation: Simulation): void => {
    assertMeasured("goBallisticWith");
    beginActivity(createBallisticActivity(simulation));
  };

  const goBallistic = (velocity: number): void => {
    assertMeasured("goBallistic");
    const simulation = physics.createBallisticSimulation(
      velocity,
      createMetricsSnapshot(metrics),
    );
    if (simulation) {
      goBallisticWith(simulation);
    } else {
      goIdle();
    }
  };

  const settle = (): void => {
    assertMeasured("settle");
    const simulation = physics.createSettlingSimulation(
      createMetricsSnapshot(metrics),
    );
    if (simulation) {
      goBallisticWith(simulation);
    } else {
      goIdle();
    }
  };

  // ===========================================================================
  // Public API
  // ===========================================================================

  const extent: SheetExtent = {
    // Partial metrics, live
    get offset() {
      return partial.offset;
    },
    get minOffset() {
      return minOffset;
    },
    get maxOffset() {
      return maxOffset;
    },
    get contentDimensions() {
      return contentDimensions;
    },
    get viewportDimensions() {
      return viewportDimensions;
    },
    get viewOffset() {
      return partial.viewOffset;
    },
    get minViewOffset() {
      return partial.minViewOffset;
    },
    get maxViewOffset() {
      return partial.maxViewOffset;
    },
    get isMeasured() {
      return partial.isMeasured;
    },
    get isInBounds() {
      return partial.isInBounds;
    },
    get isOutOfBounds() {
      return partial.isOutOfBounds;
    },

    metrics,
    get snapshot() {
      assertMeasured("snapshot");
      return createMetricsSnapshot(metrics);
    },

    context,
    physics,
    minExtent,
    maxExtent,
    initialExtent,

    get activity() {
      return currentActivity();
    },
    get isDisposed() {
      return disposed;
    },

    applyNewContentDimensions: (next) => {
      assertUsable();
      mutating(() => inBatch(() => applyContent(next)));
    },

    applyNewViewportDimensions: (next) => {
      assertUsable();
      mutating(() => inBatch(() => applyViewport(next)));
    },

    markDimensionsWillChange: () => {
      assertUsable();
      if (DEV && openBatches === 0) scheduleBalanceCheck();
      openBatch();
    },

    markDimensionsChanged: () => {
      assertUsable();
      assert(
        openBatches > 0,
        "markDimensionsChanged() called without a matching markDimensionsWillChange()",
      );
      closeBatch();
    },

    batchDimensionChanges: (apply) => {
      extent.markDimensionsWillChange();
      try {
        apply();
      } finally {
        extent.markDimensionsChanged();
      }
    },

    assertDimensionsSettled: () => {
      if (openBatches !== 0) {
        throw contractError(
          `${openBatches} dimension batch(es) still open at the end of the update cycle`,
        );
      }
    },

    beginActivity,
    goIdle,
    goBallistic,
    goBallisticWith,
    settle,

    animateTo: (target, options = {}) => {
      assertMeasured("animateTo");
      const destination = resolveExtent(target, metrics.contentDimensions);
      if (metrics.offset === destination) {
        return Promise.resolve();
      }
      const animated = createAnimatedActivity({
        destination: target,
        duration: options.duration ?? DEFAULT_ANIMATION_DURATION,
        curve: options.curve ?? easeInOut,
      });
      beginActivity(animated);
      return animated.done;
    },

    takeOver: (other) => {
      assertUsable();
      assert(!other.isDisposed, "Cannot take over a disposed SheetExtent");
      mutating(() =>
        inBatch(() => {
          if (other.viewportDimensions !== null) {
            applyViewport(other.viewportDimensions);
          }
          if (other.contentDimensions !== null) {
            applyContent(other.contentDimensions);
          }
          currentActivity().takeOver(other.activity);
        }),
      );
    },

    on: (event, handler) => emitter.on(event, handler),

    dispose: () => {
      assertUsable();
      unsubscribeActivity?.();
      unsubscribeActivity = null;
      currentActivity().dispose();
      emitter.clear();
      disposed = true;
    },
  };

  beginActivity(createIdleActivity({ restingExtent: initialExtent }));

  return extent;
};

/** Factory for hosts that create extents on demand */
export const createSheetExtentFactory = (
  config: Omit<SheetExtentConfig, "context">,
): SheetExtentFactory => ({
  create: (context) => createSheetExtent({ ...config, context }),
});
