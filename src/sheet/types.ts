/**
 * sheetmotion/sheet - Types
 * Extent configuration, host context, and the public extent surface
 */

import type { Curve } from "../animation";
import type { ActivityOwner, SheetActivity } from "../activity/types";
import type { Extent } from "../extent";
import type { SheetPhysics, Simulation } from "../physics";
import type { TickerProvider } from "../scheduler";
import type {
  EventHandler,
  SheetEvents,
  Size,
  Unsubscribe,
  ViewportDimensions,
} from "../types";

// =============================================================================
// Host Context
// =============================================================================

/** Services the host supplies to an extent */
export interface SheetContext {
  /** Frame clock for ballistic and animated motion */
  tickerProvider: TickerProvider;

  /**
   * Run a callback once the current update cycle ends (e.g. after the
   * frame). Used to verify dimension batches are balanced. When omitted the
   * check waits for the next animation frame, or for a microtask where
   * there is no requestAnimationFrame. A host that opens a batch in one
   * callback and closes it in a later callback of the same frame must
   * supply this, or the microtask reports the open batch.
   */
  scheduleEndOfCycle?: (callback: () => void) => void;
}

// =============================================================================
// Configuration
// =============================================================================

export interface SheetExtentConfig {
  context: SheetContext;

  /** Release behavior (default: clamping physics) */
  physics?: SheetPhysics;

  /** Lowest offset (default: pixels(0)) */
  minExtent?: Extent;

  /** Highest offset (default: proportional(1)) */
  maxExtent?: Extent;

  /** Where the sheet appears once measured (default: maxExtent) */
  initialExtent?: Extent;
}

export interface AnimateToOptions {
  /** Easing curve (default: easeInOut) */
  curve?: Curve;

  /** Duration in milliseconds (default: 300) */
  duration?: number;
}

// =============================================================================
// Extent
// =============================================================================

/**
 * Owns a sheet's offset, bounds, dimensions and current activity.
 * Read the live fields directly; read `metrics` only once `isMeasured`.
 */
export interface SheetExtent extends ActivityOwner {
  readonly activity: SheetActivity;
  readonly minExtent: Extent;
  readonly maxExtent: Extent;

  /** Record a new content size and let the activity react */
  applyNewContentDimensions: (contentDimensions: Size) => void;

  /** Record a new viewport and let the activity react */
  applyNewViewportDimensions: (viewportDimensions: ViewportDimensions) => void;

  /** Open a dimension batch; pair with markDimensionsChanged() */
  markDimensionsWillChange: () => void;

  /** Close a dimension batch; the last close finalizes the changes */
  markDimensionsChanged: () => void;

  /** Run `apply` inside one dimension batch */
  batchDimensionChanges: (apply: () => void) => void;

  /** Throw if a dimension batch is still open */
  assertDimensionsSettled: () => void;

  goBallisticWith: (simulation: Simulation) => void;

  /** Animate to `extent`; resolves when done or superseded */
  animateTo: (extent: Extent, options?: AnimateToOptions) => Promise<void>;

  /** Continue from another live extent that this one replaces */
  takeOver: (other: SheetExtent) => void;

  on: <K extends keyof SheetEvents>(
    event: K,
    handler: EventHandler<SheetEvents[K]>,
  ) => Unsubscribe;

  dispose: () => void;
}

/** Creates extents for a host; a new factory replaces the live extent */
export interface SheetExtentFactory {
  create: (context: SheetContext) => SheetExtent;
}
