/**
 * sheetmotion/activity - Types
 * The strategy contract an extent hosts, and the owner surface it sees.
 */

import type { Extent } from "../extent";
import type { MaybeSheetMetrics, SheetMetrics, SheetMetricsSnapshot } from "../metrics";
import type { SheetPhysics } from "../physics";
import type { SheetContext } from "../sheet/types";
import type { EventHandler, Size, Unsubscribe, ViewportDimensions } from "../types";

// =============================================================================
// Owner
// =============================================================================

/**
 * What an activity may see of the extent hosting it.
 * Activities read freely but change the extent only through transitions.
 */
export interface ActivityOwner extends MaybeSheetMetrics {
  readonly metrics: SheetMetrics;
  readonly snapshot: SheetMetricsSnapshot;
  readonly context: SheetContext;
  readonly physics: SheetPhysics;
  readonly initialExtent: Extent;
  readonly isDisposed: boolean;

  beginActivity: (activity: SheetActivity) => void;
  goIdle: () => void;
  goBallistic: (velocity: number) => void;
  settle: () => void;
}

// =============================================================================
// Dimension Changes
// =============================================================================

/** Everything that changed during one dimension batch */
export interface DimensionChanges {
  readonly contentChanged: boolean;
  /** Content size before the batch (null if it was unknown) */
  readonly oldContentDimensions: Size | null;
  readonly viewportChanged: boolean;
  /** Viewport before the batch (null if it was unknown) */
  readonly oldViewportDimensions: ViewportDimensions | null;
}

// =============================================================================
// Activity
// =============================================================================

export type ActivityKind = "idle" | "ballistic" | "animated" | (string & {});

/** Payload of an activity's change event */
export interface ActivityChange {
  offset: number | null;
}

/**
 * How the offset evolves right now. Exactly one is active per extent.
 *
 * Lifecycle: created → initWith(owner) → takeOver(previous) →
 * dimension notices → dispose(). Every method is a fixed template; custom
 * behavior plugs in through {@link ActivityHooks}.
 */
export interface SheetActivity {
  readonly kind: ActivityKind;
  readonly offset: number | null;

  /** Current velocity in px/s (0 when static) */
  readonly velocity: number;

  readonly owner: ActivityOwner | null;
  readonly isDisposed: boolean;

  initWith: (owner: ActivityOwner) => void;
  takeOver: (other: SheetActivity) => void;
  didChangeContentDimensions: (oldDimensions: Size | null) => void;
  didChangeViewportDimensions: (oldDimensions: ViewportDimensions | null) => void;
  didFinalizeDimensions: (changes: DimensionChanges) => void;

  /** Subscribe to offset changes the activity makes on its own */
  onChange: (handler: EventHandler<ActivityChange>) => Unsubscribe;

  dispose: () => void;
}

// =============================================================================
// Extension Points
// =============================================================================

/** Handle given to hooks; valid for the activity's whole life */
export interface ActivityScope {
  /** The attached owner; throws before initWith() */
  readonly owner: ActivityOwner;
  readonly offset: number | null;
  readonly isDisposed: boolean;

  /**
   * Move the sheet and notify observers.
   * Use for time-driven motion (ticks).
   */
  setOffset: (offset: number) => void;

  /**
   * Move the sheet without notifying.
   * Use inside dimension notices; the owner notifies once the change is applied.
   */
  correctOffset: (offset: number) => void;
}

/** Optional behavior run after the base lifecycle step */
export interface ActivityHooks {
  velocity?: () => number;
  onInit?: () => void;
  onTakeOver?: (other: SheetActivity) => void;
  onContentDimensionsChanged?: (oldDimensions: Size | null) => void;
  onViewportDimensionsChanged?: (oldDimensions: ViewportDimensions | null) => void;
  onDimensionsFinalized?: (changes: DimensionChanges) => void;
  onDispose?: () => void;
}
