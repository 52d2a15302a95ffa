/**
 * sheetmotion - Core Types
 * Geometry values and event primitives shared across the package
 */

// =============================================================================
// Event Map Base Type
// =============================================================================

/** Base event map with index signature */
export type EventMap = Record<string, unknown>;

/** Event handler function */
export type EventHandler<T> = (payload: T) => void;

/** Unsubscribe function */
export type Unsubscribe = () => void;

// =============================================================================
// Geometry
// =============================================================================

/** Measured size of a box, in pixels */
export interface Size {
  readonly width: number;
  readonly height: number;
}

/** Insets on each edge of a box, in pixels */
export interface EdgeInsets {
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
  readonly left: number;
}

/**
 * Size and insets of the visible area around the sheet.
 * `insets.bottom` grows when an on-screen keyboard covers the viewport.
 */
export interface ViewportDimensions {
  readonly width: number;
  readonly height: number;
  readonly insets: EdgeInsets;
}

// =============================================================================
// Events
// =============================================================================

/** Events emitted by a sheet extent and forwarded by a sheet controller */
export interface SheetEvents extends EventMap {
  /** Offset or derived view offset changed */
  change: { offset: number | null };
}
