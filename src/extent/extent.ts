/**
 * sheetmotion/extent - Extent Resolution
 * Abstract sheet positions resolved against the measured content size.
 */

import type { Size } from "../types";
import { contractError, requireFinite } from "../internal/assert";

// =============================================================================
// Types
// =============================================================================

/** A fixed distance in pixels, independent of the content size */
export interface FixedExtent {
  readonly type: "pixels";
  readonly pixels: number;
}

/** A fraction of the content height (1 = fully expanded) */
export interface ProportionalExtent {
  readonly type: "proportional";
  readonly fraction: number;
}

/** Visible area of the sheet */
export type Extent = FixedExtent | ProportionalExtent;

// =============================================================================
// Factories
// =============================================================================

export const pixels = (value: number): FixedExtent => {
  requireFinite(value, "pixels");
  if (value < 0) {
    throw contractError(`pixels must be >= 0, got ${value}`);
  }
  return Object.freeze({ type: "pixels", pixels: value });
};

export const proportional = (fraction: number): ProportionalExtent => {
  requireFinite(fraction, "fraction");
  if (fraction < 0) {
    throw contractError(`fraction must be >= 0, got ${fraction}`);
  }
  return Object.freeze({ type: "proportional", fraction });
};

// =============================================================================
// Resolution
// =============================================================================

/** Convert an extent into a pixel offset for the given content size */
export const resolveExtent = (extent: Extent, contentDimensions: Size): number => {
  switch (extent.type) {
    case "pixels":
      return extent.pixels;
    case "proportional":
      return contentDimensions.height * extent.fraction;
  }
};

export const extentEquals = (a: Extent, b: Extent): boolean => {
  if (a === b) return true;
  switch (a.type) {
    case "pixels":
      return b.type === "pixels" && a.pixels === b.pixels;
    case "proportional":
      return b.type === "proportional" && a.fraction === b.fraction;
  }
};

export const describeExtent = (extent: Extent): string =>
  extent.type === "pixels"
    ? `pixels(${extent.pixels})`
    : `proportional(${extent.fraction})`;
