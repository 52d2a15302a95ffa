/**
 * sheetmotion/geometry - Dimension Values
 * Frozen size, inset and viewport values with structural equality.
 */

import type { Size, EdgeInsets, ViewportDimensions } from "../types";
import { requireFinite } from "../internal/assert";

// =============================================================================
// Constructors
// =============================================================================

export const createSize = (width: number, height: number): Size =>
  Object.freeze({
    width: requireFinite(width, "width"),
    height: requireFinite(height, "height"),
  });

export const ZERO_INSETS: EdgeInsets = Object.freeze({
  top: 0,
  right: 0,
  bottom: 0,
  left: 0,
});

export const createEdgeInsets = (insets: Partial<EdgeInsets> = {}): EdgeInsets =>
  Object.freeze({
    top: requireFinite(insets.top ?? 0, "insets.top"),
    right: requireFinite(insets.right ?? 0, "insets.right"),
    bottom: requireFinite(insets.bottom ?? 0, "insets.bottom"),
    left: requireFinite(insets.left ?? 0, "insets.left"),
  });

export const createViewportDimensions = (
  width: number,
  height: number,
  insets: Partial<EdgeInsets> = ZERO_INSETS,
): ViewportDimensions =>
  Object.freeze({
    width: requireFinite(width, "width"),
    height: requireFinite(height, "height"),
    insets: createEdgeInsets(insets),
  });

// =============================================================================
// Equality
// =============================================================================

// Absent values are equal only to each other.

export const sizeEquals = (a: Size | null, b: Size | null): boolean => {
  if (a === b) return true;
  if (a === null || b === null) return false;
  return a.width === b.width && a.height === b.height;
};

export const edgeInsetsEquals = (
  a: EdgeInsets | null,
  b: EdgeInsets | null,
): boolean => {
  if (a === b) return true;
  if (a === null || b === null) return false;
  return (
    a.top === b.top &&
    a.right === b.right &&
    a.bottom === b.bottom &&
    a.left === b.left
  );
};

export const viewportDimensionsEquals = (
  a: ViewportDimensions | null,
  b: ViewportDimensions | null,
): boolean => {
  if (a === b) return true;
  if (a === null || b === null) return false;
  return (
    a.width === b.width &&
    a.height === b.height &&
    edgeInsetsEquals(a.insets, b.insets)
  );
};
