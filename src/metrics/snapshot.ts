/**
 * sheetmotion/metrics - Snapshots
 * Frozen, fully populated copies of the asserted metrics view.
 */

import type { Size, ViewportDimensions } from "../types";
import { sizeEquals, viewportDimensionsEquals } from "../geometry";
import type { SheetMetrics } from "./metrics";

/** Primary fields of a snapshot */
export interface SnapshotFields {
  readonly offset: number;
  readonly minOffset: number;
  readonly maxOffset: number;
  readonly contentDimensions: Size;
  readonly viewportDimensions: ViewportDimensions;
}

/** Immutable metrics passed by value, e.g. to a physics policy */
export interface SheetMetricsSnapshot extends SheetMetrics {
  readonly isMeasured: true;
}

const buildSnapshot = (fields: SnapshotFields): SheetMetricsSnapshot => {
  const { offset, minOffset, maxOffset, contentDimensions, viewportDimensions } =
    fields;
  const inset = viewportDimensions.insets.bottom;
  const inBounds = minOffset <= offset && offset <= maxOffset;

  return Object.freeze({
    offset,
    minOffset,
    maxOffset,
    contentDimensions,
    viewportDimensions,
    viewOffset: offset + inset,
    minViewOffset: minOffset + inset,
    maxViewOffset: maxOffset + inset,
    isMeasured: true as const,
    isInBounds: inBounds,
    isOutOfBounds: !inBounds,
  });
};

const pickFields = (metrics: SheetMetrics): SnapshotFields => ({
  offset: metrics.offset,
  minOffset: metrics.minOffset,
  maxOffset: metrics.maxOffset,
  contentDimensions: metrics.contentDimensions,
  viewportDimensions: metrics.viewportDimensions,
});

/** Copy the current values of a metrics view */
export const createMetricsSnapshot = (metrics: SheetMetrics): SheetMetricsSnapshot =>
  buildSnapshot(pickFields(metrics));

export const copySnapshotWith = (
  snapshot: SheetMetricsSnapshot,
  patch: Partial<SnapshotFields>,
): SheetMetricsSnapshot => buildSnapshot({ ...pickFields(snapshot), ...patch });

export const snapshotEquals = (
  a: SheetMetricsSnapshot,
  b: SheetMetricsSnapshot,
): boolean =>
  a === b ||
  (a.offset === b.offset &&
    a.minOffset === b.minOffset &&
    a.maxOffset === b.maxOffset &&
    sizeEquals(a.contentDimensions, b.contentDimensions) &&
    viewportDimensionsEquals(a.viewportDimensions, b.viewportDimensions));

/**
 * Structural 32-bit hash (FNV-1a over the primary field values).
 * Equal snapshots always hash equally.
 */
export const hashSnapshot = (snapshot: SheetMetricsSnapshot): number => {
  const { contentDimensions: c, viewportDimensions: v } = snapshot;
  const key = [
    snapshot.offset,
    snapshot.minOffset,
    snapshot.maxOffset,
    c.width,
    c.height,
    v.width,
    v.height,
    v.insets.top,
    v.insets.right,
    v.insets.bottom,
    v.insets.left,
  ].join("|");

  let hash = 0x811c9dc5;
  for (let i = 0; i < key.length; i++) {
    hash ^= key.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
};
