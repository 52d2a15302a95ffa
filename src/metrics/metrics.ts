/**
 * sheetmotion/metrics - Metrics Views
 *
 * Two views over the same five primary fields:
 * - MaybeSheetMetrics: every field may be null (before measurement)
 * - SheetMetrics: every field is present; reading an absent one throws
 *
 * Derived fields (view offsets, bounds checks) are computed on every read,
 * so they follow the primary fields without invalidation.
 */

import type { Size, ViewportDimensions } from "../types";
import { required } from "../internal/assert";

// =============================================================================
// Types
// =============================================================================

/** The five primary fields, all nullable */
export interface MetricsSource {
  readonly offset: number | null;
  readonly minOffset: number | null;
  readonly maxOffset: number | null;
  readonly contentDimensions: Size | null;
  readonly viewportDimensions: ViewportDimensions | null;
}

/** Partial view: usable before and after the sheet is measured */
export interface MaybeSheetMetrics extends MetricsSource {
  /** offset + viewport bottom inset */
  readonly viewOffset: number | null;
  readonly minViewOffset: number | null;
  readonly maxViewOffset: number | null;

  /** True iff all five primary fields are present */
  readonly isMeasured: boolean;

  /** True iff measured and minOffset <= offset <= maxOffset */
  readonly isInBounds: boolean;
  readonly isOutOfBounds: boolean;
}

/** Asserted view: only read after checking `isMeasured` */
export interface SheetMetrics extends MaybeSheetMetrics {
  readonly offset: number;
  readonly minOffset: number;
  readonly maxOffset: number;
  readonly contentDimensions: Size;
  readonly viewportDimensions: ViewportDimensions;
  readonly viewOffset: number;
  readonly minViewOffset: number;
  readonly maxViewOffset: number;
}

// =============================================================================
// Derivations
// =============================================================================

/** Shift an offset by the viewport's bottom inset, propagating null */
export const toViewOffset = (
  offset: number | null,
  viewport: ViewportDimensions | null,
): number | null =>
  offset === null || viewport === null ? null : offset + viewport.insets.bottom;

export const isMeasured = (source: MetricsSource): boolean =>
  source.offset !== null &&
  source.minOffset !== null &&
  source.maxOffset !== null &&
  source.contentDimensions !== null &&
  source.viewportDimensions !== null;

export const isInBounds = (source: MetricsSource): boolean => {
  if (!isMeasured(source)) return false;
  const { offset, minOffset, maxOffset } = source;
  if (offset === null || minOffset === null || maxOffset === null) return false;
  return minOffset <= offset && offset <= maxOffset;
};

// =============================================================================
// Views
// =============================================================================

/**
 * Wrap a source of primary fields in a partial view.
 * The source is read on every access, so a live source stays live.
 */
export const createMaybeMetrics = (source: MetricsSource): MaybeSheetMetrics => ({
  get offset() {
    return source.offset;
  },
  get minOffset() {
    return source.minOffset;
  },
  get maxOffset() {
    return source.maxOffset;
  },
  get contentDimensions() {
    return source.contentDimensions;
  },
  get viewportDimensions() {
    return source.viewportDimensions;
  },
  get viewOffset() {
    return toViewOffset(source.offset, source.viewportDimensions);
  },
  get minViewOffset() {
    return toViewOffset(source.minOffset, source.viewportDimensions);
  },
  get maxViewOffset() {
    return toViewOffset(source.maxOffset, source.viewportDimensions);
  },
  get isMeasured() {
    return isMeasured(source);
  },
  get isInBounds() {
    return isInBounds(source);
  },
  get isOutOfBounds() {
    return !isInBounds(source);
  },
});

/**
 * Asserted view over a partial one. Shares the partial view's storage;
 * each read fails fast if the field is absent.
 */
export const createMetricsView = (source: MaybeSheetMetrics): SheetMetrics => ({
  get offset() {
    return required(source.offset, "offset");
  },
  get minOffset() {
    return required(source.minOffset, "minOffset");
  },
  get maxOffset() {
    return required(source.maxOffset, "maxOffset");
  },
  get contentDimensions() {
    return required(source.contentDimensions, "contentDimensions");
  },
  get viewportDimensions() {
    return required(source.viewportDimensions, "viewportDimensions");
  },
  get viewOffset() {
    return required(source.viewOffset, "viewOffset");
  },
  get minViewOffset() {
    return required(source.minViewOffset, "minViewOffset");
  },
  get maxViewOffset() {
    return required(source.maxViewOffset, "maxViewOffset");
  },
  get isMeasured() {
    return source.isMeasured;
  },
  get isInBounds() {
    return source.isInBounds;
  },
  get isOutOfBounds() {
    return source.isOutOfBounds;
  },
});

/** Debug description of any metrics view */
export const describeMetrics = (metrics: MaybeSheetMetrics): string => {
  const size = (s: Size | null) => (s ? `${s.width}x${s.height}` : "null");
  const viewport = metrics.viewportDimensions;
  return [
    `isMeasured: ${metrics.isMeasured}`,
    `offset: ${metrics.offset}`,
    `minOffset: ${metrics.minOffset}`,
    `maxOffset: ${metrics.maxOffset}`,
    `viewOffset: ${metrics.viewOffset}`,
    `contentDimensions: ${size(metrics.contentDimensions)}`,
    `viewportDimensions: ${viewport ? `${size(viewport)} +${viewport.insets.bottom}` : "null"}`,
  ].join(", ");
};
