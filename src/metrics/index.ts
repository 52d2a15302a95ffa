/**
 * sheetmotion - Metrics Domain
 */

export {
  createMaybeMetrics,
  createMetricsView,
  describeMetrics,
  toViewOffset,
  isMeasured,
  isInBounds,
  type MetricsSource,
  type MaybeSheetMetrics,
  type SheetMetrics,
} from "./metrics";

export {
  createMetricsSnapshot,
  copySnapshotWith,
  snapshotEquals,
  hashSnapshot,
  type SheetMetricsSnapshot,
  type SnapshotFields,
} from "./snapshot";
