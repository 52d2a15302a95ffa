/**
 * sheetmotion - Sheet Motion Core
 * Offset, bounds and motion state for draggable, physically animated sheets
 *
 * @packageDocumentation
 */

// Extent and controller
export {
  createSheetExtent,
  createSheetExtentFactory,
  createSheetController,
} from "./sheet";

// Extents
export {
  pixels,
  proportional,
  resolveExtent,
  extentEquals,
  describeExtent,
} from "./extent";

// Geometry
export {
  createSize,
  createEdgeInsets,
  createViewportDimensions,
  sizeEquals,
  edgeInsetsEquals,
  viewportDimensionsEquals,
  ZERO_INSETS,
} from "./geometry";

// Metrics
export {
  createMaybeMetrics,
  createMetricsView,
  createMetricsSnapshot,
  copySnapshotWith,
  snapshotEquals,
  hashSnapshot,
  describeMetrics,
} from "./metrics";

// Activities
export {
  defineActivity,
  createIdleActivity,
  createBallisticActivity,
  createAnimatedActivity,
  isIdleActivity,
} from "./activity";

// Physics
export {
  createClampingPhysics,
  createSnappingPhysics,
  createSpringSimulation,
  createSpringDescription,
  springWithDampingRatio,
  createFrictionSimulation,
  createBoundedFrictionSimulation,
} from "./physics";

// Curves
export {
  linear,
  easeIn,
  easeOut,
  easeInOut,
  easeInOutQuad,
  decelerate,
  cubicBezier,
} from "./animation";

// Scheduling
export {
  createFrameTickerProvider,
  createManualTickerProvider,
  createManualCycleScheduler,
} from "./scheduler";

// Events
export { createEmitter } from "./events";

// Diagnostics
export { setDebugLogging } from "./internal/log";

// Constants
export { DEFAULT_ANIMATION_DURATION } from "./constants";

// Types
export type {
  SheetExtent,
  SheetExtentConfig,
  SheetExtentFactory,
  SheetContext,
  SheetController,
  AnimateToOptions,
} from "./sheet";

export type { Extent, FixedExtent, ProportionalExtent } from "./extent";

export type {
  MaybeSheetMetrics,
  SheetMetrics,
  SheetMetricsSnapshot,
  MetricsSource,
} from "./metrics";

export type {
  SheetActivity,
  ActivityOwner,
  ActivityScope,
  ActivityHooks,
  ActivityKind,
  DimensionChanges,
  IdleActivity,
  BallisticActivity,
  AnimatedActivity,
} from "./activity";

export type {
  Simulation,
  SheetPhysics,
  PhysicsConfig,
  SnappingPhysicsConfig,
  SpringDescription,
} from "./physics";

export type { Curve } from "./animation";

export type {
  Ticker,
  TickerProvider,
  ManualTickerProvider,
  ManualCycleScheduler,
} from "./scheduler";

export type {
  Size,
  EdgeInsets,
  ViewportDimensions,
  SheetEvents,
  EventHandler,
  Unsubscribe,
} from "./types";
