/**
 * sheetmotion - Geometry Domain
 */

export {
  createSize,
  createEdgeInsets,
  createViewportDimensions,
  sizeEquals,
  edgeInsetsEquals,
  viewportDimensionsEquals,
  ZERO_INSETS,
} from "./dimensions";
