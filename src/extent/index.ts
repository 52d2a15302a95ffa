/**
 * sheetmotion - Extent Domain
 */

export {
  pixels,
  proportional,
  resolveExtent,
  extentEquals,
  describeExtent,
  type Extent,
  type FixedExtent,
  type ProportionalExtent,
} from "./extent";
