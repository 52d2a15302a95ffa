/**
 * sheetmotion - Animation Domain
 */

export {
  linear,
  easeIn,
  easeOut,
  easeInOut,
  easeInOutQuad,
  decelerate,
  cubicBezier,
  transformProgress,
  type Curve,
} from "./curves";
