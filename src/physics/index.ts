/**
 * sheetmotion - Physics Domain
 * Simulations and the policies that choose them
 */

export {
  DEFAULT_TOLERANCE,
  nearEqual,
  nearZero,
  type Simulation,
  type Tolerance,
} from "./simulation";

export {
  createSpringSimulation,
  createSpringDescription,
  springWithDampingRatio,
  type SpringDescription,
  type SpringSimulation,
} from "./spring";

export {
  createFrictionSimulation,
  createBoundedFrictionSimulation,
  type FrictionSimulation,
} from "./friction";

export {
  createClampingPhysics,
  createSnappingPhysics,
  createDefaultSpring,
  resolveSnapOffsets,
  findNearestSnap,
  findNextSnap,
  type SheetPhysics,
  type PhysicsConfig,
  type SnappingPhysicsConfig,
} from "./physics";
