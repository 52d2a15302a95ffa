/**
 * sheetmotion - Activity Domain
 * Strategies that decide how the sheet's offset evolves
 */

export { defineActivity, type ActivityDefinition } from "./activity";

export {
  createIdleActivity,
  isIdleActivity,
  type IdleActivity,
  type IdleActivityApi,
  type IdleActivityOptions,
} from "./idle";

export {
  createBallisticActivity,
  type BallisticActivity,
  type BallisticActivityApi,
} from "./ballistic";

export {
  createAnimatedActivity,
  type AnimatedActivity,
  type AnimatedActivityApi,
  type AnimatedActivityOptions,
} from "./animated";

export type {
  ActivityOwner,
  ActivityScope,
  ActivityHooks,
  ActivityKind,
  ActivityChange,
  DimensionChanges,
  SheetActivity,
} from "./types";
