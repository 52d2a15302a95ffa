/**
 * sheetmotion - Sheet Domain
 * The extent that hosts activities, and the consumer-side controller
 */

export { createSheetExtent, createSheetExtentFactory } from "./extent";
export { createSheetController, type SheetController } from "./controller";
export type {
  SheetExtent,
  SheetExtentConfig,
  SheetExtentFactory,
  SheetContext,
  AnimateToOptions,
} from "./types";
