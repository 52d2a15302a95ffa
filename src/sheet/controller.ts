/**
 * sheetmotion/sheet - Sheet Controller
 *
 * A stable handle for code outside the host that wants to observe or drive
 * a sheet. The host attaches whichever extent is live; the handle forwards
 * its change events and survives extent replacement.
 */

import { createEmitter } from "../events";
import type { Extent } from "../extent";
import { contractError } from "../internal/assert";
import { createMaybeMetrics, type MaybeSheetMetrics } from "../metrics";
import type { EventHandler, SheetEvents, Unsubscribe } from "../types";
import type { AnimateToOptions, SheetExtent } from "./types";

export interface SheetController {
  /** The attached extent, if any */
  readonly extent: SheetExtent | null;
  readonly hasClient: boolean;

  /** Live partial metrics of the attached extent (all null when detached) */
  readonly metrics: MaybeSheetMetrics;

  attach: (extent: SheetExtent) => void;
  detach: (extent: SheetExtent) => void;

  /** Animate the attached extent; requires an attached, measured sheet */
  animateTo: (extent: Extent, options?: AnimateToOptions) => Promise<void>;

  on: <K extends keyof SheetEvents>(
    event: K,
    handler: EventHandler<SheetEvents[K]>,
  ) => Unsubscribe;

  dispose: () => void;
}

export const createSheetController = (): SheetController => {
  const emitter = createEmitter<SheetEvents>();
  let client: SheetExtent | null = null;
  let unsubscribe: Unsubscribe | null = null;

  const metrics = createMaybeMetrics({
    get offset() {
      return client?.offset ?? null;
    },
    get minOffset() {
      return client?.minOffset ?? null;
    },
    get maxOffset() {
      return client?.maxOffset ?? null;
    },
    get contentDimensions() {
      return client?.contentDimensions ?? null;
    },
    get viewportDimensions() {
      return client?.viewportDimensions ?? null;
    },
  });

  const notify = (): void => {
    emitter.emit("change", { offset: metrics.offset });
  };

  const detachClient = (): void => {
    unsubscribe?.();
    unsubscribe = null;
    client = null;
  };

  return {
    get extent() {
      return client;
    },
    get hasClient() {
      return client !== null;
    },
    metrics,

    attach: (extent) => {
      if (client === extent) return;
      detachClient();
      client = extent;
      unsubscribe = extent.on("change", notify);
      notify();
    },

    detach: (extent) => {
      // A stale host may detach an extent that was already replaced
      if (client !== extent) return;
      detachClient();
      notify();
    },

    animateTo: (target, options) => {
      if (client === null) {
        throw contractError("SheetController.animateTo() needs an attached extent");
      }
      return client.animateTo(target, options);
    },

    on: (event, handler) => emitter.on(event, handler),

    dispose: () => {
      detachClient();
      emitter.clear();
    },
  };
};
