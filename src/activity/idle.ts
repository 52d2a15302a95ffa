/**
 * sheetmotion/activity - Idle
 * The sheet rests. No ticks, no motion of its own.
 */

import { OFFSET_EPSILON } from "../constants";
import { resolveExtent, type Extent } from "../extent";
import { defineActivity } from "./activity";
import type { SheetActivity } from "./types";

export interface IdleActivityOptions {
  /**
   * Extent the sheet rests at. When set, content size changes move the
   * sheet so it stays at this extent (e.g. half of the new content height).
   */
  restingExtent?: Extent | null;
}

export interface IdleActivityApi {
  getRestingExtent: () => Extent | null;
}

export type IdleActivity = SheetActivity & IdleActivityApi;

export const isIdleActivity = (activity: SheetActivity): activity is IdleActivity =>
  activity.kind === "idle" && "getRestingExtent" in activity;

export const createIdleActivity = (options: IdleActivityOptions = {}): IdleActivity =>
  defineActivity<IdleActivityApi>("idle", (scope) => {
    let restingExtent = options.restingExtent ?? null;

    return {
      hooks: {
        onTakeOver: (other) => {
          if (isIdleActivity(other)) {
            restingExtent = other.getRestingExtent();
            return;
          }
          // The position now comes from the outgoing activity; keep our
          // resting extent only if the sheet actually stopped there.
          const content = scope.owner.contentDimensions;
          if (
            restingExtent !== null &&
            (content === null ||
              scope.offset === null ||
              Math.abs(resolveExtent(restingExtent, content) - scope.offset) >
                OFFSET_EPSILON)
          ) {
            restingExtent = null;
          }
        },

        onContentDimensionsChanged: () => {
          const { owner } = scope;
          const content = owner.contentDimensions;
          if (content === null) return;

          if (scope.offset === null) {
            // First measurement: place the sheet
            scope.correctOffset(
              resolveExtent(restingExtent ?? owner.initialExtent, content),
            );
          } else if (restingExtent !== null) {
            scope.correctOffset(resolveExtent(restingExtent, content));
          }
        },

        onDimensionsFinalized: () => {
          const { owner } = scope;
          if (!owner.isMeasured || scope.offset === null) return;
          const adjusted = owner.physics.adjustOffsetForNewBounds(
            scope.offset,
            owner.snapshot,
          );
          scope.correctOffset(adjusted);
        },
      },
      api: {
        getRestingExtent: () => restingExtent,
      },
    };
  });
