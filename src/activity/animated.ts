/**
 * sheetmotion/activity - Animated
 *
 * Tweens from the taken-over offset to a destination extent over a fixed
 * duration. `done` resolves when the tween finishes or another activity
 * replaces it. When the content size changes mid-flight the destination is
 * resolved again and the tween continues from the current offset for the
 * time that was left.
 */

import { transformProgress, type Curve } from "../animation";
import { resolveExtent, type Extent } from "../extent";
import { contractError } from "../internal/assert";
import type { Ticker } from "../scheduler";
import { defineActivity } from "./activity";
import { createIdleActivity } from "./idle";
import type { SheetActivity } from "./types";

export interface AnimatedActivityOptions {
  destination: Extent;
  /** Duration in milliseconds */
  duration: number;
  curve: Curve;
}

export interface AnimatedActivityApi {
  readonly destination: Extent;
  readonly duration: number;
  readonly curve: Curve;

  /** Resolves when the animation completes or is superseded */
  readonly done: Promise<void>;
}

export type AnimatedActivity = SheetActivity & AnimatedActivityApi;

export const createAnimatedActivity = (
  options: AnimatedActivityOptions,
): AnimatedActivity => {
  const { destination, duration, curve } = options;
  if (!(duration >= 0) || !Number.isFinite(duration)) {
    throw contractError(`duration must be a finite number >= 0, got ${duration}`);
  }

  let resolveDone: () => void = () => {};
  const done = new Promise<void>((resolve) => {
    resolveDone = resolve;
  });

  return defineActivity<AnimatedActivityApi>("animated", (scope) => {
    let ticker: Ticker | null = null;
    let from: number | null = null;
    let to = 0;

    // Current tween segment, restarted when the destination moves
    let segmentStart = 0;
    let segmentDuration = duration;
    let lastElapsed = 0;
    let velocity = 0;

    const resolveDestination = (): number => {
      const content = scope.owner.contentDimensions;
      if (content === null) {
        throw contractError("animated activity needs measured content");
      }
      return resolveExtent(destination, content);
    };

    const tick = (elapsedMs: number): void => {
      const start = from ?? to;
      const local = elapsedMs - segmentStart;
      const progress = segmentDuration > 0 ? local / segmentDuration : 1;
      const previous = scope.offset;
      const next =
        progress >= 1 ? to : start + (to - start) * transformProgress(curve, progress);

      const dt = (elapsedMs - lastElapsed) / 1000;
      velocity = previous !== null && dt > 0 ? (next - previous) / dt : 0;
      lastElapsed = elapsedMs;

      scope.setOffset(next);

      if (progress >= 1) {
        resolveDone();
        scope.owner.beginActivity(createIdleActivity({ restingExtent: destination }));
      }
    };

    return {
      hooks: {
        velocity: () => velocity,

        onInit: () => {
          from = scope.offset;
          to = resolveDestination();
          ticker = scope.owner.context.tickerProvider.createTicker(tick);
          ticker.start();
        },

        onTakeOver: () => {
          from = scope.offset;
        },

        onDimensionsFinalized: (changes) => {
          if (!changes.contentChanged || scope.owner.contentDimensions === null) {
            return;
          }
          from = scope.offset;
          to = resolveDestination();
          segmentDuration = Math.max(0, segmentDuration - (lastElapsed - segmentStart));
          segmentStart = lastElapsed;
        },

        onDispose: () => {
          ticker?.dispose();
          ticker = null;
          resolveDone();
        },
      },
      api: { destination, duration, curve, done },
    };
  });
};
