/**
 * sheetmotion/activity - Ballistic
 * Follows a physics simulation, one sample per host tick.
 */

import type { Simulation } from "../physics";
import type { Ticker } from "../scheduler";
import { defineActivity } from "./activity";
import type { SheetActivity } from "./types";

export interface BallisticActivityApi {
  readonly simulation: Simulation;
}

export type BallisticActivity = SheetActivity & BallisticActivityApi;

export const createBallisticActivity = (simulation: Simulation): BallisticActivity =>
  defineActivity<BallisticActivityApi>("ballistic", (scope) => {
    let ticker: Ticker | null = null;
    let time = 0;

    const tick = (elapsedMs: number): void => {
      time = elapsedMs / 1000;
      if (!simulation.isDone(time)) {
        scope.setOffset(simulation.x(time));
        return;
      }
      scope.setOffset(simulation.finalX ?? simulation.x(time));
      scope.owner.goIdle();
    };

    return {
      hooks: {
        velocity: () => simulation.dx(time),

        onInit: () => {
          ticker = scope.owner.context.tickerProvider.createTicker(tick);
          ticker.start();
        },

        onDimensionsFinalized: (changes) => {
          // Bounds moved under the motion: plan again from here, once per batch
          const { owner } = scope;
          if (changes.contentChanged && owner.isMeasured) {
            owner.goBallistic(simulation.dx(time));
          }
        },

        onDispose: () => {
          ticker?.dispose();
          ticker = null;
        },
      },
      api: { simulation },
    };
  });
