/**
 * sheetmotion/scheduler - Manual Drivers
 * Deterministic time and update-cycle control for tests and headless hosts.
 */

import { contractError } from "../internal/assert";
import type { Ticker, TickerProvider } from "./ticker";

// =============================================================================
// Manual Ticker Provider
// =============================================================================

export interface ManualTickerProvider extends TickerProvider {
  /**
   * Advance time by `ms` and deliver one tick to every active ticker.
   * Tickers started during this call first tick on the next one.
   */
  advance: (ms: number) => void;

  /** Deliver `count` ticks of `frameMs` each */
  runFrames: (count: number, frameMs?: number) => void;

  /** Number of tickers currently active */
  readonly activeCount: number;
}

interface ManualTicker extends Ticker {
  tick: (ms: number) => void;
}

export const createManualTickerProvider = (): ManualTickerProvider => {
  const active = new Set<ManualTicker>();

  const advance = (ms: number): void => {
    if (!(ms >= 0)) {
      throw contractError(`advance() needs a non-negative duration, got ${ms}`);
    }
    for (const ticker of [...active]) {
      // An earlier callback in this round may have stopped it
      if (active.has(ticker)) ticker.tick(ms);
    }
  };

  return {
    createTicker: (onTick) => {
      let elapsed = 0;
      let disposed = false;

      const ticker: ManualTicker = {
        start: () => {
          if (disposed) {
            throw contractError("Cannot start a disposed ticker");
          }
          elapsed = 0;
          active.add(ticker);
        },
        stop: () => {
          active.delete(ticker);
        },
        get isActive() {
          return active.has(ticker);
        },
        dispose: () => {
          active.delete(ticker);
          disposed = true;
        },
        tick: (ms) => {
          elapsed += ms;
          onTick(elapsed);
        },
      };
      return ticker;
    },

    advance,

    runFrames: (count, frameMs = 16) => {
      for (let i = 0; i < count; i++) advance(frameMs);
    },

    get activeCount() {
      return active.size;
    },
  };
};

// =============================================================================
// Manual Cycle Scheduler
// =============================================================================

export interface ManualCycleScheduler {
  /** Queue a callback for the end of the current update cycle */
  scheduleEndOfCycle: (callback: () => void) => void;

  /**
   * Close the current cycle: run the queued callbacks in order.
   * Callbacks queued while running belong to the next cycle.
   */
  endCycle: () => void;

  readonly pendingCount: number;
}

export const createManualCycleScheduler = (): ManualCycleScheduler => {
  let pending: Array<() => void> = [];

  return {
    scheduleEndOfCycle: (callback) => {
      pending.push(callback);
    },
    endCycle: () => {
      const callbacks = pending;
      pending = [];
      for (const callback of callbacks) callback();
    },
    get pendingCount() {
      return pending.length;
    },
  };
};
