/**
 * sheetmotion/scheduler - Tickers
 *
 * A ticker calls back once per frame with the time elapsed since it was
 * started. Ballistic and animated activities drive their motion from one.
 */

import { FALLBACK_FRAME_INTERVAL } from "../constants";
import { contractError } from "../internal/assert";

// =============================================================================
// Types
// =============================================================================

/** Called once per frame with milliseconds since `start()` */
export type TickCallback = (elapsedMs: number) => void;

export interface Ticker {
  /** Begin ticking; elapsed time restarts from 0 */
  start: () => void;

  /** Stop ticking; may be started again */
  stop: () => void;

  /** Whether the ticker is currently delivering ticks */
  readonly isActive: boolean;

  /** Stop for good */
  dispose: () => void;
}

/** Host-supplied source of tickers */
export interface TickerProvider {
  createTicker: (onTick: TickCallback) => Ticker;
}

// =============================================================================
// Frame Ticker Provider
// =============================================================================

interface FrameScheduler {
  request: (callback: () => void) => number;
  cancel: (id: number) => void;
}

/** requestAnimationFrame when the host has one, a ~60Hz timer otherwise */
const createFrameScheduler = (): FrameScheduler => {
  if (typeof requestAnimationFrame === "function") {
    return {
      request: (callback) => requestAnimationFrame(() => callback()),
      cancel: (id) => cancelAnimationFrame(id),
    };
  }

  const timers = new Map<number, ReturnType<typeof setTimeout>>();
  let nextId = 0;
  return {
    request: (callback) => {
      const id = ++nextId;
      timers.set(
        id,
        setTimeout(() => {
          timers.delete(id);
          callback();
        }, FALLBACK_FRAME_INTERVAL),
      );
      return id;
    },
    cancel: (id) => {
      const timer = timers.get(id);
      if (timer !== undefined) {
        clearTimeout(timer);
        timers.delete(id);
      }
    },
  };
};

/**
 * Tickers driven by the display's frame clock.
 */
export const createFrameTickerProvider = (): TickerProvider => {
  const frames = createFrameScheduler();

  return {
    createTicker: (onTick) => {
      let frameId: number | null = null;
      let startTime = 0;
      let isActive = false;
      let disposed = false;

      const loop = (): void => {
        frameId = frames.request(() => {
          frameId = null;
          onTick(performance.now() - startTime);
          // The callback may have stopped or restarted us
          if (frameId === null && isActive) loop();
        });
      };

      const stop = (): void => {
        isActive = false;
        if (frameId !== null) {
          frames.cancel(frameId);
          frameId = null;
        }
      };

      return {
        start: () => {
          if (disposed) {
            throw contractError("Cannot start a disposed ticker");
          }
          stop();
          isActive = true;
          startTime = performance.now();
          loop();
        },
        stop,
        get isActive() {
          return isActive;
        },
        dispose: () => {
          stop();
          disposed = true;
        },
      };
    },
  };
};

// =============================================================================
// End of Frame
// =============================================================================

/**
 * Run `callback` once the current frame's work is over: on the next
 * animation frame when the host has one, otherwise after the current task.
 * Hosts without a frame clock should pass their own `scheduleEndOfCycle`,
 * since a microtask runs before later callbacks of the same frame.
 */
export const scheduleEndOfFrame = (callback: () => void): void => {
  if (typeof requestAnimationFrame === "function") {
    requestAnimationFrame(() => callback());
  } else {
    queueMicrotask(callback);
  }
};
