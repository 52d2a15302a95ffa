/**
 * sheetmotion - Logging
 * Tagged console output. Debug lines are off unless explicitly enabled.
 */

import { LOG_PREFIX } from "../constants";

let debugEnabled = false;

/** Turn debug logging on or off for every logger */
export const setDebugLogging = (enabled: boolean): void => {
  debugEnabled = enabled;
};

export const isDebugLogging = (): boolean => debugEnabled;

export interface Logger {
  debug: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Create a logger whose lines start with `[sheetmotion/<tag>]`,
 * or `[sheetmotion]` when no tag is given.
 */
export const createLogger = (tag?: string): Logger => {
  const prefix = tag ? `[${LOG_PREFIX}/${tag}]` : `[${LOG_PREFIX}]`;

  return {
    debug: (...args) => {
      if (debugEnabled) console.log(prefix, ...args);
    },
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  };
};
