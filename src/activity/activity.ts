/**
 * sheetmotion/activity - Activity Template
 *
 * defineActivity() builds a SheetActivity whose lifecycle methods always run
 * the base behavior first and then the matching hook, so variants cannot
 * forget it:
 * - initWith: binds the owner once
 * - takeOver: inherits the outgoing activity's offset
 * - dispose: tears down listeners; a second dispose is a contract violation
 */

import { createEmitter } from "../events";
import { assert, contractError } from "../internal/assert";
import type {
  ActivityChange,
  ActivityHooks,
  ActivityKind,
  ActivityOwner,
  ActivityScope,
  SheetActivity,
} from "./types";

/** What a definition returns: hooks plus any variant-specific API */
export interface ActivityDefinition<TApi extends object> {
  hooks: ActivityHooks;
  api: TApi;
}

type ActivityEvents = { change: ActivityChange };

export const defineActivity = <TApi extends object = Record<never, never>>(
  kind: ActivityKind,
  build: (scope: ActivityScope) => ActivityDefinition<TApi>,
): SheetActivity & TApi => {
  const emitter = createEmitter<ActivityEvents>();
  let owner: ActivityOwner | null = null;
  let offset: number | null = null;
  let disposed = false;

  const scope: ActivityScope = {
    get owner() {
      if (owner === null) {
        throw contractError(`${kind} activity used before initWith()`);
      }
      return owner;
    },
    get offset() {
      return offset;
    },
    get isDisposed() {
      return disposed;
    },
    setOffset: (value) => {
      assert(!disposed, `${kind} activity moved the sheet after dispose()`);
      if (value === offset) return;
      offset = value;
      emitter.emit("change", { offset });
    },
    correctOffset: (value) => {
      offset = value;
    },
  };

  const { hooks, api } = build(scope);

  const activity: SheetActivity = {
    kind,
    get offset() {
      return offset;
    },
    get velocity() {
      return hooks.velocity ? hooks.velocity() : 0;
    },
    get owner() {
      return owner;
    },
    get isDisposed() {
      return disposed;
    },

    initWith: (nextOwner) => {
      assert(owner === null, `${kind} activity is already attached`);
      assert(!disposed, `Cannot attach a disposed ${kind} activity`);
      owner = nextOwner;
      hooks.onInit?.();
    },

    takeOver: (other) => {
      if (other.offset !== null) {
        offset = other.offset;
      }
      hooks.onTakeOver?.(other);
    },

    didChangeContentDimensions: (oldDimensions) => {
      hooks.onContentDimensionsChanged?.(oldDimensions);
    },

    didChangeViewportDimensions: (oldDimensions) => {
      hooks.onViewportDimensionsChanged?.(oldDimensions);
    },

    didFinalizeDimensions: (changes) => {
      hooks.onDimensionsFinalized?.(changes);
    },

    onChange: (handler) => emitter.on("change", handler),

    dispose: () => {
      assert(!disposed, `${kind} activity disposed twice`);
      disposed = true;
      emitter.clear();
      hooks.onDispose?.();
    },
  };

  return Object.assign(activity, api);
};
