/**
 * sheetmotion - Sheet Extent Tests
 * Measurement, notifications, activity transitions and extent replacement
 */

import { describe, it, expect, vi } from "vitest";
import { defineActivity, isIdleActivity } from "../../src/activity";
import { linear } from "../../src/animation";
import { pixels, proportional } from "../../src/extent";
import { createSize, createViewportDimensions } from "../../src/geometry";
import { createSnappingPhysics } from "../../src/physics";
import { createSheetExtent, createSheetExtentFactory } from "../../src/sheet";
import {
  createLinearSimulation,
  createMeasuredExtent,
  createTestContext,
  measure,
} from "../harness";

// =============================================================================
// Measurement
// =============================================================================

describe("before measurement", () => {
  it("should expose null metrics", () => {
    const { context } = createTestContext();
    const extent = createSheetExtent({ context });

    expect(extent.offset).toBeNull();
    expect(extent.minOffset).toBeNull();
    expect(extent.maxOffset).toBeNull();
    expect(extent.viewOffset).toBeNull();
    expect(extent.isMeasured).toBe(false);
    expect(extent.isInBounds).toBe(false);
    expect(extent.isOutOfBounds).toBe(true);
  });

  it("should fail fast when reading asserted metrics", () => {
    const { context } = createTestContext();
    const extent = createSheetExtent({ context });

    expect(() => extent.metrics.offset).toThrow(
      "[sheetmotion] offset is not available yet. Check isMeasured before reading metrics.",
    );
    expect(() => extent.snapshot).toThrow("snapshot() requires a measured sheet");
  });

  it("should reject motion requests", () => {
    const { context } = createTestContext();
    const extent = createSheetExtent({ context });

    expect(() => extent.goBallistic(100)).toThrow("goBallistic() requires a measured sheet");
    expect(() => extent.settle()).toThrow("settle() requires a measured sheet");
    expect(() => extent.animateTo(pixels(10))).toThrow(
      "animateTo() requires a measured sheet",
    );
  });

  it("should place the sheet once content is known but stay unmeasured without a viewport", () => {
    const { context } = createTestContext();
    const extent = createSheetExtent({ context });

    extent.applyNewContentDimensions(createSize(400, 500));

    expect(extent.offset).toBe(500);
    expect(extent.minOffset).toBe(0);
    expect(extent.maxOffset).toBe(500);
    expect(extent.isMeasured).toBe(false);
  });
});

describe("measurement", () => {
  it("should start at the max extent by default", () => {
    const { extent } = createMeasuredExtent();

    expect(extent.isMeasured).toBe(true);
    expect(extent.offset).toBe(500);
    expect(extent.metrics.offset).toBe(500);
    expect(extent.isInBounds).toBe(true);
  });

  it("should start at the initial extent and shift view offsets by the bottom inset", () => {
    const { extent } = createMeasuredExtent(
      { initialExtent: proportional(0.5) },
      { bottomInset: 20 },
    );

    expect(extent.offset).toBe(250);
    expect(extent.viewOffset).toBe(270);
    expect(extent.minViewOffset).toBe(20);
    expect(extent.maxViewOffset).toBe(520);
  });

  it("should notify once when first measured", () => {
    const { context } = createTestContext();
    const extent = createSheetExtent({ context });
    const handler = vi.fn();
    extent.on("change", handler);

    measure(extent);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ offset: 500 });
  });

  it("should reject bounds where min resolves above max", () => {
    const { context } = createTestContext();
    const extent = createSheetExtent({ context, minExtent: pixels(600) });

    expect(() => extent.applyNewContentDimensions(createSize(400, 500))).toThrow(
      "minExtent resolves above maxExtent (600 > 500)",
    );
  });
});

// =============================================================================
// Notifications
// =============================================================================

describe("change notifications", () => {
  it("should notify exactly once for repeated equal viewports", () => {
    const { extent } = createMeasuredExtent();
    const handler = vi.fn();
    extent.on("change", handler);

    extent.applyNewViewportDimensions(createViewportDimensions(400, 800));
    extent.applyNewViewportDimensions(createViewportDimensions(400, 800, { bottom: 20 }));
    extent.applyNewViewportDimensions(createViewportDimensions(400, 800, { bottom: 20 }));

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ offset: 500 });
    expect(extent.viewOffset).toBe(520);
  });

  it("should keep a resting sheet at its extent when content resizes", () => {
    const { extent } = createMeasuredExtent();
    const handler = vi.fn();
    extent.on("change", handler);

    extent.applyNewContentDimensions(createSize(400, 600));

    expect(extent.offset).toBe(600);
    expect(extent.maxOffset).toBe(600);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ offset: 600 });
  });

  it("should stop notifying after unsubscribe", () => {
    const { extent } = createMeasuredExtent();
    const handler = vi.fn();
    const unsubscribe = extent.on("change", handler);

    unsubscribe();
    extent.applyNewContentDimensions(createSize(400, 600));

    expect(handler).not.toHaveBeenCalled();
  });
});

// =============================================================================
// Activity Transitions
// =============================================================================

describe("beginActivity", () => {
  it("should attach the new activity before it takes over, then dispose the old one", () => {
    const { extent } = createMeasuredExtent();
    const previous = extent.activity;
    const calls: string[] = [];

    const recorder = defineActivity("recording", (scope) => ({
      hooks: {
        onInit: () => {
          calls.push(`init:${scope.owner === extent}`);
        },
        onTakeOver: (other) => {
          calls.push(`takeOver:${other.kind}:${other.isDisposed}:${scope.offset}`);
        },
      },
      api: {},
    }));
    extent.beginActivity(recorder);

    expect(calls).toEqual(["init:true", "takeOver:idle:false:500"]);
    expect(previous.isDisposed).toBe(true);
    expect(extent.activity).toBe(recorder);
    expect(recorder.owner).toBe(extent);
  });

  it("should forward offset changes the activity makes on its own", () => {
    const { extent, ticker } = createMeasuredExtent();
    const handler = vi.fn();
    extent.on("change", handler);

    extent.goBallisticWith(createLinearSimulation(100, 100));
    ticker.advance(500);

    expect(extent.offset).toBe(150);
    expect(handler).toHaveBeenLastCalledWith({ offset: 150 });
  });
});

describe("goBallistic", () => {
  it("should go idle when the physics declines", () => {
    const { extent } = createMeasuredExtent();
    const initial = extent.activity;

    // Already at max, pushing further open
    extent.goBallistic(100);

    expect(extent.activity.kind).toBe("idle");
    expect(extent.activity).not.toBe(initial);
    expect(extent.offset).toBe(500);
  });

  it("should fling and come to rest", () => {
    const { extent, ticker } = createMeasuredExtent();

    extent.goBallistic(-1000);
    expect(extent.activity.kind).toBe("ballistic");

    for (let i = 0; i < 8; i++) ticker.advance(1000);

    expect(extent.activity.kind).toBe("idle");
    expect(ticker.activeCount).toBe(0);
    expect(extent.offset).toBeCloseTo(500 + 1000 / Math.log(0.135), 2);
  });
});

describe("settle", () => {
  it("should spring back into bounds", () => {
    const { extent, ticker } = createMeasuredExtent();
    extent.goBallisticWith(createLinearSimulation(600, 0));
    ticker.advance(16);
    expect(extent.isOutOfBounds).toBe(true);

    extent.settle();
    expect(extent.activity.kind).toBe("ballistic");
    for (let i = 0; i < 30; i++) ticker.advance(100);

    expect(extent.activity.kind).toBe("idle");
    expect(extent.offset).toBe(500);
    expect(extent.isInBounds).toBe(true);

    // Nothing left to settle
    extent.settle();
    expect(extent.activity.kind).toBe("idle");
    expect(extent.offset).toBe(500);
  });

  it("should come to rest inside bounds that shrank during a fling", () => {
    const { extent, ticker } = createMeasuredExtent();
    extent.goBallistic(-1000);
    ticker.advance(100);

    extent.applyNewContentDimensions(createSize(400, 100));
    expect(extent.isOutOfBounds).toBe(true);
    expect(extent.activity.kind).toBe("ballistic");
    for (let i = 0; i < 30; i++) ticker.advance(100);

    expect(extent.activity.kind).toBe("idle");
    expect(extent.offset).toBe(100);
    expect(extent.isInBounds).toBe(true);
  });

  it("should rest exactly on a snap position", () => {
    const { extent, ticker } = createMeasuredExtent({
      physics: createSnappingPhysics({
        snapExtents: [proportional(0), proportional(0.5), proportional(1)],
      }),
    });

    extent.goBallistic(-1000);
    expect(extent.activity.kind).toBe("ballistic");
    for (let i = 0; i < 30; i++) ticker.advance(100);

    expect(extent.activity.kind).toBe("idle");
    expect(extent.offset).toBe(250);

    extent.settle();
    expect(extent.activity.kind).toBe("idle");
    expect(extent.offset).toBe(250);
  });

  it("should go idle when already in bounds", () => {
    const { extent } = createMeasuredExtent();

    extent.settle();

    expect(extent.activity.kind).toBe("idle");
    expect(extent.offset).toBe(500);
  });
});

describe("animateTo", () => {
  it("should start from the offset taken over from a ballistic activity", () => {
    const { extent, ticker } = createMeasuredExtent({ initialExtent: pixels(100) });
    extent.goBallisticWith(createLinearSimulation(100, 50));
    expect(extent.offset).toBe(100);

    void extent.animateTo(pixels(200), { duration: 100, curve: linear });
    expect(ticker.activeCount).toBe(1);

    ticker.advance(50);
    expect(extent.offset).toBe(150);
  });

  it("should resolve immediately without notifying when already at the target", async () => {
    const { extent, ticker } = createMeasuredExtent();
    const initial = extent.activity;
    const handler = vi.fn();
    extent.on("change", handler);

    await expect(extent.animateTo(proportional(1))).resolves.toBeUndefined();

    expect(handler).not.toHaveBeenCalled();
    expect(extent.activity).toBe(initial);
    expect(ticker.activeCount).toBe(0);
  });

  it("should rest at the destination extent when finished", async () => {
    const { extent, ticker } = createMeasuredExtent();

    const done = extent.animateTo(proportional(0.5), { duration: 100, curve: linear });
    ticker.advance(100);
    await done;

    expect(extent.offset).toBe(250);
    const { activity } = extent;
    expect(isIdleActivity(activity)).toBe(true);
    if (isIdleActivity(activity)) {
      expect(activity.getRestingExtent()).toEqual(proportional(0.5));
    }

    extent.applyNewContentDimensions(createSize(400, 800));
    expect(extent.offset).toBe(400);
  });

  it("should use the default duration and curve", () => {
    const { extent, ticker } = createMeasuredExtent();

    void extent.animateTo(pixels(0));
    ticker.advance(150);
    expect(extent.offset).toBe(250);

    ticker.advance(150);
    expect(extent.offset).toBe(0);
    expect(extent.activity.kind).toBe("idle");
  });
});

// =============================================================================
// Replacement
// =============================================================================

describe("takeOver", () => {
  it("should continue from another extent's dimensions and offset", () => {
    const { extent: previous, ticker, context } = createMeasuredExtent();
    previous.goBallisticWith(createLinearSimulation(300, 0));
    ticker.advance(16);

    const next = createSheetExtent({ context });
    const handler = vi.fn();
    next.on("change", handler);
    next.takeOver(previous);

    expect(next.isMeasured).toBe(true);
    expect(next.offset).toBe(300);
    expect(next.maxOffset).toBe(500);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ offset: 300 });

    const { activity } = next;
    expect(isIdleActivity(activity) && activity.getRestingExtent()).toBeNull();
  });

  it("should reject a disposed extent", () => {
    const { extent: previous, context } = createMeasuredExtent();
    previous.dispose();

    const next = createSheetExtent({ context });
    expect(() => next.takeOver(previous)).toThrow("Cannot take over a disposed SheetExtent");
  });
});

describe("createSheetExtentFactory", () => {
  it("should create extents with the shared configuration", () => {
    const { context } = createTestContext();
    const factory = createSheetExtentFactory({ initialExtent: pixels(120) });

    const extent = factory.create(context);
    measure(extent);

    expect(extent.context).toBe(context);
    expect(extent.offset).toBe(120);
  });
});

// =============================================================================
// Disposal
// =============================================================================

describe("dispose", () => {
  it("should dispose the current activity exactly once", () => {
    const { extent } = createMeasuredExtent();
    const onDispose = vi.fn();
    const recorder = defineActivity("recording", () => ({ hooks: { onDispose }, api: {} }));
    extent.beginActivity(recorder);

    extent.dispose();

    expect(onDispose).toHaveBeenCalledTimes(1);
    expect(recorder.isDisposed).toBe(true);
    expect(extent.isDisposed).toBe(true);
  });

  it("should stop a running ticker", () => {
    const { extent, ticker } = createMeasuredExtent();
    extent.goBallisticWith(createLinearSimulation(500, -10));
    expect(ticker.activeCount).toBe(1);

    extent.dispose();

    expect(ticker.activeCount).toBe(0);
  });

  it("should reject use after dispose", () => {
    const { extent } = createMeasuredExtent();
    extent.dispose();

    expect(() => extent.dispose()).toThrow("SheetExtent used after dispose()");
    expect(() => extent.applyNewContentDimensions(createSize(400, 600))).toThrow(
      "SheetExtent used after dispose()",
    );
  });
});
