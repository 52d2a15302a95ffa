/**
 * sheetmotion - Ballistic Activity Tests
 */

import { describe, it, expect, vi } from "vitest";
import { createSize, createViewportDimensions } from "../../src/geometry";
import { createClampingPhysics } from "../../src/physics";
import { createLinearSimulation, createMeasuredExtent } from "../harness";

describe("createBallisticActivity", () => {
  it("should sample the simulation once per tick", () => {
    const { extent, ticker } = createMeasuredExtent();

    extent.goBallisticWith(createLinearSimulation(100, 200));
    ticker.advance(250);

    expect(extent.offset).toBe(150);
    expect(extent.activity.velocity).toBe(200);

    ticker.advance(250);
    expect(extent.offset).toBe(200);
  });

  it("should go idle at the final position once the simulation is done", () => {
    const { extent, ticker } = createMeasuredExtent();

    extent.goBallisticWith(createLinearSimulation(100, 200, 0.5));
    ticker.advance(250);
    expect(extent.activity.kind).toBe("ballistic");

    ticker.advance(250);

    expect(extent.activity.kind).toBe("idle");
    expect(extent.offset).toBe(200);
    expect(ticker.activeCount).toBe(0);
  });

  it("should land on the resting point the simulation reports", () => {
    const { extent, ticker } = createMeasuredExtent();

    extent.goBallisticWith({ ...createLinearSimulation(100, 200, 0.5), finalX: 205 });
    ticker.advance(250);
    expect(extent.offset).toBe(150);

    ticker.advance(250);

    expect(extent.activity.kind).toBe("idle");
    expect(extent.offset).toBe(205);
  });

  it("should stop ticking when superseded", () => {
    const { extent, ticker } = createMeasuredExtent();
    extent.goBallisticWith(createLinearSimulation(100, 200));

    extent.goIdle();
    ticker.advance(250);

    expect(ticker.activeCount).toBe(0);
    expect(extent.offset).toBe(500);
  });
});

describe("dimension changes", () => {
  const setup = () => {
    const base = createClampingPhysics();
    const createBallisticSimulation = vi.fn(base.createBallisticSimulation);
    const harness = createMeasuredExtent({
      physics: { ...base, createBallisticSimulation },
    });
    harness.extent.goBallisticWith(createLinearSimulation(100, 100));
    harness.ticker.advance(500);
    return { ...harness, createBallisticSimulation };
  };

  it("should plan again once per finalized content batch", () => {
    const { extent, createBallisticSimulation } = setup();
    const previous = extent.activity;

    extent.batchDimensionChanges(() => {
      extent.applyNewContentDimensions(createSize(400, 900));
      extent.applyNewContentDimensions(createSize(400, 1000));
    });

    expect(createBallisticSimulation).toHaveBeenCalledTimes(1);
    const [velocity, metrics] = createBallisticSimulation.mock.calls[0] ?? [];
    expect(velocity).toBe(100);
    expect(metrics?.offset).toBe(150);
    expect(metrics?.maxOffset).toBe(1000);

    expect(extent.activity).not.toBe(previous);
    expect(extent.activity.kind).toBe("ballistic");
    expect(extent.offset).toBe(150);
  });

  it("should keep its motion when only the viewport changes", () => {
    const { extent, createBallisticSimulation } = setup();
    const previous = extent.activity;

    extent.applyNewViewportDimensions(createViewportDimensions(400, 600));

    expect(createBallisticSimulation).not.toHaveBeenCalled();
    expect(extent.activity).toBe(previous);
  });
});
