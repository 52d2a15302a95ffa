/**
 * sheetmotion - Dimension Value Tests
 */

import { describe, it, expect } from "vitest";
import {
  createEdgeInsets,
  createSize,
  createViewportDimensions,
  edgeInsetsEquals,
  sizeEquals,
  viewportDimensionsEquals,
  ZERO_INSETS,
} from "../../src/geometry";

describe("constructors", () => {
  it("should create frozen values", () => {
    const size = createSize(400, 500);

    expect(size).toEqual({ width: 400, height: 500 });
    expect(Object.isFrozen(size)).toBe(true);
  });

  it("should default missing insets to zero", () => {
    expect(createEdgeInsets({ bottom: 12 })).toEqual({ top: 0, right: 0, bottom: 12, left: 0 });
    expect(createViewportDimensions(400, 800).insets).toEqual(ZERO_INSETS);
  });

  it("should reject non-finite numbers", () => {
    expect(() => createSize(NaN, 10)).toThrow("width must be a finite number, got NaN");
    expect(() => createEdgeInsets({ left: Infinity })).toThrow(
      "insets.left must be a finite number, got Infinity",
    );
  });
});

describe("equality", () => {
  it("should compare sizes structurally", () => {
    expect(sizeEquals(createSize(1, 2), createSize(1, 2))).toBe(true);
    expect(sizeEquals(createSize(1, 2), createSize(2, 1))).toBe(false);
  });

  it("should treat null as equal only to null", () => {
    expect(sizeEquals(null, null)).toBe(true);
    expect(sizeEquals(createSize(1, 2), null)).toBe(false);
    expect(viewportDimensionsEquals(null, createViewportDimensions(1, 2))).toBe(false);
  });

  it("should compare insets edge by edge", () => {
    expect(edgeInsetsEquals(createEdgeInsets({ top: 1 }), createEdgeInsets({ top: 1 }))).toBe(
      true,
    );
    expect(edgeInsetsEquals(createEdgeInsets({ top: 1 }), createEdgeInsets({ right: 1 }))).toBe(
      false,
    );
  });

  it("should include insets in viewport equality", () => {
    const base = createViewportDimensions(400, 800);

    expect(viewportDimensionsEquals(base, createViewportDimensions(400, 800))).toBe(true);
    expect(
      viewportDimensionsEquals(base, createViewportDimensions(400, 800, { bottom: 1 })),
    ).toBe(false);
    expect(viewportDimensionsEquals(base, createViewportDimensions(400, 801))).toBe(false);
  });
});
