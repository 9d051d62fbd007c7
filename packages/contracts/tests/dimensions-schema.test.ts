import { describe, expect, it } from "vitest";
import {
  CellSizeSchema,
  Dimensions2dSchema,
  Dimensions3dSchema,
  ExtentSchema,
  GridError,
  parseCellSize,
  parseDimensions2d,
  parseDimensions3d,
} from "../src";

describe("Dimension Schemas", () => {
  it("accepts positive integer extents", () => {
    expect(ExtentSchema.safeParse(1).success).toBe(true);
    expect(Dimensions2dSchema.safeParse({ width: 4, height: 4 }).success).toBe(
      true,
    );
    expect(
      Dimensions3dSchema.safeParse({ width: 2, height: 3, depth: 4 }).success,
    ).toBe(true);
  });

  it("rejects zero, negative and fractional extents", () => {
    expect(ExtentSchema.safeParse(0).success).toBe(false);
    expect(ExtentSchema.safeParse(-3).success).toBe(false);
    expect(ExtentSchema.safeParse(1.5).success).toBe(false);
  });

  it("rejects a missing depth", () => {
    const res = Dimensions3dSchema.safeParse({ width: 2, height: 3 });
    expect(res.success).toBe(false);
  });

  it("accepts fractional cell sizes", () => {
    expect(CellSizeSchema.safeParse(0.25).success).toBe(true);
    expect(CellSizeSchema.safeParse(0).success).toBe(false);
  });
});

describe("parse helpers", () => {
  it("returns validated dimensions", () => {
    expect(parseDimensions2d(3, 2)).toEqual({ width: 3, height: 2 });
    expect(parseDimensions3d(3, 2, 1)).toEqual({
      width: 3,
      height: 2,
      depth: 1,
    });
    expect(parseCellSize(4)).toBe(4);
  });

  it("throws INVALID_DIMENSIONS with the offending extents", () => {
    expect(() => parseDimensions2d(0, 2)).toThrow(GridError);
    let caught: unknown;
    try {
      parseDimensions3d(2, 2, 0);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(GridError);
    if (!GridError.isGridError(caught)) return;
    expect(caught.code).toBe("INVALID_DIMENSIONS");
    expect(caught.details).toEqual({ width: 2, height: 2, depth: 0 });
    expect(caught.message).toBe(
      "Invalid array dimensions 2x2x0: Extents must be greater than zero",
    );
  });

  it("throws INVALID_CELL_SIZE for a negative cell size", () => {
    expect(() => parseCellSize(-1)).toThrow(
      "Invalid cell size -1: Cell size must be greater than zero",
    );
  });
});
