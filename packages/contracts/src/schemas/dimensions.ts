import { z } from "zod";
import { GridError } from "../types/error";
import type { Dimensions2d, Dimensions3d } from "../types/vector";

export const ExtentSchema = z
  .number()
  .int({ error: "Extents must be integers" })
  .positive({ error: "Extents must be greater than zero" });

export const Dimensions2dSchema = z.object({
  width: ExtentSchema,
  height: ExtentSchema,
});

export const Dimensions3dSchema = z.object({
  width: ExtentSchema,
  height: ExtentSchema,
  depth: ExtentSchema,
});

export const CellSizeSchema = z
  .number()
  .positive({ error: "Cell size must be greater than zero" });

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? "Invalid value";
}

/**
 * Validate 2D extents, throwing INVALID_DIMENSIONS on failure.
 */
export function parseDimensions2d(width: number, height: number): Dimensions2d {
  const res = Dimensions2dSchema.safeParse({ width, height });
  if (!res.success) {
    throw GridError.invalidDimensions(
      `Invalid array dimensions ${width}x${height}: ${firstIssue(res.error)}`,
      { width, height },
    );
  }
  return res.data;
}

/**
 * Validate 3D extents, throwing INVALID_DIMENSIONS on failure.
 */
export function parseDimensions3d(
  width: number,
  height: number,
  depth: number,
): Dimensions3d {
  const res = Dimensions3dSchema.safeParse({ width, height, depth });
  if (!res.success) {
    throw GridError.invalidDimensions(
      `Invalid array dimensions ${width}x${height}x${depth}: ${firstIssue(res.error)}`,
      { width, height, depth },
    );
  }
  return res.data;
}

export function parseCellSize(cellSize: number): number {
  const res = CellSizeSchema.safeParse(cellSize);
  if (!res.success) {
    throw GridError.invalidCellSize(
      `Invalid cell size ${cellSize}: ${firstIssue(res.error)}`,
      { cellSize },
    );
  }
  return res.data;
}
