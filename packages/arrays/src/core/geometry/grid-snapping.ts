/**
 * Snapping continuous positions onto a regular grid.
 */

import {
  type IVec2,
  type IVec3,
  parseCellSize,
  type Vec2,
  type Vec3,
} from "@flatgrid/contracts";

function snap(value: number, cellSize: number): number {
  return Math.floor(value / cellSize) * cellSize;
}

/**
 * Snap a position down to the nearest lower multiple of `cellSize` per axis.
 *
 * @example
 * ```typescript
 * quantizeToGrid({ x: 35.8277, y: 7.987278 }, 4); // { x: 32, y: 4 }
 * ```
 */
export function quantizeToGrid(v: Vec2, cellSize: number): Vec2 {
  const size = parseCellSize(cellSize);
  return { x: snap(v.x, size), y: snap(v.y, size) };
}

export function quantizeToGridVec3(v: Vec3, cellSize: number): Vec3 {
  const size = parseCellSize(cellSize);
  return { x: snap(v.x, size), y: snap(v.y, size), z: snap(v.z, size) };
}

/**
 * Map a world position to the cell it falls into. Think of an inventory HUD
 * with its tiles laid out like an `Array2d`: the result addresses the tile.
 */
export function mapToGridVec2(v: Vec2, cellSize: number): IVec2 {
  const quantized = quantizeToGrid(v, cellSize);
  return {
    x: Math.trunc(quantized.x / cellSize),
    y: Math.trunc(quantized.y / cellSize),
  };
}

/**
 * Map a world position onto the grid, e.g. a raycast hit onto a voxel.
 *
 * Returns the snapped position truncated to integers, not the cell count
 * along each axis: `({ x: 35.8277, y: 7.987278, z: 2.0993 }, 4)` gives
 * `{ x: 32, y: 4, z: 0 }`.
 */
export function mapToGridVec3(v: Vec3, cellSize: number): IVec3 {
  const quantized = quantizeToGridVec3(v, cellSize);
  return {
    x: Math.trunc(quantized.x),
    y: Math.trunc(quantized.y),
    z: Math.trunc(quantized.z),
  };
}
