/**
 * Coordinate <-> offset mapping for 2D flat arrays.
 *
 * The second axis varies fastest: `index = width * x + y`. Neither function
 * checks bounds; that is the container's job.
 */

import type { IVec2 } from "@flatgrid/contracts";

/**
 * Get the buffer offset for a position. Inverse of {@link fromIndex2d}.
 *
 * @example
 * ```typescript
 * toIndex2d(2, 1, 1); // 3
 * ```
 */
export function toIndex2d(width: number, x: number, y: number): number {
  return width * x + y;
}

/**
 * Get the position for a buffer offset. Inverse of {@link toIndex2d}.
 *
 * @returns `[x, y]`
 */
export function fromIndex2d(
  width: number,
  index: number,
): [x: number, y: number] {
  return [Math.floor(index / width), index % width];
}

/**
 * Wrapper around {@link toIndex2d} taking a coordinate pair.
 */
export function toIndexIVec2(width: number, v: IVec2): number {
  return toIndex2d(width, v.x, v.y);
}

/**
 * Wrapper around {@link fromIndex2d} returning a coordinate pair.
 */
export function fromIndexIVec2(width: number, index: number): IVec2 {
  const [x, y] = fromIndex2d(width, index);
  return { x, y };
}
