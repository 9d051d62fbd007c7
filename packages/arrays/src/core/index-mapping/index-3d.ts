/**
 * Coordinate <-> offset mapping for 3D flat arrays.
 *
 * Unlike the 2D mapping, the first axis varies fastest here:
 * `index = z * maxX * maxY + y * maxX + x`.
 */

import type { IVec3 } from "@flatgrid/contracts";

export function toIndex3d(
  maxX: number,
  maxY: number,
  x: number,
  y: number,
  z: number,
): number {
  return z * maxX * maxY + y * maxX + x;
}

/**
 * Get the position for a buffer offset. Inverse of {@link toIndex3d}.
 *
 * @returns `[x, y, z]`
 */
export function fromIndex3d(
  maxX: number,
  maxY: number,
  index: number,
): [x: number, y: number, z: number] {
  const layer = maxX * maxY;
  const z = Math.floor(index / layer);
  const rest = index - z * layer;
  return [rest % maxX, Math.floor(rest / maxX), z];
}

export function toIndexIVec3(maxX: number, maxY: number, v: IVec3): number {
  return toIndex3d(maxX, maxY, v.x, v.y, v.z);
}

export function fromIndexIVec3(
  maxX: number,
  maxY: number,
  index: number,
): IVec3 {
  const [x, y, z] = fromIndex3d(maxX, maxY, index);
  return { x, y, z };
}
