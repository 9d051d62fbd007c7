/**
 * Flat Arrays - dense 2D and 3D containers over a single contiguous buffer.
 *
 * @example
 * ```typescript
 * import { Array3d, mapToGridVec3 } from "@flatgrid/arrays";
 *
 * const voxels = Array3d.zeros(16, 16, 16);
 * voxels.set({ x: 1, y: 2, z: 3 }, 7);
 *
 * for (const [position, value] of voxels) {
 *   if (value !== 0) console.log(position, value);
 * }
 * ```
 */

export * from "./core";
export {
  type Dimensions2d,
  type Dimensions3d,
  GridError,
  type GridErrorCode,
  type IVec2,
  type IVec3,
  type Vec2,
  type Vec3,
} from "@flatgrid/contracts";
