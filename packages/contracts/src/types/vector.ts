/**
 * Vector types shared by the index mappers, the containers and the grid
 * helpers. All types are immutable value objects.
 */

/**
 * 2D integer coordinate
 */
export interface IVec2 {
  readonly x: number;
  readonly y: number;
}

/**
 * 3D integer coordinate
 */
export interface IVec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * 2D continuous position
 */
export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

/**
 * 3D continuous position
 */
export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface Dimensions2d {
  readonly width: number;
  readonly height: number;
}

export interface Dimensions3d {
  readonly width: number;
  readonly height: number;
  readonly depth: number;
}
