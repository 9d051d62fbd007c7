/**
 * Dense 3D array backed by one contiguous buffer.
 */

import {
  type Dimensions3d,
  type IVec3,
  parseDimensions3d,
} from "@flatgrid/contracts";
import { DEV_MODE } from "../config";
import { fromIndexIVec3, toIndexIVec3 } from "../index-mapping/index-3d";
import { type DefaultFactory, FlatArray } from "./flat-array";

/**
 * 3D array that keeps its values sequentially in memory, addressed by
 * `z * width * height + y * width + x`.
 *
 * Same access and iteration behaviour as {@link Array2d}, with a depth
 * extent added and `x` varying fastest.
 */
export class Array3d<T> extends FlatArray<IVec3, T> {
  private _width: number;
  private _height: number;
  private _depth: number;

  constructor(
    width: number,
    height: number,
    depth: number,
    createDefault: DefaultFactory<T>,
    slots?: readonly T[],
  ) {
    const dim = parseDimensions3d(width, height, depth);
    super(dim.width * dim.height * dim.depth, createDefault, slots);
    this._width = dim.width;
    this._height = dim.height;
    this._depth = dim.depth;
  }

  static fromDimensions<T>(
    dim: Dimensions3d,
    createDefault: DefaultFactory<T>,
  ): Array3d<T> {
    return new Array3d(dim.width, dim.height, dim.depth, createDefault);
  }

  static filled<T>(
    width: number,
    height: number,
    depth: number,
    value: T,
  ): Array3d<T> {
    return new Array3d(width, height, depth, () => value);
  }

  static zeros(width: number, height: number, depth: number): Array3d<number> {
    return Array3d.filled(width, height, depth, 0);
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  get depth(): number {
    return this._depth;
  }

  len(): number {
    return this._width * this._height * this._depth;
  }

  indexOf(position: IVec3): number {
    return toIndexIVec3(this._width, this._height, position);
  }

  positionOf(index: number): IVec3 {
    return fromIndexIVec3(this._width, this._height, index);
  }

  protected componentsOf(position: IVec3): readonly number[] {
    return [position.x, position.y, position.z];
  }

  /**
   * Resize to the given dimensions. Values keep their raw offset.
   */
  resize(width: number, height: number, depth: number): void {
    const dim = parseDimensions3d(width, height, depth);

    if (
      DEV_MODE &&
      (dim.width !== this._width || dim.height !== this._height)
    ) {
      console.warn(
        `Array3d.resize: layer ${this._width}x${this._height} -> ${dim.width}x${dim.height} moves retained values to new positions`,
      );
    }

    this.resizeBuffer(dim.width * dim.height * dim.depth);
    this._width = dim.width;
    this._height = dim.height;
    this._depth = dim.depth;
  }

  getDimensions(): Dimensions3d {
    return { width: this._width, height: this._height, depth: this._depth };
  }

  clone(): Array3d<T> {
    return new Array3d(
      this._width,
      this._height,
      this._depth,
      this.createDefault,
      this.data,
    );
  }

  equals(other: Array3d<T>): boolean {
    return (
      this._width === other._width &&
      this._height === other._height &&
      this._depth === other._depth &&
      this.sameSlots(other)
    );
  }
}
