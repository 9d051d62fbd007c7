/**
 * Dense 2D array backed by one contiguous buffer.
 */

import {
  type Dimensions2d,
  type IVec2,
  parseDimensions2d,
} from "@flatgrid/contracts";
import { DEV_MODE } from "../config";
import { fromIndexIVec2, toIndexIVec2 } from "../index-mapping/index-2d";
import { type DefaultFactory, FlatArray } from "./flat-array";

/**
 * 2D array that keeps its values sequentially in memory, addressed by
 * `width * x + y`.
 *
 * Iteration always maps each offset back to a position, which costs a
 * division per slot. Use {@link FlatArray.at}/{@link FlatArray.setAt} for
 * the raw-offset path when the position is not needed.
 *
 * @remarks
 * Bounds are checked on the computed offset, not per axis: any position
 * whose offset falls inside the buffer is accepted.
 *
 * @example
 * ```typescript
 * const tiles = Array2d.zeros(4, 4);
 * tiles.set({ x: 3, y: 3 }, 64);
 * tiles.get({ x: 3, y: 3 }); // 64
 * ```
 */
export class Array2d<T> extends FlatArray<IVec2, T> {
  private _width: number;
  private _height: number;

  /**
   * @param slots - Optional initial values in raw-offset order, exactly
   * `width * height` of them. The default factory is then only used by
   * `resize`.
   */
  constructor(
    width: number,
    height: number,
    createDefault: DefaultFactory<T>,
    slots?: readonly T[],
  ) {
    const dim = parseDimensions2d(width, height);
    super(dim.width * dim.height, createDefault, slots);
    this._width = dim.width;
    this._height = dim.height;
  }

  /**
   * Create array from dimensions object
   */
  static fromDimensions<T>(
    dim: Dimensions2d,
    createDefault: DefaultFactory<T>,
  ): Array2d<T> {
    return new Array2d(dim.width, dim.height, createDefault);
  }

  /**
   * Create array with every slot set to `value`
   */
  static filled<T>(width: number, height: number, value: T): Array2d<T> {
    return new Array2d(width, height, () => value);
  }

  static zeros(width: number, height: number): Array2d<number> {
    return Array2d.filled(width, height, 0);
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  len(): number {
    return this._width * this._height;
  }

  indexOf(position: IVec2): number {
    return toIndexIVec2(this._width, position);
  }

  positionOf(index: number): IVec2 {
    return fromIndexIVec2(this._width, index);
  }

  protected componentsOf(position: IVec2): readonly number[] {
    return [position.x, position.y];
  }

  /**
   * Resize to the given dimensions, allocating right away.
   *
   * Values keep their raw offset, not their position: once the width
   * changes, a retained value answers to a different coordinate.
   */
  resize(width: number, height: number): void {
    const dim = parseDimensions2d(width, height);

    if (DEV_MODE && dim.width !== this._width) {
      console.warn(
        `Array2d.resize: width ${this._width} -> ${dim.width} moves retained values to new positions`,
      );
    }

    this.resizeBuffer(dim.width * dim.height);
    this._width = dim.width;
    this._height = dim.height;
  }

  getDimensions(): Dimensions2d {
    return { width: this._width, height: this._height };
  }

  clone(): Array2d<T> {
    return new Array2d(
      this._width,
      this._height,
      this.createDefault,
      this.data,
    );
  }

  /**
   * Check if this array has the same dimensions and values as another.
   */
  equals(other: Array2d<T>): boolean {
    return (
      this._width === other._width &&
      this._height === other._height &&
      this.sameSlots(other)
    );
  }
}
