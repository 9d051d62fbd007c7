/**
 * Shared storage for the dense 2D/3D arrays.
 *
 * One contiguous `T[]` buffer addressed by a raw offset. Subclasses own the
 * extents and the coordinate <-> offset formula; this class owns the bounds
 * checks, flat access, iteration and raw buffer resizing.
 */

import { GridError } from "@flatgrid/contracts";

/**
 * Produces the value stored in a freshly allocated slot.
 * Called once per slot, so mutable defaults are never shared.
 */
export type DefaultFactory<T> = () => T;

/**
 * Handle to a single slot, standing in for a mutable reference.
 *
 * The handle is bound to a raw offset, not to the value: every read and write
 * goes through the owning array and is bounds-checked again, so a handle kept
 * across a shrinking resize throws instead of touching a stale slot.
 */
export interface CellRef<P, T> {
  readonly position: P;
  readonly index: number;
  value: T;
}

class SlotRef<P, T> implements CellRef<P, T> {
  constructor(
    private readonly owner: FlatArray<P, T>,
    readonly index: number,
    readonly position: P,
  ) {}

  get value(): T {
    return this.owner.at(this.index);
  }

  set value(value: T) {
    this.owner.setAt(this.index, value);
  }
}

export abstract class FlatArray<P, T> implements Iterable<[P, T]> {
  protected data: T[];
  protected readonly createDefault: DefaultFactory<T>;

  /**
   * @param slots - Initial values in raw-offset order. When given, the
   * default factory is not called and `slots.length` must equal `length`.
   */
  protected constructor(
    length: number,
    createDefault: DefaultFactory<T>,
    slots?: readonly T[],
  ) {
    this.createDefault = createDefault;

    if (slots === undefined) {
      this.data = this.allocate(length);
    } else if (slots.length === length) {
      this.data = slots.slice();
    } else {
      throw GridError.invalidDimensions(
        `Expected ${length} initial slots, got ${slots.length}`,
        { expected: length, actual: slots.length },
      );
    }
  }

  /**
   * Number of slots: the product of the current extents.
   */
  abstract len(): number;

  /**
   * Raw offset for a position, without bounds checking.
   */
  abstract indexOf(position: P): number;

  /**
   * Position for a raw offset, derived with the inverse mapping.
   */
  abstract positionOf(index: number): P;

  /** Coordinate components, used to reject negative or fractional input. */
  protected abstract componentsOf(position: P): readonly number[];

  /**
   * Always false: extents are positive once construction succeeds, so an
   * array can never hold zero slots. Revisit if zero extents are ever allowed.
   */
  isEmpty(): boolean {
    return false;
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  /**
   * Check whether `get`/`set` would accept the position.
   */
  contains(position: P): boolean {
    for (const c of this.componentsOf(position)) {
      if (!Number.isInteger(c) || c < 0) return false;
    }
    return this.isValidIndex(this.indexOf(position));
  }

  private isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.len();
  }

  private checkIndex(index: number): void {
    if (!this.isValidIndex(index)) {
      throw GridError.indexOutOfBounds(
        `Invalid index ${index} for array of length ${this.len()}`,
        { index, len: this.len() },
      );
    }
  }

  private checkedOffset(position: P): number {
    if (!this.contains(position)) {
      throw GridError.indexOutOfBounds(
        `Invalid position ${JSON.stringify(position)} for array of length ${this.len()}`,
        { position, len: this.len() },
      );
    }
    return this.indexOf(position);
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  /**
   * Get the value at a position.
   */
  get(position: P): T {
    return this.slot(this.checkedOffset(position));
  }

  /**
   * Get a handle to the slot at a position.
   */
  getMut(position: P): CellRef<P, T> {
    const index = this.checkedOffset(position);
    return new SlotRef(this, index, position);
  }

  /**
   * Update the value at a position.
   */
  set(position: P, value: T): void {
    this.data[this.checkedOffset(position)] = value;
  }

  /**
   * Get the value at a raw offset. No coordinate computation takes place.
   */
  at(index: number): T {
    this.checkIndex(index);
    return this.slot(index);
  }

  /**
   * Update the value at a raw offset.
   */
  setAt(index: number, value: T): void {
    this.checkIndex(index);
    this.data[index] = value;
  }

  private slot(index: number): T {
    return this.data[index] as T;
  }

  // ===========================================================================
  // ITERATION
  // ===========================================================================

  /**
   * Lazily yield `[position, value]` in increasing raw-offset order.
   * Each call starts a fresh pass.
   */
  *entries(): Generator<[P, T], void, undefined> {
    for (let i = 0; i < this.len(); i++) {
      yield [this.positionOf(i), this.slot(i)];
    }
  }

  /**
   * Lazily yield one slot handle per offset, in increasing raw-offset order.
   * Each handle addresses only its own offset.
   */
  *entriesMut(): Generator<CellRef<P, T>, void, undefined> {
    for (let i = 0; i < this.len(); i++) {
      yield new SlotRef(this, i, this.positionOf(i));
    }
  }

  [Symbol.iterator](): Iterator<[P, T]> {
    return this.entries();
  }

  forEach(callback: (value: T, position: P, index: number) => void): void {
    for (let i = 0; i < this.len(); i++) {
      callback(this.slot(i), this.positionOf(i), i);
    }
  }

  // ===========================================================================
  // UTILITY
  // ===========================================================================

  /**
   * Set every slot to the same value.
   */
  fill(value: T): void {
    this.data.fill(value);
  }

  /**
   * Copy of the buffer in raw-offset order.
   */
  toArray(): T[] {
    return this.data.slice();
  }

  protected sameSlots(other: FlatArray<P, T>): boolean {
    if (this.data.length !== other.data.length) return false;
    for (let i = 0; i < this.data.length; i++) {
      if (!Object.is(this.data[i], other.data[i])) return false;
    }
    return true;
  }

  /**
   * Resize the buffer to `length` slots. Values at offsets below the old
   * length stay where they are; new offsets get a default value.
   *
   * The grown tail is built before the buffer is touched, so a throwing
   * default factory leaves the buffer as it was. Callers update their
   * extents only after this returns.
   */
  protected resizeBuffer(length: number): void {
    if (length < this.data.length) {
      this.data.length = length;
    } else {
      this.data = this.data.concat(this.allocate(length - this.data.length));
    }
  }

  private allocate(count: number): T[] {
    const slots: T[] = [];
    for (let i = 0; i < count; i++) {
      slots.push(this.createDefault());
    }
    return slots;
  }
}
