import { GridError } from "../src";

/**
 * Run `fn` and return the GridError it throws.
 */
export function thrownBy(fn: () => unknown): GridError {
  try {
    fn();
  } catch (error) {
    if (GridError.isGridError(error)) return error;
    throw error;
  }
  throw new Error("Expected a GridError to be thrown");
}
