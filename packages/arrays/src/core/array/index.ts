/**
 * Array module - dense flat-buffer containers.
 */

export { Array2d } from "./array-2d";
export { Array3d } from "./array-3d";
export {
  type CellRef,
  type DefaultFactory,
  FlatArray,
} from "./flat-array";
