/**
 * Index mapping module - pure coordinate/offset conversions.
 */

export * from "./index-2d";
export * from "./index-3d";
