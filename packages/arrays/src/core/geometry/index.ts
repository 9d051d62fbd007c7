/**
 * Geometry module - grid snapping helpers.
 */

export * from "./grid-snapping";
