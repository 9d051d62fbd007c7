/**
 * Core module - index mapping, containers and grid helpers.
 */

export * from "./array";
export * from "./geometry";
export * from "./index-mapping";
