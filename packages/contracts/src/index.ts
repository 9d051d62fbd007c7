export * from "./schemas/dimensions";
export * from "./types/error";
export * from "./types/vector";
