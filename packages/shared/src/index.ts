export * from "./types.js";
export * from "./schemas.js";
export * from "./constants.js";
export * from "./retry.js";
export * from "./numbers.js";
