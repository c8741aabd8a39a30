export * from "./address.js";
export * from "./codec.js";
export * from "./endpoint.js";
export * from "./errors.js";
export * from "./hex.js";
export * from "./keys.js";
export * from "./logging/index.js";
export * from "./network.js";
