export * from "./errors.js";
export * from "./types.js";
export * from "./config.js";
export * from "./presets.js";
export * from "./interfaces.js";
