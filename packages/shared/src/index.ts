export * from "./errors/index.js";
export * from "./i18n/index.js";
export * from "./runtime/clock.js";
export * from "./time.js";
