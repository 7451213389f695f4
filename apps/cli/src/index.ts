export * from "./cli.js";
export * from "./composition-root.js";
export * from "./config.js";
export * from "./trace-logger.js";
