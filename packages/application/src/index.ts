export * from "./errors.js";
export * from "./event-logger.js";
export * from "./in-memory-catalog.js";
export * from "./resolver.js";
export * from "./command-errors.js";
export * from "./underscore-command.js";
