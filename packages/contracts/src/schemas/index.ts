export * from "./common.js";
export * from "./catalog-file.js";
export * from "./runtime-env.js";
export * from "./issues.js";
