export * from "./catalog-loader.js";
export * from "./json-catalog.js";
export * from "./mo-file.js";
