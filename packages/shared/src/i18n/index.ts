export * from "./locale.js";
export * from "./format.js";
