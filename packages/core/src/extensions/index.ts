export * from "./constants.js";
export * from "./parse.js";
