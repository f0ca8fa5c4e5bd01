export * from "./Logger.js";
