export { Swagger } from "./types.js";
export * from "./guards.js";
