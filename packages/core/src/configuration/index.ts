export * from "./AnalyserConfiguration.js";
export * from "./ServiceConfiguration.js";
