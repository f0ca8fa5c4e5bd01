export * from "./errors.js";
export * from "./vfs/VFS.js";
export { NodeVFS } from "./vfs/NodeVFS.js";
export { MemoryVFS } from "./vfs/MemoryVFS.js";
export * from "./loader/DocumentLoader.js";
export * from "./naming/ResourceNaming.js";
export { toTerraformName } from "./naming/terraformName.js";
export * from "./analysis/SchemaTypeResolver.js";
export * from "./analysis/PropertyFlags.js";
export * from "./analysis/PropertyBuilder.js";
export * from "./analysis/PathClassifier.js";
export * from "./analysis/polling.js";
export * from "./analysis/timeouts.js";
export * from "./analysis/multiRegion.js";
export * from "./analysis/SpecAnalyser.js";
export * from "./resource/SchemaDefinition.js";
export * from "./resource/SpecResource.js";
export * from "./resource/BackendConfiguration.js";
