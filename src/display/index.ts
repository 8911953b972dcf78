export * from "./report.js";
export * from "./tree-renderer.js";
