export * from "./tag-decoder.js";
export * from "./tree-walker.js";
