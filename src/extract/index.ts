export * from "./field-extractor.js";
export * from "./key-size-estimator.js";
