export * from "./signature-locator.js";
