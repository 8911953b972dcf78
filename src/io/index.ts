export * from "./file-handler.js";
