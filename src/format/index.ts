export * from "./content-formatter.js";
