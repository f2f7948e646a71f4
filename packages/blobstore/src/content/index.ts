export * from "./content-source.js";
