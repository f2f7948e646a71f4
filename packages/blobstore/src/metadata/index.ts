export * from "./clone.js";
