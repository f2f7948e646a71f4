export * from "./utils/index.js";
