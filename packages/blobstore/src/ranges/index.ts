export * from "./range-spec.js";
