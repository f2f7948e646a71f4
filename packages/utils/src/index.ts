export * from "./bytes/index.js";
export * from "./hash/index.js";
export * from "./streams/index.js";
