export * from "./blob-store.suite.js";
export * from "./conditional-read.suite.js";
export * from "./listing.suite.js";
