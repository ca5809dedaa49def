export * from "./LogCatcher.js";
export * from "./TestParse.js";
