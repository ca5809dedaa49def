export * from "./CombinatorTypes.js";
export * from "./DoParse.js";
export * from "./Input.js";
export * from "./Parser.js";
export * from "./ParserCombinator.js";
export * from "./ParserLogging.js";
export * from "./ParserTracing.js";
