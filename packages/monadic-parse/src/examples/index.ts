export * from "./AmbiguousSplits.js";
export * from "./CharClasses.js";
export * from "./QuotedString.js";
export * from "./SexpReader.js";
