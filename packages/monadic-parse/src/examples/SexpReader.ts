import { doParse } from "../DoParse.js";
import { toInput } from "../Input.js";
import { Parser } from "../Parser.js";
import {
  alt,
  and,
  eof,
  fn,
  isNot,
  not,
  oneOrMore,
  prog1,
  satisfies,
  text,
  zeroOrMore,
} from "../ParserCombinator.js";
import { integer, whitespace } from "./CharClasses.js";
import { quotedString } from "./QuotedString.js";

/** a value read from s-expression text */
export type SExp = SymbolAtom | NumberAtom | StringAtom | SList;

export interface SymbolAtom {
  kind: "symbol";
  name: string;
}

export interface NumberAtom {
  kind: "number";
  value: number;
}

export interface StringAtom {
  kind: "string";
  value: string;
}

export interface SList {
  kind: "list";
  items: SExp[];
}

/** a ; comment, through the end of the line */
const comment = and(text(";"), zeroOrMore(isNot((c: string) => c === "\n")));

/** white space and comments between expressions */
const gap = zeroOrMore(alt(whitespace, comment)).traceName("gap");

const symbolChar = satisfies((c: string) => /[^\s()";]/.test(c));

const symbolAtom = oneOrMore(symbolChar).map(
  (chars): SExp => ({ kind: "symbol", name: chars.join("") })
);

// an integer immediately followed by symbol text (e.g. 1+) reads as a symbol
const numberAtom = prog1(integer, not(symbolChar)).map(
  (value): SExp => ({ kind: "number", value })
);

const stringAtom = quotedString.map(
  (value): SExp => ({ kind: "string", value })
);

const list = doParse()
  .ignore(text("("))
  .let("items", zeroOrMore(fn(() => sexp)))
  .ignore(gap)
  .ignore(text(")"))
  .yield(({ items }): SExp => ({ kind: "list", items }))
  .traceName("list");

/** one s-expression, after any leading white space or comments */
export const sexp: Parser<SExp> = and(
  gap,
  alt(list, stringAtom, numberAtom, symbolAtom)
).traceName("sexp");

/** all the s-expressions in a source text */
export const sexpFile: Parser<SExp[]> = prog1(
  zeroOrMore(sexp),
  gap,
  eof()
).traceName("sexpFile");

/** @return the s-expressions in src, or null if src isn't valid s-expression text */
export function readSexps(src: string): SExp[] | null {
  return sexpFile.parse(toInput(src))?.value ?? null;
}
