import { doParse } from "../DoParse.js";
import {
  maybe,
  oneOrMore,
  satisfies,
  text,
  zeroOrMore,
} from "../ParserCombinator.js";

export const letter = satisfies((c: string) => /[a-zA-Z]/.test(c)).traceName(
  "letter"
);
export const digit = satisfies((c: string) => c >= "0" && c <= "9").traceName(
  "digit"
);
export const whitespace = satisfies((c: string) => /\s/.test(c)).traceName(
  "whitespace"
);

export const skipSpace = zeroOrMore(whitespace).traceName("skipSpace");

/** an optionally negative decimal integer */
export const integer = doParse()
  .let("sign", maybe(text("-")))
  .let("digits", oneOrMore(digit))
  .yield(({ sign, digits }) => {
    const n = parseInt(digits.join(""), 10);
    return sign ? -n : n;
  })
  .traceName("integer");
