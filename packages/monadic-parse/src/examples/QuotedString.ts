import { doParse } from "../DoParse.js";
import { bind } from "../Parser.js";
import { alt, isNot, item, text, zeroOrMore } from "../ParserCombinator.js";

/** a backslash escaped character, e.g. \" or \\ */
const escaped = bind(text("\\"), () => item()).traceName("escaped");

const plain = isNot((c: string) => c === '"' || c === "\\");

/** a double quoted string
 * @return the contents of the string, with escapes removed */
export const quotedString = doParse()
  .ignore(text('"'))
  .let("chars", zeroOrMore(alt(escaped, plain)))
  .ignore(text('"'))
  .yield(({ chars }) => chars.join(""))
  .traceName("quotedString");
