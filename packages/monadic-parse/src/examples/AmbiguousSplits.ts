import { doParse } from "../DoParse.js";
import { bind, Parser } from "../Parser.js";
import { eof, item, plus, result } from "../ParserCombinator.js";

/** one or more elements, returning every possible length (shortest first)
 *
 * unlike oneOrMore(), which commits to the longest match,
 * this keeps every interpretation for a later stage to choose from
 */
export function prefixes(p: Parser<string>): Parser<string[]> {
  const all: Parser<string[]> = bind(p, (x) =>
    plus(
      result([x]),
      bind(all, (xs) => result([x, ...xs]))
    )
  );
  return all.traceName("prefixes");
}

/** every way to split the whole input into two non-empty parts */
export const splits = doParse()
  .let("left", prefixes(item()))
  .let("right", prefixes(item()))
  .ignore(eof())
  .yield(({ left, right }): [string, string] => [
    left.join(""),
    right.join(""),
  ])
  .traceName("splits");
