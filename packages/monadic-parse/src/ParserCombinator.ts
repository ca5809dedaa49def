import {
  CombinatorArg,
  ElemFromArgs,
  FirstParser,
  LastParser,
  OrParser,
  ParserFromArg,
  SecondParser,
  SeqParser,
} from "./CombinatorTypes.js";
import { ParserInput } from "./Input.js";
import {
  bind,
  ParseResult,
  Parser,
  ParserLike,
  parser,
  toParser,
} from "./Parser.js";

/** Parsing Combinators
 *
 * The basic idea is that parsers are contructed heirarchically from other parsers.
 * Each parser is independently testable and reusable with combinators like alt() and seq().
 *
 * Each parser is a function from an input to a list of results.
 *  Each result holds a parsed value and the input remaining after the match.
 *  An empty list indicates failure. A list with more than one result
 *  means the input matched in more than one way (the grammar is ambiguous here).
 *
 * Built in parsers and combinators are available:
 *  result(), fail() and item() are the primitive parsers.
 *  bind() sequences parsers, choosing the next parser from each result value.
 *  plus() keeps the results of every alternative, alt() only the first successful one.
 *  not() succeeds when its parser fails.
 *  zeroOrMore(), oneOrMore(), seq(), maybe() and friends are built from those.
 *
 * Inputs are never modified. Backtracking is simply trying another result
 * (or another alternative) on an input value we already hold.
 */

/** succeed with the provided value, consuming nothing */
export function result<T, E = string>(value: T): Parser<T, E> {
  return parser(
    "result",
    (input: ParserInput<E>): ParseResult<T, E>[] => [
      { value, remaining: input },
    ],
    true
  );
}

/** always fails, does not consume any input */
export function fail<T = never, E = string>(): Parser<T, E> {
  return parser("fail", (): ParseResult<T, E>[] => [], true);
}

/** yield next element, any element */
export function item<E = string>(): Parser<E, E> {
  return parser(
    "item",
    (input: ParserInput<E>): ParseResult<E, E>[] =>
      input.isEmpty() ? [] : [{ value: input.first(), remaining: input.rest() }],
    true
  );
}

/** Try every parser on the same input.
 * @return the results from all of the parsers, in argument order */
export function plus<P extends CombinatorArg[]>(...args: P): OrParser<P> {
  return allSuccesses(
    "plus",
    args.map((a) => parserArg(a))
  );
}

/** Try parsing with one or more parsers,
 *  @return the results from the first parser that succeeds */
export function alt<P extends CombinatorArg[]>(...args: P): OrParser<P> {
  return firstSuccess(
    "alt",
    args.map((a) => parserArg(a))
  );
}

/** return true if the provided parser _doesn't_ match
 * does not consume any input */
export function not<T, E = string>(arg: ParserLike<T, E>): Parser<true, E> {
  const p = toParser(arg);
  return parser("not", (input: ParserInput<E>): ParseResult<true, E>[] =>
    p._run(input).length ? [] : [{ value: true, remaining: input }]
  );
}

/** match zero or more instances of a parser, as many as possible
 *
 * Note that a parser that succeeds without consuming input
 * will repeat forever. (use RunOptions.maxParseCount to guard while debugging)
 */
export function zeroOrMore<T, E = string>(
  arg: ParserLike<T, E>
): Parser<T[], E> {
  const p = toParser(arg);
  const more: Parser<T[], E> = firstSuccess("zeroOrMore", [
    bind(p, (x) => bind(more, (xs) => result<T[], E>([x, ...xs]))),
    result<T[], E>([]),
  ]);
  return more;
}

/** match one or more instances of a parser */
export function oneOrMore<T, E = string>(
  arg: ParserLike<T, E>
): Parser<T[], E> {
  const p = toParser(arg);
  const rest = zeroOrMore(p);
  return bind(p, (x) => bind(rest, (xs) => result<T[], E>([x, ...xs])))
    .traceName("oneOrMore");
}

/** Parse a sequence of parsers
 * @return an array of all parsed results */
export function seq<P extends CombinatorArg[]>(...args: P): SeqParser<P> {
  const parsers = args.map((a) => parserArg(a));

  const seqParser = parser("seq", (input: ParserInput<ElemFromArgs<P>>) => {
    let partials: ParseResult<unknown[], ElemFromArgs<P>>[] = [
      { value: [], remaining: input },
    ];
    for (const p of parsers) {
      partials = partials.flatMap(({ value: values, remaining }) =>
        p._run(remaining).map((r) => ({
          value: [...values, r.value],
          remaining: r.remaining,
        }))
      );
    }
    return partials;
  });

  return seqParser as SeqParser<P>;
}

/** Parse a sequence of parsers
 * @return the result of the last parser */
export function and<P extends [CombinatorArg, ...CombinatorArg[]]>(
  ...args: P
): LastParser<P> {
  const parsers = args.map((a) => parserArg(a));
  const last = parsers[parsers.length - 1];
  const leading = parsers.slice(0, -1);
  const chained: Parser<unknown, ElemFromArgs<P>> = leading.reduceRight(
    (rest, p) => bind(p, () => rest),
    last
  );
  return chained.traceName("and") as LastParser<P>;
}

/** Parse a sequence of parsers
 * @return the result of the first parser */
export function prog1<P extends [CombinatorArg, ...CombinatorArg[]]>(
  ...args: P
): FirstParser<P> {
  return seqPick("prog1", 0, args) as FirstParser<P>;
}

/** Parse a sequence of parsers
 * @return the result of the second parser */
export function prog2<
  P extends [CombinatorArg, CombinatorArg, ...CombinatorArg[]],
>(...args: P): SecondParser<P> {
  return seqPick("prog2", 1, args) as SecondParser<P>;
}

/** Try a parser.
 *
 * If the parse succeeds, return the results.
 * If the parser fails, succeed with undefined and don't advance the input.
 */
export function maybe<T, E = string>(
  arg: ParserLike<T, E>
): Parser<T | undefined, E> {
  return firstSuccess<T | undefined, E>("maybe", [
    toParser(arg),
    result<undefined, E>(undefined),
  ]);
}

const noMatch = Symbol("noMatch");

/** If the test parser matches, continue with the then parser after the test's match.
 * Otherwise run the otherwise parser from the original input.
 * (otherwise defaults to fail()) */
export function ifP<T, U = never, E = string>(
  test: ParserLike<unknown, E>,
  then: ParserLike<T, E>,
  otherwise?: ParserLike<U, E>
): Parser<T | U, E> {
  const thenParser = toParser(then);
  const elseParser = otherwise ? toParser(otherwise) : fail<U, E>();
  const tested = firstSuccess<unknown, E>("ifTest", [
    toParser(test),
    result<unknown, E>(noMatch),
  ]);
  return bind(tested, (v): Parser<T | U, E> =>
    v === noMatch ? elseParser : thenParser
  ).traceName("ifP");
}

/** run the body parser only if the test parser matches (continuing after the test's match) */
export function when<T, E = string>(
  test: ParserLike<unknown, E>,
  body: ParserLike<T, E>
): Parser<T, E> {
  return ifP(test, body).traceName("when");
}

/** run the body parser only if the test parser doesn't match */
export function unless<T, E = string>(
  test: ParserLike<unknown, E>,
  body: ParserLike<T, E>
): Parser<T, E> {
  return ifP(test, fail<never, E>(), body).traceName("unless");
}

/** match values from a parser (by default the next element) that pass a test */
export function satisfies<E = string>(pred: (elem: E) => boolean): Parser<E, E>;
export function satisfies<T, E = string>(
  pred: (value: T) => boolean,
  arg: ParserLike<T, E>
): Parser<T, E>;
export function satisfies<T, E>(
  pred: (value: T | E) => boolean,
  arg?: ParserLike<T, E>
): Parser<T | E, E> {
  const source: Parser<T | E, E> = arg ? toParser(arg) : item<E>();
  return bind(source, (v) =>
    pred(v) ? result<T | E, E>(v) : fail<T | E, E>()
  ).traceName("satisfies");
}

/** match values from a parser (by default the next element) that fail a test */
export function isNot<E = string>(pred: (elem: E) => boolean): Parser<E, E>;
export function isNot<T, E = string>(
  pred: (value: T) => boolean,
  arg: ParserLike<T, E>
): Parser<T, E>;
export function isNot<T, E>(
  pred: (value: T | E) => boolean,
  arg?: ParserLike<T, E>
): Parser<T | E, E> {
  const source: Parser<T | E, E> = arg ? toParser(arg) : item<E>();
  return satisfies((v: T | E) => !pred(v), source).traceName("isNot");
}

/** match one element equal (===) to the provided element */
export function is<E = string>(elem: E): Parser<E, E> {
  return satisfies((e: E) => e === elem).traceName(`is ${quoted(elem)}`);
}

/** Parse a run of characters matching a string
 * @return the matched string */
export function text(value: string): Parser<string, string> {
  return parser(
    `text ${quoted(value)}`,
    (input: ParserInput<string>): ParseResult<string, string>[] => {
      let current = input;
      for (let i = 0; i < value.length; i++) {
        if (current.isEmpty() || current.first() !== value[i]) return [];
        current = current.rest();
      }
      return [{ value, remaining: current }];
    },
    true
  );
}

/** yields true if parsing has reached the end of input */
export function eof<E = string>(): Parser<true, E> {
  return parser(
    "eof",
    (input: ParserInput<E>): ParseResult<true, E>[] =>
      input.isEmpty() ? [{ value: true, remaining: input }] : [],
    true
  );
}

/** keep only the first result of a parser (commit to its first interpretation) */
export function onlyFirst<T, E = string>(arg: ParserLike<T, E>): Parser<T, E> {
  const p = toParser(arg);
  return parser("onlyFirst", (input: ParserInput<E>) =>
    p._run(input).slice(0, 1)
  );
}

/** A delayed parser definition, for making recursive parser definitions. */
export function fn<T, E = string>(
  fn: () => ParserLike<T, E>
): Parser<T, E> {
  return parser("fn", (input: ParserInput<E>): ParseResult<T, E>[] =>
    toParser(fn())._run(input)
  );
}

export interface WithSepOptions {
  /** if true, allow an optional trailing separator (default true) */
  trailing?: boolean;
  /** if true, require at least one element (default false) */
  requireOne?: boolean;
}

/** match an optional series of elements separated by a delimiter (e.g. a comma) */
export function withSep<T, E = string>(
  sep: ParserLike<unknown, E>,
  arg: ParserLike<T, E>,
  opts: WithSepOptions = {}
): Parser<T[], E> {
  const { trailing = true, requireOne = false } = opts;
  const p = toParser(arg);
  const sepParser = toParser(sep);
  const elems = sepList(p, sepParser);
  const some = trailing
    ? bind(elems, (values) =>
        bind(maybe(sepParser), () => result<T[], E>(values))
      )
    : elems;
  const series = requireOne
    ? some
    : firstSuccess("withSep", [some, result<T[], E>([])]);
  return series.traceName("withSep");

  function sepList(
    first: Parser<T, E>,
    sepP: Parser<unknown, E>
  ): Parser<T[], E> {
    const following = zeroOrMore(bind(sepP, () => first));
    return bind(first, (x) =>
      bind(following, (xs) => result<T[], E>([x, ...xs]))
    );
  }
}

/** convert naked string arguments into text() parsers and functions into Parsers */
export function parserArg<A extends CombinatorArg>(arg: A): ParserFromArg<A>;
export function parserArg(arg: CombinatorArg): Parser<unknown, any> {
  if (typeof arg === "string") {
    return text(arg);
  } else if (arg instanceof Parser) {
    return arg;
  } else if (typeof arg === "function") {
    return parser("fn", arg);
  }
  throw new TypeError(`not a parser: ${String(arg)}`);
}

/** @return a parser returning the results of the first parser that succeeds */
function firstSuccess<T, E>(
  traceName: string,
  parsers: Parser<T, E>[]
): Parser<T, E> {
  return parser(traceName, (input: ParserInput<E>): ParseResult<T, E>[] => {
    for (const p of parsers) {
      const results = p._run(input);
      if (results.length) {
        return results;
      }
    }
    return [];
  });
}

/** @return a parser returning the results of all parsers, concatenated */
function allSuccesses<T, E>(
  traceName: string,
  parsers: Parser<T, E>[]
): Parser<T, E> {
  return parser(traceName, (input: ParserInput<E>): ParseResult<T, E>[] =>
    parsers.flatMap((p) => p._run(input))
  );
}

/** sequence the parsers, keeping only one of the parsed values */
function seqPick<P extends CombinatorArg[]>(
  traceName: string,
  index: number,
  args: P
): Parser<unknown, ElemFromArgs<P>> {
  const all: Parser<unknown[], ElemFromArgs<P>> = seq(...args);
  return all.map((values) => values[index]).traceName(traceName);
}

function quoted(elem: unknown): string {
  return typeof elem === "string" ? `'${elem}'` : String(elem);
}
