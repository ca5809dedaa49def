import { ParseFn, Parser } from "./Parser.js";

/** Typescript types for parser combinators */

/**
 * This type describes the variations for parser combinator arguments.
 *
 * Parser combinators seq(), alt() and similiar combinators
 * combine other parsers they take as function arguments.
 * Standard combinators also accept plain parsing functions,
 * or simple string arguments. Strings are later converted to text() parsers.
 */
export type CombinatorArg = Parser<any, any> | ParseFn<any, any> | string;

/**
 * @return Parser corresponding to a single CombinatorArg.
 *
 * examples:
 *    for combinator("some_string"), the argument is "some_string"
 *      the Parser corresponding to "some_string" is Parser<string, string>
 *    if the combinator argument is Parser<number[], Token>
 *      the corresponding parser is Parser<number[], Token>
 *    if the combinator argument is (input: ParserInput<Token>) => ParseResult<number, Token>[]
 *      the corresponding parser is Parser<number, Token>
 */
export type ParserFromArg<A extends CombinatorArg> = Parser<
  ResultFromArg<A>,
  ElemFromArg<A>
>;

/** Result value type returned by a parser specified by a CombinatorArg */
export type ResultFromArg<A extends CombinatorArg> =
  A extends Parser<infer R, any>
    ? R
    : A extends string
      ? string
      : A extends ParseFn<infer R, any>
        ? R
        : never;

/** Input element type consumed by a parser specified by a CombinatorArg */
export type ElemFromArg<A extends CombinatorArg> =
  A extends Parser<any, infer E>
    ? E
    : A extends string
      ? string
      : A extends ParseFn<any, infer E>
        ? E
        : never;

/** Input element type shared by a list of CombinatorArgs */
export type ElemFromArgs<P extends CombinatorArg[]> = ElemFromArg<P[number]>;

/** Parser type returned by seq(),
 *    concatenates the argument result types into an array
 * @param P type of arguments to seq()
 */
export type SeqParser<P extends CombinatorArg[]> = Parser<
  SeqValues<P>,
  ElemFromArgs<P>
>;

/**
 * The type of an array of parsed result values from an array of parsers specified
 * by CombinatorArgs.
 *
 * Note that although looks like an object type given the {} syntax, it's not.
 * As of TS 3.1, type mapping over keys of an array or tuple returns an array or tuple type, not an object type.
 */
export type SeqValues<P extends CombinatorArg[]> = {
  [key in keyof P]: ResultFromArg<P[key]>;
};

/** Parser type returned by alt() and plus(), a union of the argument result types */
export type OrParser<P extends CombinatorArg[]> = Parser<
  ResultFromArg<P[number]>,
  ElemFromArgs<P>
>;

/** Parser type returned by and(), the result type of the last argument */
export type LastParser<P extends CombinatorArg[]> = Parser<
  P extends [...CombinatorArg[], infer L extends CombinatorArg]
    ? ResultFromArg<L>
    : never,
  ElemFromArgs<P>
>;

/** Parser type returned by prog1(), the result type of the first argument */
export type FirstParser<P extends CombinatorArg[]> = Parser<
  P extends [infer F extends CombinatorArg, ...CombinatorArg[]]
    ? ResultFromArg<F>
    : never,
  ElemFromArgs<P>
>;

/** Parser type returned by prog2(), the result type of the second argument */
export type SecondParser<P extends CombinatorArg[]> = Parser<
  P extends [CombinatorArg, infer S extends CombinatorArg, ...CombinatorArg[]]
    ? ResultFromArg<S>
    : never,
  ElemFromArgs<P>
>;
