import { bind, Parser, ParserLike, toParser } from "./Parser.js";
import { result } from "./ParserCombinator.js";

/** binding name for parsers whose values aren't needed */
export const ignoreName = "_";

/** values bound so far in a doParse() chain */
export type Bindings = Record<string, unknown>;

/** a parser, or a function choosing a parser from the earlier bound values */
export type BindingArg<T, Env extends Bindings, E> =
  | Parser<T, E>
  | ((env: Env) => ParserLike<T, E>);

/** the bindings after adding a named value (the ignore name adds nothing) */
export type WithBinding<Env extends Bindings, K extends string, T> =
  K extends typeof ignoreName ? Env : Env & { [key in K]: T };

/** one named binding in a doParse() chain */
export interface BindingStep<E> {
  name: string;
  parserFor: (env: Bindings) => Parser<unknown, E>;
}

/**
 * Start a chain of named parser bindings, an alternative to nesting bind() calls.
 *
 * e.g.
 *    doParse()
 *      .let("open", text("("))
 *      .let("body", zeroOrMore(letter))
 *      .ignore(text(")"))
 *      .yield(({ body }) => body.join(""))
 *
 * expands to:
 *    bind(text("("), (open) =>
 *      bind(zeroOrMore(letter), (body) =>
 *        bind(text(")"), () => result(body.join("")))))
 *
 * Later bindings and the body see the values of earlier bindings.
 */
export function doParse<E = string>(): DoBuilder<{}, E> {
  return new DoBuilder<{}, E>([]);
}

export class DoBuilder<Env extends Bindings, E = string> {
  constructor(private readonly steps: BindingStep<E>[]) {}

  /** run a parser and bind its value to a name.
   * @param arg a parser, or a function from the current bindings to a parser */
  let<K extends string, T>(
    name: K,
    arg: BindingArg<T, Env, E>
  ): DoBuilder<WithBinding<Env, K, T>, E> {
    const parserFor = (env: Bindings): Parser<unknown, E> =>
      arg instanceof Parser ? arg : toParser(arg(env as Env));
    return new DoBuilder<WithBinding<Env, K, T>, E>([
      ...this.steps,
      { name, parserFor },
    ]);
  }

  /** run a parser, and drop its value */
  ignore<T>(arg: BindingArg<T, Env, E>): DoBuilder<Env, E> {
    return this.let(ignoreName, arg);
  }

  /** finish the chain with a parser chosen from the bound values */
  body<U>(fn: (env: Env) => ParserLike<U, E>): Parser<U, E> {
    const last = (env: Bindings): Parser<U, E> => toParser(fn(env as Env));
    const expand = this.steps.reduceRight(
      (next, step) =>
        (env: Bindings): Parser<U, E> =>
          bind(step.parserFor(env), (value) =>
            next(step.name === ignoreName ? env : { ...env, [step.name]: value })
          ),
      last
    );
    return expand({});
  }

  /** finish the chain with a value computed from the bound values */
  yield<U>(fn: (env: Env) => U): Parser<U, E> {
    return this.body((env) => result<U, E>(fn(env)));
  }
}
