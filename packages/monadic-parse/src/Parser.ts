import { ParserInput } from "./Input.js";
import { inputLog } from "./ParserLogging.js";
import {
  parserLog,
  TraceContext,
  TraceOptions,
  tracing,
  withTraceLogging,
} from "./ParserTracing.js";

/** One way a parser can match: the parsed value and the input left over */
export interface ParseResult<T, E = string> {
  /** result from this stage */
  value: T;

  /** input not consumed by this stage */
  remaining: ParserInput<E>;
}

/**
 * A parsing function returns every possible match at the start of the input,
 * in order. An empty array means the parse failed.
 */
export type ParseFn<T, E = string> = (
  input: ParserInput<E>
) => ParseResult<T, E>[];

/** combinators accept Parser objects or plain parsing functions */
export type ParserLike<T, E = string> = Parser<T, E> | ParseFn<T, E>;

export interface RunOptions {
  /** set this to avoid infinite looping by failing after more than this many parsing steps */
  maxParseCount?: number;
}

/** options for creating a core parser */
export interface ParserArgs {
  /** name to use for trace logging */
  traceName?: string;

  /** enable trace logging */
  trace?: TraceOptions;

  /** true for elements without children like item() and text(),
   * (to avoid intro log statement while tracing) */
  terminal?: boolean;
}

interface ConstructArgs<T, E> extends ParserArgs {
  fn: ParseFn<T, E>;
}

/** bookkeeping for one call to run() */
interface ParseRun {
  parseCount: number;
  maxParseCount?: number;
  loopReported: boolean;
}

let activeRun: ParseRun | undefined;

/** a composable parsing element */
export class Parser<T, E = string> {
  tracingName: string | undefined;
  traceOptions: TraceOptions | undefined;
  terminal: boolean | undefined;
  fn: ParseFn<T, E>;

  constructor(args: ConstructArgs<T, E>) {
    this.tracingName = args.traceName;
    this.traceOptions = args.trace;
    this.terminal = args.terminal;
    this.fn = args.fn;
  }

  /** copy this parser with slightly different settings */
  _cloneWith(p: Partial<ConstructArgs<T, E>>): Parser<T, E> {
    return new Parser({
      traceName: this.tracingName,
      trace: this.traceOptions,
      terminal: this.terminal,
      fn: this.fn,
      ...p,
    });
  }

  /** run the parser inside an active run() */
  _run(input: ParserInput<E>): ParseResult<T, E>[] {
    return runParser(this, input);
  }

  /** record a name for debug tracing */
  traceName(name: string): Parser<T, E> {
    return this._cloneWith({ traceName: name });
  }

  /** trigger tracing for this parser (and by default also this parsers descendants) */
  trace(opts: TraceOptions = {}): Parser<T, E> {
    return this._cloneWith({ trace: opts });
  }

  /** continue parsing with a parser chosen from each result value */
  bind<U>(fn: (value: T) => ParserLike<U, E>): Parser<U, E> {
    return bind(this, fn);
  }

  /** map result values to new values */
  map<U>(fn: (value: T) => U): Parser<U, E> {
    return map(this, fn);
  }

  /** start parsing
   * @return every way this parser matches the start of the input */
  run(input: ParserInput<E>, opts: RunOptions = {}): ParseResult<T, E>[] {
    return withParseRun(opts, () => this._run(input));
  }

  /** start parsing
   * @return the first match, or null if the parser doesn't match */
  parse(input: ParserInput<E>, opts: RunOptions = {}): ParseResult<T, E> | null {
    return this.run(input, opts)[0] ?? null;
  }

  get debugName(): string {
    return this.tracingName ?? "parser";
  }
}

/** Create a Parser from a ParseFn
 * @param traceName name to show in trace logs
 * @param fn the parser function
 * @param terminal true if the parser doesn't call other parsers
 */
export function parser<T, E = string>(
  traceName: string,
  fn: ParseFn<T, E>,
  terminal?: boolean
): Parser<T, E> {
  const terminalArg = terminal ? { terminal } : {};
  return new Parser<T, E>({ fn, traceName, ...terminalArg });
}

/** wrap a plain parsing function into a Parser (Parsers are returned as is) */
export function toParser<T, E>(p: ParserLike<T, E>): Parser<T, E> {
  return p instanceof Parser ? p : parser("fn", p);
}

/**
 * Sequence two parsers: for each match of p, run the parser
 * returned by next() on the remaining input.
 *
 * Results are flattened in order: all continuations of p's first match,
 * then all continuations of p's second match, and so on.
 */
export function bind<T, U, E = string>(
  p: ParserLike<T, E>,
  next: (value: T) => ParserLike<U, E>
): Parser<U, E> {
  const first = toParser(p);
  return parser("bind", (input: ParserInput<E>): ParseResult<U, E>[] =>
    first
      ._run(input)
      .flatMap(({ value, remaining }) => toParser(next(value))._run(remaining))
  );
}

/** return a parser that maps the result values of another parser */
export function map<T, U, E = string>(
  p: ParserLike<T, E>,
  fn: (value: T) => U
): Parser<U, E> {
  const mapped = toParser(p);
  return parser("map", (input: ParserInput<E>): ParseResult<U, E>[] =>
    mapped
      ._run(input)
      .map(({ value, remaining }) => ({ value: fn(value), remaining }))
  );
}

/**
 * Execute a parser by running the core parsing fn on the input
 * also:
 * . check for infinite loops
 * . log if tracing is enabled
 */
function runParser<T, E>(
  p: Parser<T, E>,
  input: ParserInput<E>
): ParseResult<T, E>[] {
  // check for infinite looping
  const parseRun = activeRun;
  if (parseRun) {
    parseRun.parseCount++;
    const { parseCount, maxParseCount } = parseRun;
    if (maxParseCount !== undefined && parseCount > maxParseCount) {
      if (!parseRun.loopReported) {
        parseRun.loopReported = true;
        inputLog(input, "infinite loop?", p.debugName);
      }
      return [];
    }
  }

  // setup trace logging if enabled and active for this parser
  return withTraceLogging<ParseResult<T, E>[]>()(p.traceOptions, runTraced);

  function runTraced(trace: TraceContext | undefined): ParseResult<T, E>[] {
    const traceSuccessOnly = trace?.successOnly;
    if (!p.terminal && tracing && !traceSuccessOnly)
      parserLog(`..${p.debugName}`);

    // run the parser function for this stage
    const results = p.fn(input);

    if (results.length === 0) {
      tracing && !traceSuccessOnly && parserLog(`x ${p.debugName}`);
    } else {
      const count = results.length > 1 ? ` (${results.length})` : "";
      tracing && parserLog(`✓ ${p.debugName}${count}`);
    }
    return results;
  }
}

/** track parse steps while running fn */
function withParseRun<T>(opts: RunOptions, fn: () => T): T {
  const orig = activeRun;
  try {
    const { maxParseCount } = opts;
    activeRun = { parseCount: 0, maxParseCount, loopReported: false };
    return fn();
  } finally {
    activeRun = orig;
  }
}
