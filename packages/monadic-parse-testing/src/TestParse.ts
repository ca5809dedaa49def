import {
  type ParseResult,
  type Parser,
  type RunOptions,
  _withBaseLogger,
  inputElements,
  inputText,
  toInput,
} from "monadic-parse";
import { expect } from "vitest";
import { logCatch } from "./LogCatcher.js";

export interface TestParseResult<T> {
  results: ParseResult<T, string>[];

  /** parsed values, one per result */
  values: T[];

  /** unparsed text, one per result */
  remaining: string[];
}

export interface TokensParseResult<T, E> {
  results: ParseResult<T, E>[];
  values: T[];
  remaining: E[][];
}

const defaultRunOptions: RunOptions = { maxParseCount: 10000 };

/** utility for testing parsers on character input */
export function testParse<T>(
  p: Parser<T>,
  src: string,
  opts: RunOptions = defaultRunOptions
): TestParseResult<T> {
  const results = p.run(toInput(src), opts);
  const values = results.map((r) => r.value);
  const remaining = results.map((r) => inputText(r.remaining));
  return { results, values, remaining };
}

/** utility for testing parsers on token (or other element) arrays */
export function testParseTokens<T, E>(
  p: Parser<T, E>,
  tokens: readonly E[],
  opts: RunOptions = defaultRunOptions
): TokensParseResult<T, E> {
  const results = p.run(toInput(tokens), opts);
  const values = results.map((r) => r.value);
  const remaining = results.map((r) => inputElements(r.remaining));
  return { results, values, remaining };
}

/** run a test function and expect that no logs are produced */
export function expectNoLogErr<T>(fn: () => T): T {
  const { log, logged } = logCatch();
  const result = _withBaseLogger(log, fn);
  expect(logged()).eq("");
  return result;
}
