import { testParse, testParseTokens } from "monadic-parse-testing";
import { expect, test } from "vitest";
import { toInput, type ParserInput } from "../Input.js";
import { bind, parser, Parser, type ParseFn } from "../Parser.js";
import {
  alt,
  and,
  eof,
  fail,
  fn,
  ifP,
  is,
  isNot,
  item,
  maybe,
  not,
  oneOrMore,
  onlyFirst,
  parserArg,
  plus,
  prog1,
  prog2,
  result,
  satisfies,
  seq,
  text,
  unless,
  when,
  withSep,
  zeroOrMore,
} from "../ParserCombinator.js";
import { letter } from "../examples/CharClasses.js";

test("item() takes one element", () => {
  const { values, remaining } = testParse(item(), "foo");
  expect(values).toEqual(["f"]);
  expect(remaining).toEqual(["oo"]);
});

test("item() fails on empty input", () => {
  expect(testParse(item(), "").results).toEqual([]);
});

test("result() consumes nothing", () => {
  const { values, remaining } = testParse(result(42), "abc");
  expect(values).toEqual([42]);
  expect(remaining).toEqual(["abc"]);
});

test("fail() never matches", () => {
  expect(testParse(fail(), "abc").results).toEqual([]);
  expect(testParse(fail(), "").results).toEqual([]);
});

test("bind() continues with the value of the first parser", () => {
  const p = bind(item(), (c) => result([":char", c]));
  const { values, remaining } = testParse(p, "foo");
  expect(values).toEqual([[":char", "f"]]);
  expect(remaining).toEqual(["oo"]);
});

test("bind() fails if the first parser fails", () => {
  const p = bind(text("x"), () => result(1));
  expect(testParse(p, "abc").results).toEqual([]);
});

test("bind() keeps every continuation, in order", () => {
  const p = bind(plus(text("a"), text("ab")), (s) =>
    plus(result(`${s}1`), result(`${s}2`))
  );
  const { values, remaining } = testParse(p, "abc");
  expect(values).toEqual(["a1", "a2", "ab1", "ab2"]);
  expect(remaining).toEqual(["bc", "bc", "c", "c"]);
});

test("plus() keeps results from every alternative", () => {
  const p = plus(seq(item(), item()), item());
  const { values, remaining } = testParse(p, "asd");
  expect(values).toEqual([["a", "s"], "a"]);
  expect(remaining).toEqual(["d", "sd"]);
});

test("plus() with failing alternatives", () => {
  expect(testParse(plus(fail(), text("a")), "a").values).toEqual(["a"]);
  expect(testParse(plus(text("b"), fail()), "a").results).toEqual([]);
});

test("alt() returns only the first successful alternative", () => {
  let p1Calls = 0;
  let p2Calls = 0;
  const p1: ParseFn<number> = () => {
    p1Calls++;
    return [];
  };
  const p2 = parser("p2", (input: ParserInput<string>) => {
    p2Calls++;
    return [{ value: 7, remaining: input }];
  });
  const input = toInput("xyz");
  const p = alt(p1, p2);
  const results = p.run(input);
  expect(results).toHaveLength(1);
  expect(results[0].value).toBe(7);
  expect(results[0].remaining).toBe(input);
  expect(p1Calls).toBe(1);
  expect(p2Calls).toBe(1);

  expect(p.run(input)).toHaveLength(1);
  expect(p1Calls).toBe(2);
  expect(p2Calls).toBe(2);
});

test("alt() doesn't try later alternatives after a success", () => {
  let laterCalls = 0;
  const later: ParseFn<string> = () => {
    laterCalls++;
    return [];
  };
  const { values } = testParse(alt(plus(text("a"), text("ab")), later), "ab");
  expect(values).toEqual(["a", "ab"]);
  expect(laterCalls).toBe(0);
});

test("alt() accepts strings", () => {
  const { values, remaining } = testParse(alt("#import", "//"), "// x");
  expect(values).toEqual(["//"]);
  expect(remaining).toEqual([" x"]);
});

test("not() succeeds when its parser fails", () => {
  const { values, remaining } = testParse(not(text("a")), "bcd");
  expect(values).toEqual([true]);
  expect(remaining).toEqual(["bcd"]);
});

test("not() fails when its parser matches", () => {
  expect(testParse(not(text("a")), "abc").results).toEqual([]);
  expect(testParse(not(item()), "").values).toEqual([true]);
});

test("zeroOrMore() takes as many as possible", () => {
  const { results, values, remaining } = testParse(zeroOrMore(is("a")), "aaaab");
  expect(results).toHaveLength(1);
  expect(values).toEqual([["a", "a", "a", "a"]]);
  expect(remaining).toEqual(["b"]);
});

test("zeroOrMore() matches nothing", () => {
  const { results, values, remaining } = testParse(zeroOrMore(is("a")), "bbbba");
  expect(results).toHaveLength(1);
  expect(values).toEqual([[]]);
  expect(remaining).toEqual(["bbbba"]);
});

test("oneOrMore() requires a match", () => {
  expect(testParse(oneOrMore(is("a")), "bbb").results).toEqual([]);
  const { values, remaining } = testParse(oneOrMore(is("a")), "aab");
  expect(values).toEqual([["a", "a"]]);
  expect(remaining).toEqual(["b"]);
});

test("seq() collects values", () => {
  const { values, remaining } = testParse(seq("a", letter, text("c")), "abcd");
  expect(values).toEqual([["a", "b", "c"]]);
  expect(remaining).toEqual(["d"]);
  expect(testParse(seq("a", "c"), "ab").results).toEqual([]);
});

test("and() returns the last value", () => {
  const { values, remaining } = testParse(and("a", text("b")), "abc");
  expect(values).toEqual(["b"]);
  expect(remaining).toEqual(["c"]);
  expect(testParse(and("a", "b"), "ac").results).toEqual([]);
});

test("prog1() and prog2()", () => {
  expect(testParse(prog1(letter, text(";")), "x;").values).toEqual(["x"]);
  expect(testParse(prog2("(", letter, ")"), "(q)").values).toEqual(["q"]);
});

test("maybe() succeeds with undefined if its parser fails", () => {
  const missing = testParse(maybe(text("a")), "b");
  expect(missing.values).toEqual([undefined]);
  expect(missing.remaining).toEqual(["b"]);

  const found = testParse(maybe(text("a")), "ab");
  expect(found.values).toEqual(["a"]);
  expect(found.remaining).toEqual(["b"]);
});

test("ifP() chooses then or otherwise", () => {
  const p = ifP(text("a"), text("b"), text("c"));
  expect(testParse(p, "ab").values).toEqual(["b"]);
  expect(testParse(p, "ab").remaining).toEqual([""]);
  expect(testParse(p, "c").values).toEqual(["c"]);

  // the test matched, so otherwise isn't tried
  expect(testParse(p, "ac").results).toEqual([]);
});

test("ifP() without otherwise fails if the test fails", () => {
  expect(testParse(ifP(text("a"), text("b")), "b").results).toEqual([]);
});

test("when() runs the body after the test matches", () => {
  const p = when(text("a"), text("b"));
  expect(testParse(p, "ab").values).toEqual(["b"]);
  expect(testParse(p, "b").results).toEqual([]);
});

test("unless() runs the body only if the test fails", () => {
  const p = unless(text("a"), text("b"));
  const { values, remaining } = testParse(p, "b");
  expect(values).toEqual(["b"]);
  expect(remaining).toEqual([""]);
  expect(testParse(p, "ab").results).toEqual([]);
});

test("satisfies() and isNot()", () => {
  const vowel = satisfies((c: string) => "aeiou".includes(c));
  expect(testParse(vowel, "ex").values).toEqual(["e"]);
  expect(testParse(vowel, "xe").results).toEqual([]);
  expect(testParse(isNot((c: string) => c === "x"), "ab").values).toEqual([
    "a",
  ]);

  const even = satisfies((n: number) => n % 2 === 0, item<number>());
  expect(testParseTokens(even, [4, 5]).values).toEqual([4]);
});

test("is() on tokens", () => {
  const { values, remaining } = testParseTokens(oneOrMore(is(1)), [1, 1, 2]);
  expect(values).toEqual([[1, 1]]);
  expect(remaining).toEqual([[2]]);
});

test("text() matches whole strings only", () => {
  expect(testParse(text("abc"), "abcd").remaining).toEqual(["d"]);
  expect(testParse(text("abc"), "abd").results).toEqual([]);
  expect(testParse(text("abc"), "ab").results).toEqual([]);
});

test("eof()", () => {
  expect(testParse(eof(), "").values).toEqual([true]);
  expect(testParse(eof(), "a").results).toEqual([]);
});

test("onlyFirst() commits to the first result", () => {
  const ambiguous = plus(text("a"), text("ab"));
  expect(testParse(ambiguous, "abc").remaining).toEqual(["bc", "c"]);
  const { values, remaining } = testParse(onlyFirst(ambiguous), "abc");
  expect(values).toEqual(["a"]);
  expect(remaining).toEqual(["bc"]);
});

test("recurse with fn()", () => {
  const depth: Parser<number> = alt(
    prog2(text("("), fn(() => depth), text(")")).map((d) => d + 1),
    result(0)
  );
  const { values, remaining } = testParse(depth, "((()))x");
  expect(values).toEqual([3]);
  expect(remaining).toEqual(["x"]);
});

test("withSep() with a trailing separator", () => {
  const p = withSep(text(","), letter);
  expect(testParse(p, "a,b,c").values).toEqual([["a", "b", "c"]]);
  const { values, remaining } = testParse(p, "a,b,");
  expect(values).toEqual([["a", "b"]]);
  expect(remaining).toEqual([""]);
  expect(testParse(p, "").values).toEqual([[]]);
});

test("withSep() options", () => {
  const strict = withSep(text(","), letter, { trailing: false });
  expect(testParse(strict, "a,b,").remaining).toEqual([","]);

  const some = withSep(text(","), letter, { requireOne: true });
  expect(testParse(some, "").results).toEqual([]);
  expect(testParse(some, "z").values).toEqual([["z"]]);
});

test("parse() returns the first result or null", () => {
  expect(item().parse(toInput(""))).toBeNull();
  expect(plus(text("a"), text("ab")).parse(toInput("ab"))?.value).toBe("a");
});

test("map() and bind() methods", () => {
  const p = letter.map((c) => c.toUpperCase()).bind((c) => result(c + c));
  expect(testParse(p, "q").values).toEqual(["QQ"]);
});

test("parserArg() rejects non parsers", () => {
  expect(() => parserArg(JSON.parse("42"))).toThrow(TypeError);
  expect(parserArg("ab").debugName).toBe("text 'ab'");
});
