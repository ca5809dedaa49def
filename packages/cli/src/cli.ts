import yargs from "yargs";
import fs from "fs";
import { dlog } from "berry-pretty";
import {
  enableTracing,
  eof,
  inputPreview,
  type Parser,
  type ParseResult,
  prog1,
  toInput,
} from "monadic-parse";
import {
  quotedString,
  sexpFile,
  skipSpace,
  splits,
} from "monadic-parse/examples";

const grammars = new Map<string, Parser<unknown>>([
  ["sexp", sexpFile],
  ["string", prog1(quotedString, skipSpace, eof())],
  ["splits", splits],
]);

type CliArgs = ReturnType<typeof parseArgs>;
let argv: CliArgs;

export async function cli(rawArgs: string[]): Promise<void> {
  argv = parseArgs(rawArgs);
  argv.trace && enableTracing();
  const files = argv.files as string[];
  files.forEach(parseFile);
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
function parseArgs(args: string[]) {
  return yargs(args)
    .command("$0 <files...>", "parse each file with an example grammar")
    .option("grammar", {
      type: "string",
      choices: [...grammars.keys()],
      default: "sexp",
      describe: "grammar to parse with",
    })
    .option("all", {
      type: "boolean",
      default: false,
      describe: "print every parse, not just the first",
    })
    .option("trace", {
      type: "boolean",
      default: false,
      describe: "log each parser as it runs",
    })
    .option("maxParseCount", {
      requiresArg: true,
      type: "number",
      describe: "stop parsing after this many parser steps",
    })
    .check(({ maxParseCount }) => {
      if (maxParseCount !== undefined && !Number.isFinite(maxParseCount)) {
        throw new Error("maxParseCount must be a number");
      }
      return true;
    })
    .option("baseDir", {
      requiresArg: true,
      type: "string",
      describe: "rm common prefix from file paths",
    })
    .option("details", {
      type: "boolean",
      default: false,
      hidden: true,
      describe: "show the unparsed remainder of each result",
    })
    .help()
    .fail(false)
    .parseSync();
}

function parseFile(path: string): void {
  const src = fs.readFileSync(path, { encoding: "utf8" });
  const basedPath = rmBaseDirPrefix(path);
  const grammar = grammars.get(argv.grammar);
  if (!grammar) {
    throw new Error(`unknown grammar: ${argv.grammar}`);
  }
  const p = argv.trace ? grammar.trace() : grammar;

  // files conventionally end with a newline, which isn't part of the text to split
  const text = argv.grammar === "splits" ? src.replace(/\r?\n$/, "") : src;
  const results = p.run(toInput(text), { maxParseCount: argv.maxParseCount });
  const shown = argv.all ? results : results.slice(0, 1);

  if (!shown.length) {
    console.log(`${basedPath}: no parse`);
  }
  shown.forEach((r) => console.log(JSON.stringify(r.value)));
  argv.details && printDetails(basedPath, results);
}

function printDetails(path: string, results: ParseResult<unknown>[]): void {
  const remaining = results.map((r) => inputPreview(r.remaining));
  dlog(path, { results: results.length, remaining });
}

function rmBaseDirPrefix(path: string): string {
  const baseDir = argv.baseDir;
  if (baseDir) {
    const found = path.indexOf(baseDir);
    if (found !== -1) {
      return path.slice(found + baseDir.length);
    }
  }
  return path;
}
