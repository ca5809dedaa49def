import { ParserInput, inputElements } from "./Input.js";
import { logger, parserLog } from "./ParserTracing.js";

/** number of input elements shown after a log message */
const previewLength = 20;

/** log a message along with a preview of the upcoming input */
export function inputLog(input: ParserInput<unknown>, ...msgs: unknown[]): void {
  logInternal(logger, input, ...msgs);
}

/** log a message along with an input preview, but only if tracing is active in the current parser */
export function inputTrace(
  input: ParserInput<unknown>,
  ...msgs: unknown[]
): void {
  logInternal(parserLog, input, ...msgs);
}

/** @return a short printable summary of the upcoming input elements */
export function inputPreview(input: ParserInput<unknown>): string {
  const elems = inputElements(input, previewLength + 1);
  if (elems.length === 0) return "<end>";

  const shown = elems.slice(0, previewLength);
  const more = elems.length > previewLength ? " ..." : "";
  if (shown.every((e) => typeof e === "string" && e.length === 1)) {
    return JSON.stringify(shown.join("")) + more;
  }
  return shown.map((e) => JSON.stringify(e)).join(" ") + more;
}

function logInternal(
  log: typeof console.log,
  input: ParserInput<unknown>,
  ...msgs: unknown[]
): void {
  log(...msgs);
  log("at:", inputPreview(input));
}
