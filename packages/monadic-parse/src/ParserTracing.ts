export let tracing = false;

/** enable tracing of parser activity via .trace() */
export function enableTracing(enable = true): void {
  tracing = enable;
}

/** base logger. (can be overriden to a capturing logger for tests) */
export let logger = console.log;

/** no-op logger, for when tracing is disabled */
const noLog: typeof console.log = () => {};

/** logger while tracing is active, otherwise noop */
export let parserLog: typeof console.log = noLog;

/** options to .trace() on a parser stage */
export interface TraceOptions {
  /** trace this parser, but not children */
  shallow?: boolean;

  /** don't trace this parser or its children, even if the parent is tracing */
  hide?: boolean;

  /** trace less info */
  successOnly?: boolean;
}

/** runtime stack info about currently active trace logging */
export interface TraceContext {
  indent: number;
  successOnly?: boolean;
}

/** trace settings inherited from the enclosing parser stage */
let activeTrace: TraceContext | undefined;

/** use temporary logger for tests */
export function _withBaseLogger<T>(logFn: typeof console.log, fn: () => T): T {
  const orig = logger;
  try {
    logger = logFn;
    return fn();
  } finally {
    logger = orig;
  }
}

type TraceLoggingFn<T> = (
  trace: TraceOptions | undefined,
  fn: (traceContext: TraceContext | undefined) => T
) => T;

export const withTraceLogging = <T>(): TraceLoggingFn<T> =>
  tracing ? withTraceLoggingInternal : stubTraceLogging;

function stubTraceLogging<T>(
  trace: TraceOptions | undefined,
  fn: (traceContext: TraceContext | undefined) => T
): T {
  return fn(undefined);
}

/** how one parser stage logs, and what it passes on to nested stages */
interface TraceScope {
  log: typeof console.log;
  inherited: TraceContext | undefined;
}

/** setup trace logging inside a parser stage */
function withTraceLoggingInternal<T>(
  trace: TraceOptions | undefined,
  fn: (traceContext: TraceContext | undefined) => T
): T {
  const scope = traceScope(activeTrace, trace);
  const origLog = parserLog;
  const origTrace = activeTrace;
  try {
    parserLog = scope.log;
    activeTrace = scope.inherited;
    return fn(scope.inherited);
  } finally {
    parserLog = origLog;
    activeTrace = origTrace;
  }
}

/**
 * @param parent trace settings from the enclosing stage, if it is tracing
 * @param trace trace options set on this stage
 */
function traceScope(
  parent: TraceContext | undefined,
  trace: TraceOptions | undefined
): TraceScope {
  if (trace?.hide) {
    return { log: noLog, inherited: undefined };
  }

  let current = parent;
  if (trace?.shallow) {
    current = undefined;
  } else if (!current && trace) {
    current = { indent: 0, successOnly: trace.successOnly };
  }

  const log = parent || trace ? indentedLog(current?.indent ?? 0) : noLog;
  const inherited = current && { ...current, indent: current.indent + 1 };
  return { log, inherited };
}

/** log through the base logger, padding the first message */
function indentedLog(indent: number): typeof console.log {
  const pad = "  ".repeat(indent);
  return (...msgs: unknown[]) => {
    logger(`${pad}${msgs[0]}`, ...msgs.slice(1));
  };
}
