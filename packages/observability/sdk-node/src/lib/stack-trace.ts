import type { WireStackFrame } from '@stackwire/observability-contracts';

/**
 * The parts of a V8 call site the normalizer reads. Sites collected through
 * `Error.prepareStackTrace` satisfy it.
 */
export type CallSiteLike = Pick<
  NodeJS.CallSite,
  | 'getFileName'
  | 'getLineNumber'
  | 'getColumnNumber'
  | 'getFunctionName'
  | 'getMethodName'
  | 'getTypeName'
  | 'isToplevel'
  | 'isNative'
>;

/**
 * A V8-formatted stack (`error.stack`) or structured call sites, both
 * innermost frame first.
 */
export type StackTraceInput = string | readonly CallSiteLike[];

/**
 * Receives the complete frame list, outermost caller first, and returns the
 * frames to send. May reorder, drop or rewrite frames.
 */
export type StackFrameFilter = (frames: WireStackFrame[]) => WireStackFrame[];

export interface EncodeStackTraceOptions {
  stackFrameFilter?: StackFrameFilter;
  /** Called when the input cannot be parsed; the trace is then sent empty */
  onError?: (error: unknown) => void;
}

const ANONYMOUS = '<anonymous>';

// at [async ][fn (]path:line:col[)]
const LOCATED_FRAME = /^\s*at (?:async )?(?:(.+?) \()?(.*?):(\d+):(\d+)\)?\s*$/;
// at fn (native) / at fn (<anonymous>) / at Promise.all (index 0)
const UNLOCATED_FRAME = /^\s*at (?:async )?(.+?) \(([^():]*)\)\s*$/;
// V8 markers that stand where a path would
const NOT_A_PATH = /^(?:<anonymous>|index \d+)$/;

function isInApp(path: string): boolean {
  return !(
    path.startsWith('node:') ||
    path.startsWith('internal/') ||
    /[\\/]node_modules[\\/]/.test(path)
  );
}

function basename(path: string): string | undefined {
  const name = path.split(/[\\/]/).pop();
  return name ? name : undefined;
}

function buildFrame(
  fn: string | undefined,
  path: string | undefined,
  lineno: number | undefined,
  colno: number | undefined,
): WireStackFrame {
  const frame: WireStackFrame = {};
  if (path) {
    frame.abs_path = path;
    const filename = basename(path);
    if (filename) frame.filename = filename;
  }
  frame.function = fn || ANONYMOUS;
  if (lineno !== undefined) frame.lineno = lineno;
  if (colno !== undefined) frame.colno = colno;
  // frames without a source position are runtime internals
  frame.in_app = path !== undefined && lineno !== undefined && isInApp(path);
  return frame;
}

function parseStackLine(line: string): WireStackFrame | null {
  const located = LOCATED_FRAME.exec(line);
  if (located) {
    return buildFrame(
      located[1],
      located[2],
      parseInt(located[3] ?? '', 10),
      parseInt(located[4] ?? '', 10),
    );
  }

  const unlocated = UNLOCATED_FRAME.exec(line);
  if (unlocated) {
    const location = unlocated[2];
    const path = location === undefined || NOT_A_PATH.test(location) ? undefined : location;
    return buildFrame(unlocated[1], path, undefined, undefined);
  }

  return null;
}

function callSiteFunctionName(site: CallSiteLike): string | undefined {
  const name = site.getFunctionName() ?? site.getMethodName();
  if (!name) {
    return undefined;
  }
  const typeName = site.isToplevel() ? null : site.getTypeName();
  return typeName ? `${typeName}.${name}` : name;
}

function parseCallSite(site: CallSiteLike): WireStackFrame {
  const path = site.getFileName() ?? (site.isNative() ? 'native' : undefined);
  return buildFrame(
    callSiteFunctionName(site),
    path,
    site.getLineNumber() ?? undefined,
    site.getColumnNumber() ?? undefined,
  );
}

/**
 * Parse a stack into frames, outermost caller first.
 *
 * Lines that are not frames (the `Error: message` header, blank lines) are
 * skipped. Throws when a call site cannot be read.
 */
export function parseStackTrace(input: StackTraceInput): WireStackFrame[] {
  const innermostFirst =
    typeof input === 'string'
      ? input
          .split('\n')
          .map(parseStackLine)
          .filter((frame): frame is WireStackFrame => frame !== null)
      : input.map(parseCallSite);

  return innermostFirst.reverse();
}

/**
 * Frames for the `stacktrace` attribute.
 *
 * A trace that cannot be parsed yields no frames rather than failing the
 * capture. The filter runs on the full ordered list; errors it throws are
 * the caller's and propagate.
 */
export function encodeStackTrace(
  input: StackTraceInput,
  options: EncodeStackTraceOptions = {},
): WireStackFrame[] {
  let frames: WireStackFrame[];
  try {
    frames = parseStackTrace(input);
  } catch (error) {
    options.onError?.(error);
    frames = [];
  }

  return options.stackFrameFilter ? options.stackFrameFilter(frames) : frames;
}
