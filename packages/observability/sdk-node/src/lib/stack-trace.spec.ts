import type { WireStackFrame } from '@stackwire/observability-contracts';
import { CallSiteLike, encodeStackTrace, parseStackTrace } from './stack-trace';

const stack = [
  'Error: boom',
  '    at inner (/app/src/inner.js:3:11)',
  '    at async outer (/app/src/outer.js:7:5)',
  '    at /app/src/main.js:1:1',
].join('\n');

const innerFrame: WireStackFrame = {
  abs_path: '/app/src/inner.js',
  filename: 'inner.js',
  function: 'inner',
  lineno: 3,
  colno: 11,
  in_app: true,
};

function site(overrides: Partial<CallSiteLike> = {}): CallSiteLike {
  return {
    getFileName: () => '/app/src/index.js',
    getLineNumber: () => 10,
    getColumnNumber: () => 2,
    getFunctionName: () => null,
    getMethodName: () => null,
    getTypeName: () => null,
    isToplevel: () => true,
    isNative: () => false,
    ...overrides,
  };
}

function captureCallSites(): NodeJS.CallSite[] {
  const original = Error.prepareStackTrace;
  let sites: NodeJS.CallSite[] = [];
  Error.prepareStackTrace = (_error, callSites) => {
    sites = callSites;
    return '';
  };
  try {
    void new Error('probe').stack;
  } finally {
    Error.prepareStackTrace = original;
  }
  return sites;
}

describe('parseStackTrace', () => {
  it('should order frames outermost caller first', () => {
    const frames = parseStackTrace(stack);

    expect(frames).toEqual([
      {
        abs_path: '/app/src/main.js',
        filename: 'main.js',
        function: '<anonymous>',
        lineno: 1,
        colno: 1,
        in_app: true,
      },
      {
        abs_path: '/app/src/outer.js',
        filename: 'outer.js',
        function: 'outer',
        lineno: 7,
        colno: 5,
        in_app: true,
      },
      innerFrame,
    ]);
  });

  it('should mark runtime and dependency frames as not in app', () => {
    const frames = parseStackTrace(
      [
        '    at handle (/app/node_modules/express/lib/router.js:10:3)',
        '    at Module._compile (node:internal/modules/cjs/loader:1376:14)',
      ].join('\n'),
    );

    expect(frames).toEqual([
      {
        abs_path: 'node:internal/modules/cjs/loader',
        filename: 'loader',
        function: 'Module._compile',
        lineno: 1376,
        colno: 14,
        in_app: false,
      },
      {
        abs_path: '/app/node_modules/express/lib/router.js',
        filename: 'router.js',
        function: 'handle',
        lineno: 10,
        colno: 3,
        in_app: false,
      },
    ]);
  });

  it('should keep frames without a source position', () => {
    expect(parseStackTrace('    at Array.map (<anonymous>)')).toEqual([
      {
        function: 'Array.map',
        in_app: false,
      },
    ]);
  });

  it('should not take a promise combinator index for a path', () => {
    expect(parseStackTrace('    at async Promise.all (index 0)')).toEqual([
      {
        function: 'Promise.all',
        in_app: false,
      },
    ]);
  });

  it('should keep native as the location of native frames', () => {
    expect(parseStackTrace('    at JSON.parse (native)')).toEqual([
      {
        abs_path: 'native',
        filename: 'native',
        function: 'JSON.parse',
        in_app: false,
      },
    ]);
  });

  it('should skip lines that are not frames', () => {
    expect(parseStackTrace('TypeError: nothing to see\n\n  more text')).toEqual([]);
  });

  it('should read structured call sites, innermost last', () => {
    const frames = parseStackTrace([
      site({ getFunctionName: () => 'handle', getTypeName: () => 'Router', isToplevel: () => false }),
      site({ getFileName: () => '/app/src/main.js', getLineNumber: () => 1, getColumnNumber: () => 1 }),
    ]);

    expect(frames).toEqual([
      {
        abs_path: '/app/src/main.js',
        filename: 'main.js',
        function: '<anonymous>',
        lineno: 1,
        colno: 1,
        in_app: true,
      },
      {
        abs_path: '/app/src/index.js',
        filename: 'index.js',
        function: 'Router.handle',
        lineno: 10,
        colno: 2,
        in_app: true,
      },
    ]);
  });

  it('should read call sites captured from V8', () => {
    const frames = parseStackTrace(captureCallSites());
    const innermost = frames[frames.length - 1];

    expect(innermost?.abs_path).toBe(__filename);
    expect(innermost?.function).toBe('captureCallSites');
  });
});

describe('encodeStackTrace', () => {
  it('should pass the full ordered list to the filter and send what it returns', () => {
    const filter = jest.fn((frames: WireStackFrame[]) => frames.slice(-1));

    const frames = encodeStackTrace(stack, { stackFrameFilter: filter });

    expect(filter).toHaveBeenCalledTimes(1);
    expect(filter.mock.calls[0]?.[0].map((frame) => frame.function)).toEqual([
      '<anonymous>',
      'outer',
      'inner',
    ]);
    expect(frames).toEqual([innerFrame]);
  });

  it('should let the filter rewrite frames', () => {
    const frames = encodeStackTrace(stack, {
      stackFrameFilter: (all) => all.map((frame) => ({ ...frame, abs_path: 'redacted' })),
    });

    expect(frames.map((frame) => frame.abs_path)).toEqual(['redacted', 'redacted', 'redacted']);
  });

  it('should fall back to no frames when a call site cannot be read', () => {
    const onError = jest.fn();
    const broken = site({
      getFileName: () => {
        throw new Error('detached call site');
      },
    });

    const frames = encodeStackTrace([site(), broken], { onError });

    expect(frames).toEqual([]);
    expect(onError).toHaveBeenCalledWith(new Error('detached call site'));
  });

  it('should still run the filter on an unparsable trace', () => {
    const broken = site({
      getLineNumber: () => {
        throw new Error('gone');
      },
    });

    const frames = encodeStackTrace([broken], {
      stackFrameFilter: (all) => [...all, { function: 'marker' }],
    });

    expect(frames).toEqual([{ function: 'marker' }]);
  });

  it('should propagate errors thrown by the filter', () => {
    expect(() =>
      encodeStackTrace(stack, {
        stackFrameFilter: () => {
          throw new Error('filter bug');
        },
      }),
    ).toThrow('filter bug');
  });

  it('should return equal frames for the same input and filter', () => {
    const filter = (frames: WireStackFrame[]) => frames.filter((frame) => frame.function !== 'outer');

    expect(encodeStackTrace(stack, { stackFrameFilter: filter })).toEqual(
      encodeStackTrace(stack, { stackFrameFilter: filter }),
    );
  });
});
