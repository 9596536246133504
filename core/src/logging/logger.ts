export type LogFn = (message: string, details?: Record<string, unknown>) => void;

export type Logger = {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
};

function emit(write: (...args: unknown[]) => void): LogFn {
  return (message, details) => {
    if (details === undefined) write(message);
    else write(message, details);
  };
}

export function createConsoleLogger(opts: { debug?: boolean } = {}): Logger {
  return {
    info: emit((...args) => console.log(...args)),
    warn: emit((...args) => console.warn(...args)),
    error: emit((...args) => console.error(...args)),
    debug: opts.debug ? emit((...args) => console.debug(...args)) : () => {},
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
