import debugFactory, { type Debugger } from 'debug';

export type Logger = {
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
  debug: (message: string, ...args: unknown[]) => void;
  /** Writes each line as its own debug record, keeping trace indentation intact. */
  debugLines: (lines: string[]) => void;
  child: (suffix: string) => Logger;
};

const fromDebugger = (dbg: Debugger, verbose: boolean): Logger => {
  const log = (level: 'info' | 'warn' | 'error', message: string, ...args: unknown[]) => {
    const prefix = `[${level.toUpperCase()}] ${dbg.namespace}:`;
    // eslint-disable-next-line no-console
    console[level](`${prefix} ${message}`, ...args);
  };

  const debug = (message: string, ...args: unknown[]) => {
    if (verbose) {
      dbg(message, ...args);
    }
  };

  return {
    info: (message, ...args) => log('info', message, ...args),
    warn: (message, ...args) => log('warn', message, ...args),
    error: (message, ...args) => log('error', message, ...args),
    debug,
    debugLines: (lines) => {
      if (!verbose) return;
      // %s keeps debug from interpreting format specifiers inside captured values.
      lines.forEach((line) => dbg('%s', line));
    },
    child: (suffix) => fromDebugger(dbg.extend(suffix), verbose),
  };
};

export const createLogger = (namespace = 'har-replay', verbose = false): Logger => {
  return fromDebugger(debugFactory(namespace), verbose);
};
