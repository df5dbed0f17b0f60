/**
 * Logger
 *
 * Console logger shared by the engine, the daemon adapters and the CLI.
 * Silent by default: engine classes stay quiet unless the daemon injects
 * a live logger.
 */

export interface Logger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  /** Only written when the logger was created with `verbose`. */
  debug: (...args: unknown[]) => void;
}

export interface LoggerOptions {
  /** Suppress all output (default true) */
  silent?: boolean;
  /** Prepended to every message, e.g. "[Engine]" */
  prefix?: string;
  /** Emit debug lines */
  verbose?: boolean;
}

const noop = (): void => {};

const silentLogger: Logger = {
  log: noop,
  warn: noop,
  error: noop,
  debug: noop,
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const { silent = true, prefix, verbose = false } = options;

  if (silent) {
    return silentLogger;
  }

  const formatArgs = (args: unknown[]): unknown[] => {
    if (prefix && args.length > 0 && typeof args[0] === "string") {
      return [`${prefix} ${args[0]}`, ...args.slice(1)];
    }
    if (prefix) {
      return [prefix, ...args];
    }
    return args;
  };

  return {
    log: (...args) => console.log(...formatArgs(args)),
    warn: (...args) => console.warn(...formatArgs(args)),
    error: (...args) => console.error(...formatArgs(args)),
    debug: verbose ? (...args) => console.debug(...formatArgs(args)) : noop,
  };
}
