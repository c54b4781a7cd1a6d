import util from "node:util";

export type LoggerFunction = (
  message: string,
  ...optionalParams: unknown[]
) => void;

/**
 * Simple interface for logging.
 */
export interface Logger {
  trace: LoggerFunction;
  debug: LoggerFunction;
  info: LoggerFunction;
  warn: LoggerFunction;
  error: LoggerFunction;
}

export const LogLevels: (keyof Logger)[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
];

const _debuglog = util.debuglog("future-chain");

const noop = () => undefined;

/**
 * Default `Logger` implementation.
 *
 * - `trace`, `debug` and `info` go to `util.debuglog("future-chain")`, so
 *   set `NODE_DEBUG=future-chain` to see settlement traffic.
 *
 * - `warn` and `error` go to `console.warn` and `console.error`.
 *
 * @see https://nodejs.org/api/util.html#util_util_debuglog_section
 */
export const ConsoleLogger: Logger = Object.freeze({
  trace: _debuglog,
  debug: _debuglog,
  info: _debuglog,
  warn: (...args: unknown[]) => {
    // eslint-disable-next-line no-console
    console.warn(...args);
  },
  error: (...args: unknown[]) => {
    // eslint-disable-next-line no-console
    console.error(...args);
  },
});

/**
 * `Logger` that disables all logging.
 */
export const NoLogger: Logger = Object.freeze({
  trace: noop,
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
});

let _logger: Logger = _debuglog.enabled ? ConsoleLogger : NoLogger;

export function setLogger(l: Logger): void {
  if (LogLevels.some((ea) => typeof l[ea] !== "function")) {
    throw new Error("invalid logger, must implement " + LogLevels.join(", "));
  }
  _logger = l;
}

export function logger(): Logger {
  return _logger;
}

function isLogLevel(s: unknown): s is keyof Logger {
  return LogLevels.some((ea) => ea === s);
}

/**
 * @return `s` if it names a log level, otherwise `fallback`
 */
export function toLogLevel(
  s: unknown,
  fallback: keyof Logger = "error",
): keyof Logger {
  return isLogLevel(s) ? s : fallback;
}

function buildLogger(f: (level: keyof Logger) => LoggerFunction): Logger {
  return {
    trace: f("trace"),
    debug: f("debug"),
    info: f("info"),
    warn: f("warn"),
    error: f("error"),
  };
}

export const Log = {
  withLevels: (delegate: Logger): Logger =>
    buildLogger((level) => {
      const prefix = (level + " ").substring(0, 5) + " | ";
      return (message: unknown, ...optionalParams: unknown[]) => {
        if (String(message ?? "").trim().length > 0) {
          delegate[level](prefix + String(message), ...optionalParams);
        }
      };
    }),

  withTimestamps: (delegate: Logger): Logger =>
    buildLogger(
      (level) =>
        (message: unknown, ...optionalParams: unknown[]) => {
          if (message != null) {
            delegate[level](
              new Date().toISOString() + " | " + String(message),
              ...optionalParams,
            );
          }
        },
    ),

  filterLevels: (l: Logger, minLogLevel: keyof Logger): Logger => {
    const minLogLevelIndex = LogLevels.indexOf(minLogLevel);
    return buildLogger((level) =>
      LogLevels.indexOf(level) < minLogLevelIndex ? noop : l[level].bind(l),
    );
  },
};
