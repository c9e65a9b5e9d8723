/**
 * @rowsift/logger - Leveled diagnostic logger.
 *
 * Every line goes to the diagnostic stream (stderr by default) so that
 * nothing interleaves with data on stdout. Lines look like:
 *   [INFO] Processing file: data/a.csv
 *   [DEBUG] [csv] Header: id, contact
 *
 * Verbosity picks the most detailed level that is printed:
 *   -1 errors only, 0 warnings (default), 1 info, 2 debug, 3 trace.
 */

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

/** Minimum verbosity at which each level is printed. */
export const LEVEL_THRESHOLDS: Record<LogLevel, number> = {
  error: -1,
  warn: 0,
  info: 1,
  debug: 2,
  trace: 3,
};

const LEVEL_TAGS: Record<LogLevel, string> = {
  error: "[ERROR]",
  warn: "[WARNING]",
  info: "[INFO]",
  debug: "[DEBUG]",
  trace: "[TRACE]",
};

export const MIN_VERBOSITY = -1;
export const MAX_VERBOSITY = 3;

export interface LoggerConfig {
  /** Default: 0 (errors and warnings). Clamped to [-1, 3]. */
  verbosity?: number;
  /** Line sink. Default: console.error. */
  write?: (line: string) => void;
}

export interface Logger {
  readonly verbosity: number;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  trace(message: string): void;
  /** True when `level` would be printed; guards expensive messages. */
  enabled(level: LogLevel): boolean;
  /** Logger whose lines carry `[scope]` after the level tag. */
  child(scope: string): Logger;
}

function clampVerbosity(verbosity: number): number {
  if (!Number.isFinite(verbosity)) return 0;
  return Math.min(MAX_VERBOSITY, Math.max(MIN_VERBOSITY, Math.trunc(verbosity)));
}

function buildLogger(
  verbosity: number,
  write: (line: string) => void,
  scopes: string[],
): Logger {
  const prefix = scopes.map((s) => `[${s}] `).join("");

  function enabled(level: LogLevel): boolean {
    return verbosity >= LEVEL_THRESHOLDS[level];
  }

  function log(level: LogLevel, message: string): void {
    if (!enabled(level)) return;
    write(`${LEVEL_TAGS[level]} ${prefix}${message}`);
  }

  return {
    verbosity,
    error: (message) => log("error", message),
    warn: (message) => log("warn", message),
    info: (message) => log("info", message),
    debug: (message) => log("debug", message),
    trace: (message) => log("trace", message),
    enabled,
    child: (scope) => buildLogger(verbosity, write, [...scopes, scope]),
  };
}

/**
 * Create a logger.
 *
 * ```typescript
 * import { createLogger } from '@rowsift/logger';
 *
 * const log = createLogger({ verbosity: 1 });
 * log.info("Processing file: a.csv"); // [INFO] Processing file: a.csv
 * log.debug("hidden at verbosity 1");
 * ```
 */
export function createLogger(config?: LoggerConfig): Logger {
  const verbosity = clampVerbosity(config?.verbosity ?? 0);
  const write = config?.write ?? ((line: string) => console.error(line));
  return buildLogger(verbosity, write, []);
}

/** Logger that prints nothing. Default for library callers. */
export function silentLogger(): Logger {
  return buildLogger(MIN_VERBOSITY - 1, () => {}, []);
}
