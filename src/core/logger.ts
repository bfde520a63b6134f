/**
 * @file src/core/logger.ts
 * @summary Centralised logging abstraction for the triage engine. Every message is
 * prefixed with "[Triage]" for easy filtering. Supports four severity levels (debug,
 * info, warn, error) plus a "silent" mode, and a `swallow` helper for catch blocks that
 * deliberately continue, which logs at debug level. The log level can be changed at
 * runtime via `globalThis.__triageLog.setLevel("debug")`.
 *
 * @exports
 *   - LogLevel - type union of log severity levels
 *   - log - singleton logger object with debug/info/warn/error/swallow methods
 */

const PREFIX = "[Triage]";

// Bind console methods once so call-sites don't trigger the no-console rule.
const _debug = globalThis.console.debug.bind(globalThis.console);
const _log = globalThis.console.log.bind(globalThis.console);
const _warn = globalThis.console.warn.bind(globalThis.console);
const _error = globalThis.console.error.bind(globalThis.console);

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, v);
}

function levelFromEnv(): LogLevel {
  const raw = String(process.env.TRIAGE_LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

let currentLevel: LogLevel = levelFromEnv();

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export const log = {
  /** Set the minimum log level.  "silent" suppresses everything. */
  setLevel(level: LogLevel) {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  /** Verbose detail - silenced unless level is "debug". */
  debug(...args: unknown[]) {
    if (shouldLog("debug")) _debug(PREFIX, ...args);
  },

  /** General informational messages. */
  info(...args: unknown[]) {
    if (shouldLog("info")) _log(PREFIX, ...args);
  },

  /** Unexpected-but-recoverable situations. */
  warn(...args: unknown[]) {
    if (shouldLog("warn")) _warn(PREFIX, ...args);
  },

  /** Genuine errors that need attention. */
  error(...args: unknown[]) {
    if (shouldLog("error")) _error(PREFIX, ...args);
  },

  /**
   * For catch blocks whose failure is tolerated (fire-and-forget side effects,
   * background prefetch). Logs at **debug** level so the error is not lost.
   *
   * ```ts
   * void Promise.resolve(effects.refreshWidgets?.()).catch((e) => log.swallow("refresh widgets", e));
   * ```
   */
  swallow(context: string, err?: unknown) {
    if (shouldLog("debug")) {
      _debug(PREFIX, `[swallowed] ${context}:`, err);
    }
  },
};

declare global {
  var __triageLog: typeof log | undefined;
}

// Expose on globalThis so the level can be toggled from a REPL or devtools:
//   globalThis.__triageLog.setLevel("debug")
globalThis.__triageLog = log;
