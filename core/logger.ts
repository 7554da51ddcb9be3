/**
 * Centralized Library Logger
 *
 * A lightweight singleton logger that survives duplicate copies of the
 * package by storing state on globalThis. Supports three log levels:
 * - debug: detailed messages (only shown when debug=true)
 * - warn: important warnings (ALWAYS shown regardless of debug flag)
 * - error: critical errors (ALWAYS shown regardless of debug flag)
 *
 * The codecs themselves only ever log at debug level, so the library is
 * silent until a caller opts in.
 *
 * @example
 * ```ts
 * import { logger } from 'coinbits';
 *
 * // Enable all debug logging
 * logger.configure({ debug: true });
 *
 * // Enable only address validation logs
 * logger.setTagDebug('Address', true);
 *
 * // Route everything into an application log sink
 * logger.configure({ handler: (level, tag, message, ...args) => sink[level](tag, message, args) });
 * ```
 */

export type LogLevel = 'debug' | 'warn' | 'error';

/** Tags used by the library itself. Callers may log under any string. */
export type LogTag = 'Address' | 'Keys' | 'Network' | (string & {});

export type LogHandler = (level: LogLevel, tag: string, message: string, ...args: unknown[]) => void;

export interface LoggerConfig {
  /** Enable debug logging globally (default: false). When false, only warn and error messages are shown. */
  debug?: boolean;
  /** Custom log handler. If provided, replaces console output. Pass null to go back to the console. */
  handler?: LogHandler | null;
}

const LOGGER_KEY = '__coinbits_logger__';

interface LoggerState {
  debug: boolean;
  tags: Record<string, boolean>;
  handler: LogHandler | null;
}

function isLoggerState(value: unknown): value is LoggerState {
  return typeof value === 'object' && value !== null && 'tags' in value && 'debug' in value;
}

function getState(): LoggerState {
  const g = globalThis as unknown as Record<string, unknown>;
  const existing = g[LOGGER_KEY];
  if (isLoggerState(existing)) return existing;
  const fresh: LoggerState = { debug: false, tags: {}, handler: null };
  g[LOGGER_KEY] = fresh;
  return fresh;
}

function isEnabled(tag: string): boolean {
  const state = getState();
  if (tag in state.tags) return state.tags[tag];
  return state.debug;
}

const CONSOLE_SINKS: Record<LogLevel, (...data: unknown[]) => void> = {
  debug: (...data) => console.log(...data),
  warn: (...data) => console.warn(...data),
  error: (...data) => console.error(...data),
};

function emit(level: LogLevel, tag: string, message: string, args: unknown[]): void {
  const { handler } = getState();
  if (handler) {
    handler(level, tag, message, ...args);
    return;
  }
  CONSOLE_SINKS[level](`[${tag}]`, message, ...args);
}

export const logger = {
  /**
   * Configure the logger. Can be called multiple times (last write wins).
   */
  configure(config: LoggerConfig): void {
    const state = getState();
    if (config.debug !== undefined) state.debug = config.debug;
    if (config.handler !== undefined) state.handler = config.handler;
  },

  /**
   * Enable/disable debug logging for a specific tag.
   * Per-tag setting overrides the global debug flag.
   */
  setTagDebug(tag: LogTag, enabled: boolean): void {
    getState().tags[tag] = enabled;
  },

  /** Clear per-tag override, falling back to global debug flag. */
  clearTagDebug(tag: LogTag): void {
    delete getState().tags[tag];
  },

  /** Returns true if debug mode is enabled for the given tag (or globally). */
  isDebugEnabled(tag?: LogTag): boolean {
    return tag ? isEnabled(tag) : getState().debug;
  },

  /** Debug-level log. Only shown when debug is enabled (globally or for this tag). */
  debug(tag: LogTag, message: string, ...args: unknown[]): void {
    if (!isEnabled(tag)) return;
    emit('debug', tag, message, args);
  },

  /** Warning-level log. ALWAYS shown regardless of debug flag. */
  warn(tag: LogTag, message: string, ...args: unknown[]): void {
    emit('warn', tag, message, args);
  },

  /** Error-level log. ALWAYS shown regardless of debug flag. */
  error(tag: LogTag, message: string, ...args: unknown[]): void {
    emit('error', tag, message, args);
  },

  /** Reset all logger state (debug flag, tags, handler). Primarily for tests. */
  reset(): void {
    const g = globalThis as unknown as Record<string, unknown>;
    delete g[LOGGER_KEY];
  },
};
