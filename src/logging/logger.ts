/**
 * Minimal injected logger used by buffers to report structural changes.
 *
 * Buffers never log by default; pass a logger created with `createLogger` (or
 * any object satisfying `Logger`) through `ByteBufferOptions.logger`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Destination for log lines. `console` satisfies this interface.
 */
export type LogSink = Logger;

export interface LoggerConfig {
  /** Lowest level that is forwarded to the sink. */
  level: LogLevel;
  /** Prefix written in brackets before every message, e.g. `[ByteBuffer]`. */
  scope?: string;
  /** Where log lines go. Defaults to `console`. */
  sink?: LogSink;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const NOOP = (): void => {};

/** Logger that drops everything. */
export const noopLogger: Logger = {
  debug: NOOP,
  info: NOOP,
  warn: NOOP,
  error: NOOP,
};

/**
 * Returns true when a message at `msgLevel` passes a logger configured at
 * `configLevel`.
 */
export function passesLevel(msgLevel: LogLevel, configLevel: LogLevel): boolean {
  return LEVEL_PRIORITY[msgLevel] >= LEVEL_PRIORITY[configLevel];
}

/**
 * Creates a level-filtered, optionally scoped logger.
 *
 * Enabled levels are bound directly to the sink method so that console output
 * points at the caller rather than at this module.
 */
export function createLogger(config: LoggerConfig): Logger {
  const sink: LogSink = config.sink ?? console;
  const prefix = config.scope === undefined ? undefined : `[${config.scope}]`;

  const forLevel = (level: LogLevel): Logger[LogLevel] => {
    if (!passesLevel(level, config.level)) {
      return NOOP;
    }
    const method = sink[level];
    return prefix === undefined ? method.bind(sink) : method.bind(sink, prefix);
  };

  return {
    debug: forLevel("debug"),
    info: forLevel("info"),
    warn: forLevel("warn"),
    error: forLevel("error"),
  };
}
