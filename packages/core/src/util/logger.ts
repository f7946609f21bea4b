/**
 * Structured JSON-line logging.
 *
 * Every line looks like
 *   {"level":"info","msg":"...","timestamp":"...","module":"selection",...fields}
 *
 * The threshold comes from PRACTICE_LOG_LEVEL (debug | info | warn | error | silent).
 * Test runs default to silent unless the variable is set.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LEVEL_ORDER, value);

const levelFromEnv = (): LogLevel => {
  const raw = process.env.PRACTICE_LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  return process.env.NODE_ENV === "test" ? "silent" : "info";
};

let threshold: LogLevel = levelFromEnv();

export const setLogLevel = (level: LogLevel): void => {
  threshold = level;
};

export const getLogLevel = (): LogLevel => threshold;

const write = (
  level: Exclude<LogLevel, "silent">,
  module: string,
  message: string,
  fields?: LogFields
): void => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }
  const line = JSON.stringify({
    level,
    msg: message,
    timestamp: new Date().toISOString(),
    module,
    ...fields
  });
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

export const createLogger = (module: string): Logger => ({
  debug: (message, fields) => write("debug", module, message, fields),
  info: (message, fields) => write("info", module, message, fields),
  warn: (message, fields) => write("warn", module, message, fields),
  error: (message, fields) => write("error", module, message, fields)
});

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
