export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
  /** Returns a logger that stamps `bindings` onto every line. */
  child(bindings: LogFields): Logger;
}

export type LoggerOptions = {
  level?: LogLevel;
  bindings?: LogFields;
};

const levelRank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const serializeValue = (value: unknown): unknown => {
  if (!(value instanceof Error)) return value;

  const serialized: Record<string, unknown> = { name: value.name, message: value.message };
  if ("code" in value && typeof value.code === "string") {
    serialized.code = value.code;
  }
  return serialized;
};

const serializeFields = (fields: LogFields): LogFields => {
  const out: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) out[key] = serializeValue(value);
  }
  return out;
};

/**
 * Structured JSON-lines logger on top of `console`.
 * info/debug go to stdout, warnings and errors to stderr.
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const minRank = levelRank[options.level ?? "info"];
  const bindings = options.bindings ?? {};

  const emit = (level: LogLevel, event: string, fields?: LogFields) => {
    if (levelRank[level] < minRank) return;
    const line = JSON.stringify({ event, ...serializeFields(bindings), ...serializeFields(fields ?? {}) });
    if (level === "error") {
      // eslint-disable-next-line no-console
      console.error(line);
    } else if (level === "warn") {
      // eslint-disable-next-line no-console
      console.warn(line);
    } else {
      // eslint-disable-next-line no-console
      console.log(line);
    }
  };

  return {
    debug: (event, fields) => emit("debug", event, fields),
    info: (event, fields) => emit("info", event, fields),
    warn: (event, fields) => emit("warn", event, fields),
    error: (event, fields) => emit("error", event, fields),
    child: (extra) => createLogger({ level: options.level, bindings: { ...bindings, ...extra } })
  };
};
