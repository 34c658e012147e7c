type LogLevel = "debug" | "info" | "warn" | "error";

type LogMeta = Record<string, unknown>;

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const resolveLevel = (): LogLevel => {
  const raw = (process.env.LOG_LEVEL ?? "").toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return raw;
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
};

const activeLevel = resolveLevel();

const write = (level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta): void => {
  if (levelOrder[level] < levelOrder[activeLevel]) return;
  const payload = {
    ts: new Date().toISOString(),
    level,
    ...(scope ? { scope } : {}),
    msg: message,
    ...(meta ? { meta } : {}),
  };
  const line = `${JSON.stringify(payload)}\n`;
  if (level === "error" || level === "warn") {
    process.stderr.write(line);
    return;
  }
  process.stdout.write(line);
};

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
}

export const createLogger = (scope?: string): Logger => ({
  debug: (message, meta) => write("debug", scope, message, meta),
  info: (message, meta) => write("info", scope, message, meta),
  warn: (message, meta) => write("warn", scope, message, meta),
  error: (message, meta) => write("error", scope, message, meta),
});

export const logger = createLogger();

/** Loggable fields for a caught value of unknown shape. */
export const errorMeta = (error: unknown): LogMeta =>
  error instanceof Error
    ? { error: error.message, name: error.name, stack: error.stack }
    : { error: String(error) };
