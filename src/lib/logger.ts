export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function levelFromEnv(fallback: LogLevel = "info"): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  return isLogLevel(raw) ? raw : fallback;
}

type Sink = Pick<Console, "log" | "warn" | "error">;

/**
 * Leveled console logger: `[timestamp] [LEVEL] [scope] message`.
 * Errors passed as `data` are printed with their stack.
 */
export function createLogger(
  scope: string,
  options: { level?: LogLevel; sink?: Sink } = {}
): Logger {
  const threshold = LEVEL_ORDER[options.level ?? levelFromEnv()];
  const sink = options.sink ?? console;

  const write = (level: Exclude<LogLevel, "silent">, message: string, data?: unknown) => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${scope}] ${message}`;
    const out = level === "error" ? sink.error : level === "warn" ? sink.warn : sink.log;
    if (data === undefined) {
      out(line);
    } else if (data instanceof Error) {
      out(line, data.stack ?? data.message);
    } else {
      out(line, JSON.stringify(data));
    }
  };

  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
  };
}

export const silentLogger: Logger = createLogger("silent", { level: "silent" });
