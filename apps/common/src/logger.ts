export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogMeta {
  [key: string]: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

function stringify(meta?: LogMeta): string {
  if (!meta) {
    return "";
  }
  return ` ${JSON.stringify(meta)}`;
}

function emit(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[minimumLevel]) {
    return;
  }

  const line = `${new Date().toISOString()} [${level.toUpperCase()}] ${message}${stringify(meta)}`;
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.log(line);
}

export const logger = {
  debug(message: string, meta?: LogMeta): void {
    emit("debug", message, meta);
  },
  info(message: string, meta?: LogMeta): void {
    emit("info", message, meta);
  },
  warn(message: string, meta?: LogMeta): void {
    emit("warn", message, meta);
  },
  error(message: string, meta?: LogMeta): void {
    emit("error", message, meta);
  },
};

export type Logger = typeof logger;
