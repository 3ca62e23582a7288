type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

function currentLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
  return configured && isLogLevel(configured) ? configured : "info";
}

function timestamp(): string {
  return new Date().toISOString();
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel()];
}

export const logger = {
  debug(message: string): void {
    if (enabled("debug")) {
      console.log(`[${timestamp()}] DEBUG ${message}`);
    }
  },
  info(message: string): void {
    if (enabled("info")) {
      console.log(`[${timestamp()}] INFO ${message}`);
    }
  },
  warn(message: string): void {
    if (enabled("warn")) {
      console.warn(`[${timestamp()}] WARN ${message}`);
    }
  },
  error(message: string): void {
    if (enabled("error")) {
      console.error(`[${timestamp()}] ERROR ${message}`);
    }
  }
};
