type LogLevel = "debug" | "info" | "warn" | "error";

interface LogContext {
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function resolveMinLevel(raw: string | undefined): number {
  const key = (raw ?? "info").toLowerCase();
  if (key === "debug" || key === "info" || key === "warn" || key === "error" || key === "silent") {
    return LEVEL_ORDER[key];
  }
  return LEVEL_ORDER.info;
}

export class ScopedLogger {
  private readonly minLevel: number;

  constructor(
    private readonly scope: string,
    minLevel: string | undefined = process.env.LOG_LEVEL,
  ) {
    this.minLevel = resolveMinLevel(minLevel);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.minLevel;
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled("debug")) {
      console.debug(`[DEBUG] [${this.scope}] ${message}`, context ?? "");
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled("info")) {
      console.info(`[INFO] [${this.scope}] ${message}`, context ?? "");
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled("warn")) {
      console.warn(`[WARN] [${this.scope}] ${message}`, context ?? "");
    }
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.enabled("error")) return;
    const errorContext = error instanceof Error
      ? { ...context, error: { message: error.message, stack: error.stack } }
      : { ...context, error };
    console.error(`[ERROR] [${this.scope}] ${message}`, errorContext);
  }
}

export function createLogger(scope: string): ScopedLogger {
  return new ScopedLogger(scope);
}
