export type LogLevel = "error" | "warn" | "info" | "debug";

export interface Logger {
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "error" || normalized === "warn" || normalized === "info" || normalized === "debug") {
    return normalized;
  }
  return fallback;
}

/**
 * Writes to the console with a `[scope]` prefix. Messages above the configured
 * level are dropped.
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(
    private readonly scope: string,
    level: LogLevel = parseLogLevel(process.env.LOG_LEVEL),
  ) {
    this.threshold = LEVEL_WEIGHT[level];
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    if (this.threshold < LEVEL_WEIGHT.info) {
      return;
    }
    this.write(console.info, message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    if (this.threshold < LEVEL_WEIGHT.warn) {
      return;
    }
    this.write(console.warn, message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.write(console.error, message, metadata);
  }

  private write(
    sink: (message?: unknown, ...optionalParams: unknown[]) => void,
    message: string,
    metadata?: Record<string, unknown>,
  ): void {
    const line = `[${this.scope}] ${message}`;
    if (metadata === undefined) {
      sink(line);
      return;
    }
    sink(line, metadata);
  }
}

export class SilentLogger implements Logger {
  info(): void {}
  warn(): void {}
  error(): void {}
}
