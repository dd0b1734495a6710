export type LogLevel = "debug" | "info" | "warn" | "error";

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const SECRET_KEY_PATTERN = /(token|secret|authorization|password|api[_-]?key)/i;
const REDACTED = "[redacted]";

export function parseLogLevel(input: string | undefined): LogLevel {
  const normalized = (input ?? "info").trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
}

export function sanitize(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack
    };
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitize(item));
  }
  if (value && typeof value === "object") {
    const output: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      output[key] = SECRET_KEY_PATTERN.test(key) ? REDACTED : sanitize(nested);
    }
    return output;
  }
  return value;
}

export function formatLine(level: LogLevel, scope: string, message: string, metadata?: Record<string, unknown>): string {
  const base = {
    ts: new Date().toISOString(),
    level,
    scope,
    message,
    ...(metadata ? { metadata: sanitize(metadata) } : {})
  };
  return JSON.stringify(base);
}

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    // eslint-disable-next-line no-console
    console.error(line);
    return;
  }
  if (level === "warn") {
    // eslint-disable-next-line no-console
    console.warn(line);
    return;
  }
  // eslint-disable-next-line no-console
  console.log(line);
};

export class Logger {
  private readonly minLevel: LogLevel;

  constructor(
    private readonly scope: string,
    configuredLevel: string | undefined,
    private readonly sink: LogSink = consoleSink
  ) {
    this.minLevel = parseLogLevel(configuredLevel);
  }

  child(suffix: string): Logger {
    return new Logger(`${this.scope}.${suffix}`, this.minLevel, this.sink);
  }

  private shouldLog(level: LogLevel): boolean {
    return levelWeight[level] >= levelWeight[this.minLevel];
  }

  private emit(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }
    this.sink(level, formatLine(level, this.scope, message, metadata));
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.emit("debug", message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.emit("info", message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.emit("warn", message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.emit("error", message, metadata);
  }
}
