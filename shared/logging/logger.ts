/**
 * Logger
 *
 * Fans structured entries out to transports. Children share the parent's
 * transports and ring buffer, so a request-scoped child still shows up in
 * getRecentLogs() of the root logger.
 */

import {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  type LogLevel,
  type LogEntry,
  type LoggerConfig,
  type ILogger
} from "./types.js";

// ============================================
// RING BUFFER
// ============================================

class RingBuffer<T> {
  private items: T[] = [];

  constructor(private capacity: number) {}

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items.shift();
    }
  }

  last(n: number): T[] {
    return this.items.slice(-n);
  }
}

// ============================================
// LOGGER
// ============================================

export class Logger implements ILogger {
  private readonly config: LoggerConfig;
  private readonly redactPatterns: RegExp[];
  private readonly buffer: RingBuffer<LogEntry>;

  constructor(config: LoggerConfig, buffer?: RingBuffer<LogEntry>) {
    this.config = config;
    this.redactPatterns = config.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    this.buffer = buffer ?? new RingBuffer<LogEntry>(config.ringBufferSize ?? 500);
  }

  get component(): string {
    return this.config.component;
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.write("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("fatal", message, data, error);
  }

  private write(level: LogLevel, message: string, data?: Record<string, unknown>, error?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
    };
    if (this.config.correlationId) entry.correlationId = this.config.correlationId;
    if (data) entry.data = this.redact(data);
    if (error !== undefined) {
      entry.error = error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : { name: "NonError", message: String(error) };
    }

    this.buffer.push(entry);

    for (const transport of this.config.transports) {
      if (LOG_LEVELS[level] < LOG_LEVELS[transport.minLevel]) continue;
      try {
        transport.log(entry);
      } catch (e) {
        // Last resort: a broken transport must not take the caller down
        console.error(`[Logger] transport "${transport.name}" failed:`, e);
      }
    }
  }

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (this.redactPatterns.some(p => p.test(key))) {
        out[key] = "[REDACTED]";
      } else if (isPlainObject(value)) {
        out[key] = this.redact(value);
      } else {
        out[key] = value;
      }
    }
    return out;
  }

  child(context: { component?: string; correlationId?: string }): Logger {
    return new Logger(
      {
        ...this.config,
        component: context.component ?? this.config.component,
        correlationId: context.correlationId ?? this.config.correlationId,
      },
      this.buffer,
    );
  }

  getRecentLogs(count: number = 100): LogEntry[] {
    return this.buffer.last(count);
  }

  async flush(): Promise<void> {
    await Promise.all(this.config.transports.map(t => t.flush?.()));
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(this.config.transports.map(t => t.close?.()));
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

// ============================================
// ROOT LOGGER
// ============================================

let rootLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  rootLogger = new Logger(config);
  return rootLogger;
}

export function getLogger(): Logger {
  if (!rootLogger) {
    throw new Error("Logger not initialized. Call initLogger() first.");
  }
  return rootLogger;
}

export function hasLogger(): boolean {
  return rootLogger !== null;
}
