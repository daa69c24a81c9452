/**
 * Logging Setup
 *
 * Initializes the shared logger for the server package and hands out
 * component loggers ("server.<component>").
 */

import {
  initLogger,
  hasLogger,
  getLogger,
  isLogLevel,
  Logger,
  ConsoleTransport,
  FileTransport,
  type ILogger,
  type LogLevel,
  type LogTransport,
} from "@switchboard/shared/logging";

export interface LoggingOptions {
  /** Default: LOG_LEVEL, else "warn" under test, "info" in production, "debug" otherwise */
  minLevel?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Directory for the rotating file log (default: LOG_DIR; unset disables it) */
  logDir?: string;
  /** Extra transports, e.g. a MemoryTransport in tests */
  transports?: LogTransport[];
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  if (process.env.NODE_ENV === "test") return "warn";
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

/**
 * Initialize the root logger. Calling it again replaces the root; loggers
 * handed out earlier keep their original transports.
 */
export function initServerLogging(options: LoggingOptions = {}): Logger {
  const minLevel = options.minLevel ?? defaultLevel();
  const transports: LogTransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({
      minLevel,
      prettyPrint: process.env.NODE_ENV === "development",
    }));
  }

  const logDir = options.logDir ?? process.env.LOG_DIR;
  if (logDir) {
    transports.push(new FileTransport({ minLevel: "debug", logDir, filename: "server" }));
  }

  transports.push(...(options.transports ?? []));

  return initLogger({ minLevel, component: "server", transports, ringBufferSize: 2000 });
}

export function getServerLogger(): Logger {
  return hasLogger() ? getLogger() : initServerLogging();
}

export function createComponentLogger(component: string): ILogger {
  return getServerLogger().child({ component: `server.${component}` });
}
