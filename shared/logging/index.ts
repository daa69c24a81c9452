/**
 * Structured Logging
 *
 * ```typescript
 * import { initLogger, ConsoleTransport } from "@switchboard/shared/logging";
 *
 * const root = initLogger({
 *   minLevel: "info",
 *   component: "server",
 *   transports: [new ConsoleTransport()],
 * });
 *
 * const routerLog = root.child({ component: "server.router" });
 * routerLog.info("Cache hit", { distance: 0.012 });
 * routerLog.error("Lookup failed", err, { collection: "router_cache" });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ILogger
} from "./types.js";

export {
  Logger,
  initLogger,
  getLogger,
  hasLogger
} from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
  type ConsoleTransportOptions,
  type FileTransportOptions
} from "./transports/index.js";
