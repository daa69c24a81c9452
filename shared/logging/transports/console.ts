/**
 * Console Transport
 *
 * One line per entry, ANSI colours when writing to a TTY.
 */

import type { LogTransport, LogEntry, LogLevel } from "../types.js";

// ============================================
// COLOURS
// ============================================

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";
const MAGENTA = "\x1b[35m";
const RED = "\x1b[31m";

const LEVEL_STYLE: Record<LogLevel, { label: string; color: string }> = {
  trace: { label: "TRC", color: "\x1b[90m" },
  debug: { label: "DBG", color: "\x1b[36m" },
  info: { label: "INF", color: "\x1b[34m" },
  warn: { label: "WRN", color: "\x1b[33m" },
  error: { label: "ERR", color: RED },
  fatal: { label: "FTL", color: "\x1b[41m\x1b[37m" },
  silent: { label: "   ", color: RESET },
};

// ============================================
// CONSOLE TRANSPORT
// ============================================

export interface ConsoleTransportOptions {
  minLevel?: LogLevel;
  /** Default: true when stdout is a TTY */
  colors?: boolean;
  /** Indent data payloads over several lines (default: false) */
  prettyPrint?: boolean;
}

export class ConsoleTransport implements LogTransport {
  name = "console";
  minLevel: LogLevel;
  private colors: boolean;
  private prettyPrint: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel ?? "debug";
    this.colors = options.colors ?? process.stdout.isTTY === true;
    this.prettyPrint = options.prettyPrint ?? false;
  }

  log(entry: LogEntry): void {
    const style = LEVEL_STYLE[entry.level];
    const time = entry.timestamp.slice(11, 19);

    const parts = [
      this.paint(time, DIM),
      this.paint(style.label, style.color),
      this.paint(`[${entry.component}]`, MAGENTA),
    ];
    if (entry.correlationId) {
      parts.push(this.paint(`(${entry.correlationId.slice(0, 8)})`, DIM));
    }
    parts.push(entry.message);

    let line = parts.join(" ");
    if (entry.data && Object.keys(entry.data).length > 0) {
      const json = this.prettyPrint ? `\n${JSON.stringify(entry.data, null, 2)}` : ` ${JSON.stringify(entry.data)}`;
      line += this.paint(json, DIM);
    }
    if (entry.error) {
      line += "\n" + this.paint(`${entry.error.name}: ${entry.error.message}`, RED);
    }

    if (entry.level === "error" || entry.level === "fatal") {
      console.error(line);
    } else if (entry.level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private paint(text: string, color: string): string {
    return this.colors ? `${color}${text}${RESET}` : text;
  }
}
