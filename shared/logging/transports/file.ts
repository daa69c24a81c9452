/**
 * File Transport
 *
 * Appends JSON lines to <logDir>/<filename>.log and rotates by size:
 * name.log -> name.log.1 -> ... -> name.log.<maxFiles> (dropped).
 */

import * as fs from "fs";
import * as path from "path";
import type { LogTransport, LogEntry, LogLevel } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename without extension (default: "switchboard") */
  filename?: string;
  /** Rotate once the file would exceed this many bytes (default: 10MB) */
  maxSize?: number;
  /** Rotated files kept (default: 5) */
  maxFiles?: number;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private filePath: string;
  private maxSize: number;
  private maxFiles: number;
  private stream: fs.WriteStream;
  private size: number;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel ?? "info";
    this.maxSize = options.maxSize ?? 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;

    fs.mkdirSync(options.logDir, { recursive: true });
    this.filePath = path.join(options.logDir, `${options.filename ?? "switchboard"}.log`);
    this.size = fs.existsSync(this.filePath) ? fs.statSync(this.filePath).size : 0;
    this.stream = this.open();
  }

  private open(): fs.WriteStream {
    const stream = fs.createWriteStream(this.filePath, { flags: "a" });
    stream.on("error", (err: Error) => {
      console.error("[FileTransport] write error:", err);
    });
    return stream;
  }

  log(entry: LogEntry): void {
    const line = JSON.stringify(entry) + "\n";
    const bytes = Buffer.byteLength(line);

    if (this.size > 0 && this.size + bytes > this.maxSize) {
      this.rotate();
    }

    this.stream.write(line);
    this.size += bytes;
  }

  private rotate(): void {
    this.stream.end();

    const oldest = `${this.filePath}.${this.maxFiles}`;
    if (fs.existsSync(oldest)) fs.unlinkSync(oldest);

    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = `${this.filePath}.${i}`;
      if (fs.existsSync(from)) fs.renameSync(from, `${this.filePath}.${i + 1}`);
    }
    if (fs.existsSync(this.filePath)) fs.renameSync(this.filePath, `${this.filePath}.1`);

    this.size = 0;
    this.stream = this.open();
  }

  async flush(): Promise<void> {
    if (this.stream.writableLength === 0) return;
    await new Promise<void>(resolve => this.stream.once("drain", () => resolve()));
  }

  async close(): Promise<void> {
    await new Promise<void>(resolve => this.stream.end(() => resolve()));
  }
}
