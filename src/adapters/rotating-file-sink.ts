import {
  closeSync,
  existsSync,
  fstatSync,
  mkdirSync,
  openSync,
  renameSync,
  unlinkSync,
  writeSync,
} from "node:fs";
import { dirname, resolve } from "node:path";
import { formatLine } from "../core/record-format.js";
import { errorMessage, SinkError } from "../errors.js";
import type { LogSink } from "../interfaces/sink.js";
import type { LogRecord } from "../types/log-record.js";

export interface RotatingFileSinkOptions {
  path: string;
  /** Rollover threshold in bytes. 0 disables rotation. */
  maxBytes: number;
  /** Rotated files to keep (`<path>.1` … `<path>.<n>`). 0 disables rotation. */
  backupCount: number;
}

/**
 * Size-bounded file sink.
 *
 * The file is opened in append mode at construction. Before a write that would
 * take the file to `maxBytes` or beyond, the current file becomes `<path>.1`,
 * older backups shift up by one, and anything past `<path>.<backupCount>` is
 * discarded. After close() the sink drops further writes, so a logger that
 * outlives its registry cannot reopen the file behind a newer sink.
 */
export class RotatingFileSink implements LogSink {
  readonly name: string;
  readonly path: string;
  private readonly maxBytes: number;
  private readonly backupCount: number;
  private fd: number | undefined;
  private size = 0;
  private closed = false;

  constructor(options: RotatingFileSinkOptions) {
    this.path = resolve(options.path);
    this.name = `file:${this.path}`;
    this.maxBytes = options.maxBytes;
    this.backupCount = options.backupCount;

    try {
      mkdirSync(dirname(this.path), { recursive: true });
      this.open();
    } catch (err) {
      throw new SinkError(`Cannot open log file ${this.path}: ${errorMessage(err)}`, this.name, {
        cause: err,
      });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  write(record: LogRecord): void {
    if (this.closed) return;
    const data = `${formatLine(record)}\n`;
    const bytes = Buffer.byteLength(data, "utf-8");
    if (this.shouldRollover(bytes)) this.rollover();
    writeSync(this.open(), data, null, "utf-8");
    this.size += bytes;
  }

  close(): void {
    this.closed = true;
    this.release();
  }

  /** Backup file path for generation `n` (1 is the most recent). */
  backupPath(n: number): string {
    return `${this.path}.${n}`;
  }

  private open(): number {
    if (this.fd === undefined) {
      this.fd = openSync(this.path, "a");
      this.size = fstatSync(this.fd).size;
    }
    return this.fd;
  }

  private release(): void {
    if (this.fd === undefined) return;
    closeSync(this.fd);
    this.fd = undefined;
  }

  private shouldRollover(bytes: number): boolean {
    if (this.maxBytes <= 0 || this.backupCount <= 0) return false;
    // A single record larger than maxBytes still goes into an empty file
    if (this.size === 0) return false;
    return this.size + bytes >= this.maxBytes;
  }

  private rollover(): void {
    this.release();

    for (let i = this.backupCount - 1; i >= 1; i--) {
      const source = this.backupPath(i);
      if (!existsSync(source)) continue;
      const target = this.backupPath(i + 1);
      if (existsSync(target)) unlinkSync(target);
      renameSync(source, target);
    }

    const first = this.backupPath(1);
    if (existsSync(first)) unlinkSync(first);
    if (existsSync(this.path)) renameSync(this.path, first);

    this.open();
  }
}
