import { formatLine } from "../core/record-format.js";
import type { LogSink } from "../interfaces/sink.js";
import type { LogRecord } from "../types/log-record.js";

/**
 * In-memory sink for tests and development.
 */
export class MemorySink implements LogSink {
  readonly name: string;
  readonly records: LogRecord[] = [];
  private closed = false;

  constructor(name = "memory") {
    this.name = name;
  }

  write(record: LogRecord): void {
    this.records.push(record);
  }

  /** Record bodies (`[prefix] message`) in emission order. */
  messages(): string[] {
    return this.records.map((r) => r.message);
  }

  /** Records rendered the way the console and file sinks render them. */
  lines(): string[] {
    return this.records.map(formatLine);
  }

  clear(): void {
    this.records.length = 0;
  }

  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
