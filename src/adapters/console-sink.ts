/**
 * Console sink. Writes one formatted line per record, stderr by default.
 */

import { formatLine } from "../core/record-format.js";
import type { LogSink } from "../interfaces/sink.js";
import type { LogRecord } from "../types/log-record.js";

export interface ConsoleSinkOptions {
  writer?: (line: string) => void;
}

export class ConsoleSink implements LogSink {
  readonly name = "console";
  private writer: (line: string) => void;

  constructor(options: ConsoleSinkOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
  }

  write(record: LogRecord): void {
    this.writer(formatLine(record));
  }
}
