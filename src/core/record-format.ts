import { LEVEL_NAMES, type LogRecord } from "../types/log-record.js";

/** Body of every record: the prefix in brackets, then the message. Empty prefix renders `[]`. */
export function formatBody(prefix: string, message: string): string {
  return `[${prefix}] ${message}`;
}

export function formatStartBeacon(key: string, message: string): string {
  return `(BEACON - [${key}] - START) ${message}`;
}

/** `elapsedSeconds` is undefined when no start was recorded for the key. */
export function formatEndBeacon(
  key: string,
  elapsedSeconds: number | undefined,
  message: string,
): string {
  const elapsed = elapsedSeconds === undefined ? "N/A" : elapsedSeconds.toFixed(2);
  return `(BEACON - [${key}] - END (Elapsed time ${elapsed} s)) ${message}`;
}

/** `<ISO timestamp> - <LEVEL> - <message>`, with the stack on the following lines. */
export function formatLine(record: LogRecord): string {
  const line = `${record.time.toISOString()} - ${LEVEL_NAMES[record.level]} - ${record.message}`;
  return record.stack ? `${line}\n${record.stack}` : line;
}
