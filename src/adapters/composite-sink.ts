import { errorMessage, SinkError } from "../errors.js";
import type { LogSink } from "../interfaces/sink.js";
import type { LogRecord } from "../types/log-record.js";

interface SinkFailure {
  sink: LogSink;
  error: unknown;
}

function toSinkError(action: string, failures: SinkFailure[]): SinkError {
  if (failures.length === 1) {
    const [{ sink, error }] = failures;
    if (error instanceof SinkError) return error;
    return new SinkError(`Sink ${sink.name} failed to ${action}: ${errorMessage(error)}`, sink.name, {
      cause: error,
    });
  }
  const names = failures.map((f) => f.sink.name).join(", ");
  return new SinkError(`${failures.length} sinks failed to ${action}: ${names}`, "composite", {
    cause: new AggregateError(
      failures.map((f) => f.error),
      `sink failures: ${names}`,
    ),
  });
}

/**
 * Fans write() out to N sinks in order.
 * A failing sink does not keep the record from the sinks after it; once every
 * sink has been tried the failures are rethrown as a single SinkError.
 */
export class CompositeSink implements LogSink {
  readonly name = "composite";

  constructor(private readonly sinks: readonly LogSink[]) {}

  write(record: LogRecord): void {
    const failures: SinkFailure[] = [];
    for (const sink of this.sinks) {
      try {
        sink.write(record);
      } catch (error) {
        failures.push({ sink, error });
      }
    }
    if (failures.length > 0) throw toSinkError("write", failures);
  }

  close(): void {
    const failures: SinkFailure[] = [];
    for (const sink of this.sinks) {
      try {
        sink.close?.();
      } catch (error) {
        failures.push({ sink, error });
      }
    }
    if (failures.length > 0) throw toSinkError("close", failures);
  }
}
