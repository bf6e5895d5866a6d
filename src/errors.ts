export class BeaconLogError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BeaconLogError";
    this.code = code;
  }
}

// ── Domain errors ──

export class ConfigurationError extends BeaconLogError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIGURATION", options);
    this.name = "ConfigurationError";
  }
}

export class SinkError extends BeaconLogError {
  readonly sinkName: string;

  constructor(message: string, sinkName: string, options?: ErrorOptions) {
    super(message, "SINK", options);
    this.name = "SinkError";
    this.sinkName = sinkName;
  }
}

// ── Utilities ──

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}

/** Render the stack text of a thrown value, falling back to its message. */
export function errorStack(value: unknown): string {
  if (value instanceof Error) return value.stack ?? `${value.name}: ${value.message}`;
  return errorMessage(value);
}
