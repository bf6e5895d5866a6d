export interface BeaconRegistryOptions {
  /** Monotonic clock in milliseconds. Defaults to `performance.now()`. */
  now?: () => number;
}

/**
 * Start instants of in-flight operations, keyed by caller-chosen names.
 *
 * A key is present only while a start is recorded and no end has consumed it.
 * Starting a key that is already present overwrites the earlier instant, so two
 * concurrent operations sharing a key time from the most recent start.
 */
export class BeaconRegistry {
  private readonly starts = new Map<string, number>();
  private readonly now: () => number;

  constructor(options: BeaconRegistryOptions = {}) {
    this.now = options.now ?? (() => performance.now());
  }

  start(key: string): void {
    this.starts.set(key, this.now());
  }

  /**
   * Consume the start recorded for `key`.
   * @returns elapsed seconds, or undefined when there is no recorded start
   */
  end(key: string): number | undefined {
    const startedAt = this.starts.get(key);
    if (startedAt === undefined) return undefined;
    this.starts.delete(key);
    return Math.max(0, this.now() - startedAt) / 1000;
  }

  has(key: string): boolean {
    return this.starts.has(key);
  }

  /** Keys with a start that no end has consumed yet. */
  pending(): string[] {
    return [...this.starts.keys()];
  }
}
