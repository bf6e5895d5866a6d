/**
 * Public test utilities, exported from the `"beaconlog/testing"` entry point.
 * Consumers can import these helpers to assert on what their code logs.
 */
export { MemorySink } from "./adapters/memory-sink.js";
export { FakeCloudLog } from "./testing/fake-cloud-log.js";
export { ManualClock } from "./testing/manual-clock.js";
