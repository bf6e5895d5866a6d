import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SinkError } from "../errors.js";
import { LogLevel, type LogRecord } from "../types/log-record.js";
import { RotatingFileSink } from "./rotating-file-sink.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Every line built from makeRecord("msg-N") is 43 bytes including the newline. */
const LINE_BYTES = 43;

function makeRecord(message: string, overrides: Partial<LogRecord> = {}): LogRecord {
  return {
    time: new Date("2024-05-01T12:00:00.000Z"),
    level: LogLevel.INFO,
    loggerName: "svc",
    prefix: "",
    message: `[] ${message}`,
    ...overrides,
  };
}

function line(message: string): string {
  return `2024-05-01T12:00:00.000Z - INFO - [] ${message}\n`;
}

function read(path: string): string {
  return readFileSync(path, "utf-8");
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("RotatingFileSink", () => {
  let dir: string;
  let sink: RotatingFileSink | undefined;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "beaconlog-file-"));
  });

  afterEach(() => {
    sink?.close();
    sink = undefined;
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates the file and parent directories at construction", () => {
    const path = join(dir, "nested", "logs", "app.log");
    sink = new RotatingFileSink({ path, maxBytes: 1000, backupCount: 2 });

    expect(existsSync(path)).toBe(true);
    expect(read(path)).toBe("");
    expect(sink.name).toBe(`file:${path}`);
  });

  it("appends one formatted line per record", () => {
    const path = join(dir, "app.log");
    sink = new RotatingFileSink({ path, maxBytes: 1000, backupCount: 2 });

    sink.write(makeRecord("msg-0"));
    sink.write(makeRecord("msg-1"));

    expect(line("msg-0")).toHaveLength(LINE_BYTES);
    expect(read(path)).toBe(line("msg-0") + line("msg-1"));
  });

  it("writes the stack below the message", () => {
    const path = join(dir, "app.log");
    sink = new RotatingFileSink({ path, maxBytes: 1000, backupCount: 2 });

    sink.write(makeRecord("failed", { level: LogLevel.ERROR, stack: "Error: boom" }));

    expect(read(path)).toBe("2024-05-01T12:00:00.000Z - ERROR - [] failed\nError: boom\n");
  });

  it("keeps existing content and appends after it", () => {
    const path = join(dir, "app.log");
    writeFileSync(path, "earlier\n");
    sink = new RotatingFileSink({ path, maxBytes: 1000, backupCount: 2 });

    sink.write(makeRecord("msg-0"));

    expect(read(path)).toBe(`earlier\n${line("msg-0")}`);
  });

  it("rotates before the file would reach maxBytes and keeps backupCount files", () => {
    const path = join(dir, "app.log");
    sink = new RotatingFileSink({ path, maxBytes: 100, backupCount: 2 });

    for (let i = 0; i < 7; i++) sink.write(makeRecord(`msg-${i}`));

    expect(read(path)).toBe(line("msg-6"));
    expect(read(`${path}.1`)).toBe(line("msg-4") + line("msg-5"));
    expect(read(`${path}.2`)).toBe(line("msg-2") + line("msg-3"));
    expect(existsSync(`${path}.3`)).toBe(false);
  });

  it("counts pre-existing bytes toward the threshold", () => {
    const path = join(dir, "app.log");
    writeFileSync(path, `${"x".repeat(89)}\n`);
    sink = new RotatingFileSink({ path, maxBytes: 100, backupCount: 1 });

    sink.write(makeRecord("msg-0"));

    expect(read(`${path}.1`)).toBe(`${"x".repeat(89)}\n`);
    expect(read(path)).toBe(line("msg-0"));
  });

  it("with one backup replaces the previous backup", () => {
    const path = join(dir, "app.log");
    sink = new RotatingFileSink({ path, maxBytes: 50, backupCount: 1 });

    sink.write(makeRecord("msg-0"));
    sink.write(makeRecord("msg-1"));
    sink.write(makeRecord("msg-2"));

    expect(read(path)).toBe(line("msg-2"));
    expect(read(`${path}.1`)).toBe(line("msg-1"));
    expect(existsSync(`${path}.2`)).toBe(false);
  });

  it("puts an oversized record into an empty file without rotating", () => {
    const path = join(dir, "app.log");
    sink = new RotatingFileSink({ path, maxBytes: 10, backupCount: 2 });

    sink.write(makeRecord("msg-0"));

    expect(read(path)).toBe(line("msg-0"));
    expect(existsSync(`${path}.1`)).toBe(false);
  });

  it("never rotates when maxBytes is 0", () => {
    const path = join(dir, "app.log");
    sink = new RotatingFileSink({ path, maxBytes: 0, backupCount: 2 });

    for (let i = 0; i < 5; i++) sink.write(makeRecord(`msg-${i}`));

    expect(read(path)).toHaveLength(5 * LINE_BYTES);
    expect(existsSync(`${path}.1`)).toBe(false);
  });

  it("never rotates when backupCount is 0", () => {
    const path = join(dir, "app.log");
    sink = new RotatingFileSink({ path, maxBytes: 50, backupCount: 0 });

    for (let i = 0; i < 5; i++) sink.write(makeRecord(`msg-${i}`));

    expect(read(path)).toHaveLength(5 * LINE_BYTES);
    expect(existsSync(`${path}.1`)).toBe(false);
  });

  it("drops writes after close()", () => {
    const path = join(dir, "app.log");
    sink = new RotatingFileSink({ path, maxBytes: 1000, backupCount: 2 });

    sink.write(makeRecord("msg-0"));
    sink.close();
    sink.close();
    sink.write(makeRecord("msg-1"));

    expect(sink.isClosed).toBe(true);
    expect(read(path)).toBe(line("msg-0"));
  });

  it("stays closed across a rollover by a newer sink on the same path", () => {
    const path = join(dir, "app.log");
    const stale = new RotatingFileSink({ path, maxBytes: 80, backupCount: 2 });
    stale.write(makeRecord("msg-0"));
    stale.close();

    sink = new RotatingFileSink({ path, maxBytes: 80, backupCount: 2 });
    sink.write(makeRecord("msg-1"));
    stale.write(makeRecord("stale"));

    expect(read(path)).toBe(line("msg-1"));
    expect(read(`${path}.1`)).toBe(line("msg-0"));
  });

  it("throws SinkError when the file cannot be opened", () => {
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "not a directory");

    expect(
      () => new RotatingFileSink({ path: join(blocker, "app.log"), maxBytes: 100, backupCount: 1 }),
    ).toThrow(SinkError);
  });

  it("names backups by generation", () => {
    const path = join(dir, "app.log");
    sink = new RotatingFileSink({ path, maxBytes: 100, backupCount: 3 });

    expect(sink.backupPath(3)).toBe(`${path}.3`);
  });
});
