import test from "node:test";
import assert from "node:assert/strict";
import { Writable } from "node:stream";
import winston from "winston";
import { createLogger, formatLogLine, isDebugLogging, rootLogger, setDebugLogging } from "../src/lib/logger";

function captureLogs(): { lines: string[]; detach: () => void } {
  const lines: string[] = [];
  const sink = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(chunk.toString().trimEnd());
      callback();
    }
  });
  const transport = new winston.transports.Stream({ stream: sink });
  rootLogger.add(transport);
  return { lines, detach: () => rootLogger.remove(transport) };
}

function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

test("formatLogLine pads scope and level into columns", () => {
  const line = formatLogLine("debug", "afsmon", "Running: bos status afs01.example.org -long -noauth", "2018-10-18T08:00:00.000Z");
  assert.equal(line, "2018-10-18T08:00:00.000Z afsmon       DEBUG    Running: bos status afs01.example.org -long -noauth");
});

test("setDebugLogging switches the level between info and debug", () => {
  setDebugLogging(true);
  assert.equal(rootLogger.level, "debug");
  assert.equal(isDebugLogging(), true);
  setDebugLogging(false);
  assert.equal(rootLogger.level, "info");
  assert.equal(isDebugLogging(), false);
});

test("debug lines are written only while debug logging is enabled", async () => {
  const capture = captureLogs();
  const log = createLogger("afsmon").child("fileserver");
  try {
    setDebugLogging(false);
    log.debug("hidden");
    log.info("Polled 2 fileserver(s)");
    setDebugLogging(true);
    log.debug("Finding stats for: afs01.example.org");
    await settle();
  } finally {
    setDebugLogging(false);
    capture.detach();
  }

  assert.equal(capture.lines.length, 2);
  assert.match(capture.lines[0], /^\S+ afsmon\.fileserver INFO     Polled 2 fileserver\(s\)$/);
  assert.match(capture.lines[1], /^\S+ afsmon\.fileserver DEBUG    Finding stats for: afs01\.example\.org$/);
});

test("the root scope is padded to its column", async () => {
  const capture = captureLogs();
  try {
    createLogger("afsmon").warn("Sending stats to localhost:8125");
    await settle();
  } finally {
    capture.detach();
  }

  assert.equal(capture.lines.length, 1);
  assert.match(capture.lines[0], /^\d{4}-\d{2}-\d{2}T\S+Z afsmon {7}WARN {5}Sending stats to localhost:8125$/);
});
