import test from "node:test";
import assert from "node:assert/strict";
import dgram from "node:dgram";
import { formatGauge, packLines, StatsdClient } from "../src/lib/statsd";

test("formatGauge writes statsd gauge lines", () => {
  assert.deepEqual(formatGauge({ name: "afs.afs01_example_org.idle_threads", value: 250 }), [
    "afs.afs01_example_org.idle_threads:250|g"
  ]);
});

test("formatGauge resets before sending a negative value", () => {
  assert.deepEqual(formatGauge({ name: "afs.x.part.vicepa.used", value: -5 }), [
    "afs.x.part.vicepa.used:0|g",
    "afs.x.part.vicepa.used:-5|g"
  ]);
});

test("packLines fills packets up to the size limit", () => {
  assert.deepEqual(packLines(["a:1|g", "b:2|g", "c:3|g"], 11), ["a:1|g\nb:2|g", "c:3|g"]);
});

test("packLines sends an oversized line on its own", () => {
  assert.deepEqual(packLines(["toolong:12345|g", "b:2|g"], 5), ["toolong:12345|g", "b:2|g"]);
});

test("flush without gauges sends nothing", async () => {
  const client = new StatsdClient({ host: "127.0.0.1", port: 8125 });
  assert.equal(await client.flush(), 0);
});

test("flush delivers queued gauges to a statsd listener", async () => {
  const server = dgram.createSocket("udp4");
  await new Promise<void>((resolve) => server.bind(0, "127.0.0.1", () => resolve()));
  const received: string[] = [];
  const arrived = new Promise<void>((resolve) => {
    server.on("message", (message) => {
      received.push(message.toString());
      if (received.length === 2) {
        resolve();
      }
    });
  });

  try {
    const client = new StatsdClient({ host: "127.0.0.1", port: server.address().port }, 30);
    client.gauge("afs.a.idle_threads", 250);
    client.gauge("afs.a.calls_waiting", 2);

    assert.equal(client.size, 2);
    assert.equal(await client.flush(), 2);
    await arrived;
    assert.equal(client.size, 0);
    assert.deepEqual([...received].sort(), ["afs.a.calls_waiting:2|g", "afs.a.idle_threads:250|g"]);
  } finally {
    server.close();
  }
});
