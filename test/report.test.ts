import test from "node:test";
import assert from "node:assert/strict";
import { buildStatsRows, renderStatsTable } from "../src/lib/report";
import type { FileServerStats, Volume } from "../src/lib/types";

const POLLED_AT = new Date(Date.UTC(2018, 9, 18, 8, 0, 0));
const RESTARTED_AT = new Date(Date.UTC(2018, 9, 17, 6, 30, 2));

function volume(name: string, permission: Volume["permission"], usedKb: number): Volume {
  return {
    name,
    id: 536870991,
    permission,
    usedKb,
    quotaKb: 2048,
    percentUsed: (usedKb / 2048) * 100,
    creationTime: new Date(Date.UTC(2018, 9, 2, 18, 45, 54))
  };
}

const running: FileServerStats = {
  hostname: "afs01.example.org",
  timestamp: POLLED_AT,
  status: "normal",
  restartTime: RESTARTED_AT,
  uptimeMs: POLLED_AT.getTime() - RESTARTED_AT.getTime(),
  callsWaiting: 0,
  idleThreads: 250,
  partitions: [{ name: "vicepa", usedKb: 512, freeKb: 512, totalKb: 1024, percentUsed: 50 }],
  volumes: [volume("mirror.moo", "RW", 1024), volume("mirror.moo.backup", "BK", 512)]
};

const unreachable: FileServerStats = {
  hostname: "afs02.example.org",
  timestamp: POLLED_AT,
  status: "no_connection"
};

test("buildStatsRows lists server, partition and volume metrics", () => {
  assert.deepEqual(buildStatsRows(running), [
    ["Hostname", "afs01.example.org"],
    ["Timestamp", "2018-10-18T08:00:00.000Z"],
    ["Status", "NORMAL"],
    ["Uptime", "1d 1h 29m"],
    ["Last Restart", "2018-10-17T06:30:02.000Z"],
    ["Calls Waiting", "0"],
    ["Idle Threads", "250"],
    ["/vicepa used", "512"],
    ["/vicepa free", "512"],
    ["/vicepa total", "1024"],
    ["/vicepa %used", "50%"],
    ["mirror.moo used", "1024"],
    ["mirror.moo quota", "2048"],
    ["mirror.moo %used", "50%"],
    ["mirror.moo creation", "2018-10-02T18:45:54.000Z"],
    ["mirror.moo.backup used", "512"],
    ["mirror.moo.backup quota", "2048"],
    ["mirror.moo.backup %used", "25%"],
    ["mirror.moo.backup creation", "2018-10-02T18:45:54.000Z"]
  ]);
});

test("buildStatsRows can restrict volumes to read-write", () => {
  const labels = buildStatsRows(running, { rwOnly: true }).map(([label]) => label);
  assert.equal(labels.includes("mirror.moo used"), true);
  assert.equal(labels.includes("mirror.moo.backup used"), false);
});

test("renderStatsTable renders placeholders for a server that could not be reached", () => {
  assert.equal(renderStatsTable(unreachable), [
    `METRIC${" ".repeat(9)}VALUE`,
    `${"-".repeat(13)}  ${"-".repeat(24)}`,
    `Hostname${" ".repeat(7)}afs02.example.org`,
    `Timestamp${" ".repeat(6)}2018-10-18T08:00:00.000Z`,
    `Status${" ".repeat(9)}NO_CONNECTION`,
    `Uptime${" ".repeat(9)}-`,
    `Last Restart${" ".repeat(3)}-`,
    "Calls Waiting  -",
    `Idle Threads${" ".repeat(3)}-`
  ].join("\n"));
});
