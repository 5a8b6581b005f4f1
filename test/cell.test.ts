import test from "node:test";
import assert from "node:assert/strict";
import { getFileServerAddresses } from "../src/lib/cell";
import { CommandError } from "../src/lib/exec";
import { createFakeRunner, readFixture } from "./helpers";

const LISTADDRS = "vos listaddrs -noauth -cell example.org";

test("getFileServerAddresses returns every listed fileserver in order", async () => {
  const runner = createFakeRunner({ [LISTADDRS]: readFixture("vos-listaddrs.txt") });

  const addresses = await getFileServerAddresses("example.org", runner.run);

  assert.deepEqual(addresses, ["afs01.example.org", "afs02.example.org", "afs01.example.org"]);
  assert.deepEqual(runner.calls, [["vos", "listaddrs", "-noauth", "-cell", "example.org"]]);
});

test("getFileServerAddresses treats a failed listing as an empty cell", async () => {
  const runner = createFakeRunner({ [LISTADDRS]: new CommandError(LISTADDRS, 1, "vos: no such cell") });

  assert.deepEqual(await getFileServerAddresses("example.org", runner.run), []);
});

test("getFileServerAddresses propagates other failures", async () => {
  const runner = createFakeRunner({ [LISTADDRS]: new Error("spawn vos EACCES") });

  await assert.rejects(getFileServerAddresses("example.org", runner.run), /spawn vos EACCES/);
});
