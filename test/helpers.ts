import fs from "node:fs";
import path from "node:path";
import type { CommandRunner } from "../src/lib/exec";

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, "fixtures", name), "utf8");
}

export interface FakeRunner {
  run: CommandRunner;
  calls: string[][];
}

/**
 * In-process stand-in for the AFS tools, keyed by the space-joined argv.
 * An Error response is thrown instead of returned.
 */
export function createFakeRunner(responses: Record<string, string | Error>): FakeRunner {
  const calls: string[][] = [];
  const run: CommandRunner = async (argv) => {
    calls.push([...argv]);
    const key = argv.join(" ");
    const response = responses[key];
    if (response === undefined) {
      throw new Error(`unexpected command: ${key}`);
    }
    if (response instanceof Error) {
      throw response;
    }
    return response;
  };
  return { run, calls };
}
