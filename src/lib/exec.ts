import { spawn } from "node:child_process";
import { logger } from "./logger";

export interface RunOptions {
  timeoutMs?: number;
}

export class CommandError extends Error {
  command: string;
  exitCode: number;
  output: string;

  constructor(command: string, exitCode: number, output: string, message = `Command failed (${exitCode}): ${command}`) {
    super(message);
    this.name = "CommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.output = output;
  }
}

export class CommandTimeoutError extends CommandError {
  constructor(command: string, timeoutMs: number, output: string) {
    super(command, -1, output, `Command timed out after ${timeoutMs}ms: ${command}`);
    this.name = "CommandTimeoutError";
  }
}

/**
 * Runs an argv vector and resolves with its captured output. Unlike a shell,
 * arguments are passed through untouched.
 */
export type CommandRunner = (argv: readonly string[]) => Promise<string>;

/**
 * Resolves with stdout and stderr interleaved in the order they arrived.
 */
export async function runCommand(command: string, args: readonly string[] = [], options: RunOptions = {}): Promise<string> {
  const timeoutMs = options.timeoutMs ?? 60_000;
  const rendered = formatCommand(command, args);

  return await new Promise<string>((resolve, reject) => {
    const child = spawn(command, [...args], {
      stdio: ["ignore", "pipe", "pipe"]
    });

    let output = "";
    let settled = false;

    const timeoutHandle = setTimeout(() => {
      child.kill("SIGTERM");
      if (!settled) {
        settled = true;
        reject(new CommandTimeoutError(rendered, timeoutMs, output));
      }
    }, timeoutMs);

    // multi-byte characters may straddle two reads; decode in the stream
    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      output += chunk;
    });
    child.stderr?.on("data", (chunk: string) => {
      output += chunk;
    });

    child.on("error", (error) => {
      clearTimeout(timeoutHandle);
      if (!settled) {
        settled = true;
        reject(error);
      }
    });

    child.on("close", (code) => {
      clearTimeout(timeoutHandle);
      if (settled) {
        return;
      }
      settled = true;
      const exitCode = typeof code === "number" ? code : 1;
      if (exitCode !== 0) {
        reject(new CommandError(rendered, exitCode, output.trim()));
        return;
      }
      resolve(output);
    });
  });
}

export function createCommandRunner(options: RunOptions = {}): CommandRunner {
  return async (argv) => {
    const [command, ...args] = argv;
    if (!command) {
      throw new Error("Cannot run an empty command.");
    }
    logger.debug(`Running: ${formatCommand(command, args)}`);
    try {
      return await runCommand(command, args, options);
    } catch (error) {
      logger.debug(" ... failed!");
      throw error;
    }
  };
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(" ");
}
