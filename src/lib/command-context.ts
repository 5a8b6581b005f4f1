import ora from "ora";
import { loadConfig, resolveFileServers } from "./config";
import type { AfsmonConfig } from "./config";
import { COMMAND_TIMEOUT_MS } from "./constants";
import { createCommandRunner } from "./exec";
import type { CommandRunner } from "./exec";
import { pollFileServers } from "./fileserver";
import { isDebugLogging, logger, setDebugLogging } from "./logger";
import type { FileServerStats } from "./types";

// type alias so it satisfies commander's OptionValues
export type GlobalOptions = {
  config: string;
  debug?: boolean;
};

export interface CommandContext {
  config: AfsmonConfig;
  run: CommandRunner;
}

export function getCommandContext(options: GlobalOptions, run: CommandRunner = createCommandRunner({ timeoutMs: COMMAND_TIMEOUT_MS })): CommandContext {
  const config = loadConfig(options.config);
  if (options.debug || config.debug) {
    setDebugLogging(true);
    logger.debug("Debugging enabled");
  }
  return { config, run };
}

/** Resolves the fileservers to poll and polls them one after another. */
export async function collectFileServerStats(context: CommandContext): Promise<FileServerStats[]> {
  const hostnames = await resolveFileServers(context.config, context.run);

  // debug lines and the spinner would interleave on stderr
  const spinner = ora({ text: "Polling fileservers...", isEnabled: isDebugLogging() ? false : undefined }).start();
  try {
    const stats = await pollFileServers(hostnames, context.run, ({ hostname, index, total }) => {
      spinner.text = `Polling ${hostname} (${index + 1}/${total})...`;
    });
    spinner.succeed(`Polled ${stats.length} fileserver(s).`);
    return stats;
  } catch (error) {
    spinner.fail("Polling failed.");
    throw error;
  }
}
