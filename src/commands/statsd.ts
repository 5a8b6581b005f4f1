import chalk from "chalk";
import { Command } from "commander";
import { collectFileServerStats, getCommandContext } from "../lib/command-context";
import type { GlobalOptions } from "../lib/command-context";
import { resolveStatsdTarget } from "../lib/config";
import { logger } from "../lib/logger";
import { collectGauges } from "../lib/metrics";
import { StatsdClient } from "../lib/statsd";

export function registerStatsdCommand(program: Command): void {
  program
    .command("statsd")
    .description("Report fileserver statistics to statsd")
    .action(async (_options: unknown, command: Command) => {
      const context = getCommandContext(command.optsWithGlobals<GlobalOptions>());
      const target = resolveStatsdTarget(context.config);
      logger.debug(`Sending stats to ${target.host}:${target.port}`);

      const fileservers = await collectFileServerStats(context);
      const client = new StatsdClient(target);
      for (const gauge of collectGauges(fileservers)) {
        client.gauge(gauge.name, gauge.value);
      }

      const samples = client.size;
      const packets = await client.flush();
      console.log(chalk.green(`Sent ${samples} gauge(s) in ${packets} packet(s) to ${target.host}:${target.port}.`));
    });
}
