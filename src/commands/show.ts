import { Command } from "commander";
import { collectFileServerStats, getCommandContext } from "../lib/command-context";
import type { GlobalOptions } from "../lib/command-context";
import { renderStatsTable } from "../lib/report";

type ShowOptions = {
  rwOnly?: boolean;
};

export function registerShowCommand(program: Command): void {
  program
    .command("show")
    .description("Show a table of results for every fileserver")
    .option("--rw-only", "only list read-write volumes")
    .action(async (options: ShowOptions, command: Command) => {
      const context = getCommandContext(command.optsWithGlobals<GlobalOptions & ShowOptions>());
      const fileservers = await collectFileServerStats(context);

      const tables = fileservers.map((stats) => renderStatsTable(stats, { rwOnly: options.rwOnly }));
      console.log(tables.join("\n\n"));
    });
}
