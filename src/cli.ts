#!/usr/bin/env node
import chalk from "chalk";
import { Command } from "commander";
import { registerShowCommand } from "./commands/show";
import { registerStatsdCommand } from "./commands/statsd";
import { CLI_NAME, DEFAULT_CONFIG_PATH } from "./lib/constants";
import { renderCliError, toCliError } from "./lib/errors";
import { readPackageMeta } from "./lib/package";

const pkg = readPackageMeta();
const program = new Command();
const normalizedArgv = process.argv.map((arg) => (arg === "-v" ? "--version" : arg));

program
  .name(CLI_NAME)
  .description("An AFS monitoring tool")
  .version(pkg.version ?? "0.0.0", "--version", "output the version number")
  .option("-c, --config <path>", "path to the YAML config file (the INI afsmon.cfg layout is no longer read)", DEFAULT_CONFIG_PATH)
  .option("-d, --debug", "enable debug logging");

registerShowCommand(program);
registerStatsdCommand(program);

program.parseAsync(normalizedArgv).catch((error: unknown) => {
  const cliError = toCliError(error);
  console.error(chalk.red(renderCliError(cliError)));
  process.exitCode = cliError.exitCode;
});
