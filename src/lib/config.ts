import fs from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { getFileServerAddresses } from "./cell";
import { DEFAULT_STATSD_HOST, DEFAULT_STATSD_PORT } from "./constants";
import { CliError, ConfigurationError } from "./errors";
import type { CommandRunner } from "./exec";
import { logger } from "./logger";

const hostnameSchema = z.string().trim().min(1, "fileserver entries must not be empty");

const portSchema = z.coerce.number().int().min(1).max(65535);

// section headers of the older INI afsmon.cfg
const LEGACY_INI_SECTION = /^\s*\[(main|statsd)\]\s*$/m;

export const configSchema = z
  .object({
    debug: z.boolean().default(false),
    cell: z.string().trim().min(1).optional(),
    fileservers: z.array(hostnameSchema).default([]),
    statsd: z
      .object({
        host: z.string().trim().min(1).default(DEFAULT_STATSD_HOST),
        port: portSchema.default(DEFAULT_STATSD_PORT)
      })
      .strict()
      .default({})
  })
  .strict();

export type AfsmonConfig = z.infer<typeof configSchema>;

export interface StatsdTarget {
  host: string;
  port: number;
}

/**
 * Reads and validates the YAML config file. An empty file is a valid,
 * all-defaults config.
 */
export function loadConfig(configPath: string): AfsmonConfig {
  if (!fs.existsSync(configPath)) {
    throw new CliError({
      kind: "validation",
      message: `Config file ${configPath} does not exist`,
      hint: "Pass a config file with --config <path>."
    });
  }

  const raw = fs.readFileSync(configPath, "utf8");
  return parseConfig(raw, configPath);
}

export function parseConfig(raw: string, source = "config"): AfsmonConfig {
  if (LEGACY_INI_SECTION.test(raw)) {
    throw new ConfigurationError(`${source} uses the INI afsmon.cfg layout; afsmon now reads YAML`, [
      "move cell, fileservers and debug from [main] to top-level keys",
      "list fileservers as a YAML sequence, one '- host' per line",
      "move host and port from [statsd] under a 'statsd:' mapping",
      "see afsmon.example.yaml"
    ]);
  }

  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`${source} is not valid YAML`, [message]);
  }

  const result = configSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      `${source} is not a valid afsmon config`,
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return result.data;
}

/** STATSD_HOST / STATSD_PORT take precedence over the config file. */
export function resolveStatsdTarget(config: AfsmonConfig, env: NodeJS.ProcessEnv = process.env): StatsdTarget {
  const host = env.STATSD_HOST?.trim() || config.statsd.host;
  const rawPort = env.STATSD_PORT?.trim();
  if (!rawPort) {
    return { host, port: config.statsd.port };
  }

  const port = portSchema.safeParse(rawPort);
  if (!port.success) {
    throw new ConfigurationError(`STATSD_PORT must be a port number, got '${rawPort}'`);
  }
  return { host, port: port.data };
}

/**
 * Collects the hosts to poll: the cell's fileservers (when a cell is
 * configured) followed by the explicit list. Nothing to poll is fatal.
 */
export async function resolveFileServers(config: AfsmonConfig, run: CommandRunner): Promise<string[]> {
  const hostnames: string[] = [];

  if (config.cell) {
    hostnames.push(...(await getFileServerAddresses(config.cell, run)));
  }

  if (config.fileservers.length > 0) {
    logger.debug(`cfg fileservers: ${config.fileservers.join(", ")}`);
    hostnames.push(...config.fileservers);
  }

  if (hostnames.length === 0) {
    throw new ConfigurationError("No fileservers found!", [
      config.cell ? `cell '${config.cell}' returned no fileservers` : "no cell configured",
      "no fileservers listed in the config"
    ]);
  }
  return hostnames;
}
