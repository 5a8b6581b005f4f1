import {
  partitionInfoCommand,
  serverStatusCommand,
  threadStatsCommand,
  volumeListCommand
} from "./commands";
import { CommandError } from "./exec";
import type { CommandRunner } from "./exec";
import { logger } from "./logger";
import { parsePartitions, parseServerStatus, parseThreadStats, parseVolumes } from "./parsers";
import type { FileServerStats, ServerStatusInfo } from "./types";

const log = logger.child("fileserver");

export type Clock = () => Date;

/**
 * Polls one fileserver. The status query decides everything else: a host
 * that cannot be reached is reported as `no_connection`, and only a host
 * running normally is asked for partitions, thread stats and volumes.
 *
 * Failures in those dependent queries are not caught, so the caller gets
 * either a complete snapshot or an error, never a half-filled one.
 */
export async function pollFileServer(
  hostname: string,
  run: CommandRunner,
  now: Clock = () => new Date()
): Promise<FileServerStats> {
  const timestamp = now();

  let statusOutput: string;
  try {
    statusOutput = await run(serverStatusCommand(hostname));
  } catch (error) {
    if (error instanceof CommandError) {
      log.debug(`${hostname}: status query failed (${error.message})`);
      return { hostname, timestamp, status: "no_connection" };
    }
    throw error;
  }

  const info: ServerStatusInfo = parseServerStatus(statusOutput);
  if (info.status !== "normal") {
    if (info.status === "unknown") {
      log.debug(`${hostname}: unrecognised status output:\n${statusOutput}`);
    }
    return { hostname, timestamp, status: info.status };
  }

  const partitions = parsePartitions(await run(partitionInfoCommand(hostname)));
  const threads = parseThreadStats(await run(threadStatsCommand(hostname)));
  const volumes = parseVolumes(await run(volumeListCommand(hostname)));

  return {
    hostname,
    timestamp,
    status: "normal",
    restartTime: info.restartTime,
    uptimeMs: timestamp.getTime() - info.restartTime.getTime(),
    ...threads,
    partitions,
    volumes
  };
}

export interface PollProgress {
  hostname: string;
  index: number;
  total: number;
}

/**
 * Polls each host in turn; the next poll starts only once the previous one
 * has finished. The first failing host aborts the run.
 */
export async function pollFileServers(
  hostnames: readonly string[],
  run: CommandRunner,
  onProgress?: (progress: PollProgress) => void,
  now?: Clock
): Promise<FileServerStats[]> {
  const results: FileServerStats[] = [];
  for (const [index, hostname] of hostnames.entries()) {
    onProgress?.({ hostname, index, total: hostnames.length });
    log.debug(`Finding stats for: ${hostname}`);
    results.push(await pollFileServer(hostname, run, now));
  }
  return results;
}
