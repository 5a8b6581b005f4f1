export { getFileServerAddresses } from "./lib/cell";
export {
  cellAddressesCommand,
  partitionInfoCommand,
  serverStatusCommand,
  threadStatsCommand,
  volumeListCommand
} from "./lib/commands";
export { loadConfig, parseConfig, resolveFileServers, resolveStatsdTarget } from "./lib/config";
export type { AfsmonConfig, StatsdTarget } from "./lib/config";
export { CliError, ConfigurationError, ParseError } from "./lib/errors";
export { CommandError, CommandTimeoutError, createCommandRunner, runCommand } from "./lib/exec";
export type { CommandRunner } from "./lib/exec";
export { pollFileServer, pollFileServers } from "./lib/fileserver";
export { collectGauges } from "./lib/metrics";
export {
  parseAfsDate,
  parseFileServerAddresses,
  parsePartitions,
  parseServerStatus,
  parseThreadStats,
  parseVolumes
} from "./lib/parsers";
export { buildStatsRows, renderStatsTable } from "./lib/report";
export { StatsdClient } from "./lib/statsd";
export type {
  FileServerStats,
  GaugeSample,
  Partition,
  RunningFileServerStats,
  ServerStatus,
  ServerStatusInfo,
  StoppedFileServerStats,
  ThreadStats,
  Volume,
  VolumePermission
} from "./lib/types";
