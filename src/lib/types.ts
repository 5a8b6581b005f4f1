export type ServerStatus = "normal" | "temporarily_disabled" | "disabled" | "unknown" | "no_connection";

export type VolumePermission = "RO" | "RW" | "BK";

export interface Partition {
  name: string;
  usedKb: number;
  freeKb: number;
  totalKb: number;
  percentUsed: number;
}

export interface Volume {
  name: string;
  id: number;
  permission: VolumePermission;
  usedKb: number;
  quotaKb: number;
  percentUsed: number;
  creationTime: Date;
}

export interface ThreadStats {
  callsWaiting?: number;
  idleThreads?: number;
}

export type ServerStatusInfo =
  | { status: "normal"; restartTime: Date }
  | { status: "temporarily_disabled" | "disabled" | "unknown" };

interface FileServerStatsBase {
  readonly hostname: string;
  readonly timestamp: Date;
}

export interface RunningFileServerStats extends FileServerStatsBase {
  readonly status: "normal";
  readonly restartTime: Date;
  readonly uptimeMs: number;
  readonly callsWaiting?: number;
  readonly idleThreads?: number;
  readonly partitions: readonly Partition[];
  readonly volumes: readonly Volume[];
}

export interface StoppedFileServerStats extends FileServerStatsBase {
  readonly status: Exclude<ServerStatus, "normal">;
}

export type FileServerStats = RunningFileServerStats | StoppedFileServerStats;

export interface GaugeSample {
  name: string;
  value: number;
}
