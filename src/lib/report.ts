import { renderTable } from "./table";
import type { FileServerStats } from "./types";
import { formatDuration } from "./utils";

export interface ReportOptions {
  /** Only list read-write volumes; replicas and backups are skipped. */
  rwOnly?: boolean;
}

const STATUS_LABELS: Record<FileServerStats["status"], string> = {
  normal: "NORMAL",
  temporarily_disabled: "TEMPORARILY_DISABLED",
  disabled: "DISABLED",
  unknown: "UNKNOWN",
  no_connection: "NO_CONNECTION"
};

export function formatStatus(status: FileServerStats["status"]): string {
  return STATUS_LABELS[status];
}

export function buildStatsRows(stats: FileServerStats, options: ReportOptions = {}): string[][] {
  const rows: string[][] = [
    ["Hostname", stats.hostname],
    ["Timestamp", stats.timestamp.toISOString()],
    ["Status", formatStatus(stats.status)]
  ];

  if (stats.status !== "normal") {
    rows.push(["Uptime", "-"], ["Last Restart", "-"], ["Calls Waiting", "-"], ["Idle Threads", "-"]);
    return rows;
  }

  rows.push(
    ["Uptime", formatDuration(stats.uptimeMs)],
    ["Last Restart", stats.restartTime.toISOString()],
    ["Calls Waiting", formatCount(stats.callsWaiting)],
    ["Idle Threads", formatCount(stats.idleThreads)]
  );

  for (const partition of stats.partitions) {
    const label = `/${partition.name}`;
    rows.push(
      [`${label} used`, String(partition.usedKb)],
      [`${label} free`, String(partition.freeKb)],
      [`${label} total`, String(partition.totalKb)],
      [`${label} %used`, `${partition.percentUsed}%`]
    );
  }

  const volumes = options.rwOnly ? stats.volumes.filter((volume) => volume.permission === "RW") : stats.volumes;
  for (const volume of volumes) {
    rows.push(
      [`${volume.name} used`, String(volume.usedKb)],
      [`${volume.name} quota`, String(volume.quotaKb)],
      [`${volume.name} %used`, `${volume.percentUsed}%`],
      [`${volume.name} creation`, volume.creationTime.toISOString()]
    );
  }

  return rows;
}

export function renderStatsTable(stats: FileServerStats, options: ReportOptions = {}): string {
  return renderTable(["METRIC", "VALUE"], buildStatsRows(stats, options));
}

function formatCount(value?: number): string {
  return typeof value === "number" ? String(value) : "-";
}
