import type { FileServerStats, GaugeSample } from "./types";
import { toMetricSegment } from "./utils";

/**
 * Flattens poll results into statsd gauges. Hosts that are not running
 * normally have nothing to report and are skipped.
 *
 *   afs.<host>.idle_threads
 *   afs.<host>.calls_waiting
 *   afs.<host>.part.<partition>.{used,free,total}
 *   afs.<host>.vol.<volume>.{used,quota,creation_unix_epoch}
 */
export function collectGauges(fileservers: readonly FileServerStats[]): GaugeSample[] {
  const gauges: GaugeSample[] = [];

  for (const stats of fileservers) {
    if (stats.status !== "normal") {
      continue;
    }

    const prefix = `afs.${toMetricSegment(stats.hostname)}`;
    if (stats.idleThreads !== undefined) {
      gauges.push({ name: `${prefix}.idle_threads`, value: stats.idleThreads });
    }
    if (stats.callsWaiting !== undefined) {
      gauges.push({ name: `${prefix}.calls_waiting`, value: stats.callsWaiting });
    }

    for (const partition of stats.partitions) {
      const part = `${prefix}.part.${partition.name}`;
      gauges.push(
        { name: `${part}.used`, value: partition.usedKb },
        { name: `${part}.free`, value: partition.freeKb },
        { name: `${part}.total`, value: partition.totalKb }
      );
    }

    for (const volume of stats.volumes) {
      const vol = `${prefix}.vol.${toMetricSegment(volume.name)}`;
      gauges.push(
        { name: `${vol}.used`, value: volume.usedKb },
        { name: `${vol}.quota`, value: volume.quotaKb },
        { name: `${vol}.creation_unix_epoch`, value: Math.floor(volume.creationTime.getTime() / 1000) }
      );
    }
  }

  return gauges;
}
