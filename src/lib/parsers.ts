import { VOLUME_RECORD_TRAILING_LINES } from "./constants";
import { ParseError } from "./errors";
import type { Partition, ServerStatusInfo, ThreadStats, Volume, VolumePermission } from "./types";
import { roundTo, splitLines } from "./utils";

// Sample AFS timestamps:
//   Tue Nov  2 03:35:15 2016
//   Tue Nov 22 03:35:15 2016
const AFS_DATE_SOURCE = String.raw`[A-Za-z]{3} +[A-Za-z]{3} +\d{1,2} +\d{1,2}:\d{2}:\d{2} +\d{4}`;
const AFS_DATE_FIELDS = /^\s*([A-Za-z]{3}) +([A-Za-z]{3}) +(\d{1,2}) +(\d{1,2}):(\d{2}):(\d{2}) +(\d{4})\s*$/;

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

const RESTART_PATTERN = new RegExp(`last started at (${AFS_DATE_SOURCE})`);
const PARTITION_PATTERN = /Free space on partition \/vicep([a-z]{1,2}): (\d+) K blocks out of total (\d+)/;
const CALLS_WAITING_PATTERN = /(\d+) calls waiting for a thread/g;
const IDLE_THREADS_PATTERN = /(\d+) threads are idle/g;

// mirror.yum-puppetlabs.readonly    536871036 RO   63026403 K  On-line
const VOLUME_HEADER_PATTERN = /^(\S+)[ \t]+(\d+)[ \t]+(RO|RW|BK)[ \t]+(\d+) K\b.*On-line/;
const VOLUME_QUOTA_PATTERN = /MaxQuota\s+(\d+) K/;
const VOLUME_CREATION_PATTERN = new RegExp(`Creation\\s+(${AFS_DATE_SOURCE})`);

const VOLUME_MARKER = "On-line";

/**
 * Parses the timestamp format the AFS tools print, e.g. `Tue Nov  2 03:35:15 2016`.
 * The tools print server-local time without a zone, so the result is a local Date.
 */
export function parseAfsDate(text: string): Date {
  const match = AFS_DATE_FIELDS.exec(text);
  if (!match) {
    throw new ParseError(`Unrecognised AFS timestamp '${text.trim()}'`, text);
  }

  const [, weekday, monthName, dayText, hourText, minuteText, secondText, yearText] = match;
  const month = MONTHS.indexOf(monthName);
  if (!WEEKDAYS.includes(weekday) || month === -1) {
    throw new ParseError(`Unrecognised day or month name in AFS timestamp '${text.trim()}'`, text);
  }

  const year = Number(yearText);
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = Number(secondText);
  const date = new Date(year, month, day, hour, minute, second);
  // Date rolls invalid fields over (Feb 30 -> Mar 2); reject instead.
  if (
    hour > 23 || minute > 59 || second > 59
    || date.getFullYear() !== year || date.getMonth() !== month || date.getDate() !== day
  ) {
    throw new ParseError(`Out of range field in AFS timestamp '${text.trim()}'`, text);
  }
  return date;
}

/**
 * Classifies `bos status -long` output. The disabled phrases are checked
 * most specific first: "temporarily disabled, currently shutdown" also
 * contains "disabled, currently shutdown".
 */
export function parseServerStatus(output: string): ServerStatusInfo {
  if (output.includes("currently running normally")) {
    const match = RESTART_PATTERN.exec(output);
    if (!match) {
      throw new ParseError("Fileserver reports running normally but no 'last started at' time was found", output);
    }
    return { status: "normal", restartTime: parseAfsDate(match[1]) };
  }
  if (output.includes("temporarily disabled, currently shutdown")) {
    return { status: "temporarily_disabled" };
  }
  if (output.includes("disabled, currently shutdown")) {
    return { status: "disabled" };
  }
  return { status: "unknown" };
}

/** Parses `vos partinfo` output, one partition per matching line. */
export function parsePartitions(output: string): Partition[] {
  const partitions: Partition[] = [];
  for (const line of splitLines(output)) {
    const match = PARTITION_PATTERN.exec(line);
    if (!match) {
      continue;
    }

    const name = `vicep${match[1]}`;
    const freeKb = Number(match[2]);
    const totalKb = Number(match[3]);
    if (totalKb === 0) {
      throw new ParseError(`Partition /${name} reports a total size of 0 K`, line);
    }
    const usedKb = totalKb - freeKb;
    partitions.push({
      name,
      usedKb,
      freeKb,
      totalKb,
      percentUsed: roundTo((usedKb / totalKb) * 100, 2)
    });
  }
  return partitions;
}

/** Parses `rxdebug -rxstats` output. Missing counters stay unset. */
export function parseThreadStats(output: string): ThreadStats {
  const stats: ThreadStats = {};
  const callsWaiting = lastCapturedNumber(output, CALLS_WAITING_PATTERN);
  if (callsWaiting !== undefined) {
    stats.callsWaiting = callsWaiting;
  }
  const idleThreads = lastCapturedNumber(output, IDLE_THREADS_PATTERN);
  if (idleThreads !== undefined) {
    stats.idleThreads = idleThreads;
  }
  return stats;
}

/**
 * Parses `vos listvol -long` output. Every record is the "On-line" header
 * line followed by exactly eight fixed lines:
 *
 *   docs.backup                 536870993 BK   17270997 K  On-line
 *       afs01.example.org /vicepa
 *       RWrite  536870991 ROnly          0 Backup  536870993
 *       MaxQuota   50000000 K
 *       Creation    Tue Oct  2 18:45:54 2018
 *       Copy        Tue Oct  2 18:45:54 2018
 *       Backup      Tue Oct  2 18:45:54 2018
 *       Last Access Tue Oct  2 18:45:54 2018
 *       Last Update Tue Oct  2 18:45:54 2018
 *
 * A record that cannot be fully read throws; every later record boundary
 * would be misaligned with it.
 */
export function parseVolumes(output: string): Volume[] {
  const cursor = new LineCursor(splitLines(output));
  const volumes: Volume[] = [];

  while (!cursor.done) {
    const lineNumber = cursor.position + 1;
    const header = cursor.next();
    if (header === undefined || !header.includes(VOLUME_MARKER)) {
      continue;
    }

    const body = cursor.take(VOLUME_RECORD_TRAILING_LINES);
    if (!body) {
      throw new ParseError(
        `Volume record at line ${lineNumber} is truncated: expected ${VOLUME_RECORD_TRAILING_LINES} more lines, found ${cursor.remaining}`,
        [header, ...cursor.rest()].join("\n")
      );
    }
    volumes.push(parseVolumeRecord(header, body, lineNumber));
  }

  return volumes;
}

/** Parses `vos listaddrs` output: one fileserver per non-blank line. */
export function parseFileServerAddresses(output: string): string[] {
  return splitLines(output)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function parseVolumeRecord(header: string, body: readonly string[], lineNumber: number): Volume {
  const chunk = [header, ...body].join("\n");
  const headerMatch = VOLUME_HEADER_PATTERN.exec(header);
  const quotaMatch = VOLUME_QUOTA_PATTERN.exec(chunk);
  const creationMatch = VOLUME_CREATION_PATTERN.exec(chunk);

  const missing = [
    headerMatch ? undefined : "header",
    quotaMatch ? undefined : "MaxQuota",
    creationMatch ? undefined : "Creation"
  ].filter((part): part is string => Boolean(part));
  if (!headerMatch || !quotaMatch || !creationMatch) {
    throw new ParseError(`Malformed volume record at line ${lineNumber}: missing ${missing.join(", ")}`, chunk);
  }

  const [, name, idText, permission, usedText] = headerMatch;
  const usedKb = Number(usedText);
  const quotaKb = Number(quotaMatch[1]);
  if (quotaKb === 0) {
    throw new ParseError(`Volume ${name} has a MaxQuota of 0 K; cannot compute usage`, chunk);
  }

  return {
    name,
    id: Number(idText),
    permission: toPermission(permission),
    usedKb,
    quotaKb,
    percentUsed: roundTo((usedKb / quotaKb) * 100, 2),
    creationTime: parseAfsDate(creationMatch[1])
  };
}

function toPermission(value: string): VolumePermission {
  if (value === "RO" || value === "RW" || value === "BK") {
    return value;
  }
  throw new ParseError(`Unknown volume type '${value}'`, value);
}

function lastCapturedNumber(text: string, pattern: RegExp): number | undefined {
  let value: number | undefined;
  for (const match of text.matchAll(pattern)) {
    value = Number(match[1]);
  }
  return value;
}

/** Forward-only cursor over the lines of a tool's output. */
export class LineCursor {
  private index = 0;

  constructor(private readonly lines: readonly string[]) {}

  get position(): number {
    return this.index;
  }

  get remaining(): number {
    return this.lines.length - this.index;
  }

  get done(): boolean {
    return this.index >= this.lines.length;
  }

  next(): string | undefined {
    if (this.done) {
      return undefined;
    }
    const line = this.lines[this.index];
    this.index += 1;
    return line;
  }

  /** Consumes exactly `count` lines, or nothing when fewer remain. */
  take(count: number): string[] | undefined {
    if (this.remaining < count) {
      return undefined;
    }
    const taken = this.lines.slice(this.index, this.index + count);
    this.index += count;
    return taken;
  }

  rest(): string[] {
    const taken = this.lines.slice(this.index);
    this.index = this.lines.length;
    return taken;
  }
}
