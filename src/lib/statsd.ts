import dgram from "node:dgram";
import { isIPv6 } from "node:net";
import type { StatsdTarget } from "./config";
import { STATSD_MAX_PACKET_BYTES } from "./constants";
import { logger } from "./logger";
import type { GaugeSample } from "./types";

export function formatGauge(sample: GaugeSample): string[] {
  // A leading sign means "adjust by" to statsd, so an absolute negative
  // value has to be sent as a reset to 0 followed by the delta.
  if (sample.value < 0) {
    return [`${sample.name}:0|g`, `${sample.name}:${sample.value}|g`];
  }
  return [`${sample.name}:${sample.value}|g`];
}

/** Packs newline separated lines into payloads of at most `maxBytes`. */
export function packLines(lines: readonly string[], maxBytes = STATSD_MAX_PACKET_BYTES): string[] {
  const packets: string[] = [];
  let current = "";

  for (const line of lines) {
    const candidate = current ? `${current}\n${line}` : line;
    if (current && Buffer.byteLength(candidate) > maxBytes) {
      packets.push(current);
      current = line;
    } else {
      current = candidate;
    }
  }
  if (current) {
    packets.push(current);
  }
  return packets;
}

/**
 * Gauge-only statsd client. Samples queue up until `flush()`, which sends
 * them in as few UDP packets as fit and closes the socket.
 */
export class StatsdClient {
  private pending: string[] = [];

  constructor(
    private readonly target: StatsdTarget,
    private readonly maxPacketBytes = STATSD_MAX_PACKET_BYTES
  ) {}

  gauge(name: string, value: number): void {
    this.pending.push(...formatGauge({ name, value }));
  }

  get size(): number {
    return this.pending.length;
  }

  /** Resolves with the number of packets sent. */
  async flush(): Promise<number> {
    const packets = packLines(this.pending, this.maxPacketBytes);
    this.pending = [];
    if (packets.length === 0) {
      return 0;
    }

    logger.debug(`Sending ${packets.length} statsd packet(s) to ${this.target.host}:${this.target.port}`);
    const socket = dgram.createSocket(isIPv6(this.target.host) ? "udp6" : "udp4");
    try {
      for (const packet of packets) {
        await sendPacket(socket, packet, this.target);
      }
    } finally {
      socket.close();
    }
    return packets.length;
  }
}

function sendPacket(socket: dgram.Socket, packet: string, target: StatsdTarget): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    socket.send(Buffer.from(packet), target.port, target.host, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
