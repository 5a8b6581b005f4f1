import { RX_FILESERVER_PORT } from "./constants";

// argv templates for the OpenAFS client tools; keep them verbatim.

export function serverStatusCommand(hostname: string): string[] {
  return ["bos", "status", hostname, "-long", "-noauth"];
}

export function partitionInfoCommand(hostname: string): string[] {
  return ["vos", "partinfo", hostname, "-noauth"];
}

export function volumeListCommand(hostname: string): string[] {
  return ["vos", "listvol", "-long", "-server", hostname];
}

export function threadStatsCommand(hostname: string): string[] {
  return ["rxdebug", hostname, RX_FILESERVER_PORT, "-rxstats", "-noconns"];
}

export function cellAddressesCommand(cell: string): string[] {
  return ["vos", "listaddrs", "-noauth", "-cell", cell];
}
