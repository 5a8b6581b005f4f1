export const CLI_NAME = "afsmon";

export const DEFAULT_CONFIG_PATH = "/etc/afsmon.yaml";

export const DEFAULT_STATSD_HOST = "localhost";
export const DEFAULT_STATSD_PORT = 8125;
// Payload ceiling per UDP packet.
export const STATSD_MAX_PACKET_BYTES = 512;

export const RX_FILESERVER_PORT = "7000";

// Lines in one `vos listvol -long` record after its "On-line" header.
export const VOLUME_RECORD_TRAILING_LINES = 8;

export const COMMAND_TIMEOUT_MS = 60_000;
