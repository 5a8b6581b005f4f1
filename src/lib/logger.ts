import winston from "winston";

const ROOT_SCOPE = "afsmon";

/**
 * One log line: `<timestamp> <scope, 12 wide> <LEVEL, 8 wide> <message>`.
 */
export function formatLogLine(level: string, scope: string, message: string, timestamp: string): string {
  return `${timestamp} ${scope.padEnd(12)} ${level.toUpperCase().padEnd(8)} ${message}`;
}

const lineFormat = winston.format.printf((info) =>
  formatLogLine(
    info.level,
    typeof info.scope === "string" ? info.scope : ROOT_SCOPE,
    String(info.message),
    String(info.timestamp)
  )
);

// stdout is reserved for reports, so every level goes to stderr
export const rootLogger = winston.createLogger({
  level: "info",
  format: winston.format.combine(winston.format.timestamp(), lineFormat),
  transports: [new winston.transports.Console({ stderrLevels: ["error", "warn", "info", "debug"] })],
  exitOnError: false
});

export function setDebugLogging(enabled: boolean): void {
  rootLogger.level = enabled ? "debug" : "info";
}

export function isDebugLogging(): boolean {
  return rootLogger.isDebugEnabled();
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export function createLogger(scope: string): Logger {
  const scoped = rootLogger.child({ scope });
  return {
    debug: (message) => scoped.debug(message),
    info: (message) => scoped.info(message),
    warn: (message) => scoped.warn(message),
    error: (message) => scoped.error(message),
    child: (childScope) => createLogger(`${scope}.${childScope}`)
  };
}

export const logger = createLogger(ROOT_SCOPE);
