import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type { Logger };

export function createLogger(level: string, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level,
    base: {
      component: "viewport",
    },
  };

  return destination ? pino(options, destination) : pino(options);
}

let silentLogger: Logger | null = null;

// Shared fallback for hosts that don't supply a logger.
export function getSilentLogger(): Logger {
  if (!silentLogger) silentLogger = createLogger("silent");
  return silentLogger;
}
