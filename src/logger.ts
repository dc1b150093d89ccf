import pino from "pino";

export type Logger = pino.Logger;

export interface LoggerConfig {
  level?: string;
  pretty?: boolean;
  name?: string;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const { level = process.env.LOG_LEVEL || "info", pretty = false, name = "subtitle-forge" } = config;

  const options: pino.LoggerOptions = {
    name,
    level,
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (pretty) {
    return pino(
      options,
      pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname,name",
        },
      })
    );
  }

  return pino(options);
}

/**
 * Logger that discards everything; the default for library callers and tests.
 */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
