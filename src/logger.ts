import pino from "pino";

export type Logger = pino.Logger;

export interface LoggerOptions {
  level?: string;
  /** "pretty" routes through pino-pretty; anything else writes JSON lines */
  format?: string;
}

// stdout is reserved for reports, so every format logs to stderr
export function createLogger(opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? "info";

  if (opts.format === "pretty") {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss Z",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino({ level }, pino.destination(2));
}

const logger = createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: process.env.LOG_FORMAT ?? "json",
});

export default logger;
