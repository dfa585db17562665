import winston from "winston";

export type Logger = winston.Logger;

export interface LoggerOptions {
  level?: string;   // default: "info"
  silent?: boolean; // default: true under NODE_ENV=test
  service?: string; // default: "loglens"
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  return winston.createLogger({
    level: opts.level ?? "info",
    silent: opts.silent ?? process.env.NODE_ENV === "test",
    defaultMeta: { service: opts.service ?? "loglens" },
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    transports: [new winston.transports.Console()]
  });
}

export const defaultLogger: Logger = createLogger();
