import path from "node:path";
import winston from "winston";

export interface LoggerOptions {
  logDir?: string;
  /** Discard all output and skip the file transports */
  silent?: boolean;
}

const fileFormat = winston.format.combine(
  winston.format.uncolorize(),
  winston.format.timestamp(),
  winston.format.json()
);

export function createLogger(level: string = "info", options: LoggerOptions = {}) {
  const logDir = options.logDir ?? "logs";
  const transports: winston.transport[] = [new winston.transports.Console()];

  // Silent loggers write nowhere, not even an empty log file
  if (!options.silent) {
    transports.push(
      new winston.transports.File({ filename: path.join(logDir, "bot.log"), format: fileFormat }),
      new winston.transports.File({
        filename: path.join(logDir, "trades.log"),
        level: "info",
        format: fileFormat,
      })
    );
  }

  return winston.createLogger({
    level,
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
      winston.format.errors({ stack: true }),
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
        return `${timestamp} [${level}]: ${message}${metaStr}`;
      })
    ),
    transports,
  });
}

export type Logger = winston.Logger;
