import fs from "node:fs";
import path from "node:path";
import { createLogger, format, transports } from "winston";
import config from "@/config";

const { combine, timestamp, printf, colorize, uncolorize, errors } = format;
const logFormat = printf((info) => {
  const { level, message, timestamp, stack, ...meta } = info as Record<
    string,
    unknown
  >;

  const metaStr =
    meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";

  return `${timestamp} ${level}: ${stack ?? message}${metaStr}`;
});

const baseFormat = combine(
  timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  errors({ stack: true }),
  logFormat,
);

function fileTransports(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
  return [
    new transports.File({
      filename: path.join(dir, "error.log"),
      level: "error",
      format: combine(uncolorize(), baseFormat),
    }),
    new transports.File({
      filename: path.join(dir, "combined.log"),
      format: combine(uncolorize(), baseFormat),
    }),
  ];
}

export const logger = createLogger({
  level: config.LOG_LEVEL,
  silent: config.NODE_ENV === "test",
  transports: [
    new transports.Console({
      format: combine(colorize(), baseFormat),
    }),
    ...(config.LOG_DIR ? fileTransports(config.LOG_DIR) : []),
  ],
  exitOnError: false,
});
