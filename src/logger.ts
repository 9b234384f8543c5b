import pino from "pino";
import path from "node:path";

type TransportTarget = pino.TransportTargetOptions;

const targets: TransportTarget[] = [
  {
    target: "pino-pretty",
    options: {
      destination: 2, // stderr; stdout carries the run summary
      colorize: true,
      translateTime: "SYS:standard",
    },
  },
];

const logFile = process.env.LOG_FILE?.trim();
if (logFile) {
  targets.push({
    target: "pino/file",
    options: {
      destination: path.resolve(logFile),
      mkdir: true,
    },
  });
}

export const logger = pino(
  {
    level: process.env.LOG_LEVEL ?? "info",
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.transport({ targets })
);
