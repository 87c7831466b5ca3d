import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, {
  type DestinationStream,
  type LevelWithSilent,
  type LoggerOptions,
} from "pino";

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

function resolveLevel(value: string | undefined): LevelWithSilent {
  const normalized = value?.trim().toLowerCase() ?? "";
  return isLevel(normalized) ? normalized : "info";
}

const LOG_LEVEL = resolveLevel(process.env.LOG_LEVEL);
const LOG_FILE = process.env.LOG_FILE;

// Build the destination stream
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "" || LOG_LEVEL === "silent") {
    return undefined;
  }

  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  // Same records on stdout and in the file
  const streams: pino.StreamEntry[] = [
    { level: LOG_LEVEL, stream: process.stdout },
    {
      level: LOG_LEVEL,
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams);
}

const destination = createDestination();

const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// Child loggers for different modules
export const apiLogger = logger.child({ module: "station-api" });
export const sheetsLogger = logger.child({ module: "sheets" });
export const syncLogger = logger.child({ module: "sync" });
export const schedulerLogger = logger.child({ module: "scheduler" });
export const catalogLogger = logger.child({ module: "catalog" });
export const authLogger = logger.child({ module: "auth" });

export type Logger = pino.Logger;

if (destination !== undefined) {
  logger.info(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}
