import pino from "pino";
import { createWriteStream } from "fs";

const logLevel = process.env.LOG_LEVEL || "info";
const logFile = process.env.LOG_FILE;

// stdout always, plus an append-mode file when LOG_FILE is set
const streams: Array<{ stream: NodeJS.WritableStream }> = [
  { stream: process.stdout }
];

if (logFile) {
  streams.push({
    stream: createWriteStream(logFile, { flags: "a" })
  });
}

const destination = streams.length > 1
  ? pino.multistream(streams)
  : process.stdout;

export const logger = pino(
  {
    name: process.env.SERVICE_NAME || "clinical-terminology-engine",
    level: logLevel,
    serializers: { err: pino.stdSerializers.err }
  },
  destination
);

export type Logger = typeof logger;

/** Child logger tagged with the engine component that writes through it. */
export function componentLogger(component: "resolver" | "extraction" | "pipeline" | "validation" | "engine"): Logger {
  return logger.child({ component });
}
