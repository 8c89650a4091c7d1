import pino from "pino";
import type { Logger } from "pino";
import type { LogLevel } from "./types.js";

export type AppLogger = Logger;

export function createLogger(level: LogLevel | "silent") {
  return pino({
    level,
    timestamp: pino.stdTimeFunctions.isoTime
  });
}
