import "dotenv/config";
import { pino, type Logger } from "pino";

export const rootLogger: Logger = pino({
  level: process.env.LOG_LEVEL || "info",
  base: { service: "offline-transcriber" },
});

export function createLogger(subsystem: string): Logger {
  return rootLogger.child({ subsystem });
}
