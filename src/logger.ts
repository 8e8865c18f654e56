import { pino } from "pino";

export const logger = pino({
  name: "parcel-status-watcher",
  level: "info"
});

export function setLogLevel(level: string): void {
  logger.level = level;
}
