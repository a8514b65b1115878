import pino, { type Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function createLogger(level: LogLevel = "info"): Logger {
  return pino({ name: "siteqa", level, timestamp: true }, pino.destination(2));
}

export const silentLogger: Logger = pino({ level: "silent" });

export function moduleLogger(logger: Logger | undefined, module: string): Logger {
  return (logger ?? silentLogger).child({ module });
}
