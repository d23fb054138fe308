import pino, { type Logger } from "pino";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function createLogger(level: LogLevel, pretty: boolean): Logger {
  return pino({
    transport: pretty
      ? {
          target: "pino-pretty",
          options: {
            sync: true,
            singleLine: true,
            messageFormat: "[perso] - {msg}",
          },
        }
      : undefined,
    base: {
      pid: undefined,
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
    level,
  });
}
