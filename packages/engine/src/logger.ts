import { createLogger, format, transports, type Logger } from "winston";

export type { Logger };

/**
 * Console logger with a fixed label, `timestamp [LEVEL] [label] message`.
 * Level comes from LOG_LEVEL, default "info".
 */
export function createEngineLogger(label: string, level = process.env.LOG_LEVEL ?? "info"): Logger {
  return createLogger({
    level,
    format: format.combine(
      format.timestamp(),
      format.printf(
        ({ timestamp, level, message }) =>
          `${String(timestamp)} [${level.toUpperCase()}] [${label}] ${String(message)}`
      )
    ),
    transports: [new transports.Console()],
  });
}
