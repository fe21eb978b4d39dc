import pino, { type Logger as PinoLogger } from "pino";
import { getEnv } from "@/lib/config/env";

export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
}

let baseLogger: PinoLogger | null = null;

// Built on first write so that loading a module never parses the environment.
function getBaseLogger(): PinoLogger {
  baseLogger ??= pino({
    level: getEnv().LOG_LEVEL,
    base: { app: "forkbench" },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return baseLogger;
}

export function createLogger(component: string): Logger {
  let logger: PinoLogger | null = null;

  const write =
    (level: "debug" | "info" | "warn" | "error") =>
    (message: string, data?: Record<string, unknown>): void => {
      logger ??= getBaseLogger().child({ component });
      if (data) {
        logger[level](data, message);
      } else {
        logger[level](message);
      }
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}
