import { pino } from "pino";
import type { Logger as PinoInstance } from "pino";
import type { LogContext, Logger } from "../ports/logger";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export type PinoLoggerOptions = {
  level?: LogLevel;
  pretty?: boolean;
  base?: LogContext;
};

export function createPinoInstance(options: PinoLoggerOptions = {}): PinoInstance {
  return pino({
    level: options.level ?? "info",
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { service: "file-versioner", ...options.base },
    transport: options.pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            ignore: "pid,hostname,service",
          },
        }
      : undefined,
  });
}

/** Adapts a pino instance to the application's Logger port. */
export function createPinoLogger(options: PinoLoggerOptions | PinoInstance = {}): Logger {
  const instance = isPino(options) ? options : createPinoInstance(options);

  const write = (level: "debug" | "info" | "warn" | "error") => (message: string, context?: LogContext) => {
    if (context) instance[level](context, message);
    else instance[level](message);
  };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

function isPino(value: PinoLoggerOptions | PinoInstance): value is PinoInstance {
  return "child" in value && typeof value.child === "function";
}
