import pino, { type Logger, type LoggerOptions, type StreamEntry } from "pino";

export type { Logger } from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const isProduction = process.env.NODE_ENV === "production";

function resolveEnvLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  const match = LOG_LEVELS.find((level) => level === fromEnv);
  return match ?? (isProduction ? "info" : "debug");
}

function baseOptions(level: LogLevel): LoggerOptions {
  return {
    level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

export const logger = pino(baseOptions(resolveEnvLevel()));

// Create child loggers for different modules
export const configLogger = logger.child({ module: "config" });
export const documentLogger = logger.child({ module: "documents" });
export const reminderLogger = logger.child({ module: "reminders" });
export const emailLogger = logger.child({ module: "email" });
export const jobLogger = logger.child({ module: "jobs" });

export interface RunLoggerOptions {
  runId: string;
  level?: LogLevel;
  /** Optional log file, written in addition to stdout */
  file?: string;
}

/**
 * Logger scoped to a single run. Every component of the run receives it
 * (or a child of it) through its constructor.
 */
export function createRunLogger(options: RunLoggerOptions): Logger {
  const level = options.level ?? resolveEnvLevel();

  if (!options.file) {
    return pino(baseOptions(level)).child({ runId: options.runId });
  }

  const streams: StreamEntry[] = [
    { level, stream: process.stdout },
    { level, stream: pino.destination({ dest: options.file, mkdir: true, sync: true }) },
  ];

  return pino(baseOptions(level), pino.multistream(streams)).child({
    runId: options.runId,
  });
}

/**
 * Logger that drops everything. Used where a component needs a Logger but
 * output is unwanted (tests, dry runs).
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

export default logger;
