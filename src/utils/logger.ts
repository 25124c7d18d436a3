/**
 * Logger Module
 * Structured logging using pino, written to stderr so stdout stays a clean report
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

/** Every logger handed out so far, so `--debug` can reach module-level loggers */
const loggers = new Set<PinoLogger>();

let levelOverride: LogLevel | null = null;

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

/**
 * Pretty output only for humans watching a terminal
 */
function usePrettyOutput(): boolean {
  return (
    process.env.NODE_ENV !== "production" &&
    process.env.NODE_ENV !== "test" &&
    process.stderr.isTTY === true
  );
}

/**
 * Get log level from override, environment or default
 */
function getLogLevel(): LogLevel {
  if (levelOverride) return levelOverride;
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "warn";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "scanner", "inference-client")
 *
 * @example
 * ```typescript
 * const logger = createLogger("scanner");
 * logger.debug({ targetDir }, "Scanning directory");
 * logger.error({ err }, "Failed to move file");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  const logger = usePrettyOutput()
    ? pino({
        ...baseOptions,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
            destination: 2,
          },
        },
      })
    : pino(baseOptions, pino.destination({ dest: 2, sync: true }));

  loggers.add(logger);
  return logger;
}

/**
 * Change the level of every logger created so far and of those created later
 */
export function setLogLevel(level: LogLevel): void {
  levelOverride = level;
  for (const logger of loggers) {
    logger.level = level;
  }
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
