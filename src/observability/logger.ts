/**
 * Pino logger factory.
 *
 * Every engine owns one root logger; sessions and steps log through
 * children bound to `sessionId` and `step`.
 */

import pino, {
  type DestinationStream,
  type Logger,
  type LoggerOptions,
} from "pino";

export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal"
  | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

export interface LoggerConfig {
  level?: LogLevel;
  /** Bindings attached to every line. */
  base?: Record<string, unknown>;
  /** Where lines go; stdout when omitted. */
  destination?: DestinationStream;
}

export const createLogger = (config: LoggerConfig = {}): Logger => {
  const options: LoggerOptions = {
    level: config.level ?? "info",
    base: { service: "triage-loop", ...config.base },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return config.destination ? pino(options, config.destination) : pino(options);
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && LOG_LEVELS.some((level) => level === value);

export type { Logger };
