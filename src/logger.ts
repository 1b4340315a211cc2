/**
 * Logger
 *
 * Pino-based structured logger shared by every component.
 * Keeps the console helpers (success, skip, header, divider) as thin wrappers.
 */

import pino, { type DestinationStream } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LoggerOptions {
  /** Records below this level are dropped */
  level?: LogLevel;
  /** Where records go, one JSON line each. Defaults to stderr. */
  destination?: DestinationStream;
  now?: () => Date;
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  skip(msg: string): void;
  header(msg: string): void;
  divider(): void;
}

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && LOG_LEVELS.some((level) => level === value);

/**
 * Builds the single log stream. Each record carries `level`, an ISO `time` and `msg`.
 */
export const createLogger = (opts: LoggerOptions = {}): Logger => {
  const { now } = opts;
  const base = pino(
    {
      level: opts.level ?? "info",
      formatters: {
        level: (label: string) => ({ level: label }),
      },
      timestamp: now ? () => `,"time":"${now().toISOString()}"` : pino.stdTimeFunctions.isoTime,
      base: { service: "preset-transcode" },
    },
    opts.destination ?? pino.destination({ dest: 2, sync: true }),
  );

  return {
    debug: (msg) => base.debug(msg),
    info: (msg) => base.info(msg),
    success: (msg) => base.info(`✅ ${msg}`),
    warn: (msg) => base.warn(`⚠️  ${msg}`),
    error: (msg) => base.error(`❌ ${msg}`),
    skip: (msg) => base.warn(`⏭️  ${msg}`),
    header: (msg) => base.info(`=== ${msg} ===`),
    divider: () => base.info("-".repeat(50)),
  };
};

/** Formats milliseconds into a human-readable duration */
export const formatDuration = (ms: number): string => {
  const seconds = Math.floor((ms / 1000) % 60);
  const minutes = Math.floor((ms / (1000 * 60)) % 60);
  const hours = Math.floor(ms / (1000 * 60 * 60));
  const parts = [];
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (seconds > 0 || parts.length === 0) parts.push(`${seconds}s`);
  return parts.join(" ");
};
