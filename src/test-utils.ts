import { createLogger, type LogLevel } from "./logger.js";

export interface LogRecord {
  level: string;
  time: string;
  msg: string;
}

const parseRecord = (line: string): LogRecord => {
  const value: unknown = JSON.parse(line);
  if (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    "time" in value &&
    "msg" in value &&
    typeof value.level === "string" &&
    typeof value.time === "string" &&
    typeof value.msg === "string"
  ) {
    return { level: value.level, time: value.time, msg: value.msg };
  }
  throw new Error(`Not a log record: ${line}`);
};

/** A logger that keeps its records in memory, stamped with a fixed time */
export const captureLogger = (level?: LogLevel) => {
  const lines: string[] = [];
  const logger = createLogger({
    level,
    destination: {
      write: (line: string) => {
        lines.push(line.trimEnd());
      },
    },
    now: () => new Date("2026-01-02T03:04:05.000Z"),
  });
  const records = () => lines.map(parseRecord);
  const messages = () => records().map((record) => record.msg);
  return { logger, lines, records, messages };
};
