import fs from "node:fs";
import process from "node:process";
import { COLOR_CODES, ENABLE_COLOR, type ColorCode } from "../config/constants.js";

const LOG_FILE = process.env["LOG_FILE"];
const logStream: fs.WriteStream | undefined = LOG_FILE
  ? fs.createWriteStream(LOG_FILE, { flags: "a" })
  : undefined;

export type LogLevel = "debug" | "warn" | "error" | "result";

/** One log-file line: ISO time, padded level tag, message. */
export function formatLogLine(level: LogLevel, message: string, at: Date = new Date()): string {
  return `${at.toISOString()} ${level.toUpperCase().padEnd(6)} ${message}`;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function colorize(message: string, color: ColorCode | undefined): string {
  if (!ENABLE_COLOR || !color) {
    return message;
  }
  return `${color}${message}${COLOR_CODES.reset}`;
}

type ConsoleMethod = "log" | "warn" | "error";

export interface LoggerSpec {
  level: LogLevel;
  method: ConsoleMethod;
  color?: ColorCode;
}

export interface Logger {
  (message: string, ...rest: unknown[]): void;
}

/**
 * Everything goes to LOG_FILE when set; "debug" lines reach the console
 * only in debug mode.
 */
export function makeLogger(spec: LoggerSpec, debugMode: boolean): Logger {
  const quiet = spec.level === "debug" && !debugMode;
  return (message: string, ...rest: unknown[]): void => {
    const line = [message, ...rest.map(String)].join(" ");
    logStream?.write(`${formatLogLine(spec.level, line)}\n`);

    if (quiet) return;
    console[spec.method](colorize(line, spec.color));
  };
}

export interface Loggers {
  /** Load progress and pipeline tracing; shown with --debug. */
  engineLog: Logger;
  engineWarn: Logger;
  engineError: Logger;
  /** Check results for the operator. */
  resultLog: Logger;
}

export function createLoggers(debugMode: boolean): Loggers {
  return {
    engineLog: makeLogger({ level: "debug", method: "log", color: COLOR_CODES.toHuman }, debugMode),
    engineWarn: makeLogger({ level: "warn", method: "warn", color: COLOR_CODES.warn }, debugMode),
    engineError: makeLogger({ level: "error", method: "error", color: COLOR_CODES.error }, debugMode),
    resultLog: makeLogger({ level: "result", method: "log" }, debugMode),
  };
}
