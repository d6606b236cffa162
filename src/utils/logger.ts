import { existsSync, mkdirSync } from "fs";
import { appendFile } from "fs/promises";
import { dirname } from "path";
import chalk, { type ChalkInstance } from "chalk";
import type { MultiBar } from "cli-progress";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LoggerConfig {
  logToConsole: boolean;
  logToFile: boolean;
  logFilePath?: string;
  consoleLogLevel: LogLevel;
  fileLogLevel: LogLevel;
  multibar?: MultiBar | null; // Console lines go through the bar while it is drawn
}

const defaultConfig: LoggerConfig = {
  logToConsole: true,
  logToFile: false,
  consoleLogLevel: "info",
  fileLogLevel: "debug",
  multibar: null,
};

let currentConfig: LoggerConfig = { ...defaultConfig };

// Appends are chained so lines land in order
let pendingWrite: Promise<void> = Promise.resolve();

const consoleWriters: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function atLeast(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

/**
 * Merge `config` into the current settings. Creates the log file's
 * directory; file logging is switched off if that fails.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  currentConfig = { ...currentConfig, ...config };

  const { logToFile, logFilePath } = currentConfig;
  if (!logToFile || !logFilePath) return;
  const logDir = dirname(logFilePath);
  if (existsSync(logDir)) return;
  try {
    mkdirSync(logDir, { recursive: true });
  } catch (error) {
    console.error(`Cannot create log directory ${logDir}: ${error}`);
    currentConfig.logToFile = false;
  }
}

export function resetLogger(): void {
  currentConfig = { ...defaultConfig };
}

export function setActiveMultibar(multibar: MultiBar | null): void {
  currentConfig.multibar = multibar;
}

function writeConsole(level: LogLevel, line: string): void {
  const { multibar, logToFile } = currentConfig;
  if (!multibar) {
    consoleWriters[level](line);
    return;
  }
  const hint =
    level === "error" && logToFile ? chalk.gray(" (details in the log file)") : "";
  multibar.log(`${line}${hint}\n`);
}

function appendToLogFile(path: string, line: string, context?: string): void {
  const entry = context ? `${line}\n  Context: ${context}\n` : `${line}\n`;
  pendingWrite = pendingWrite.then(() =>
    appendFile(path, entry).catch((error: unknown) => {
      console.error(`Cannot write to log file ${path}: ${error}`);
    })
  );
}

/** Resolves once queued log file writes are done. */
export function flushLogs(): Promise<void> {
  return pendingWrite;
}

function log(
  level: LogLevel,
  color: ChalkInstance,
  message: string,
  context?: string
): void {
  const { logToConsole, consoleLogLevel, logToFile, logFilePath, fileLogLevel } =
    currentConfig;
  const toConsole = logToConsole && atLeast(level, consoleLogLevel);
  const filePath = logToFile && atLeast(level, fileLogLevel) ? logFilePath : undefined;
  if (!toConsole && !filePath) return;

  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`;
  if (toConsole) writeConsole(level, color(line));
  // Context (stack traces and the like) is only written to the file
  if (filePath) appendToLogFile(filePath, line, context);
}

export function debug(message: string, context?: string): void {
  log("debug", chalk.gray, message, context);
}

export function info(message: string, context?: string): void {
  log("info", chalk.blue, message, context);
}

export function warn(message: string, context?: string): void {
  log("warn", chalk.yellow, message, context);
}

export function error(message: string, context?: string): void {
  log("error", chalk.red, message, context);
}

/** Info level, in green. */
export function success(message: string, context?: string): void {
  log("info", chalk.green, message, context);
}
