/**
 * Simple logger with log levels
 *
 * Set the INKWELL_LOG env var to control verbosity:
 * - "debug": all logs
 * - "info": info, warn, error
 * - "warn": warn, error only (default)
 * - "error": errors only
 * - "silent": no logs
 */

type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVELS;
}

function getLogLevel(): LogLevel {
  const fromEnv = process.env.INKWELL_LOG?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "warn";
}

let currentLevel = getLogLevel();

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[currentLevel];
}

export const logger = {
  debug: (tag: string, ...args: unknown[]) => {
    if (shouldLog("debug")) console.log(`[${tag}]`, ...args);
  },
  info: (tag: string, ...args: unknown[]) => {
    if (shouldLog("info")) console.log(`[${tag}]`, ...args);
  },
  warn: (tag: string, ...args: unknown[]) => {
    if (shouldLog("warn")) console.warn(`[${tag}]`, ...args);
  },
  error: (tag: string, ...args: unknown[]) => {
    if (shouldLog("error")) console.error(`[${tag}]`, ...args);
  },
  setLevel: (level: LogLevel) => {
    currentLevel = level;
  },
  getLevel: () => currentLevel,
  /** True when INKWELL_LOG pins the level */
  isPinned: () => isLogLevel(process.env.INKWELL_LOG?.toLowerCase()),
};

export type { LogLevel };
