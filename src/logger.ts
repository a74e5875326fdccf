import type { LogLevel } from "./config.js";

// stdout carries the MCP protocol, so every diagnostic goes to stderr.
const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const write =
    (level: LogLevel) =>
    (message: string, ...details: unknown[]): void => {
      if (LEVELS[level] < LEVELS[threshold]) return;
      console.error(`${level.toUpperCase()} [${scope}] ${message}`, ...details);
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}
