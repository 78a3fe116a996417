import chalk, { type ChalkInstance } from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const levelColors: Record<LogLevel, ChalkInstance> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function createLogger(source: string): Logger {
  return {
    debug: (message, data) => logMessage("debug", source, message, data),
    info: (message, data) => logMessage("info", source, message, data),
    warn: (message, data) => logMessage("warn", source, message, data),
    error: (message, data) => logMessage("error", source, message, data),
  };
}

function logMessage(level: LogLevel, source: string, message: string, data?: Record<string, unknown>) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} ${levelColors[level](`[${source}]`)} ${message}`);
  if (data) {
    console.log(`  ${JSON.stringify(data)}`);
  }
}
