// All output goes to stderr: stdout belongs to the stdio transport.

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const isTest = process.env.NODE_ENV === "test";
let threshold: LogLevel = isTest ? "silent" : "info";

export function setLogLevel(level: LogLevel): void {
  if (!isTest) threshold = level;
}

function write(level: Exclude<LogLevel, "silent">, message: string, data?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  const line = `[${level.toUpperCase()}] ${message}`;
  if (data === undefined) {
    console.error(line);
  } else {
    console.error(line, data);
  }
}

export const logger = {
  debug: (message: string, data?: unknown) => write("debug", message, data),
  info: (message: string, data?: unknown) => write("info", message, data),
  warn: (message: string, data?: unknown) => write("warn", message, data),
  error: (message: string, error?: unknown) => write("error", message, error)
};
