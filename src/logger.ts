// stdout carries BibTeX only; every log line goes to stderr.

export type LogLevel = "debug" | "info";

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export const logger = {
  info: (...args: unknown[]) => console.error("[INFO]", ...args),
  warn: (...args: unknown[]) => console.error("[WARN]", ...args),
  error: (...args: unknown[]) => console.error("[ERROR]", ...args),
  debug: (...args: unknown[]) => {
    if (currentLevel === "debug") console.error("[DEBUG]", ...args);
  },
};
