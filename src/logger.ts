type Level = "debug" | "info" | "warn" | "error";

function silenced(): boolean {
  return process.env.RESTLINE_LOG_LEVEL === "silent";
}

function line(message: string): string {
  return `[${new Date().toISOString()}] ${message}`;
}

function write(level: Level, message: string, detail?: unknown): void {
  if (silenced()) return;
  if (level === "debug" && !process.env.RESTLINE_DEBUG) return;

  const args: unknown[] = detail === undefined ? [line(message)] : [line(message), detail];
  switch (level) {
    case "error":
      console.error(...args);
      break;
    case "warn":
      console.warn(...args);
      break;
    default:
      console.log(...args);
  }
}

export const logger = {
  debug: (message: string, detail?: unknown) => write("debug", message, detail),
  info: (message: string, detail?: unknown) => write("info", message, detail),
  warn: (message: string, detail?: unknown) => write("warn", message, detail),
  error: (message: string, detail?: unknown) => write("error", message, detail),
};
