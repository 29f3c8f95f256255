import { mkdirSync, existsSync, appendFileSync } from "fs";
import { join, dirname, resolve } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));
const DEFAULT_LOG_DIR = join(__dirname, "../../logs");

type LogLevel = "info" | "warn" | "error" | "debug";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

function logDir(): string {
  return process.env.LOG_DIR ? resolve(process.env.LOG_DIR) : DEFAULT_LOG_DIR;
}

function fileLoggingEnabled(): boolean {
  const flag = process.env.LOG_TO_FILE?.toLowerCase();
  return flag !== "false" && flag !== "0";
}

// Errors don't survive JSON.stringify, keep at least name and message
function serializeData(data: unknown): string {
  if (data instanceof Error) {
    return JSON.stringify({ name: data.name, message: data.message });
  }
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

function formatEntry(entry: LogEntry): string {
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.data !== undefined) {
    return `${base} ${serializeData(entry.data)}`;
  }
  return base;
}

function writeToFile(formatted: string, timestamp: string): void {
  const dir = logDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const logFile = join(dir, `jobscope-${timestamp.slice(0, 10)}.log`);
  appendFileSync(logFile, formatted + "\n");
}

function log(level: LogLevel, message: string, data?: unknown): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    data,
  };

  const formatted = formatEntry(entry);

  switch (level) {
    case "error":
      console.error(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    case "debug":
      if (!process.env.DEBUG) return;
      console.log(formatted);
      break;
    default:
      console.log(formatted);
  }

  if (!fileLoggingEnabled()) return;
  try {
    writeToFile(formatted, entry.timestamp);
  } catch (err) {
    console.error(`Log file write failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/** Shortens model output or page text for log lines. */
export function preview(text: string, max: number = 150): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export const logger = {
  info: (msg: string, data?: unknown) => log("info", msg, data),
  warn: (msg: string, data?: unknown) => log("warn", msg, data),
  error: (msg: string, data?: unknown) => log("error", msg, data),
  debug: (msg: string, data?: unknown) => log("debug", msg, data),
};
