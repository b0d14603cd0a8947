import fs from "fs";
import path from "path";

/**
 * Logging utility with file persistence
 */

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const DAY = new Date().toISOString().split("T")[0];
const LOG_FILE = path.join(LOG_DIR, `engine-${DAY}.log`);
const SIGNALS_FILE = path.join(LOG_DIR, `signals-${DAY}.jsonl`);
const CYCLES_FILE = path.join(LOG_DIR, `cycles-${DAY}.jsonl`);

const fileLoggingEnabled =
  process.env.LOG_TO_FILE !== "false" && process.env.VITEST === undefined;

let logDirReady = false;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: unknown;
}

function parseLevel(raw: string | undefined): LogLevel {
  const upper = raw?.trim().toUpperCase();
  if (upper === "DEBUG" || upper === "INFO" || upper === "WARN" || upper === "ERROR") {
    return upper;
  }
  return "INFO";
}

let minLevel: LogLevel = parseLevel(process.env.LOG_LEVEL);

/**
 * Override the minimum level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

/**
 * Write log entry to file
 */
function writeToFile(filePath: string, content: string): void {
  if (!fileLoggingEnabled) {
    return;
  }

  try {
    if (!logDirReady) {
      fs.mkdirSync(LOG_DIR, { recursive: true });
      logDirReady = true;
    }
    fs.appendFileSync(filePath, content + "\n", "utf8");
  } catch (error) {
    console.error(`Failed to write to ${filePath}:`, error);
  }
}

/**
 * Errors do not survive JSON.stringify, flatten them first
 */
function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message, stack: data.stack };
  }
  if (data && typeof data === "object" && !Array.isArray(data)) {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
    }
    return out;
  }
  return data;
}

/**
 * Main log function
 */
export function log(level: LogLevel, module: string, message: string, data?: unknown): void {
  if (!isLevelEnabled(level)) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    module,
    message,
    data: data === undefined ? undefined : serializeData(data),
  };

  const colors: Record<LogLevel, string> = {
    INFO: "\x1b[36m", // Cyan
    WARN: "\x1b[33m", // Yellow
    ERROR: "\x1b[31m", // Red
    DEBUG: "\x1b[90m", // Gray
  };
  const reset = "\x1b[0m";

  console.log(`${colors[level]}[${entry.timestamp}] [${level}] [${module}]${reset} ${message}`);
  if (data !== undefined) {
    console.log(data);
  }

  writeToFile(LOG_FILE, JSON.stringify(entry));
}

/**
 * Append an emitted signal to the daily signals journal
 */
export function logSignal(record: Record<string, unknown>): void {
  writeToFile(SIGNALS_FILE, JSON.stringify({ timestamp: new Date().toISOString(), ...record }));
}

/**
 * Append one evaluation cycle summary
 */
export function logCycle(record: Record<string, unknown>): void {
  writeToFile(CYCLES_FILE, JSON.stringify({ timestamp: new Date().toISOString(), ...record }));
}

/**
 * Export shorthand functions
 */
export const info = (module: string, message: string, data?: unknown) => log("INFO", module, message, data);
export const warn = (module: string, message: string, data?: unknown) => log("WARN", module, message, data);
export const error = (module: string, message: string, data?: unknown) => log("ERROR", module, message, data);
export const debug = (module: string, message: string, data?: unknown) => log("DEBUG", module, message, data);
