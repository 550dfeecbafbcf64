import fs from "fs";
import path from "path";

/**
 * Logging utility with file persistence
 */

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

const LOG_DIR = path.join(process.cwd(), "logs");

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: unknown;
}

interface AnalysisLogEntry {
  timestamp: string;
  assetId: string;
  status: "complete" | "error";
  provenance: string;
  quality: string;
  qualityScore: number;
  price: number;
  rsi: number;
  trend: string;
  signals: string[];
}

function dateStamp(): string {
  return new Date().toISOString().split("T")[0] ?? "unknown";
}

function isFileLoggingEnabled(): boolean {
  return process.env.LOG_TO_FILE !== "false";
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function minimumLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL ?? "INFO").toUpperCase();
  return isLogLevel(configured) ? configured : "INFO";
}

/**
 * Write log entry to file
 */
function writeToFile(fileName: string, content: string): void {
  if (!isFileLoggingEnabled()) {
    return;
  }

  try {
    if (!fs.existsSync(LOG_DIR)) {
      fs.mkdirSync(LOG_DIR, { recursive: true });
    }
    fs.appendFileSync(path.join(LOG_DIR, fileName), content + "\n", "utf8");
  } catch (err) {
    console.error(`Failed to write to ${fileName}:`, err);
  }
}

/**
 * Format unknown errors for log lines
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/**
 * Main log function
 */
export function log(level: LogLevel, module: string, message: string, data?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel()]) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    module,
    message,
    data: data instanceof Error ? { name: data.name, message: data.message } : data,
  };

  const colors: Record<LogLevel, string> = {
    INFO: "\x1b[36m",    // Cyan
    WARN: "\x1b[33m",    // Yellow
    ERROR: "\x1b[31m",   // Red
    DEBUG: "\x1b[90m",   // Gray
  };
  const reset = "\x1b[0m";

  console.log(`${colors[level]}[${entry.timestamp}] [${level}] [${module}]${reset} ${message}`);
  if (data !== undefined) {
    console.log(data);
  }

  writeToFile(`app-${dateStamp()}.log`, JSON.stringify(entry));
}

/**
 * Log a finished analysis as one JSONL record
 */
export function logAnalysisResult(result: {
  assetId: string;
  status: "complete" | "error";
  provenance: string;
  quality: string;
  qualityScore: number;
  currentPrice: number;
  rsi: number;
  trend: string;
  signals: ReadonlyArray<{ technique: string }>;
}): void {
  const entry: AnalysisLogEntry = {
    timestamp: new Date().toISOString(),
    assetId: result.assetId,
    status: result.status,
    provenance: result.provenance,
    quality: result.quality,
    qualityScore: result.qualityScore,
    price: result.currentPrice,
    rsi: result.rsi,
    trend: result.trend,
    signals: result.signals.map((s) => s.technique),
  };

  writeToFile(`analysis-${dateStamp()}.jsonl`, JSON.stringify(entry));
  log(
    "INFO",
    "AnalysisResult",
    `${result.assetId} quality=${result.quality} signals=${result.signals.length} rsi=${result.rsi.toFixed(1)} data=${result.provenance}`
  );
}

/**
 * Export shorthand functions
 */
export const info = (module: string, message: string, data?: unknown) => log("INFO", module, message, data);
export const warn = (module: string, message: string, data?: unknown) => log("WARN", module, message, data);
export const error = (module: string, message: string, data?: unknown) => log("ERROR", module, message, data);
export const debug = (module: string, message: string, data?: unknown) => log("DEBUG", module, message, data);
