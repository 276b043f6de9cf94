/**
 * tokengrid logger.
 * Format: JSONL (one JSON object per line) on stderr, so stdout stays free
 * for grid rows and decoded text. Passwords and plaintext are never logged.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogThreshold = LogLevel | "silent";

export type LogEvent =
  | "encode_started"
  | "encode_completed"
  | "placement_fallback"
  | "decode_completed"
  | "cli_error"
  | "other";

export interface LogEntry {
  ts: string;
  level: LogLevel;
  event: LogEvent;
  message: string;
  details?: Record<string, unknown>;
  error?: string;
  stack?: string;
}

export type LogSink = (line: string, entry: LogEntry) => void;

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogThreshold[] = ["debug", "info", "warn", "error", "silent"];

const LOG_BUFFER: LogEntry[] = [];
const MAX_BUFFER = 500;

const defaultSink: LogSink = (line) => {
  console.error(`[tokengrid] ${line}`);
};

let threshold: LogThreshold = "warn";
let sink: LogSink = defaultSink;

export function isLogThreshold(value: string): value is LogThreshold {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function setLogLevel(level: LogThreshold): void {
  threshold = level;
}

export function getLogLevel(): LogThreshold {
  return threshold;
}

/** Redirect output; `null` restores stderr. */
export function setLogSink(next: LogSink | null): void {
  sink = next ?? defaultSink;
}

function entry(
  level: LogLevel,
  event: LogEvent,
  message: string,
  opts?: { details?: Record<string, unknown>; error?: unknown }
): LogEntry {
  const e: LogEntry = {
    ts: new Date().toISOString(),
    level,
    event,
    message,
    ...(opts?.details && { details: opts.details }),
  };
  if (opts?.error !== undefined) {
    e.error = opts.error instanceof Error ? opts.error.message : String(opts.error);
    if (opts.error instanceof Error && opts.error.stack) e.stack = opts.error.stack;
  }
  return e;
}

function flush(ent: LogEntry): void {
  if (LEVEL_RANK[ent.level] < LEVEL_RANK[threshold]) return;
  LOG_BUFFER.push(ent);
  if (LOG_BUFFER.length > MAX_BUFFER) LOG_BUFFER.shift();
  sink(JSON.stringify(ent), ent);
}

export function logDebug(event: LogEvent, message: string, details?: Record<string, unknown>): void {
  flush(entry("debug", event, message, { details }));
}

export function logInfo(event: LogEvent, message: string, details?: Record<string, unknown>): void {
  flush(entry("info", event, message, { details }));
}

export function logWarn(event: LogEvent, message: string, details?: Record<string, unknown>): void {
  flush(entry("warn", event, message, { details }));
}

export function logError(event: LogEvent, message: string, error?: unknown, details?: Record<string, unknown>): void {
  flush(entry("error", event, message, { error, details }));
}

export function getLogBuffer(): LogEntry[] {
  return [...LOG_BUFFER];
}

export function clearLogBuffer(): void {
  LOG_BUFFER.length = 0;
}
