/**
 * Structured logging for the bridge runtime.
 *
 * Severities follow the same low-to-high scale the engine debug trace uses:
 *   - trace: verbose tracing (off by default)
 *   - info: lifecycle milestones
 *   - warn: recoverable anomalies (unknown paths, unmatched responses)
 *   - error: failed handlers and fatal faults
 */

export type LogSeverity = "trace" | "info" | "warn" | "error";

export type LogFields = Readonly<Record<string, unknown>>;

export type LogRecord = Readonly<{
  severity: LogSeverity;
  message: string;
  fields: LogFields;
  timeMs: number;
}>;

export type LogSink = (record: LogRecord) => void;

export type Logger = Readonly<{
  trace: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
}>;

export type CreateLoggerOptions = Readonly<{
  minSeverity?: LogSeverity;
  sink?: LogSink;
  now?: () => number;
}>;

const EMPTY_FIELDS: LogFields = Object.freeze({});

export function severityToNum(severity: LogSeverity): number {
  switch (severity) {
    case "trace":
      return 0;
    case "info":
      return 1;
    case "warn":
      return 2;
    case "error":
      return 3;
  }
}

export function parseLogSeverity(raw: string | undefined): LogSeverity | null {
  if (raw === undefined) return null;
  const normalized = raw.trim().toLowerCase();
  switch (normalized) {
    case "trace":
    case "info":
    case "warn":
    case "error":
      return normalized;
    default:
      return null;
  }
}

function formatFields(fields: LogFields): string {
  const keys = Object.keys(fields);
  if (keys.length === 0) return "";
  return ` ${keys.map((key) => `${key}=${String(fields[key])}`).join(" ")}`;
}

/**
 * Format a record as one `[tether] <severity> <message> k=v` line.
 */
export function formatLogRecord(record: LogRecord): string {
  return `[tether] ${record.severity} ${record.message}${formatFields(record.fields)}`;
}

export const consoleSink: LogSink = (record) => {
  const line = formatLogRecord(record);
  switch (record.severity) {
    case "error":
      console.error(line);
      return;
    case "warn":
      console.warn(line);
      return;
    default:
      console.log(line);
  }
};

export function createLogger(opts: CreateLoggerOptions = {}): Logger {
  const min = severityToNum(opts.minSeverity ?? "warn");
  const sink = opts.sink ?? consoleSink;
  const now = opts.now ?? Date.now;

  function emit(severity: LogSeverity, message: string, fields: LogFields | undefined): void {
    if (severityToNum(severity) < min) return;
    sink(Object.freeze({ severity, message, fields: fields ?? EMPTY_FIELDS, timeMs: now() }));
  }

  return Object.freeze({
    trace: (message: string, fields?: LogFields) => emit("trace", message, fields),
    info: (message: string, fields?: LogFields) => emit("info", message, fields),
    warn: (message: string, fields?: LogFields) => emit("warn", message, fields),
    error: (message: string, fields?: LogFields) => emit("error", message, fields),
  });
}

function discard(): void {}

export const SILENT_LOGGER: Logger = Object.freeze({
  trace: discard,
  info: discard,
  warn: discard,
  error: discard,
});
