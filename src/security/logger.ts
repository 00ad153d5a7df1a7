import type { Request } from "express";

export interface LogMetadata {
  [key: string]: unknown;
}

export type LogLevel = "info" | "warn" | "error";

export interface Logger {
  info: (event: string, metadata?: LogMetadata) => void;
  warn: (event: string, metadata?: LogMetadata) => void;
  error: (event: string, metadata?: LogMetadata) => void;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  minLevel?: LogLevel;
  sink?: LogSink;
  clock?: () => Date;
}

const REDACTED = "[REDACTED]";
const TRUNCATED = "[Truncated]";
const MAX_DEPTH = 6;
const MIN_ENV_SECRET_LENGTH = 6;

const LEVEL_ORDER: Record<LogLevel, number> = { info: 10, warn: 20, error: 30 };

const SENSITIVE_HEADERS = new Set([
  "authorization",
  "proxy-authorization",
  "cookie",
  "set-cookie",
  "x-api-key",
  "x-csrf-token"
]);

// Post and comment bodies, contact details and credentials never reach the log.
const SENSITIVE_KEY = /(authorization|cookie|password|secret|token|csrf|session|credential|api[_-]?key|database[_-]?url|connection[_-]?string|body|text|email|env)/i;

const SENSITIVE_ENV_NAME = /(key|token|secret|password|cookie|private|database_url|connection|credential|auth)/i;

function readSecretEnvValues(env: NodeJS.ProcessEnv): string[] {
  return Object.entries(env)
    .filter(([name, value]) => value !== undefined && SENSITIVE_ENV_NAME.test(name))
    .map(([, value]) => (value ?? "").trim())
    .filter((value) => value.length >= MIN_ENV_SECRET_LENGTH);
}

const secretEnvValues = readSecretEnvValues(process.env);

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function redactHeaders(headers: Record<string, unknown>, depth: number): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(headers).map(([name, value]) => [
      name,
      SENSITIVE_HEADERS.has(name.toLowerCase()) ? REDACTED : redactValue(value, depth + 1)
    ])
  );
}

function redactRecord(record: Record<string, unknown>, depth: number): Record<string, unknown> {
  const output: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(record)) {
    if (SENSITIVE_KEY.test(key)) {
      output[key] = REDACTED;
    } else if (key.toLowerCase() === "headers" && isPlainRecord(value)) {
      output[key] = redactHeaders(value, depth);
    } else {
      output[key] = redactValue(value, depth + 1);
    }
  }

  return output;
}

function redactValue(value: unknown, depth: number): unknown {
  if (depth > MAX_DEPTH) {
    return TRUNCATED;
  }

  switch (typeof value) {
    case "string":
      return secretEnvValues.some((secret) => value.includes(secret)) ? REDACTED : value;
    case "number":
    case "boolean":
    case "undefined":
      return value;
    case "bigint":
      return value.toString();
    case "function":
    case "symbol":
      return String(value);
    default:
      break;
  }

  if (value === null) {
    return null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (Array.isArray(value)) {
    return value.map((entry) => redactValue(entry, depth + 1));
  }
  if (isPlainRecord(value)) {
    return redactRecord(value, depth + 1);
  }

  return String(value);
}

export function sanitizeLogMetadata(metadata: LogMetadata = {}): LogMetadata {
  return redactRecord(metadata, 0);
}

export function buildSafeRequestLogMetadata(req: Request): LogMetadata {
  return {
    method: req.method,
    path: req.originalUrl || req.url,
    ip: req.ip,
    userId: req.auth?.userId,
    headers: redactHeaders({ ...req.headers }, 0)
  };
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized === "info" || normalized === "warn" || normalized === "error" ? normalized : fallback;
}

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.info(line);
  }
};

/** One JSON object per line, metadata redacted before it is serialized. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.minLevel ?? "info"];
  const sink = options.sink ?? consoleSink;
  const clock = options.clock ?? (() => new Date());

  const write = (level: LogLevel, event: string, metadata: LogMetadata = {}): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }

    sink(
      level,
      JSON.stringify({
        level,
        timestamp: clock().toISOString(),
        event,
        metadata: sanitizeLogMetadata(metadata)
      })
    );
  };

  return {
    info: (event, metadata) => write("info", event, metadata),
    warn: (event, metadata) => write("warn", event, metadata),
    error: (event, metadata) => write("error", event, metadata)
  };
}

export const appLogger = createLogger({ minLevel: parseLogLevel(process.env.LOG_LEVEL) });
