import { v4 as uuidv4 } from "uuid";
import { logLevelSchema, type LogLevel } from "../config/env";
import { AUTH_CONSTANTS } from "../config/constants";

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
const CURRENT_LOG_LEVEL: LogLevel = logLevelSchema.catch("info").parse(process.env.LOG_LEVEL);

export interface LogMeta {
  correlationId?: string;
  userId?: string;
  table?: string;
  cacheKey?: string;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

// Session tokens also travel in URLs, so anything that looks like one is
// masked before it reaches a log line.
const TOKEN_KEYS = new Set(["token", "sessionToken", "p_token", "authorization"]);
const SESSION_PARAM_PATTERN = new RegExp(`(${AUTH_CONSTANTS.SESSION_QUERY_PARAM}=)[^&\\s"]+`, "g");
const BEARER_PATTERN = /(Bearer\s+)[A-Za-z0-9_-]+/g;

export function redactToken(token: string): string {
  return token.length > 6 ? `${token.slice(0, 6)}…` : "[redacted]";
}

export function redactText(text: string): string {
  return text
    .replace(SESSION_PARAM_PATTERN, "$1[redacted]")
    .replace(BEARER_PATTERN, "$1[redacted]");
}

export function redactMeta(meta: LogMeta): LogMeta {
  const safe: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    if (TOKEN_KEYS.has(key) && typeof value === "string") {
      safe[key] = redactToken(value);
    } else if (typeof value === "string") {
      safe[key] = redactText(value);
    } else {
      safe[key] = value;
    }
  }
  return safe;
}

export function generateCorrelationId(): string {
  return uuidv4().substring(0, 8);
}

function write(level: LogLevel, component: string, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[CURRENT_LOG_LEVEL]) return;

  const safeMeta = meta ? redactMeta(meta) : undefined;
  const correlationPrefix = safeMeta?.correlationId ? `[${safeMeta.correlationId}] ` : "";
  const metaStr = safeMeta && Object.keys(safeMeta).length > 0 ? ` ${JSON.stringify(safeMeta)}` : "";
  const line = `[${level.toUpperCase()}] [${component}] ${correlationPrefix}${redactText(message)}${metaStr}`;

  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createLogger(component: string): Logger {
  return {
    debug: (message, meta) => write("debug", component, message, meta),
    info: (message, meta) => write("info", component, message, meta),
    warn: (message, meta) => write("warn", component, message, meta),
    error: (message, meta) => write("error", component, message, meta),
  };
}
