/**
 * Structured JSON logging for every tiercache process.
 *
 * Provides:
 * - JSON lines for log aggregators (default) or a one-line text format
 * - Request correlation ids, set by the load balancer per client request
 * - Per-component loggers via createLogger()
 */

import { AsyncLocalStorage } from "async_hooks";
import { v4 as uuidv4 } from "uuid";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface StructuredLog {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  requestId?: string;
  context?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
  };
}

// Correlation id of the request whose handler is currently running
const requestContext = new AsyncLocalStorage<string>();

/**
 * Run a request handler with a correlation id attached to every log line it emits,
 * including lines logged after its awaits resume.
 */
export function withRequestId<T>(requestId: string, fn: () => Promise<T>): Promise<T> {
  return requestContext.run(requestId, fn);
}

/**
 * Get the current request ID
 */
export function getRequestId(): string | undefined {
  return requestContext.getStore();
}

/**
 * Generate a new request ID
 */
export function generateRequestId(): string {
  return uuidv4();
}

/**
 * Format a log entry.
 *
 * Format is read per call so tests and the CLI can switch it after import.
 */
function formatLog(log: StructuredLog): string {
  if (process.env.TIERCACHE_LOG_FORMAT === "text") {
    const parts = [
      `[${log.timestamp}]`,
      `[${log.level.toUpperCase()}]`,
      `[${log.component}]`,
    ];
    if (log.requestId) {
      parts.push(`[${log.requestId.slice(0, 8)}]`);
    }
    parts.push(log.message);
    if (log.context) {
      parts.push(JSON.stringify(log.context));
    }
    if (log.error) {
      parts.push(`Error: ${log.error.message}`);
    }
    return parts.join(" ");
  }

  const output: Record<string, unknown> = {
    timestamp: log.timestamp,
    level: log.level,
    component: log.component,
    message: log.message,
  };
  if (log.requestId) {
    output.requestId = log.requestId;
  }
  if (log.context) {
    output.context = log.context;
  }
  if (log.error) {
    output.error = log.error;
  }
  return JSON.stringify(output);
}

/**
 * Core logging function
 */
function log(
  level: LogLevel,
  component: string,
  message: string,
  context?: Record<string, unknown>,
  error?: Error
): void {
  const entry: StructuredLog = {
    timestamp: new Date().toISOString(),
    level,
    component,
    message,
    requestId: getRequestId(),
  };

  if (context && Object.keys(context).length > 0) {
    entry.context = context;
  }

  if (error) {
    entry.error = {
      message: error.message,
      stack: error.stack,
    };
  }

  const formatted = formatLog(entry);

  if (level === "error") {
    process.stderr.write(formatted + "\n");
  } else {
    process.stdout.write(formatted + "\n");
  }
}

/**
 * Logger instance for a specific component
 */
export class Logger {
  constructor(private component: string) {}

  debug(message: string, context?: Record<string, unknown>): void {
    if (process.env.TIERCACHE_DEBUG) {
      log("debug", this.component, message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    log("info", this.component, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    log("warn", this.component, message, context);
  }

  error(
    message: string,
    error?: Error,
    context?: Record<string, unknown>
  ): void {
    log("error", this.component, message, context, error);
  }
}

/**
 * Create a logger for a component
 */
export function createLogger(component: string): Logger {
  return new Logger(component);
}

/**
 * Normalize an unknown thrown value into an Error for logging.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
