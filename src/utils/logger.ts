/**
 * Logging utility for the Facebook Ads MCP server
 * Structured JSON lines on stderr (stdout belongs to the stdio transport),
 * with request ID correlation and access token redaction
 */

import { randomUUID } from 'node:crypto';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export interface LogContext {
  request_id?: string;
  tool_name?: string;
  account_id?: string;
  duration_ms?: number;
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  request_id?: string;
  tool_name?: string;
  context?: LogContext;
  error?: {
    message: string;
    type?: string;
    code?: string;
    stack?: string;
  };
}

export type LogSink = (line: string) => void;

/**
 * Patterns for detecting access tokens and secrets
 */
const REDACTION_PATTERNS = [
  // Authorization headers
  /Bearer\s+[A-Za-z0-9\-._~+/]+=*/gi,
  // access_token in query strings and JSON
  /(access[_-]?token["\s:=]+)([A-Za-z0-9\-._~+/]+)/gi,
  // App secrets
  /(app[_-]?secret["\s:=]+)([A-Za-z0-9\-._~+/]+)/gi,
  // The token passed on the command line
  /(--fb-token["\s:=,]+)([A-Za-z0-9\-._~+/]+)/gi,
  // Graph API user/page/system tokens
  /\bEAA[A-Za-z0-9]{20,}/g,
];

/**
 * Redact sensitive information from strings
 */
export function redactSecrets(text: string): string {
  let redacted = text;

  for (const pattern of REDACTION_PATTERNS) {
    redacted = redacted.replace(pattern, (_match, prefix: unknown) => {
      if (typeof prefix === 'string') {
        return `${prefix}[REDACTED]`;
      }
      return '[REDACTED]';
    });
  }

  return redacted;
}

/**
 * Generate a unique request ID
 */
export function generateRequestId(): string {
  return `req_${randomUUID()}`;
}

function describeError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    const code =
      'code' in error && error.code !== undefined && error.code !== null ? String(error.code) : undefined;
    return {
      message: error.message,
      type: error.name,
      code,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}

const stderrSink: LogSink = line => {
  process.stderr.write(line + '\n');
};

/**
 * Logger class with structured logging and request correlation
 */
export class Logger {
  private defaultContext: LogContext;
  private minLevel: LogLevel;
  private sink: LogSink;

  constructor(context: LogContext = {}, minLevel: LogLevel = LogLevel.INFO, sink: LogSink = stderrSink) {
    this.defaultContext = context;
    this.minLevel = minLevel;
    this.sink = sink;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger({ ...this.defaultContext, ...context }, this.minLevel, this.sink);
  }

  withRequestId(requestId: string): Logger {
    return this.child({ request_id: requestId });
  }

  withTool(toolName: string): Logger {
    return this.child({ tool_name: toolName });
  }

  private shouldLog(level: LogLevel): boolean {
    const levels = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];
    return levels.indexOf(level) >= levels.indexOf(this.minLevel);
  }

  private write(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) {
      return;
    }

    this.sink(redactSecrets(JSON.stringify(entry)));
  }

  private entry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.defaultContext,
      ...(context && { context }),
    };
  }

  debug(message: string, context?: LogContext): void {
    this.write(this.entry(LogLevel.DEBUG, message, context));
  }

  info(message: string, context?: LogContext): void {
    this.write(this.entry(LogLevel.INFO, message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.write(this.entry(LogLevel.WARN, message, context));
  }

  /**
   * Log error message, with the error's name, code and stack when given
   */
  error(message: string, error?: unknown, context?: LogContext): void {
    const entry = this.entry(LogLevel.ERROR, message, context);

    if (error !== undefined) {
      entry.error = describeError(error);
    }

    this.write(entry);
  }
}

function levelFromEnv(value: string | undefined): LogLevel {
  switch (value?.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Create a new logger instance; LOG_LEVEL picks the minimum level
 */
export function createLogger(context: LogContext = {}, sink?: LogSink): Logger {
  return new Logger(context, levelFromEnv(process.env.LOG_LEVEL), sink);
}
