/**
 * Structured JSON logger for the QWeather client
 *
 * All logs go to stderr because stdout carries MCP stdio framing
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

/** Query parameters whose values never reach the logs */
const REDACTED_PARAMS = ['sign', 'publicid', 'key'];

/**
 * Replace credential-bearing query values in a URL with `***`
 */
export function redactUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  for (const name of REDACTED_PARAMS) {
    if (parsed.searchParams.has(name)) {
      parsed.searchParams.set(name, '***');
    }
  }

  return parsed.toString();
}

class Logger {
  private minLevel: LogLevel;
  private readonly levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  /**
   * Set minimum log level
   */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * Check if a log level should be output
   */
  private shouldLog(level: LogLevel): boolean {
    return this.levelPriority[level] >= this.levelPriority[this.minLevel];
  }

  /**
   * Write a log entry to stderr
   */
  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };

    console.error(JSON.stringify(entry));
  }

  /**
   * Log a debug message
   */
  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  /**
   * Log an info message
   */
  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  /**
   * Log a warning message
   */
  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  /**
   * Log an error message
   */
  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  /**
   * Log an error object with stack trace
   */
  logError(error: Error, context?: LogContext): void {
    this.error(error.message, {
      ...context,
      errorName: error.name,
      stack: error.stack,
    });
  }

  /**
   * Log tool execution start
   */
  logToolStart(toolName: string, input: unknown, requestId?: string): void {
    this.info('Tool call started', {
      requestId,
      toolName,
      inputSummary: this.summarizeInput(input),
    });
  }

  /**
   * Log tool execution end
   */
  logToolEnd(
    toolName: string,
    latencyMs: number,
    outcome: 'success' | 'error',
    requestId?: string,
    errorCode?: string
  ): void {
    this.info('Tool call completed', {
      requestId,
      toolName,
      latencyMs,
      outcome,
      ...(errorCode && { errorCode }),
    });
  }

  /**
   * Log one call to the QWeather API. The URL is redacted before writing.
   */
  logUpstreamCall(
    upstreamUrl: string,
    httpStatus: number,
    latencyMs: number,
    requestId?: string
  ): void {
    this.debug('Upstream API call', {
      requestId,
      upstreamUrl: redactUrl(upstreamUrl),
      httpStatus,
      latencyMs,
    });
  }

  /**
   * Keep only the tool arguments that are safe and useful in logs
   */
  private summarizeInput(input: unknown): Record<string, unknown> {
    if (typeof input !== 'object' || input === null) {
      return { type: typeof input };
    }

    const summary: Record<string, unknown> = {};
    const safeFields = ['location', 'days', 'hours', 'range', 'number', 'latitude', 'longitude'];

    for (const field of safeFields) {
      if (field in input) {
        summary[field] = Reflect.get(input, field);
      }
    }

    return summary;
  }
}

const logger = new Logger();

export { logger };
