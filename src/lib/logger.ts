/**
 * Structured Logging Utility - Prayer Alerts Backend
 *
 * Emits one JSON object per line so CloudWatch Logs Insights can query
 * sweep runs by runId, subscriberId or mosqueId.
 */

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
    cause?: string;
  };
}

const isLogLevel = (value: string): value is LogLevel =>
  LEVEL_ORDER.some((level) => level === value);

/**
 * Current threshold from LOG_LEVEL, INFO when unset or unknown
 */
export const getLogLevel = (): LogLevel => {
  const level = process.env['LOG_LEVEL']?.toUpperCase() ?? 'INFO';
  return isLogLevel(level) ? level : LogLevel.INFO;
};

const shouldLog = (level: LogLevel): boolean =>
  LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(getLogLevel());

const serializeError = (error: Error): NonNullable<LogEntry['error']> => ({
  name: error.name,
  message: error.message,
  stack: error.stack,
  cause: error.cause instanceof Error ? error.cause.message : undefined,
});

const writeLog = (entry: LogEntry): void => {
  if (!shouldLog(entry.level)) {
    return;
  }

  const logOutput = JSON.stringify(entry);

  switch (entry.level) {
    case LogLevel.ERROR:
      console.error(logOutput);
      break;
    case LogLevel.WARN:
      console.warn(logOutput);
      break;
    case LogLevel.DEBUG:
      console.debug(logOutput);
      break;
    case LogLevel.INFO:
    default:
      console.log(logOutput);
      break;
  }
};

/**
 * Logger class with context
 */
export class Logger {
  private context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}) {
    this.context = context;
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger({ ...this.context, ...additionalContext });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, context, error);
  }

  private write(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    writeLog({
      timestamp: new Date().toISOString(),
      level,
      message,
      context: { ...this.context, ...context },
      error: error ? serializeError(error) : undefined,
    });
  }
}

/**
 * Subset of the logger that services depend on; lets tests pass plain spies
 */
export type ServiceLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Default logger instance
 */
export const logger = new Logger({ service: 'prayer-alerts' });

/**
 * Create a logger with Lambda context
 */
export const createLambdaLogger = (awsRequestId?: string): Logger => {
  return new Logger({
    requestId: awsRequestId,
    service: 'prayer-alerts',
  });
};

/**
 * Log Lambda function invocation
 */
export const logLambdaInvocation = (
  functionName: string,
  event: unknown,
  requestId?: string
): void => {
  createLambdaLogger(requestId).info('Lambda invocation started', {
    functionName,
    eventType: typeof event,
  });
};

/**
 * Log Lambda function completion
 */
export const logLambdaCompletion = (
  functionName: string,
  duration: number,
  requestId?: string
): void => {
  createLambdaLogger(requestId).info('Lambda invocation completed', {
    functionName,
    durationMs: duration,
  });
};

/**
 * Wrap a logger so every entry carries `context`
 */
export const withContext = (
  base: ServiceLogger,
  context: Record<string, unknown>
): ServiceLogger => ({
  debug: (message, extra) => base.debug(message, { ...context, ...extra }),
  info: (message, extra) => base.info(message, { ...context, ...extra }),
  warn: (message, extra) => base.warn(message, { ...context, ...extra }),
  error: (message, error, extra) => base.error(message, error, { ...context, ...extra }),
});
