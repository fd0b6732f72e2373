/**
 * Enhanced logger utility with context-aware logging
 * and configurable verbosity levels
 */
import type { Logger } from 'homebridge';

/**
 * Logger context types for more detailed logging
 */
export enum LogContext {
  PLATFORM = 'PLATFORM',
  API = 'API',
  ACCOUNT = 'ACCOUNT',
  HOMEKIT = 'HOMEKIT',
  COORDINATOR = 'COORDINATOR',
  SERVICE = 'SERVICE'
}

/**
 * Log levels to control verbosity
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  VERBOSE = 4
}

/**
 * Valid log level string values for configuration
 */
export type LogLevelString = 'normal' | 'debug' | 'verbose';

/**
 * The subset of the Homebridge logger this plugin writes to
 */
export type LogSink = Pick<Logger, 'info' | 'warn' | 'error' | 'debug'>;

const LEVEL_NAMES = ['ERROR', 'WARN', 'INFO', 'DEBUG', 'VERBOSE'];

/**
 * Resolve the configured log level, accepting the legacy `debugMode` flag
 */
export function resolveLogLevel(logLevel: unknown, debugMode?: unknown): LogLevelString {
  if (logLevel === 'normal' || logLevel === 'debug' || logLevel === 'verbose') {
    return logLevel;
  }
  return debugMode === true ? 'debug' : 'normal';
}

/**
 * Enhanced logger with context support and configurable verbosity
 */
export class EnhancedLogger {
  private readonly logLevel: LogLevel;

  /**
   * @param logger - Homebridge logger instance
   * @param logLevelInput - Configured verbosity
   * @param timestampEnabled - Whether to include timestamps in log messages
   */
  constructor(
    private readonly logger: LogSink,
    logLevelInput: LogLevelString = 'normal',
    private readonly timestampEnabled = true
  ) {
    switch (logLevelInput) {
      case 'verbose':
        this.logLevel = LogLevel.VERBOSE;
        break;
      case 'debug':
        this.logLevel = LogLevel.DEBUG;
        break;
      case 'normal':
      default:
        this.logLevel = LogLevel.INFO;
        break;
    }

    this.debug(`Logger initialized at ${LEVEL_NAMES[this.logLevel]} level`, LogContext.PLATFORM);
  }

  /**
   * Format a message with timestamp and context
   */
  private formatMessage(message: string, context?: LogContext): string {
    let formattedMessage = '';

    if (this.timestampEnabled) {
      formattedMessage += `[${new Date().toISOString()}] `;
    }

    if (context) {
      formattedMessage += `[${context}] `;
    }

    return formattedMessage + message;
  }

  public info(message: string, context?: LogContext): void {
    if (this.logLevel >= LogLevel.INFO) {
      this.logger.info(this.formatMessage(message, context));
    }
  }

  public warn(message: string, context?: LogContext): void {
    if (this.logLevel >= LogLevel.WARN) {
      this.logger.warn(this.formatMessage(message, context));
    }
  }

  /**
   * Log an error message - always shown regardless of log level
   */
  public error(message: string, context?: LogContext): void {
    this.logger.error(this.formatMessage(message, context));
  }

  public debug(message: string, context?: LogContext): void {
    if (this.logLevel >= LogLevel.DEBUG) {
      this.logger.debug(this.formatMessage(message, context));
    }
  }

  /**
   * Log a verbose debug message (only in verbose mode)
   */
  public verbose(message: string, context?: LogContext): void {
    if (this.logLevel >= LogLevel.VERBOSE) {
      this.logger.debug(this.formatMessage(message, context));
    }
  }

  /**
   * Log an API request, or its response when a status is given
   */
  public api(method: string, endpoint: string, status?: number, data?: unknown): void {
    if (status === undefined) {
      this.debug(`${method} ${endpoint}`, LogContext.API);
      return;
    }

    this.debug(`${method} ${endpoint} (Status: ${status})`, LogContext.API);

    if (data !== undefined && this.logLevel >= LogLevel.VERBOSE) {
      const text = typeof data === 'string' ? data : JSON.stringify(data);
      // Long HTML pages are not useful in full
      this.verbose(`${method} ${endpoint} data: ${text.length > 500 ? `${text.slice(0, 500)}...` : text}`, LogContext.API);
    }
  }

  /**
   * Log the state pushed to HomeKit for an account
   */
  public state(username: string, state: Record<string, unknown>): void {
    this.debug(`Account ${username} state: ${JSON.stringify(state)}`, LogContext.ACCOUNT);
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  public isVerboseEnabled(): boolean {
    return this.logLevel >= LogLevel.VERBOSE;
  }

  public isDebugEnabled(): boolean {
    return this.logLevel >= LogLevel.DEBUG;
  }
}
