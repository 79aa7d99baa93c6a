/**
 * Logger utility
 * Provides structured logging with levels
 * Core components receive a StructuredLogger by injection and fall back to the shared instance
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogContext = Record<string, unknown>;

/**
 * Logging surface the simulator depends on
 */
export interface StructuredLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: LogContext;
  instanceId?: string;
}

export class Logger implements StructuredLogger {
  private minLevel: LogLevel = LogLevel.INFO;
  private logEntries: LogEntry[] = [];
  private maxEntries: number = 1000; // Keep last 1000 entries in memory

  constructor(private readonly instanceId?: string, private readonly parent?: Logger) {}

  /**
   * Set minimum log level
   */
  setLevel(level: LogLevel): void {
    if (this.parent) {
      this.parent.setLevel(level);
      return;
    }
    this.minLevel = level;
  }

  /**
   * Logger that prefixes every entry with an instance id and shares this logger's level and buffer
   */
  child(instanceId: string): Logger {
    return new Logger(instanceId, this.parent ?? this);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (this.parent) {
      this.parent.write(level, message, context, this.instanceId);
      return;
    }
    this.write(level, message, context, this.instanceId);
  }

  private write(level: LogLevel, message: string, context?: LogContext, instanceId?: string): void {
    if (level < this.minLevel) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context,
      instanceId,
    };

    this.logEntries.push(entry);
    if (this.logEntries.length > this.maxEntries) {
      this.logEntries.shift();
    }

    // Format and output to console
    const prefix = instanceId ? `[${instanceId}]` : '';
    const levelStr = LogLevel[level];
    const timestamp = entry.timestamp.toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';

    const logMessage = `${timestamp} ${levelStr} ${prefix} ${message}${contextStr}`;

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(logMessage);
        break;
      case LogLevel.INFO:
        console.log(logMessage);
        break;
      case LogLevel.WARN:
        console.warn(logMessage);
        break;
      case LogLevel.ERROR:
        console.error(logMessage);
        break;
    }
  }

  /**
   * Get recent log entries
   */
  getRecentEntries(count: number = 100): LogEntry[] {
    if (this.parent) {
      return this.parent.getRecentEntries(count);
    }
    return this.logEntries.slice(-count);
  }
}

// Export singleton instance
export const logger = new Logger();

// Export convenience functions
export const logInfo = (message: string, context?: LogContext, instanceId?: string) =>
  (instanceId ? logger.child(instanceId) : logger).info(message, context);
export const logWarn = (message: string, context?: LogContext, instanceId?: string) =>
  (instanceId ? logger.child(instanceId) : logger).warn(message, context);
export const logError = (message: string, context?: LogContext, instanceId?: string) =>
  (instanceId ? logger.child(instanceId) : logger).error(message, context);
