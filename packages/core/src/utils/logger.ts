/**
 * Structured Logger
 *
 * Consistent, structured logging across the cache and orchestration layers.
 */

import { toError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  level: LogLevel;
  component: string;
  enableConsole: boolean;
  /** JSON lines instead of human-readable text */
  enableStructured: boolean;
  onLog?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  component: 'auditor',
  enableConsole: true,
  enableStructured: false,
};

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get component(): string {
    return this.config.component;
  }

  /**
   * Create a child logger with a nested component name
   */
  child(component: string): Logger {
    return new Logger({
      ...this.config,
      component: `${this.config.component}.${component}`,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    const errorInfo = error
      ? {
          name: error.name,
          message: error.message,
          code: errorCode(error),
          stack: error.stack,
        }
      : undefined;

    this.log('error', message, context, errorInfo);
  }

  /**
   * Run an async operation and log its duration
   */
  async timed<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      this.debug(`${operation} completed`, { ...context, duration: Math.round(performance.now() - start) });
      return result;
    } catch (error) {
      this.error(`${operation} failed`, toError(error), {
        ...context,
        duration: Math.round(performance.now() - start),
      });
      throw error;
    }
  }

  /**
   * Create a log group for related operations
   */
  group(name: string): LogGroup {
    return new LogGroup(this, name);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: LogEntry['error']
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
      context,
      error,
    };

    if (this.config.onLog) {
      this.config.onLog(entry);
    }

    if (this.config.enableConsole) {
      this.writeToConsole(entry);
    }
  }

  private writeToConsole(entry: LogEntry): void {
    // Diagnostics go to stderr so stdout stays free for command output
    if (this.config.enableStructured) {
      console.error(JSON.stringify(entry));
      return;
    }

    const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.component}]`;
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
    console.error(`${prefix} ${entry.message}${contextStr}`);
    if (entry.level === 'error' && entry.error?.stack) {
      console.error(entry.error.stack);
    }
  }
}

/**
 * Log group for tracking related operations
 */
export class LogGroup {
  private logger: Logger;
  private name: string;
  private startTime: number;
  private operations: Array<{ name: string; duration: number; success: boolean }> = [];

  constructor(logger: Logger, name: string) {
    this.logger = logger;
    this.name = name;
    this.startTime = performance.now();
    this.logger.debug(`Starting: ${name}`);
  }

  addOperation(name: string, duration: number, success: boolean): void {
    this.operations.push({ name, duration, success });
  }

  /**
   * End the group and log a summary
   */
  end(success = true): void {
    const totalDuration = Math.round(performance.now() - this.startTime);
    const failed = this.operations.filter((op) => !op.success).length;

    if (success && failed === 0) {
      this.logger.info(`Completed: ${this.name}`, {
        duration: totalDuration,
        operationCount: this.operations.length,
      });
    } else {
      this.logger.warn(`Completed with issues: ${this.name}`, {
        duration: totalDuration,
        operationCount: this.operations.length,
        failedCount: failed,
      });
    }
  }
}

let defaultLogger: Logger | null = null;

/**
 * Get or create the default logger
 */
export function getLogger(component?: string): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger();
  }
  return component ? defaultLogger.child(component) : defaultLogger;
}

