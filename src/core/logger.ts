// Centralized logging service for pin-actions

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

/**
 * Where log lines are written. `stderr` keeps stdout free for machine-readable output.
 */
export type LogStream = 'stdout' | 'stderr';

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  stream: LogStream;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: '[pin]',
  stream: 'stdout'
};

/**
 * Centralized logger with structured output
 */
export class Logger {
  private config: LoggerConfig;
  private static instance: Logger | null = null;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Get singleton instance
   */
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Reconfigure the singleton logger in place, so modules holding `logger` see the change
   */
  static configure(config: Partial<LoggerConfig>): void {
    Logger.getInstance().config = { ...DEFAULT_CONFIG, ...config };
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  /**
   * Format a log message
   */
  private format(level: string, message: string, context?: Record<string, unknown>): string {
    const parts: string[] = [];

    if (this.config.prefix) {
      parts.push(this.config.prefix);
    }

    parts.push(`[${level}]`);
    parts.push(message);

    if (context && Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }

    return parts.join(' ');
  }

  private write(level: LogLevel, line: string): void {
    if (this.config.stream === 'stderr') {
      console.error(line);
      return;
    }
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(line);
        break;
      case LogLevel.INFO:
        console.info(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      default:
        console.error(line);
    }
  }

  /**
   * Log a debug message
   */
  debug(message: string, context?: Record<string, unknown>): void {
    if (this.config.level <= LogLevel.DEBUG) {
      this.write(LogLevel.DEBUG, this.format('DEBUG', message, context));
    }
  }

  /**
   * Log an info message
   */
  info(message: string, context?: Record<string, unknown>): void {
    if (this.config.level <= LogLevel.INFO) {
      this.write(LogLevel.INFO, this.format('INFO', message, context));
    }
  }

  /**
   * Log a warning message
   */
  warn(message: string, context?: Record<string, unknown>): void {
    if (this.config.level <= LogLevel.WARN) {
      this.write(LogLevel.WARN, this.format('WARN', message, context));
    }
  }

  /**
   * Log an error message
   */
  error(message: string, context?: Record<string, unknown>): void {
    if (this.config.level <= LogLevel.ERROR) {
      this.write(LogLevel.ERROR, this.format('ERROR', message, context));
    }
  }
}

// Export singleton instance
export const logger = Logger.getInstance();
