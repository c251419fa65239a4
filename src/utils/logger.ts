/**
 * Logger Utility
 *
 * Leveled console logger shared by every loop and route of the agent.
 * Verbosity comes from the LOG_LEVEL environment variable and can be changed at runtime.
 */

export enum LogLevel {
  SILENT = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.SILENT]: 'silent',
  [LogLevel.ERROR]: 'error',
  [LogLevel.WARN]: 'warn',
  [LogLevel.INFO]: 'info',
  [LogLevel.DEBUG]: 'debug',
};

/**
 * Parse a LOG_LEVEL string. Unknown values fall back to info.
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.toLowerCase().trim()) {
    case 'silent':
      return LogLevel.SILENT;
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'info':
      return LogLevel.INFO;
    case 'debug':
    case 'verbose':
      return LogLevel.DEBUG;
    default:
      console.warn(`Unknown LOG_LEVEL "${level}", defaulting to "info"`);
      return LogLevel.INFO;
  }
}

class Logger {
  private static instance: Logger;
  private currentLevel: LogLevel;

  private constructor() {
    this.currentLevel = parseLogLevel(process.env.LOG_LEVEL || 'info');
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public setLogLevel(level: LogLevel | string): void {
    this.currentLevel = typeof level === 'string' ? parseLogLevel(level) : level;
  }

  public getLogLevelString(): string {
    return LEVEL_NAMES[this.currentLevel];
  }

  /**
   * `<ISO timestamp> [LEVEL] [context] message`
   */
  private formatMessage(level: string, message: string, context?: string): string {
    const contextStr = context ? `[${context}]` : '';
    return `${new Date().toISOString()} [${level}] ${contextStr} ${message}`;
  }

  public error(message: string, context?: string, error?: unknown): void {
    if (this.currentLevel < LogLevel.ERROR) return;
    if (error !== undefined) {
      console.error(this.formatMessage('ERROR', message, context), error);
    } else {
      console.error(this.formatMessage('ERROR', message, context));
    }
  }

  public warn(message: string, context?: string, error?: unknown): void {
    if (this.currentLevel < LogLevel.WARN) return;
    if (error !== undefined) {
      console.warn(this.formatMessage('WARN', message, context), error);
    } else {
      console.warn(this.formatMessage('WARN', message, context));
    }
  }

  public info(message: string, context?: string, ...args: unknown[]): void {
    if (this.currentLevel >= LogLevel.INFO) {
      console.log(this.formatMessage('INFO', message, context), ...args);
    }
  }

  public debug(message: string, context?: string, ...args: unknown[]): void {
    if (this.currentLevel >= LogLevel.DEBUG) {
      console.log(this.formatMessage('DEBUG', message, context), ...args);
    }
  }

  /**
   * Startup banners and shutdown notices; shown at every level except silent.
   */
  public important(message: string, context?: string, ...args: unknown[]): void {
    if (this.currentLevel > LogLevel.SILENT) {
      console.log(this.formatMessage('INFO', message, context), ...args);
    }
  }
}

export const logger = Logger.getInstance();

export const log = {
  error: (message: string, context?: string, error?: unknown) => logger.error(message, context, error),
  warn: (message: string, context?: string, error?: unknown) => logger.warn(message, context, error),
  info: (message: string, context?: string, ...args: unknown[]) => logger.info(message, context, ...args),
  debug: (message: string, context?: string, ...args: unknown[]) => logger.debug(message, context, ...args),
  important: (message: string, context?: string, ...args: unknown[]) => logger.important(message, context, ...args),
};
