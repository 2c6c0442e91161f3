/**
 * Logging for the Maven Central search client
 * Provides leveled, structured console output with optional metadata
 */

/**
 * Log levels
 */
export enum LogLevel {
    ERROR = 'error',
    WARN = 'warn',
    INFO = 'info',
    DEBUG = 'debug',
}

/**
 * Logger interface
 */
export interface Logger {
    error(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    debug(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG];

function isLogLevel(value: string): value is LogLevel {
    return LEVEL_ORDER.some((level) => level === value);
}

/**
 * Console logger implementation
 */
export class ConsoleLogger implements Logger {
    constructor(private readonly level?: LogLevel) {}

    private currentLevel(): LogLevel {
        if (this.level) {
            return this.level;
        }
        const fromEnv = (process.env['LOG_LEVEL'] || LogLevel.INFO).toLowerCase();
        return isLogLevel(fromEnv) ? fromEnv : LogLevel.INFO;
    }

    private shouldLog(level: LogLevel): boolean {
        return LEVEL_ORDER.indexOf(level) <= LEVEL_ORDER.indexOf(this.currentLevel());
    }

    private formatMessage(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
        const timestamp = new Date().toISOString();
        const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
        return `[${timestamp}] ${level.toUpperCase()}: ${message}${metaStr}`;
    }

    error(message: string, meta?: Record<string, unknown>): void {
        if (this.shouldLog(LogLevel.ERROR)) {
            console.error(this.formatMessage(LogLevel.ERROR, message, meta));
        }
    }

    warn(message: string, meta?: Record<string, unknown>): void {
        if (this.shouldLog(LogLevel.WARN)) {
            console.warn(this.formatMessage(LogLevel.WARN, message, meta));
        }
    }

    info(message: string, meta?: Record<string, unknown>): void {
        if (this.shouldLog(LogLevel.INFO)) {
            console.info(this.formatMessage(LogLevel.INFO, message, meta));
        }
    }

    debug(message: string, meta?: Record<string, unknown>): void {
        if (this.shouldLog(LogLevel.DEBUG)) {
            console.debug(this.formatMessage(LogLevel.DEBUG, message, meta));
        }
    }
}

/**
 * Default logger instance
 */
export const logger = new ConsoleLogger();
