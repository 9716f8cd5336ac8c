/**
 * Logging utilities.
 * Diagnostics go to stderr; stdout carries only the live status line.
 */

import {format} from 'util';

/**
 * Log levels
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    level: LogLevel;
    showDetailedLogs: boolean;
    prefix: string;
    write: (line: string) => void;
}

/**
 * Log formatting options
 */
interface LogFormatOptions {
    timestamp?: boolean;
    level?: LogLevel;
}

const writeStderr = (line: string): void => {
    process.stderr.write(line);
};

/**
 * Logger
 */
export class Logger {
    private static instance: Logger;
    private config: LoggerConfig;

    private constructor() {
        this.config = {
            level: LogLevel.INFO,
            showDetailedLogs: false,
            prefix: 'bulk-put',
            write: writeStderr
        };
    }

    /**
     * Get the singleton instance
     */
    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    public updateConfig(config: Partial<LoggerConfig>): void {
        this.config = {...this.config, ...config};
    }

    /**
     * Debug and info lines are dropped unless detailed logs are on.
     */
    public setShowDetailedLogs(show: boolean): void {
        this.config.showDetailedLogs = show;
    }

    public debug(message: string, ...args: unknown[]): void {
        this.log(LogLevel.DEBUG, message, args);
    }

    public info(message: string, ...args: unknown[]): void {
        this.log(LogLevel.INFO, message, args);
    }

    public warn(message: string, ...args: unknown[]): void {
        this.log(LogLevel.WARN, message, args);
    }

    public error(message: string, error?: unknown, ...args: unknown[]): void {
        if (error === undefined) {
            this.log(LogLevel.ERROR, message, args);
            return;
        }
        if (error instanceof Error) {
            this.log(LogLevel.ERROR, `${message}: ${error.message}`, args);
            if (error.stack) {
                this.log(LogLevel.DEBUG, error.stack, []);
            }
            return;
        }
        this.log(LogLevel.ERROR, message, [error, ...args]);
    }

    /**
     * Operator notice, written regardless of level
     */
    public notify(message: string): void {
        this.config.write(`${this.formatNoticeMessage(message, 'info')}\n`);
    }

    public notifyError(message: string): void {
        this.config.write(`${this.formatNoticeMessage(message, 'error')}\n`);
    }

    public createCategoryLogger(category: string): CategoryLogger {
        return new CategoryLogger(this, category);
    }

    private log(level: LogLevel, message: string, args: unknown[]): void {
        if (level < this.config.level) {
            return;
        }

        // Without detailed logs only warnings and errors are written
        if (!this.config.showDetailedLogs && level < LogLevel.WARN) {
            return;
        }

        const formattedMessage = this.formatLogMessage(message, {
            timestamp: true,
            level
        });

        this.config.write(`${format('%s', formattedMessage, ...args)}\n`);
    }

    private formatLogMessage(message: string, options: LogFormatOptions): string {
        const parts: string[] = [];

        if (options.timestamp) {
            const timestamp = new Date().toISOString().replace('T', ' ').substring(0, 19);
            parts.push(`[${timestamp}]`);
        }

        if (options.level !== undefined) {
            parts.push(`[${LogLevel[options.level]}]`);
        }

        parts.push(`[${this.config.prefix}]`);

        parts.push(message);

        return parts.join(' ');
    }

    private formatNoticeMessage(message: string, type: 'info' | 'error'): string {
        return type === 'error' ? `${this.config.prefix}: error: ${message}` : `${this.config.prefix}: ${message}`;
    }
}

/**
 * Logger that tags every line with a component name
 */
export class CategoryLogger {
    constructor(
        private logger: Logger,
        private category: string
    ) {}

    public debug(message: string, ...args: unknown[]): void {
        this.logger.debug(`[${this.category}] ${message}`, ...args);
    }

    public info(message: string, ...args: unknown[]): void {
        this.logger.info(`[${this.category}] ${message}`, ...args);
    }

    public warn(message: string, ...args: unknown[]): void {
        this.logger.warn(`[${this.category}] ${message}`, ...args);
    }

    public error(message: string, error?: unknown, ...args: unknown[]): void {
        this.logger.error(`[${this.category}] ${message}`, error, ...args);
    }
}
