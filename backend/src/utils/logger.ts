/**
 * Structured logging
 * Levelled console output with optional JSON-lines file output and request-scoped children
 */

import { createWriteStream, existsSync, mkdirSync } from 'fs';
import { join } from 'path';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    CRITICAL = 4,
    SILENT = 5
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

interface LogEntry {
    timestamp: string;
    level: string;
    requestId?: string;
    message: string;
    context?: LogContext;
    error?: {
        message: string;
        stack?: string;
        code?: string;
    };
}

export interface ScopedLogger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, error?: unknown, context?: LogContext): void;
    critical(message: string, error?: unknown, context?: LogContext): void;
}

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    silent: LogLevel.SILENT
};

export function parseLogLevel(value: string | undefined): LogLevel {
    switch (value) {
        case 'debug':
        case 'info':
        case 'warn':
        case 'error':
        case 'silent':
            return LEVEL_BY_NAME[value];
        default:
            return LogLevel.INFO;
    }
}

function describeError(error: unknown): LogEntry['error'] {
    if (error instanceof Error) {
        const code = 'code' in error ? error.code : undefined;
        return {
            message: error.message,
            stack: error.stack,
            code: code === undefined ? undefined : String(code)
        };
    }
    return { message: String(error) };
}

export class Logger {
    private logLevel: LogLevel;
    private logStream?: ReturnType<typeof createWriteStream>;

    constructor(level: LogLevel = LogLevel.INFO) {
        this.logLevel = level;
    }

    setLevel(level: LogLevel) {
        this.logLevel = level;
    }

    /**
     * Mirror every entry as a JSON line into `<dir>/analysis-YYYY-MM-DD.log`.
     */
    enableFileOutput(logDir: string) {
        try {
            if (!existsSync(logDir)) {
                mkdirSync(logDir, { recursive: true });
            }

            const logFile = join(logDir, `analysis-${this.getDateString()}.log`);
            this.logStream = createWriteStream(logFile, { flags: 'a' });

            this.logStream.on('error', (err) => {
                console.error('Log stream error:', err);
            });
        } catch (error) {
            console.error('Failed to initialize log file:', error);
        }
    }

    private getDateString(): string {
        const date = new Date();
        return `${date.getFullYear()}-${String(date.getMonth() + 1).padStart(2, '0')}-${String(date.getDate()).padStart(2, '0')}`;
    }

    private writeLog(entry: LogEntry) {
        const colors: Record<string, string> = {
            DEBUG: '\x1b[36m',
            INFO: '\x1b[32m',
            WARN: '\x1b[33m',
            ERROR: '\x1b[31m',
            CRITICAL: '\x1b[35m'
        };

        const reset = '\x1b[0m';
        const color = colors[entry.level] || '';

        console.log(`${color}[${entry.timestamp}] [${entry.level}]${entry.requestId ? ` [${entry.requestId}]` : ''} ${entry.message}${reset}`);

        if (entry.context) {
            console.log(`${color}  Context:${reset}`, entry.context);
        }

        if (entry.error) {
            console.error(`${color}  Error:${reset}`, entry.error);
        }

        if (this.logStream) {
            this.logStream.write(JSON.stringify(entry) + '\n');
        }
    }

    private emit(level: LogLevel, label: string, message: string, context?: LogContext, requestId?: string, error?: unknown) {
        if (this.logLevel > level) {
            return;
        }
        this.writeLog({
            timestamp: new Date().toISOString(),
            level: label,
            requestId,
            message,
            context,
            error: error === undefined || error === null ? undefined : describeError(error)
        });
    }

    debug(message: string, context?: LogContext, requestId?: string) {
        this.emit(LogLevel.DEBUG, 'DEBUG', message, context, requestId);
    }

    info(message: string, context?: LogContext, requestId?: string) {
        this.emit(LogLevel.INFO, 'INFO', message, context, requestId);
    }

    warn(message: string, context?: LogContext, requestId?: string) {
        this.emit(LogLevel.WARN, 'WARN', message, context, requestId);
    }

    error(message: string, error?: unknown, context?: LogContext, requestId?: string) {
        this.emit(LogLevel.ERROR, 'ERROR', message, context, requestId, error);
    }

    critical(message: string, error?: unknown, context?: LogContext, requestId?: string) {
        this.emit(LogLevel.CRITICAL, 'CRITICAL', message, context, requestId, error);
    }

    // Request-scoped logger
    child(requestId: string): ScopedLogger {
        return {
            debug: (msg, ctx) => this.debug(msg, ctx, requestId),
            info: (msg, ctx) => this.info(msg, ctx, requestId),
            warn: (msg, ctx) => this.warn(msg, ctx, requestId),
            error: (msg, err, ctx) => this.error(msg, err, ctx, requestId),
            critical: (msg, err, ctx) => this.critical(msg, err, ctx, requestId)
        };
    }

    close() {
        if (this.logStream) {
            this.logStream.end();
        }
    }
}

// Singleton instance; server.ts re-applies the configured level after loading .env
const logger = new Logger(parseLogLevel(process.env.LOG_LEVEL));

export default logger;
