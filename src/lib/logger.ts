/**
 * Logger Utility
 *
 * Thin wrapper over the console that tags every line with its route or
 * module and drops levels below the one set for the current environment.
 */

enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
    [LogLevel.DEBUG]: "DEBUG",
    [LogLevel.INFO]: "INFO",
    [LogLevel.WARN]: "WARN",
    [LogLevel.ERROR]: "ERROR",
};

function getCurrentLogLevel(): LogLevel {
    const env = process.env.NODE_ENV || "development";
    if (env === "test") return LogLevel.ERROR;
    if (env === "production") return LogLevel.INFO;
    return LogLevel.DEBUG;
}

function formatLogEntry(level: LogLevel, message: string, context: string): string {
    return `${new Date().toISOString()} ${LOG_LEVEL_NAMES[level]} [${context}] ${message}`;
}

function log(level: LogLevel, context: string, message: string, meta?: Record<string, unknown>): void {
    if (level < getCurrentLogLevel()) {
        return;
    }

    const line = formatLogEntry(level, message, context);
    const write = level >= LogLevel.ERROR ? console.error : level === LogLevel.WARN ? console.warn : console.log;

    if (meta) {
        write(line, meta);
    } else {
        write(line);
    }
}

export interface Logger {
    debug(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, error?: unknown, meta?: Record<string, unknown>): void;
}

export function createLogger(context: string): Logger {
    return {
        debug: (message, meta) => log(LogLevel.DEBUG, context, message, meta),
        info: (message, meta) => log(LogLevel.INFO, context, message, meta),
        warn: (message, meta) => log(LogLevel.WARN, context, message, meta),
        error: (message, error, meta) => {
            if (error === undefined) {
                log(LogLevel.ERROR, context, message, meta);
                return;
            }
            const errorMeta = error instanceof Error
                ? { ...meta, error: error.message, stack: error.stack }
                : { ...meta, error };
            log(LogLevel.ERROR, context, message, errorMeta);
        },
    };
}
