/**
 * Logger - Structured JSON logging.
 *
 * One JSON object per line with timestamp, level and message, followed
 * by the logger's bound context and the call's own context. Lines
 * written while a request is in flight also carry its correlationId
 * and route.
 */

import { RequestContext } from './RequestContext.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

export interface LogContext {
    service?: string;
    component?: string;
    correlationId?: string;
    route?: string;
    method?: string;
    statusCode?: number;
    latencyMs?: number;
    activityName?: string;
    [key: string]: unknown;
}

export interface ILogger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, error?: Error, context?: LogContext): void;

    /**
     * Logger whose lines also carry `context`.
     */
    child(context: LogContext): ILogger;
}

/**
 * Destination for formatted lines.
 */
export type LogWriter = (level: LogLevel, line: string) => void;

const writeToConsole: LogWriter = (level, line) => {
    console[level](line);
};

function serializeError(error: Error): LogContext {
    return { name: error.name, message: error.message, stack: error.stack };
}

export class ConsoleLogger implements ILogger {
    constructor(
        private readonly context: LogContext = {},
        private readonly minLevel: LogLevel = 'debug',
        private readonly write: LogWriter = writeToConsole
    ) { }

    debug(message: string, context?: LogContext): void {
        this.emit('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.emit('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.emit('warn', message, context);
    }

    error(message: string, error?: Error, context?: LogContext): void {
        this.emit('error', message, error ? { ...context, error: serializeError(error) } : context);
    }

    child(context: LogContext): ILogger {
        return new ConsoleLogger({ ...this.context, ...context }, this.minLevel, this.write);
    }

    isEnabled(level: LogLevel): boolean {
        return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
    }

    private emit(level: LogLevel, message: string, context?: LogContext): void {
        if (!this.isEnabled(level)) {
            return;
        }

        const scope = RequestContext.current();
        const entry: LogContext = {
            timestamp: new Date().toISOString(),
            level,
            message,
            ...(scope && { correlationId: scope.correlationId, route: scope.route }),
            ...this.context,
            ...context,
        };

        this.write(level, JSON.stringify(entry));
    }
}

/**
 * Discards everything. Used by tests.
 */
export class NullLogger implements ILogger {
    debug(_message: string, _context?: LogContext): void {}
    info(_message: string, _context?: LogContext): void {}
    warn(_message: string, _context?: LogContext): void {}
    error(_message: string, _error?: Error, _context?: LogContext): void {}
    child(_context: LogContext): ILogger {
        return this;
    }
}
