/**
 * Logging for MediaCache
 * Provides a leveled console logger and request/response logging middleware
 */

import { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';

/**
 * Log levels
 */
export enum LogLevel {
    ERROR = 'error',
    WARN = 'warn',
    INFO = 'info',
    DEBUG = 'debug',
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG];

/**
 * Logger interface
 */
export interface Logger {
    error(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    debug(message: string, meta?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
    return LEVEL_ORDER.some(level => level === value);
}

/**
 * Console logger implementation
 *
 * Without an explicit level the logger follows LOG_LEVEL at call time.
 */
export class ConsoleLogger implements Logger {
    constructor(private readonly level?: LogLevel) { }

    private shouldLog(level: LogLevel): boolean {
        const configured = this.level ?? process.env['LOG_LEVEL'] ?? LogLevel.INFO;
        const currentLevel = isLogLevel(configured) ? configured : LogLevel.INFO;
        return LEVEL_ORDER.indexOf(level) <= LEVEL_ORDER.indexOf(currentLevel);
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

/**
 * Extract client IP address
 */
function getClientIp(req: Request): string {
    const forwarded = req.headers['x-forwarded-for'];
    const first = typeof forwarded === 'string' ? forwarded.split(',')[0]?.trim() : undefined;
    return first || req.socket?.remoteAddress || 'unknown';
}

/**
 * Logging middleware options
 */
export interface LoggingOptions {
    /** Custom logger instance */
    logger?: Logger;
    /** Skip logging for certain paths */
    skipPaths?: string[];
}

/**
 * Create logging middleware
 */
export function createLoggingMiddleware(options: LoggingOptions = {}): (req: Request, res: Response, next: NextFunction) => void {
    const {
        logger: customLogger = logger,
        skipPaths = ['/healthz'],
    } = options;

    return (req: Request, res: Response, next: NextFunction): void => {
        if (skipPaths.includes(req.path)) {
            next();
            return;
        }

        const startTime = Date.now();
        const requestId = uuidv4();
        const ip = getClientIp(req);

        // Add request ID to response headers for tracing
        res.setHeader('X-Request-ID', requestId);

        customLogger.debug('Incoming request', {
            requestId,
            method: req.method,
            path: req.path,
            ip,
            range: req.headers['range'],
        });

        res.on('finish', () => {
            const logData = {
                requestId,
                method: req.method,
                path: req.path,
                statusCode: res.statusCode,
                xCache: res.getHeader('X-Cache'),
                responseTime: Date.now() - startTime,
                ip,
            };

            if (res.statusCode >= 400) {
                customLogger.warn('Request completed with error', logData);
            } else {
                customLogger.info('Request completed', logData);
            }
        });

        next();
    };
}
