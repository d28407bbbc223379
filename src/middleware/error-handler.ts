/**
 * Error handling middleware for MediaCache
 * Renders errors as plain-text responses with a matching status code
 */

import { NextFunction, Request, Response } from 'express';
import { HTTP_STATUS } from '../config/constants';
import { Logger, logger as defaultLogger } from './logging';

/**
 * Custom error class for MediaCache operations
 */
export class MediaCacheError extends Error {
    public readonly statusCode: number;
    public readonly code: string;
    public readonly details?: Record<string, unknown>;

    constructor(
        message: string,
        statusCode: number = 500,
        code: string = 'INTERNAL_ERROR',
        details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'MediaCacheError';
        this.statusCode = statusCode;
        this.code = code;
        if (details !== undefined) {
            this.details = details;
        }
        Error.captureStackTrace(this, MediaCacheError);
    }
}

/**
 * Map an error to the status code and body sent to the client
 */
export function mapErrorToResponse(error: Error): { statusCode: number; message: string } {
    if (error instanceof MediaCacheError) {
        return { statusCode: error.statusCode, message: error.message };
    }

    return { statusCode: HTTP_STATUS.INTERNAL_SERVER_ERROR, message: 'internal server error' };
}

/**
 * Write a plain-text error body, the way net/http style servers do
 */
export function sendPlainError(res: Response, statusCode: number, message: string): void {
    const body = `${message}\n`;
    res.setHeader('Content-Type', 'text/plain; charset=utf-8');
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('Content-Length', Buffer.byteLength(body));
    res.status(statusCode).end(body);
}

/**
 * Create error handling middleware
 */
export function createErrorHandler(logger: Logger = defaultLogger) {
    return (error: Error, req: Request, res: Response, next: NextFunction): void => {
        const { statusCode, message } = mapErrorToResponse(error);

        if (statusCode >= HTTP_STATUS.INTERNAL_SERVER_ERROR) {
            logger.error(`Error in ${req.method} ${req.path}`, {
                message: error.message,
                code: error instanceof MediaCacheError ? error.code : undefined,
                details: error instanceof MediaCacheError ? error.details : undefined,
            });
        }

        // Don't handle if response already sent
        if (res.headersSent) {
            next(error);
            return;
        }

        sendPlainError(res, statusCode, message);
    };
}

/**
 * Async error wrapper for route handlers
 */
export function asyncHandler<T extends Request, U extends Response>(
    fn: (req: T, res: U, next: NextFunction) => Promise<void>
): (req: T, res: U, next: NextFunction) => void {
    return (req: T, res: U, next: NextFunction): void => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}

/**
 * Client request error helper
 */
export function createBadRequestError(message: string, details?: Record<string, unknown>): MediaCacheError {
    return new MediaCacheError(message, HTTP_STATUS.BAD_REQUEST, 'BAD_REQUEST', details);
}

/**
 * Upstream error helper
 */
export function createUpstreamError(message: string, details?: Record<string, unknown>): MediaCacheError {
    return new MediaCacheError(message, HTTP_STATUS.INTERNAL_SERVER_ERROR, 'UPSTREAM_ERROR', details);
}

/**
 * Local storage error helper
 */
export function createStorageError(message: string, details?: Record<string, unknown>): MediaCacheError {
    return new MediaCacheError(message, HTTP_STATUS.INTERNAL_SERVER_ERROR, 'STORAGE_ERROR', details);
}

/**
 * Narrow unknown errors to Node's errno shape. Checked structurally: errors
 * raised by Node built-ins may come from another realm than `Error`.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return typeof error === 'object' && error !== null && 'code' in error && 'message' in error;
}

/**
 * Human readable message for any thrown value
 */
export function errorMessage(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    return String(error);
}
