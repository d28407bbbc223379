/**
 * Application constants for MediaCache
 */

export const SOFTWARE = 'MediaCache';
export const VERSION = 'v1.0';
export const REPOSITORY_URL = 'https://github.com/mediacache/mediacache';

export const CACHE_CONFIG = {
    HTTP_TIMEOUT_MS: 60000, // 60 seconds
    META_SUFFIX: '.meta',
    CACHE_CONTROL: 'max-age=31536000',
    PRAGMA: 'cache',
    LOCK_IDLE_MS: 10 * 60 * 1000, // 10 minutes
} as const;

export const JANITOR_CONFIG = {
    TICK_INTERVAL_MS: 60 * 1000,
    STATS_EVERY_TICKS: 10,
    CLEAN_EVERY_TICKS: 60,
} as const;

export const DEFAULTS = {
    LISTEN: ':3333',
    CACHE_DIR: './cache',
    UPSTREAM: 'https://example.com',
    PREFIX: '/',
    MAX_FILES: 10000,
    MAX_SIZE_MB: 1000,
    MAX_AGE_HOURS: 3,
} as const;

export const HTTP_STATUS = {
    OK: 200,
    PARTIAL_CONTENT: 206,
    NOT_MODIFIED: 304,
    BAD_REQUEST: 400,
    FORBIDDEN: 403,
    NOT_FOUND: 404,
    INTERNAL_SERVER_ERROR: 500,
    SERVICE_UNAVAILABLE: 503,
    GATEWAY_TIMEOUT: 504,
} as const;

/**
 * Statuses an operator may override with a canned plain-text body
 */
export const CANNED_REPLY_STATUSES = [
    HTTP_STATUS.FORBIDDEN,
    HTTP_STATUS.NOT_FOUND,
    HTTP_STATUS.INTERNAL_SERVER_ERROR,
    HTTP_STATUS.SERVICE_UNAVAILABLE,
    HTTP_STATUS.GATEWAY_TIMEOUT,
] as const;

export type CannedReplyStatus = typeof CANNED_REPLY_STATUSES[number];

/**
 * Value of the X-Cache diagnostic header
 */
export function xCacheHeader(result: 'HIT' | 'MISS'): string {
    return `${SOFTWARE} ${VERSION}; ${result}`;
}
