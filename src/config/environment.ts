/**
 * Configuration loading from environment variables
 */

import { CANNED_REPLY_STATUSES, CannedReplyStatus, DEFAULTS } from './constants';
import { ListenAddress, MediaCacheConfig } from '../types/mediacache';

type Env = Record<string, string | undefined>;

const TRUE_VALUES = ['1', 't', 'T', 'TRUE', 'true', 'True'];
const FALSE_VALUES = ['0', 'f', 'F', 'FALSE', 'false', 'False'];

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export function getString(env: Env, key: string, fallback: string): string {
    const value = env[key];
    return value === undefined ? fallback : value;
}

export function getInteger(env: Env, key: string, fallback: number): number {
    const value = env[key];
    if (value === undefined) {
        return fallback;
    }
    if (!/^[+-]?\d+$/.test(value.trim())) {
        throw new ConfigurationError(`invalid value for ${key}: ${value}`);
    }
    return parseInt(value, 10);
}

export function getBoolean(env: Env, key: string, fallback: boolean): boolean {
    const value = env[key];
    if (value === undefined) {
        return fallback;
    }
    if (TRUE_VALUES.includes(value)) {
        return true;
    }
    if (FALSE_VALUES.includes(value)) {
        return false;
    }
    throw new ConfigurationError(`invalid value for ${key}: ${value}`);
}

/**
 * Parse `[host]:port`, e.g. ":3333" or "127.0.0.1:8080"
 */
export function parseListenAddress(value: string): ListenAddress {
    const separator = value.lastIndexOf(':');
    const host = separator > 0 ? value.slice(0, separator) : '';
    const portText = separator >= 0 ? value.slice(separator + 1) : value;

    if (!/^\d+$/.test(portText)) {
        throw new ConfigurationError(`invalid listen address: ${value}`);
    }
    const port = parseInt(portText, 10);
    if (port > 65535) {
        throw new ConfigurationError(`invalid listen address: ${value}`);
    }

    // Strip brackets from IPv6 literals such as [::1]:3333
    const unbracketed = host.replace(/^\[(.*)\]$/, '$1');
    return unbracketed ? { host: unbracketed, port } : { port };
}

export function parseUpstreams(value: string): string[] {
    return value.split(' ').map(upstream => upstream.trim()).filter(upstream => upstream.length > 0);
}

/**
 * Load configuration from an environment map
 */
export function loadConfig(env: Env = process.env): MediaCacheConfig {
    const cannedReplies: Partial<Record<CannedReplyStatus, string>> = {};
    for (const status of CANNED_REPLY_STATUSES) {
        const reply = getString(env, `CACHE_REPLY_${status}`, '');
        if (reply !== '') {
            cannedReplies[status] = reply;
        }
    }

    const upstreams = parseUpstreams(getString(env, 'CACHE_UPSTREAM', DEFAULTS.UPSTREAM));
    if (upstreams.length === 0) {
        throw new ConfigurationError('CACHE_UPSTREAM must name at least one origin');
    }

    return {
        listen: parseListenAddress(getString(env, 'CACHE_LISTEN', DEFAULTS.LISTEN)),
        cacheDir: getString(env, 'CACHE_DIR', DEFAULTS.CACHE_DIR),
        upstreams,
        prefix: getString(env, 'CACHE_PREFIX', DEFAULTS.PREFIX),
        keyMode: getBoolean(env, 'CACHE_KEY_QUERY', false) ? 'query' : 'path',
        cannedReplies,
        printStats: getBoolean(env, 'CACHE_PRINT_STATS', true),
        maxCacheFiles: getInteger(env, 'CACHE_MAX_FILES', DEFAULTS.MAX_FILES),
        maxCacheSizeMb: getInteger(env, 'CACHE_MAX_SIZE_MB', DEFAULTS.MAX_SIZE_MB),
        maxAgeHours: getInteger(env, 'CACHE_MAX_AGE_HOURS', DEFAULTS.MAX_AGE_HOURS),
        cacheClean: getBoolean(env, 'CACHE_CLEAN', true),
        dryRun: getBoolean(env, 'CACHE_DRY_RUN', false),
        logLevel: getString(env, 'LOG_LEVEL', 'info'),
    };
}
