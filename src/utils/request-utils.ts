/**
 * Request utilities
 * @fileoverview Maps request URLs to cache keys
 */

import { createHash } from 'crypto';
import { CACHE_CONFIG } from '../config/constants';
import { createBadRequestError } from '../middleware/error-handler';
import { CacheRequest, KeyMode } from '../types/mediacache';

export interface KeyOptions {
    prefix: string;
    keyMode: KeyMode;
}

/**
 * SHA-256 of the key, URL-safe base64 without padding
 */
export function hashKey(key: string): string {
    return createHash('sha256').update(key).digest('base64url');
}

/**
 * Split a request target into raw path and raw query string
 */
export function splitUrl(url: string): { path: string; query: string } {
    const index = url.indexOf('?');
    if (index < 0) {
        return { path: url, query: '' };
    }
    return { path: url.slice(0, index), query: url.slice(index + 1) };
}

function decodePath(path: string): string {
    try {
        return decodeURIComponent(path);
    } catch {
        throw createBadRequestError('invalid path', { path });
    }
}

/**
 * Resolve the cache key and upstream path of a request target
 */
export function resolveCacheRequest(url: string, options: KeyOptions): CacheRequest {
    const { path, query } = splitUrl(url);

    let resourcePath = path;
    if (options.prefix !== '') {
        if (!resourcePath.startsWith(options.prefix)) {
            throw createBadRequestError('invalid path', { path, prefix: options.prefix });
        }
        resourcePath = resourcePath.slice(options.prefix.length);
    }

    const decoded = decodePath(resourcePath);
    if (decoded.includes('..') || decoded.includes('~')) {
        throw createBadRequestError('invalid path', { path });
    }

    let key: string;
    if (options.keyMode === 'query') {
        key = query === '' ? decoded : `${decoded}?${query}`;
    } else {
        // The key is the file name itself; it must not name the cache
        // directory or collide with a metadata sidecar
        if (decoded.includes('/') || decoded === '.' || decoded.endsWith(CACHE_CONFIG.META_SUFFIX)) {
            throw createBadRequestError('invalid path', { path });
        }
        key = decoded;
    }

    if (key === '' || key === '/') {
        throw createBadRequestError('invalid path', { path });
    }

    return { key, upstreamPath: resourcePath };
}
