/**
 * Cache service
 * @fileoverview Request orchestration: serve a fresh entry under the shared
 * lock, otherwise refresh it under the exclusive lock and serve the result
 */

import { Request, Response } from 'express';
import { isExpired, CacheStore } from '../cache/cache-store';
import { KeyLockRegistry, LockEntry } from '../cache/key-lock-registry';
import {
    createBadRequestError,
    createStorageError,
    createUpstreamError,
    errorMessage,
    MediaCacheError
} from '../middleware/error-handler';
import { Logger, logger as defaultLogger } from '../middleware/logging';
import { CachedEntry, CacheRequest, ConditionalHeaders, KeyMode, ServeOutcome } from '../types/mediacache';
import { parseHttpDate, parseIfNoneMatch } from '../utils/http-utils';
import { resolveCacheRequest } from '../utils/request-utils';
import { FetcherService } from './fetcher-service';
import { ResponderService } from './responder-service';

export interface CacheServiceOptions {
    prefix: string;
    keyMode: KeyMode;
    maxAgeHours: number;
    store: CacheStore;
    registry: KeyLockRegistry;
    fetcher: FetcherService;
    responder: ResponderService;
    logger?: Logger;
}

type LockMode = 'shared' | 'exclusive';

interface HeldLock {
    entry: LockEntry;
    mode: LockMode;
}

/**
 * Parse the conditional request headers. A malformed If-Modified-Since is a
 * client error.
 */
export function parseConditions(req: Request): ConditionalHeaders {
    const modifiedSince = req.headers['if-modified-since'];
    let ifModifiedSince: Date | null = null;
    if (modifiedSince) {
        try {
            ifModifiedSince = parseHttpDate(modifiedSince);
        } catch (error) {
            throw createBadRequestError('error parsing If-Modified-Since header', {
                value: modifiedSince,
                error: errorMessage(error)
            });
        }
    }

    return {
        ifModifiedSince,
        eTags: parseIfNoneMatch(req.headers['if-none-match']),
        range: req.headers['range'] ?? ''
    };
}

function isClientError(error: unknown): error is MediaCacheError {
    return error instanceof MediaCacheError && error.statusCode < 500;
}

export class CacheService {
    private readonly prefix: string;
    private readonly keyMode: KeyMode;
    private readonly maxAgeHours: number;
    private readonly store: CacheStore;
    private readonly registry: KeyLockRegistry;
    private readonly fetcher: FetcherService;
    private readonly responder: ResponderService;
    private readonly logger: Logger;

    constructor(options: CacheServiceOptions) {
        this.prefix = options.prefix;
        this.keyMode = options.keyMode;
        this.maxAgeHours = options.maxAgeHours;
        this.store = options.store;
        this.registry = options.registry;
        this.fetcher = options.fetcher;
        this.responder = options.responder;
        this.logger = options.logger ?? defaultLogger;
    }

    /**
     * Handle one cache request. Errors are thrown as MediaCacheError for the
     * error middleware to render.
     */
    async handleRequest(req: Request, res: Response): Promise<void> {
        let request: CacheRequest;
        try {
            request = resolveCacheRequest(req.originalUrl, { prefix: this.prefix, keyMode: this.keyMode });
        } catch (error) {
            this.registry.totals.error();
            throw error;
        }

        const { key, upstreamPath } = request;
        let held: HeldLock | null = null;
        let entry: LockEntry | null = null;

        try {
            entry = await this.registry.acquireShared(key);
            held = { entry, mode: 'shared' };
            entry.stats.requested();

            let conditions: ConditionalHeaders;
            try {
                conditions = parseConditions(req);
            } catch (error) {
                entry.stats.error();
                throw error;
            }

            if (await this.serveHit(res, key, conditions, entry)) {
                return;
            }

            this.release(held);
            held = null;

            entry = await this.registry.acquireExclusive(key);
            held = { entry, mode: 'exclusive' };
            await this.refresh(key, upstreamPath, entry);
            this.release(held);
            held = null;

            entry = await this.registry.acquireShared(key);
            held = { entry, mode: 'shared' };
            await this.serveMiss(res, key, conditions, entry);
        } finally {
            if (held) {
                this.release(held);
            }
            entry?.stats.completed();
        }
    }

    /**
     * Serve a fresh cached copy. Resolves false when the request has to go
     * to the origins instead.
     */
    private async serveHit(res: Response, key: string, conditions: ConditionalHeaders, entry: LockEntry): Promise<boolean> {
        let cached: CachedEntry | null;
        try {
            cached = await this.store.read(key);
        } catch (error) {
            this.logger.warn('Error reading cached entry', { key, error: errorMessage(error) });
            return false;
        }

        if (!cached) {
            return false;
        }

        if (isExpired(cached.metadata, this.maxAgeHours)) {
            this.logger.debug('Cached entry expired', { key, retrieved: cached.metadata.retrieved.toISOString() });
            await this.closeEntry(key, cached);
            return false;
        }

        let outcome: ServeOutcome;
        try {
            outcome = await this.responder.serve(res, key, cached, conditions, 'HIT');
        } catch (error) {
            if (isClientError(error) || res.headersSent) {
                entry.stats.error();
                throw error;
            }
            this.logger.warn('Error serving cached entry, refetching', { key, error: errorMessage(error) });
            this.resetHeaders(res);
            return false;
        }

        entry.stats.hit(outcome.bytes);
        if (outcome.disconnected) {
            entry.stats.disconnect();
        }
        this.logger.debug('Cache hit', { key, status: outcome.status, bytes: outcome.bytes });
        return true;
    }

    /**
     * Under the exclusive lock: fetch unless another writer already
     * refreshed the entry
     */
    private async refresh(key: string, upstreamPath: string, entry: LockEntry): Promise<void> {
        const stale = await this.store.isStale(key, this.maxAgeHours);
        if (!stale && await this.store.exists(key)) {
            return;
        }

        await this.store.remove(key);

        try {
            const bytes = await this.fetcher.fetch(key, upstreamPath);
            entry.stats.received(bytes);
        } catch (error) {
            entry.stats.error();
            this.logger.error('Error fetching file', { key, upstreamPath, error: errorMessage(error) });
            throw createUpstreamError('error fetching file', { key });
        }
    }

    private async serveMiss(res: Response, key: string, conditions: ConditionalHeaders, entry: LockEntry): Promise<void> {
        let outcome: ServeOutcome;
        try {
            const cached = await this.store.read(key);
            if (!cached) {
                throw createStorageError('cache entry missing after fetch', { key });
            }
            outcome = await this.responder.serve(res, key, cached, conditions, 'MISS');
        } catch (error) {
            entry.stats.error();
            if (isClientError(error) || res.headersSent) {
                throw error;
            }
            this.logger.error('Error serving file', { key, error: errorMessage(error) });
            this.resetHeaders(res);
            throw createStorageError('error serving file', { key });
        }

        entry.stats.miss(outcome.bytes);
        if (outcome.disconnected) {
            entry.stats.disconnect();
        }
        this.logger.debug('Cache miss', { key, status: outcome.status, bytes: outcome.bytes });
    }

    private release(held: HeldLock): void {
        if (held.mode === 'shared') {
            this.registry.releaseShared(held.entry);
        } else {
            this.registry.releaseExclusive(held.entry);
        }
    }

    private async closeEntry(key: string, cached: CachedEntry): Promise<void> {
        try {
            await cached.content.close();
        } catch (error) {
            this.logger.warn('Failed to close cache file', { key, error: errorMessage(error) });
        }
    }

    /**
     * Drop headers a failed attempt set, keeping the request ID
     */
    private resetHeaders(res: Response): void {
        for (const name of res.getHeaderNames()) {
            if (name !== 'x-request-id') {
                res.removeHeader(name);
            }
        }
    }
}
