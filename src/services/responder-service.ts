/**
 * Cache responder
 * @fileoverview Writes a cached entry to the client: replayed statuses, conditional
 * requests, byte ranges and client disconnects
 */

import { Response } from 'express';
import { FileHandle } from 'fs/promises';
import { pipeline } from 'stream/promises';
import { CACHE_CONFIG, CannedReplyStatus, CANNED_REPLY_STATUSES, HTTP_STATUS, xCacheHeader } from '../config/constants';
import { CacheStore } from '../cache/cache-store';
import { createBadRequestError, errorMessage } from '../middleware/error-handler';
import { Logger, logger as defaultLogger } from '../middleware/logging';
import { CachedEntry, CacheMetadata, CacheResult, ConditionalHeaders, ServeOutcome } from '../types/mediacache';
import {
    addOneYear,
    ByteRange,
    formatContentRange,
    formatHttpDate,
    isClientDisconnect,
    parseRangeHeader,
    RangeParseError
} from '../utils/http-utils';
import { ByteCounter } from '../utils/stream-utils';

export interface ResponderOptions {
    store: CacheStore;
    cannedReplies?: Partial<Record<CannedReplyStatus, string>>;
    logger?: Logger;
}

function isCannedReplyStatus(status: number): status is CannedReplyStatus {
    return CANNED_REPLY_STATUSES.some(candidate => candidate === status);
}

/**
 * 304 when the stored copy predates If-Modified-Since or an
 * If-None-Match tag names the stored ETag
 */
export function isNotModified(metadata: CacheMetadata, conditions: ConditionalHeaders): boolean {
    if (metadata.lastModified && conditions.ifModifiedSince &&
        metadata.lastModified.getTime() < conditions.ifModifiedSince.getTime()) {
        return true;
    }
    return conditions.eTags.some(tag => tag === metadata.etag);
}

export class ResponderService {
    private readonly store: CacheStore;
    private readonly cannedReplies: Partial<Record<CannedReplyStatus, string>>;
    private readonly logger: Logger;

    constructor(options: ResponderOptions) {
        this.store = options.store;
        this.cannedReplies = options.cannedReplies ?? {};
        this.logger = options.logger ?? defaultLogger;
    }

    /**
     * Serve an opened entry. The content handle is closed before returning.
     * Throws a 400 MediaCacheError, with nothing written, on an invalid Range.
     */
    async serve(
        res: Response,
        key: string,
        cached: CachedEntry,
        conditions: ConditionalHeaders,
        result: CacheResult
    ): Promise<ServeOutcome> {
        try {
            const { metadata } = cached;

            if (metadata.status !== HTTP_STATUS.OK) {
                return await this.replay(res, key, cached, result);
            }

            if (isNotModified(metadata, conditions)) {
                res.setHeader('X-Cache', xCacheHeader(result));
                res.status(HTTP_STATUS.NOT_MODIFIED).end();
                return { status: HTTP_STATUS.NOT_MODIFIED, bytes: 0, disconnected: false };
            }

            let range: ByteRange | null;
            try {
                range = parseRangeHeader(conditions.range, metadata.size);
            } catch (error) {
                if (error instanceof RangeParseError) {
                    throw createBadRequestError(`Invalid range request: ${error.message}`, {
                        key,
                        range: conditions.range
                    });
                }
                throw error;
            }

            res.setHeader('Content-Type', metadata.contentType);
            if (metadata.lastModified) {
                res.setHeader('Last-Modified', formatHttpDate(metadata.lastModified));
            }
            res.setHeader('Cache-Control', CACHE_CONFIG.CACHE_CONTROL);
            res.setHeader('Pragma', CACHE_CONFIG.PRAGMA);
            res.setHeader('Expires', formatHttpDate(addOneYear(metadata.retrieved)));
            res.setHeader('ETag', metadata.etag);
            res.setHeader('X-Cache', xCacheHeader(result));

            let status: number;
            if (range) {
                status = HTTP_STATUS.PARTIAL_CONTENT;
                res.setHeader('Content-Range', formatContentRange(range, metadata.size));
                res.setHeader('Content-Length', range.length);
            } else {
                status = HTTP_STATUS.OK;
                res.setHeader('Content-Length', metadata.size);
            }
            res.status(status);

            await this.markUsed(key);
            const streamed = await this.stream(res, cached.content, range);
            return { status, ...streamed };
        } finally {
            await this.close(key, cached.content);
        }
    }

    /**
     * Replay a stored non-200 answer, with the operator's canned body when one is set
     */
    private async replay(res: Response, key: string, cached: CachedEntry, result: CacheResult): Promise<ServeOutcome> {
        const { status } = cached.metadata;
        res.setHeader('X-Cache', xCacheHeader(result));
        res.status(status);
        await this.markUsed(key);

        const canned = isCannedReplyStatus(status) ? this.cannedReplies[status] : undefined;
        if (canned !== undefined) {
            const body = Buffer.from(canned, 'utf8');
            res.setHeader('Content-Type', 'text/plain');
            res.setHeader('Content-Length', body.length);
            res.end(body);
            return { status, bytes: body.length, disconnected: false };
        }

        if (cached.metadata.contentType) {
            res.setHeader('Content-Type', cached.metadata.contentType);
        }
        const streamed = await this.stream(res, cached.content, null);
        return { status, ...streamed };
    }

    private async stream(
        res: Response,
        content: FileHandle,
        range: ByteRange | null
    ): Promise<{ bytes: number; disconnected: boolean }> {
        const counter = new ByteCounter();
        const source = range
            ? content.createReadStream({ start: range.start, end: range.end, autoClose: false })
            : content.createReadStream({ start: 0, autoClose: false });

        try {
            await pipeline(source, counter, res);
            return { bytes: counter.bytes, disconnected: false };
        } catch (error) {
            if (isClientDisconnect(error)) {
                return { bytes: counter.bytes, disconnected: true };
            }
            throw error;
        }
    }

    private async markUsed(key: string): Promise<void> {
        try {
            await this.store.touch(key);
        } catch (error) {
            this.logger.warn('Failed to touch cache metadata', { key, error: errorMessage(error) });
        }
    }

    private async close(key: string, content: FileHandle): Promise<void> {
        try {
            await content.close();
        } catch (error) {
            this.logger.warn('Failed to close cache file', { key, error: errorMessage(error) });
        }
    }
}
