/**
 * Upstream fetcher
 * Retrieves a resource from the first origin that answers and stores it in the cache
 */

import axios, { AxiosInstance } from 'axios';
import { Readable } from 'stream';
import { CACHE_CONFIG, HTTP_STATUS, SOFTWARE, VERSION } from '../config/constants';
import { CacheStore } from '../cache/cache-store';
import { createUpstreamError, errorMessage } from '../middleware/error-handler';
import { Logger, logger as defaultLogger } from '../middleware/logging';
import { CacheMetadata } from '../types/mediacache';
import { headerValue, joinUrl, parseHttpDate } from '../utils/http-utils';

/**
 * Upstream response with lower-cased header names and an unread body
 */
export interface UpstreamResponse {
    status: number;
    headers: Record<string, string>;
    body: Readable;
}

export interface UpstreamClient {
    get(url: string, timeoutMs: number): Promise<UpstreamResponse>;
}

/**
 * UpstreamClient backed by axios. Every status resolves; only transport
 * failures and timeouts reject.
 */
export class AxiosUpstreamClient implements UpstreamClient {
    private readonly http: AxiosInstance;

    constructor(http?: AxiosInstance) {
        this.http = http ?? axios.create({
            headers: {
                'User-Agent': `${SOFTWARE}/${VERSION}`,
                'Accept-Encoding': 'identity'
            },
            decompress: false,
            validateStatus: () => true
        });
    }

    async get(url: string, timeoutMs: number): Promise<UpstreamResponse> {
        const response = await this.http.get<Readable>(url, {
            responseType: 'stream',
            timeout: timeoutMs
        });

        const headers: Record<string, string> = {};
        for (const [name, value] of Object.entries(response.headers)) {
            headers[name.toLowerCase()] = headerValue(value);
        }

        return { status: response.status, headers, body: response.data };
    }
}

export interface FetcherOptions {
    /** Origins in order of preference */
    upstreams: string[];
    store: CacheStore;
    client?: UpstreamClient;
    timeoutMs?: number;
    logger?: Logger;
}

interface ChosenResponse {
    url: string;
    response: UpstreamResponse;
}

export class FetcherService {
    private readonly upstreams: string[];
    private readonly store: CacheStore;
    private readonly client: UpstreamClient;
    private readonly timeoutMs: number;
    private readonly logger: Logger;

    constructor(options: FetcherOptions) {
        this.upstreams = options.upstreams;
        this.store = options.store;
        this.client = options.client ?? new AxiosUpstreamClient();
        this.timeoutMs = options.timeoutMs ?? CACHE_CONFIG.HTTP_TIMEOUT_MS;
        this.logger = options.logger ?? defaultLogger;
    }

    /**
     * Populate the cache entry for `key` from `upstreamPath` on the origins.
     * Resolves to the number of bytes written.
     */
    async fetch(key: string, upstreamPath: string): Promise<number> {
        const { url, response } = await this.retrieve(upstreamPath);

        let lastModified: Date | null = null;
        const modified = response.headers['last-modified'];
        if (modified) {
            try {
                lastModified = parseHttpDate(modified);
            } catch (error) {
                response.body.destroy();
                throw createUpstreamError('invalid Last-Modified header from upstream', {
                    url,
                    lastModified: modified,
                    error: errorMessage(error)
                });
            }
        }

        const declaredLength = parseInt(response.headers['content-length'] ?? '', 10);

        const metadata: CacheMetadata = {
            source: url,
            status: response.status,
            contentType: response.headers['content-type'] ?? '',
            lastModified,
            retrieved: new Date(),
            etag: response.headers['etag'] ?? '',
            size: Number.isFinite(declaredLength) && declaredLength > 0 ? declaredLength : 0
        };

        const bytes = await this.store.write(key, metadata, response.body);

        this.logger.debug('Fetched from upstream', { key, url, status: response.status, bytes });
        return bytes;
    }

    /**
     * Walk the origins in order. The first 200 wins; failing that, the last
     * origin's answer is used as long as it arrived at all.
     */
    private async retrieve(upstreamPath: string): Promise<ChosenResponse> {
        if (this.upstreams.length === 0) {
            throw createUpstreamError('no upstreams configured');
        }

        for (const [index, upstream] of this.upstreams.entries()) {
            const url = joinUrl(upstream, upstreamPath);
            const isLast = index === this.upstreams.length - 1;

            let response: UpstreamResponse;
            try {
                response = await this.client.get(url, this.timeoutMs);
            } catch (error) {
                this.logger.warn('Upstream request failed', { url, error: errorMessage(error) });
                if (isLast) {
                    throw createUpstreamError(`error fetching ${url}`, { url, error: errorMessage(error) });
                }
                continue;
            }

            if (response.status === HTTP_STATUS.OK || isLast) {
                if (response.status !== HTTP_STATUS.OK) {
                    this.logger.warn('Upstream returned non-200 status', { url, status: response.status });
                }
                return { url, response };
            }

            this.logger.warn('Upstream returned non-200 status', { url, status: response.status });
            response.body.destroy();
        }

        // The loop always returns or throws on its last origin
        throw createUpstreamError('no upstream answered');
    }
}
