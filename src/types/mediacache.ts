/**
 * MediaCache type definitions
 */

import type { FileHandle } from 'fs/promises';
import type { CannedReplyStatus } from '../config/constants';

/**
 * How request URLs map to cache keys
 * - path: prefix-stripped path used directly as file name
 * - query: path plus query string, hashed into the file name
 */
export type KeyMode = 'path' | 'query';

/**
 * Resolved process configuration
 */
export interface MediaCacheConfig {
    listen: ListenAddress;
    cacheDir: string;
    upstreams: string[];
    prefix: string;
    keyMode: KeyMode;
    cannedReplies: Partial<Record<CannedReplyStatus, string>>;
    printStats: boolean;
    maxCacheFiles: number;
    maxCacheSizeMb: number;
    maxAgeHours: number;
    cacheClean: boolean;
    dryRun: boolean;
    logLevel: string;
}

export interface ListenAddress {
    host?: string;
    port: number;
}

/**
 * Metadata stored beside every cached content file
 */
export interface CacheMetadata {
    /** Upstream URL the content was fetched from */
    source: string;
    /** Upstream status code, stored verbatim */
    status: number;
    contentType: string;
    /** null when the upstream sent no Last-Modified */
    lastModified: Date | null;
    /** When the content was fetched */
    retrieved: Date;
    etag: string;
    size: number;
}

/**
 * On-disk JSON shape of the metadata sidecar
 */
export interface MetadataRecord {
    Source: string;
    Status: number;
    ContentType: string;
    LastModified: string;
    Retrieved: string;
    ETag: string;
    Size: number;
}

/**
 * An entry opened for reading
 */
export interface CachedEntry {
    metadata: CacheMetadata;
    content: FileHandle;
}

/**
 * A request resolved against the cache
 */
export interface CacheRequest {
    /** Logical cache key */
    key: string;
    /** Raw path to request from the origins, without query string */
    upstreamPath: string;
}

/**
 * Conditional request headers after parsing
 */
export interface ConditionalHeaders {
    ifModifiedSince: Date | null;
    eTags: string[];
    range: string;
}

export type CacheResult = 'HIT' | 'MISS';

export interface ServeOutcome {
    status: number;
    bytes: number;
    disconnected: boolean;
}
