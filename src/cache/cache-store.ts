/**
 * On-disk cache store
 * @fileoverview Content files with JSON metadata sidecars, written and removed as pairs
 */

import { createWriteStream } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { CACHE_CONFIG } from '../config/constants';
import { createStorageError, errorMessage, isErrnoException } from '../middleware/error-handler';
import { Logger, logger as defaultLogger } from '../middleware/logging';
import { CachedEntry, CacheMetadata, KeyMode, MetadataRecord } from '../types/mediacache';
import { hashKey } from '../utils/request-utils';
import { ByteCounter } from '../utils/stream-utils';

const ZERO_TIME = '0001-01-01T00:00:00Z';
const HOUR_MS = 60 * 60 * 1000;

/**
 * Cache store configuration options
 */
export interface CacheStoreOptions {
    /** Directory holding content files and sidecars */
    cacheDir: string;
    /** query mode hashes keys into file names */
    keyMode?: KeyMode;
    logger?: Logger;
}

export function serializeMetadata(metadata: CacheMetadata): string {
    const record: MetadataRecord = {
        Source: metadata.source,
        Status: metadata.status,
        ContentType: metadata.contentType,
        LastModified: metadata.lastModified ? metadata.lastModified.toISOString() : ZERO_TIME,
        Retrieved: metadata.retrieved.toISOString(),
        ETag: metadata.etag,
        Size: metadata.size
    };
    return `${JSON.stringify(record)}\n`;
}

function parseTime(value: unknown, field: string): Date {
    if (typeof value !== 'string') {
        throw new Error(`metadata field ${field} is not a string`);
    }
    const date = new Date(value);
    if (isNaN(date.getTime())) {
        throw new Error(`metadata field ${field} is not a valid time`);
    }
    return date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(record: Record<string, unknown>, field: keyof MetadataRecord): string {
    const value = record[field];
    if (typeof value !== 'string') {
        throw new Error(`metadata field ${field} is not a string`);
    }
    return value;
}

function requireNumber(record: Record<string, unknown>, field: keyof MetadataRecord): number {
    const value = record[field];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new Error(`metadata field ${field} is not a number`);
    }
    return value;
}

/**
 * Parse and validate a sidecar. The zero time stands for "no Last-Modified".
 */
export function parseMetadata(raw: string): CacheMetadata {
    const record: unknown = JSON.parse(raw);
    if (!isRecord(record)) {
        throw new Error('metadata is not an object');
    }

    const lastModified = parseTime(record['LastModified'], 'LastModified');

    return {
        source: requireString(record, 'Source'),
        status: requireNumber(record, 'Status'),
        contentType: requireString(record, 'ContentType'),
        lastModified: lastModified.getUTCFullYear() <= 1 ? null : lastModified,
        retrieved: parseTime(record['Retrieved'], 'Retrieved'),
        etag: requireString(record, 'ETag'),
        size: requireNumber(record, 'Size')
    };
}

/**
 * An entry is expired once it was retrieved more than maxAgeHours ago
 */
export function isExpired(metadata: CacheMetadata, maxAgeHours: number, now: number = Date.now()): boolean {
    return maxAgeHours > 0 && now - metadata.retrieved.getTime() > maxAgeHours * HOUR_MS;
}

function isMissing(error: unknown): boolean {
    return isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

export class CacheStore {
    readonly cacheDir: string;
    private readonly keyMode: KeyMode;
    private readonly logger: Logger;

    constructor(options: CacheStoreOptions) {
        this.cacheDir = options.cacheDir;
        this.keyMode = options.keyMode ?? 'path';
        this.logger = options.logger ?? defaultLogger;
    }

    /**
     * Ensure cache directory exists
     */
    async init(): Promise<void> {
        try {
            await fs.mkdir(this.cacheDir, { recursive: true });
        } catch (error) {
            this.logger.error('Failed to create cache directory', { cacheDir: this.cacheDir, error: errorMessage(error) });
            throw error;
        }
    }

    fileName(key: string): string {
        return this.keyMode === 'query' ? hashKey(key) : key;
    }

    paths(key: string): { contentPath: string; metaPath: string } {
        const contentPath = path.join(this.cacheDir, this.fileName(key));
        return { contentPath, metaPath: `${contentPath}${CACHE_CONFIG.META_SUFFIX}` };
    }

    /**
     * True only when both the content file and its sidecar are present
     */
    async exists(key: string): Promise<boolean> {
        const { contentPath, metaPath } = this.paths(key);
        try {
            const [meta, content] = await Promise.all([fs.stat(metaPath), fs.stat(contentPath)]);
            return meta.isFile() && content.isFile();
        } catch {
            return false;
        }
    }

    async readMetadata(key: string): Promise<CacheMetadata | null> {
        const { metaPath } = this.paths(key);
        let raw: string;
        try {
            raw = await fs.readFile(metaPath, 'utf8');
        } catch (error) {
            if (isMissing(error)) {
                return null;
            }
            throw error;
        }

        try {
            return parseMetadata(raw);
        } catch (error) {
            throw createStorageError('corrupt cache metadata', { key, error: errorMessage(error) });
        }
    }

    /**
     * A missing or unreadable entry counts as stale
     */
    async isStale(key: string, maxAgeHours: number): Promise<boolean> {
        try {
            const metadata = await this.readMetadata(key);
            return metadata === null || isExpired(metadata, maxAgeHours);
        } catch (error) {
            this.logger.warn('Unreadable cache metadata', { key, error: errorMessage(error) });
            return true;
        }
    }

    /**
     * Open an entry for reading. The caller owns the returned file handle.
     * Returns null when either half of the pair is missing.
     */
    async read(key: string): Promise<CachedEntry | null> {
        const metadata = await this.readMetadata(key);
        if (!metadata) {
            return null;
        }

        const { contentPath } = this.paths(key);
        try {
            const content = await fs.open(contentPath, 'r');
            return { metadata, content };
        } catch (error) {
            if (isMissing(error)) {
                return null;
            }
            throw error;
        }
    }

    /**
     * Stream content to disk, then write the sidecar. A non-positive
     * metadata size is replaced by the number of bytes written. On any
     * failure both files are removed and the error is rethrown.
     */
    async write(key: string, metadata: CacheMetadata, content: Readable): Promise<number> {
        const { contentPath, metaPath } = this.paths(key);
        const counter = new ByteCounter();

        try {
            await pipeline(content, counter, createWriteStream(contentPath));

            const stored: CacheMetadata = {
                ...metadata,
                size: metadata.size > 0 ? metadata.size : counter.bytes
            };
            await fs.writeFile(metaPath, serializeMetadata(stored), { mode: 0o644 });

            return counter.bytes;
        } catch (error) {
            this.logger.error('Cache write error', { key, bytes: counter.bytes, error: errorMessage(error) });
            await this.remove(key);
            throw error;
        }
    }

    /**
     * Mark the entry as used now
     */
    async touch(key: string): Promise<void> {
        const { metaPath } = this.paths(key);
        const now = new Date();
        await fs.utimes(metaPath, now, now);
    }

    /**
     * Remove both halves, best effort
     */
    async remove(key: string): Promise<void> {
        const { contentPath, metaPath } = this.paths(key);
        await Promise.all([contentPath, metaPath].map(async filePath => {
            try {
                await fs.rm(filePath, { force: true });
            } catch (error) {
                this.logger.warn('Failed to remove cache file', { key, filePath, error: errorMessage(error) });
            }
        }));
    }
}
