/**
 * Integration tests: MediaCacheServer in front of a local origin
 */

import axios, { AxiosInstance } from 'axios';
import * as fs from 'fs';
import * as http from 'http';
import * as path from 'path';
import { MediaCacheServer } from '../../src/server';
import { hashKey } from '../../src/utils/request-utils';
import { MediaCacheConfig } from '../../src/types/mediacache';
import {
    baseUrl,
    closeServer,
    createConfig,
    createMockLogger,
    createTempDir,
    listen,
    removeTempDir,
} from '../helpers/test-utils';

const CLIP = 'x'.repeat(600) + 'y'.repeat(400);
const LAST_MODIFIED = 'Wed, 10 Jan 2024 12:00:00 GMT';
const LARGE = Buffer.alloc(32 * 1024 * 1024, 'z');

const waitFor = async (condition: () => boolean): Promise<void> => {
    for (let attempt = 0; attempt < 300 && !condition(); attempt++) {
        await new Promise(resolve => setTimeout(resolve, 10));
    }
};

describe('MediaCache proxy', () => {
    let tempDir: string;
    let origin: http.Server;
    let originCalls: Map<string, number>;
    let proxy: MediaCacheServer;
    let client: AxiosInstance;

    const calls = (url: string): number => originCalls.get(url) ?? 0;

    const handleOrigin = (req: http.IncomingMessage, res: http.ServerResponse): void => {
        const url = req.url ?? '';
        originCalls.set(url, calls(url) + 1);

        switch (url.split('?')[0]) {
            case '/clip.mp4':
                res.writeHead(200, {
                    'Content-Type': 'video/mp4',
                    'Content-Length': CLIP.length,
                    'Last-Modified': LAST_MODIFIED,
                    ETag: '"clip-v1"',
                });
                res.end(CLIP);
                return;
            case '/slow.bin':
                setTimeout(() => {
                    res.writeHead(200, { 'Content-Type': 'application/octet-stream' });
                    res.end('slow-body');
                }, 100);
                return;
            case '/large.bin':
                res.writeHead(200, { 'Content-Type': 'application/octet-stream', 'Content-Length': LARGE.length });
                res.end(LARGE);
                return;
            case '/missing.bin':
                res.writeHead(404, { 'Content-Type': 'text/html' });
                res.end('<h1>origin 404</h1>');
                return;
            case '/reset.bin':
                req.socket.destroy();
                return;
            default:
                res.writeHead(500);
                res.end('unexpected');
        }
    };

    const startProxy = async (overrides: Partial<MediaCacheConfig> = {}): Promise<void> => {
        proxy = new MediaCacheServer(createConfig({
            cacheDir: tempDir,
            upstreams: [baseUrl(origin)],
            cannedReplies: { 404: 'not found here' },
            ...overrides,
        }), { logger: createMockLogger() });
        await proxy.start();
        client = axios.create({
            baseURL: `http://127.0.0.1:${proxy.port}`,
            validateStatus: () => true,
            responseType: 'text',
        });
    };

    beforeEach(async () => {
        tempDir = createTempDir();
        originCalls = new Map();
        origin = await listen(handleOrigin);
    });

    afterEach(async () => {
        await proxy.stop();
        await closeServer(origin);
        removeTempDir(tempDir);
    });

    describe('service endpoints', () => {
        beforeEach(async () => {
            await startProxy();
        });

        test('should print the banner at the root', async () => {
            const response = await client.get('/');

            expect(response.status).toBe(200);
            expect(response.data).toBe('MediaCache v1.0\nhttps://github.com/mediacache/mediacache\n');
        });

        test('should answer the health check', async () => {
            const response = await client.get('/healthz');

            expect(response.status).toBe(200);
            expect(response.data).toBe('OK');
        });
    });

    describe('caching', () => {
        beforeEach(async () => {
            await startProxy();
        });

        test('should fetch once and then serve from disk', async () => {
            const first = await client.get('/clip.mp4');
            const second = await client.get('/clip.mp4');

            expect(first.status).toBe(200);
            expect(first.data).toBe(CLIP);
            expect(first.headers['x-cache']).toBe('MediaCache v1.0; MISS');
            expect(second.status).toBe(200);
            expect(second.data).toBe(CLIP);
            expect(second.headers['x-cache']).toBe('MediaCache v1.0; HIT');
            expect(second.headers['etag']).toBe('"clip-v1"');
            expect(second.headers['last-modified']).toBe(LAST_MODIFIED);
            expect(calls('/clip.mp4')).toBe(1);
            expect(fs.readdirSync(tempDir).sort()).toEqual(['clip.mp4', 'clip.mp4.meta']);
        });

        test('should account hits and misses', async () => {
            await client.get('/clip.mp4');
            await client.get('/clip.mp4');
            await waitFor(() => proxy.registry.totals.snapshot().completed === 2);

            expect(proxy.registry.totals.snapshot()).toEqual({
                requests: 2,
                completed: 2,
                disconnects: 0,
                sentBytes: 2000,
                receivedBytes: 1000,
                hits: 1,
                hitBytes: 1000,
                misses: 1,
                missBytes: 1000,
                errors: 0,
            });
        });

        test('should answer conditional requests from the cache', async () => {
            await client.get('/clip.mp4');

            const byTag = await client.get('/clip.mp4', { headers: { 'If-None-Match': '"clip-v1"' } });
            const byDate = await client.get('/clip.mp4', { headers: { 'If-Modified-Since': 'Thu, 11 Jan 2024 00:00:00 GMT' } });

            expect(byTag.status).toBe(304);
            expect(byDate.status).toBe(304);
            expect(byDate.headers['x-cache']).toBe('MediaCache v1.0; HIT');
            expect(calls('/clip.mp4')).toBe(1);
        });

        test('should serve ranges on a miss', async () => {
            const response = await client.get('/clip.mp4', { headers: { Range: 'bytes=590-609' } });

            expect(response.status).toBe(206);
            expect(response.data).toBe('x'.repeat(10) + 'y'.repeat(10));
            expect(response.headers['content-range']).toBe('bytes 590-609/1000');
            expect(response.headers['x-cache']).toBe('MediaCache v1.0; MISS');
        });

        test('should reject an unsatisfiable range after caching', async () => {
            const response = await client.get('/clip.mp4', { headers: { Range: 'bytes=2000-3000' } });
            const retry = await client.get('/clip.mp4');

            expect(response.status).toBe(400);
            expect(response.data).toBe('Invalid range request: start > end\n');
            expect(retry.headers['x-cache']).toBe('MediaCache v1.0; HIT');
            expect(calls('/clip.mp4')).toBe(1);
        });

        test('should fetch once for concurrent requests', async () => {
            const responses = await Promise.all(
                Array.from({ length: 5 }, () => client.get('/slow.bin'))
            );

            expect(responses.map(response => response.status)).toEqual([200, 200, 200, 200, 200]);
            expect(responses.map(response => response.data)).toEqual(Array(5).fill('slow-body'));
            expect(calls('/slow.bin')).toBe(1);
        });

        test('should refetch an expired entry', async () => {
            await client.get('/clip.mp4');
            const metaPath = path.join(tempDir, 'clip.mp4.meta');
            const meta = JSON.parse(fs.readFileSync(metaPath, 'utf8'));
            meta.Retrieved = new Date(Date.now() - 4 * 60 * 60 * 1000).toISOString();
            fs.writeFileSync(metaPath, `${JSON.stringify(meta)}\n`);

            const response = await client.get('/clip.mp4');

            expect(response.headers['x-cache']).toBe('MediaCache v1.0; MISS');
            expect(calls('/clip.mp4')).toBe(2);
        });

        test('should cache origin errors and reply with the canned body', async () => {
            const first = await client.get('/missing.bin');
            const second = await client.get('/missing.bin');

            expect(first.status).toBe(404);
            expect(first.data).toBe('not found here');
            expect(second.status).toBe(404);
            expect(second.headers['x-cache']).toBe('MediaCache v1.0; HIT');
            expect(calls('/missing.bin')).toBe(1);
        });

        test('should report upstream failures without caching', async () => {
            const response = await client.get('/reset.bin');

            expect(response.status).toBe(500);
            expect(response.data).toBe('error fetching file\n');
            expect(fs.readdirSync(tempDir)).toEqual([]);
        });

        test('should reject invalid paths', async () => {
            const nested = await client.get('/a/b.mp4');
            const sidecar = await client.get('/clip.mp4.meta');

            expect(nested.status).toBe(400);
            expect(nested.data).toBe('invalid path\n');
            expect(sidecar.status).toBe(400);
            expect(originCalls.size).toBe(0);
            expect(proxy.registry.totals.snapshot().errors).toBe(2);
        });

        test('should reject a malformed If-Modified-Since', async () => {
            const response = await client.get('/clip.mp4', { headers: { 'If-Modified-Since': 'last tuesday' } });

            expect(response.status).toBe(400);
            expect(response.data).toBe('error parsing If-Modified-Since header\n');
            expect(calls('/clip.mp4')).toBe(0);
        });
    });

    describe('client disconnects', () => {
        beforeEach(async () => {
            await startProxy();
        });

        test('should count a client that goes away mid-body as a disconnect', async () => {
            await client.get('/large.bin', { responseType: 'arraybuffer' });

            await new Promise<void>((resolve, reject) => {
                const req = http.get(`http://127.0.0.1:${proxy.port}/large.bin`, res => {
                    res.once('data', () => {
                        req.destroy();
                        resolve();
                    });
                });
                req.on('error', error => {
                    if (!req.destroyed) {
                        reject(error);
                    }
                });
            });
            await waitFor(() => proxy.registry.totals.snapshot().completed === 2);

            const totals = proxy.registry.totals.snapshot();
            expect(totals.completed).toBe(2);
            expect(totals.misses).toBe(1);
            expect(totals.hits).toBe(1);
            expect(totals.disconnects).toBe(1);
            expect(totals.errors).toBe(0);
            expect(calls('/large.bin')).toBe(1);
        });
    });

    describe('query key mode', () => {
        test('should cache each query string separately', async () => {
            await startProxy({ keyMode: 'query' });

            await client.get('/clip.mp4?v=1');
            await client.get('/clip.mp4?v=2');
            const repeat = await client.get('/clip.mp4?v=1');

            expect(repeat.headers['x-cache']).toBe('MediaCache v1.0; HIT');
            expect(calls('/clip.mp4')).toBe(2);
            expect(fs.readdirSync(tempDir)).toContain(hashKey('clip.mp4?v=1'));
            expect(fs.readdirSync(tempDir)).toContain(hashKey('clip.mp4?v=2'));
        });
    });

    describe('path prefix', () => {
        test('should strip the prefix before keying and fetching', async () => {
            await startProxy({ prefix: '/media/' });

            const response = await client.get('/media/clip.mp4');
            const outside = await client.get('/clip.mp4');

            expect(response.status).toBe(200);
            expect(calls('/clip.mp4')).toBe(1);
            expect(outside.status).toBe(400);
        });
    });
});
