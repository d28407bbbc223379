#!/usr/bin/env node
/**
 * MediaCache Server
 * @fileoverview Express server exposing the disk-backed caching proxy
 */

import dotenv from 'dotenv';
import express from 'express';
import http from 'http';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { CacheStore } from './cache/cache-store';
import { KeyLockRegistry } from './cache/key-lock-registry';
import { SOFTWARE, VERSION } from './config/constants';
import { loadConfig } from './config/environment';
import { createErrorHandler, errorMessage } from './middleware/error-handler';
import { createLoggingMiddleware, LogLevel, Logger, logger as defaultLogger } from './middleware/logging';
import { createCacheRoutes } from './routes/cache';
import { CacheService } from './services/cache-service';
import { FetcherService, UpstreamClient } from './services/fetcher-service';
import { JanitorService } from './services/janitor-service';
import { ResponderService } from './services/responder-service';
import { MediaCacheConfig } from './types/mediacache';

export interface ServerOptions {
    logger?: Logger;
    /** Replaces the axios-backed origin client */
    upstreamClient?: UpstreamClient;
}

/**
 * MediaCache Server class
 */
export class MediaCacheServer {
    private readonly app: express.Application;
    private server: http.Server | null = null;
    private readonly logger: Logger;
    readonly store: CacheStore;
    readonly registry: KeyLockRegistry;
    readonly janitor: JanitorService;
    private readonly cacheService: CacheService;

    constructor(private readonly config: MediaCacheConfig, options: ServerOptions = {}) {
        this.logger = options.logger ?? defaultLogger;

        this.store = new CacheStore({ cacheDir: config.cacheDir, keyMode: config.keyMode, logger: this.logger });
        this.registry = new KeyLockRegistry();
        this.janitor = new JanitorService({
            cacheDir: config.cacheDir,
            registry: this.registry,
            settings: {
                printStats: config.printStats,
                cacheClean: config.cacheClean,
                dryRun: config.dryRun,
                maxCacheFiles: config.maxCacheFiles,
                maxCacheSizeMb: config.maxCacheSizeMb,
                maxAgeHours: config.maxAgeHours
            },
            logger: this.logger
        });

        const fetcher = new FetcherService({
            upstreams: config.upstreams,
            store: this.store,
            client: options.upstreamClient,
            logger: this.logger
        });
        const responder = new ResponderService({
            store: this.store,
            cannedReplies: config.cannedReplies,
            logger: this.logger
        });
        this.cacheService = new CacheService({
            prefix: config.prefix,
            keyMode: config.keyMode,
            maxAgeHours: config.maxAgeHours,
            store: this.store,
            registry: this.registry,
            fetcher,
            responder,
            logger: this.logger
        });

        this.app = express();
        this.setupMiddleware();
        this.setupRoutes();
        this.setupErrorHandling();
    }

    private setupMiddleware(): void {
        this.app.disable('x-powered-by');
        this.app.use(createLoggingMiddleware({ logger: this.logger }));
    }

    private setupRoutes(): void {
        this.app.use(createCacheRoutes({ cacheService: this.cacheService }));
    }

    private setupErrorHandling(): void {
        this.app.use(createErrorHandler(this.logger));
    }

    /**
     * Prepare the cache directory, listen, then start the janitor
     */
    async start(): Promise<void> {
        await this.store.init();

        const { host, port } = this.config.listen;
        const server = http.createServer(this.app);
        await new Promise<void>((resolve, reject) => {
            server.once('error', reject);
            const onListening = (): void => {
                server.off('error', reject);
                resolve();
            };
            if (host) {
                server.listen(port, host, onListening);
            } else {
                server.listen(port, onListening);
            }
        });
        this.server = server;

        server.on('error', (error: Error) => {
            this.logger.error('Server error', { error: error.message });
        });

        this.logger.info(`${SOFTWARE} ${VERSION} started`, {
            host: host ?? '',
            port: this.port,
            cacheDir: this.config.cacheDir,
            upstreams: this.config.upstreams,
            prefix: this.config.prefix,
            keyMode: this.config.keyMode,
            logLevel: this.config.logLevel
        });

        await this.janitor.start();
    }

    /**
     * Stop the janitor and close the listener
     */
    async stop(): Promise<void> {
        this.janitor.stop();

        const server = this.server;
        if (!server) {
            return;
        }
        this.server = null;

        await new Promise<void>((resolve, reject) => {
            server.close(error => (error ? reject(error) : resolve()));
            server.closeIdleConnections();
        });
        this.logger.info('Server stopped');
    }

    /**
     * Port actually bound, useful when listening on port 0
     */
    get port(): number {
        const address = this.server?.address();
        if (address && typeof address === 'object') {
            return address.port;
        }
        return this.config.listen.port;
    }

    getApp(): express.Application {
        return this.app;
    }
}

async function main(): Promise<void> {
    dotenv.config();

    const argv = yargs(hideBin(process.argv))
        .option('listen', {
            type: 'string',
            description: 'Address to listen on, [host]:port (CACHE_LISTEN)'
        })
        .option('cache-dir', {
            type: 'string',
            description: 'Cache directory (CACHE_DIR)'
        })
        .option('upstream', {
            type: 'string',
            description: 'Space-separated origin URLs (CACHE_UPSTREAM)'
        })
        .option('log-level', {
            type: 'string',
            choices: [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR],
            description: 'Log level (LOG_LEVEL)'
        })
        .help()
        .alias('help', 'h')
        .parseSync();

    if (argv.listen !== undefined) {
        process.env['CACHE_LISTEN'] = argv.listen;
    }
    if (argv['cache-dir'] !== undefined) {
        process.env['CACHE_DIR'] = argv['cache-dir'];
    }
    if (argv.upstream !== undefined) {
        process.env['CACHE_UPSTREAM'] = argv.upstream;
    }
    if (argv['log-level'] !== undefined) {
        process.env['LOG_LEVEL'] = argv['log-level'];
    }

    const server = new MediaCacheServer(loadConfig());
    await server.start();

    const shutdown = (signal: string): void => {
        defaultLogger.info(`Received ${signal}, shutting down gracefully`);
        server.stop().then(
            () => process.exit(0),
            (error: unknown) => {
                defaultLogger.error('Error during shutdown', { error: errorMessage(error) });
                process.exit(1);
            }
        );
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
}

// Start server if called directly
if (require.main === module) {
    main().catch((error: unknown) => {
        defaultLogger.error('Failed to start server', { error: errorMessage(error) });
        process.exit(1);
    });
}
