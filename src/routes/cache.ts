/**
 * Routes for the caching proxy
 */

import { Request, Response, Router } from 'express';
import { REPOSITORY_URL, SOFTWARE, VERSION } from '../config/constants';
import { asyncHandler } from '../middleware/error-handler';
import { CacheService } from '../services/cache-service';

export interface CacheRouterOptions {
    cacheService: CacheService;
}

function sendText(res: Response, body: string): void {
    res.setHeader('Content-Type', 'text/plain; charset=utf-8');
    res.setHeader('Content-Length', Buffer.byteLength(body));
    res.status(200).end(body);
}

/**
 * Create cache routes
 */
export function createCacheRoutes(options: CacheRouterOptions): Router {
    const { cacheService } = options;
    const router = Router();

    /**
     * GET /
     * Software banner
     */
    router.get('/', (_req: Request, res: Response): void => {
        sendText(res, `${SOFTWARE} ${VERSION}\n${REPOSITORY_URL}\n`);
    });

    /**
     * GET /healthz
     * Liveness probe
     */
    router.get('/healthz', (_req: Request, res: Response): void => {
        sendText(res, 'OK');
    });

    /**
     * GET <prefix><path>[?query]
     * Cached content
     */
    router.get(/.*/, asyncHandler(async (req: Request, res: Response): Promise<void> => {
        await cacheService.handleRequest(req, res);
    }));

    return router;
}
