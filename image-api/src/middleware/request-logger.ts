import { createMiddleware } from 'hono/factory';
import type { Logger } from '../lib/logger';
import type { HonoEnv } from '../types';

export const requestLogger = (root: Logger) =>
    createMiddleware<HonoEnv>(async (c, next) => {
        const startedAt = Date.now();
        const log = root.child({
            request_id: c.get('requestId'),
            method: c.req.method,
            path: c.req.path,
        });
        c.set('logger', log);

        await next();

        log.info('request_complete', { status: c.res.status, duration_ms: Date.now() - startedAt });
    });
