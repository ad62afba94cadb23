import { Hono } from 'hono';
import type { HonoEnv } from '../types';

export function healthRoutes(): Hono<HonoEnv> {
    const app = new Hono<HonoEnv>();

    app.get('/health', (c) => c.json({ status: 'ok' }));

    return app;
}
