import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { logger } from 'hono/logger';
import { requestId } from 'hono/request-id';
import { authMiddleware } from './middleware/auth';
import { requestLogger } from './middleware/request-logger';
import { healthRoutes } from './routes/health';
import { imageRoutes } from './routes/images';
import type { AccessVerifier } from './lib/access';
import type { Allowlist } from './lib/allowlist';
import type { AppConfig } from './lib/config';
import { AppError, type ErrorResponse } from './lib/errors';
import type { ImageService } from './lib/images';
import { describeError, type Logger } from './lib/logger';
import type { ImageRecordRepository } from './lib/records';
import type { HonoEnv } from './types';

export interface AppDeps {
    config: Pick<AppConfig, 'access' | 'cors' | 'images'>;
    logger: Logger;
    images: ImageService;
    records: ImageRecordRepository;
    verifier: AccessVerifier;
    allowlist: Allowlist;
}

export function toAppError(err: unknown): AppError {
    if (err instanceof AppError) return err;
    if (err instanceof HTTPException) {
        switch (err.status) {
            case 400:
                return AppError.invalidPayload(err.message || 'Invalid payload');
            case 401:
                return AppError.unauthorized();
            case 404:
                return AppError.notFound();
            case 413:
                return AppError.payloadTooLarge();
        }
    }
    return AppError.internal(undefined, err);
}

function renderError(c: Context<HonoEnv>, error: AppError): Response {
    const body: ErrorResponse = {
        error: error.message,
        code: error.code,
        request_id: c.get('requestId'),
    };
    return c.json(body, error.statusCode);
}

export function createApp(deps: AppDeps): Hono<HonoEnv> {
    const { config } = deps;
    const app = new Hono<HonoEnv>();

    // Global Middleware Chain (Strict Order)
    app.use(requestId());
    app.use(requestLogger(deps.logger));
    app.use(logger((message, ...rest) => deps.logger.debug('http', { message: [message, ...rest].join(' ') })));
    app.use(cors({
        origin: (origin) => {
            if (!origin) return null;
            if (config.cors.origins.includes('*') || config.cors.origins.includes(origin)) return origin;
            if (config.cors.originsRegex?.test(origin)) return origin;
            return null;
        },
        credentials: true,
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Content-Type', 'Authorization', 'X-Request-Id', 'Cf-Access-Jwt-Assertion'],
        exposeHeaders: ['X-Request-Id', 'X-Cache', 'X-Image-Width', 'X-Image-Height'],
        maxAge: 86400,
    }));
    app.use(authMiddleware(deps.verifier, config.access.excludePaths));

    // Routes
    app.route('/', healthRoutes());
    app.route('/', imageRoutes({
        images: deps.images,
        records: deps.records,
        allowlist: deps.allowlist,
        maxFileSize: config.images.maxFileSize,
        maxDimension: config.images.maxDimension,
    }));

    // 404 for everything else
    app.notFound((c) => renderError(c, AppError.notFound('Endpoint not found')));

    app.onError((err, c) => {
        const error = toAppError(err);
        const log = c.get('logger') ?? deps.logger;
        if (error.isOperational) {
            log.warn('request_error', { code: error.code, status: error.statusCode, message: error.message });
        } else {
            log.error('request_error', { code: error.code, status: error.statusCode, ...describeError(err) });
        }
        return renderError(c, error);
    });

    return app;
}
