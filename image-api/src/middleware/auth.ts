import type { Context } from 'hono';
import { getCookie } from 'hono/cookie';
import { createMiddleware } from 'hono/factory';
import type { AccessVerifier } from '../lib/access';
import { AppError } from '../lib/errors';
import type { HonoEnv } from '../types';

export const ACCESS_TOKEN_HEADER = 'Cf-Access-Jwt-Assertion';
export const ACCESS_TOKEN_COOKIE = 'CF_Authorization';

export function extractAccessToken(c: Context<HonoEnv>): string | null {
    const assertion = c.req.header(ACCESS_TOKEN_HEADER);
    if (assertion) return assertion.trim();

    const cookie = getCookie(c, ACCESS_TOKEN_COOKIE);
    if (cookie) return cookie;

    const authHeader = c.req.header('Authorization');
    if (authHeader && authHeader.startsWith('Bearer ')) {
        const token = authHeader.slice(7).trim();
        return token || null;
    }
    return null;
}

export const authMiddleware = (verifier: AccessVerifier, excludePaths: readonly string[]) =>
    createMiddleware<HonoEnv>(async (c, next) => {
        if (excludePaths.includes(c.req.path)) {
            return await next();
        }

        const token = extractAccessToken(c);
        if (!token) {
            throw AppError.unauthorized();
        }

        const identity = await verifier.verify(token);
        c.set('identity', identity);
        c.get('logger')?.debug('auth_success', { subject: identity.subject, email: identity.email });
        await next();
    });
