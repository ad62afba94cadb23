import { createMiddleware } from 'hono/factory';
import type { Allowlist } from '../lib/allowlist';
import { AppError } from '../lib/errors';
import type { HonoEnv } from '../types';

/** Restricts a route to identities whose email is on the uploader allowlist. */
export const requireUploader = (allowlist: Allowlist) =>
    createMiddleware<HonoEnv>(async (c, next) => {
        const identity = c.get('identity');
        if (!identity?.email) {
            throw AppError.unauthorized();
        }

        if (!(await allowlist.has(identity.email))) {
            c.get('logger')?.warn('upload_forbidden', { email: identity.email });
            throw AppError.forbidden();
        }

        await next();
    });
