import { createRemoteJWKSet, jwtVerify, errors, type JWTPayload, type JWTVerifyGetKey } from 'jose';
import { AppError } from './errors';
import type { AppConfig } from './config';

export interface Identity {
    subject?: string;
    email?: string;
    claims: JWTPayload;
}

export interface AccessVerifierOptions {
    audience: string;
    keys: JWTVerifyGetKey;
    issuer?: string;
}

/**
 * Verifies identity-proxy tokens (RS256) against a key set and audience.
 */
export class AccessVerifier {
    constructor(private readonly options: AccessVerifierOptions) {}

    async verify(token: string): Promise<Identity> {
        try {
            const { payload } = await jwtVerify(token, this.options.keys, {
                audience: this.options.audience,
                issuer: this.options.issuer,
                algorithms: ['RS256'],
            });
            return {
                subject: payload.sub,
                email: typeof payload.email === 'string' ? payload.email : undefined,
                claims: payload,
            };
        } catch (err) {
            if (isKeySetFailure(err)) {
                throw AppError.identityUnavailable(err);
            }
            throw AppError.unauthorized();
        }
    }
}

/**
 * Errors that say nothing about the token itself: the certs endpoint timed out,
 * answered with a non-200 or an unparseable body, or the request never left.
 * jose reports the non-200 and unparseable cases as a bare `JOSEError`.
 */
export function isKeySetFailure(err: unknown): boolean {
    if (!(err instanceof errors.JOSEError)) return true;
    return err instanceof errors.JWKSTimeout
        || err instanceof errors.JWKSInvalid
        || err.code === 'ERR_JOSE_GENERIC';
}

/**
 * Remote key set from the team domain's certs endpoint. jose keeps the keys
 * in memory, refetching once `jwksCacheTtlMs` has passed or when a token
 * names a key id it has not seen.
 */
export function createAccessVerifier(config: AppConfig['access']): AccessVerifier {
    const keys = createRemoteJWKSet(new URL(config.certsUrl), {
        cacheMaxAge: config.jwksCacheTtlMs,
        cooldownDuration: 30_000,
    });
    return new AccessVerifier({ audience: config.audience, keys });
}
