import { z } from 'zod';
import { LOG_LEVELS } from './logger';

const commaList = z
    .string()
    .optional()
    .transform((value) => (value ?? '').split(',').map((item) => item.trim()).filter(Boolean));

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => value === 'true' || value === '1');

const optionalString = z
    .string()
    .optional()
    .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    LISTEN_HOST: z.string().default('0.0.0.0'),
    PUBLIC_URL: z.string().url().default('http://localhost:8000'),

    S3_BUCKET: z.string().min(1, 'S3_BUCKET is required'),
    S3_ENDPOINT: z.string().url().optional(),
    S3_REGION: z.string().min(1).default('auto'),
    S3_ACCESS_KEY_ID: optionalString,
    S3_SECRET_ACCESS_KEY: optionalString,
    S3_FORCE_PATH_STYLE: booleanFlag,

    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),

    TEAM_DOMAIN: z.string().min(1, 'TEAM_DOMAIN is required'),
    POLICY_AUD: z.string().min(1, 'POLICY_AUD is required'),
    JWKS_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(14400),
    AUTH_EXCLUDE_PATHS: z.string().default('/health'),

    ALLOWLIST_FILE: z.string().min(1).default('/config/post_allowlist.json'),
    ALLOWLIST_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(60),

    MAX_FILE_SIZE: z.coerce.number().int().positive().default(5 * 1024 * 1024),
    MAX_DIMENSION: z.coerce.number().int().positive().default(4096),

    ALLOWED_ORIGINS: commaList,
    ALLOWED_ORIGINS_REGEX: optionalString,

    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface AppConfig {
    port: number;
    hostname: string;
    publicUrl: string;
    s3: {
        bucket: string;
        endpoint?: string;
        region: string;
        credentials?: { accessKeyId: string; secretAccessKey: string };
        forcePathStyle: boolean;
    };
    databaseUrl: string;
    access: {
        teamDomain: string;
        audience: string;
        certsUrl: string;
        jwksCacheTtlMs: number;
        excludePaths: string[];
    };
    allowlist: {
        file: string;
        cacheTtlMs: number;
    };
    images: {
        maxFileSize: number;
        maxDimension: number;
    };
    cors: {
        origins: string[];
        originsRegex?: RegExp;
    };
    logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
}

/** Origins must match the whole pattern, not a substring of it. */
export const anchorOriginPattern = (pattern: string): RegExp => new RegExp(`^(?:${pattern})$`);

export class ConfigError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
    }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
    }
    const e = parsed.data;

    let credentials: AppConfig['s3']['credentials'];
    if (e.S3_ACCESS_KEY_ID && e.S3_SECRET_ACCESS_KEY) {
        credentials = { accessKeyId: e.S3_ACCESS_KEY_ID, secretAccessKey: e.S3_SECRET_ACCESS_KEY };
    } else if (e.S3_ACCESS_KEY_ID || e.S3_SECRET_ACCESS_KEY) {
        throw new ConfigError(['S3_ACCESS_KEY_ID and S3_SECRET_ACCESS_KEY must be set together']);
    }

    let originsRegex: RegExp | undefined;
    if (e.ALLOWED_ORIGINS_REGEX) {
        try {
            originsRegex = anchorOriginPattern(e.ALLOWED_ORIGINS_REGEX);
        } catch {
            throw new ConfigError(['ALLOWED_ORIGINS_REGEX: not a valid pattern']);
        }
    }

    const teamDomain = e.TEAM_DOMAIN.replace(/^https?:\/\//, '').replace(/\/+$/, '');

    return {
        port: e.PORT,
        hostname: e.LISTEN_HOST,
        publicUrl: e.PUBLIC_URL.replace(/\/+$/, ''),
        s3: {
            bucket: e.S3_BUCKET,
            endpoint: e.S3_ENDPOINT,
            region: e.S3_REGION,
            credentials,
            forcePathStyle: e.S3_FORCE_PATH_STYLE,
        },
        databaseUrl: e.DATABASE_URL,
        access: {
            teamDomain,
            audience: e.POLICY_AUD,
            certsUrl: `https://${teamDomain}/cdn-cgi/access/certs`,
            jwksCacheTtlMs: e.JWKS_CACHE_TTL_SECONDS * 1000,
            excludePaths: e.AUTH_EXCLUDE_PATHS.split(',').map((p) => p.trim()).filter(Boolean),
        },
        allowlist: {
            file: e.ALLOWLIST_FILE,
            cacheTtlMs: e.ALLOWLIST_CACHE_TTL_SECONDS * 1000,
        },
        images: {
            maxFileSize: e.MAX_FILE_SIZE,
            maxDimension: e.MAX_DIMENSION,
        },
        cors: {
            origins: e.ALLOWED_ORIGINS,
            originsRegex,
        },
        logLevel: e.LOG_LEVEL,
    };
}
