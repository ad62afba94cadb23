import { createHash } from 'node:crypto';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import sharp from 'sharp';
import { z } from 'zod';
import { createLocalJWKSet, exportJWK, generateKeyPair, SignJWT, type JWTPayload, type KeyLike } from 'jose';
import { createApp } from '../index';
import { AccessVerifier } from '../lib/access';
import { Allowlist } from '../lib/allowlist';
import type { ImageFormat } from '../lib/formats';
import { ImageService } from '../lib/images';
import { createLogger, type Logger } from '../lib/logger';
import { encodeCursor, decodeCursor, type ImageRecord, type ImageRecordRepository, type ListPage, type ListQuery } from '../lib/records';
import type { ObjectHead, ObjectStore, PutOptions, StoredObject } from '../lib/storage';

export const TEST_AUDIENCE = 'test-policy-aud';
export const UPLOADER_EMAIL = 'uploader@example.com';
export const READER_EMAIL = 'reader@example.com';
export const PUBLIC_URL = 'http://images.test';

interface MemoryObject {
    body: Buffer;
    contentType: string;
    metadata: Record<string, string>;
    etag: string;
}

/** In-process object store with S3-like ETags and call counters. */
export class MemoryObjectStore implements ObjectStore {
    readonly objects = new Map<string, MemoryObject>();
    readonly calls = { head: 0, get: 0, put: 0 };

    async head(key: string): Promise<ObjectHead | null> {
        this.calls.head++;
        const object = this.objects.get(key);
        if (!object) return null;
        return { size: object.body.byteLength, contentType: object.contentType, etag: object.etag, metadata: { ...object.metadata } };
    }

    async get(key: string): Promise<StoredObject | null> {
        this.calls.get++;
        const object = this.objects.get(key);
        if (!object) return null;
        return {
            body: Buffer.from(object.body),
            size: object.body.byteLength,
            contentType: object.contentType,
            etag: object.etag,
            metadata: { ...object.metadata },
        };
    }

    async put(key: string, body: Buffer, options: PutOptions): Promise<{ etag?: string }> {
        this.calls.put++;
        const etag = `"${createHash('md5').update(body).digest('hex')}"`;
        this.objects.set(key, {
            body: Buffer.from(body),
            contentType: options.contentType,
            metadata: { ...(options.metadata ?? {}) },
            etag,
        });
        return { etag };
    }

    keys(): string[] {
        return [...this.objects.keys()].sort();
    }
}

export class MemoryRecordRepository implements ImageRecordRepository {
    readonly records = new Map<string, ImageRecord>();

    async upsert(record: ImageRecord): Promise<void> {
        this.records.set(`${record.project}\u0000${record.key}`, { ...record });
    }

    async get(project: string, key: string): Promise<ImageRecord | null> {
        const record = this.records.get(`${project}\u0000${key}`);
        return record ? { ...record } : null;
    }

    async list(query: ListQuery): Promise<ListPage> {
        const after = query.cursor ? decodeCursor(query.cursor) : null;
        const sorted = [...this.records.values()]
            .filter((r) => query.project === undefined || r.project === query.project)
            .filter((r) => !after || r.project > after.project || (r.project === after.project && r.key > after.key))
            .sort((a, b) => (a.project === b.project ? (a.key < b.key ? -1 : 1) : a.project < b.project ? -1 : 1));
        const page = sorted.slice(0, query.limit);
        const last = page[page.length - 1];
        return {
            records: page,
            nextCursor: sorted.length > query.limit && last ? encodeCursor(last) : null,
        };
    }
}

export function createCapturingLogger(): { logger: Logger; lines: Array<Record<string, unknown>> } {
    const lines: Array<Record<string, unknown>> = [];
    const logger = createLogger('debug', {}, (line) => {
        lines.push(z.record(z.unknown()).parse(JSON.parse(line)));
    });
    return { logger, lines };
}

export async function makeImage(
    width: number,
    height: number,
    format: ImageFormat = 'png'
): Promise<Buffer> {
    const pipeline = sharp({
        create: { width, height, channels: 3, background: { r: 40, g: 120, b: 200 } },
    });
    if (format === 'jpeg') return pipeline.jpeg().toBuffer();
    if (format === 'webp') return pipeline.webp().toBuffer();
    if (format === 'avif') return pipeline.avif().toBuffer();
    return pipeline.png().toBuffer();
}

export interface TestKeys {
    privateKey: KeyLike;
    verifier: AccessVerifier;
    sign(claims: JWTPayload, options?: { audience?: string; expiresAt?: number | string; key?: KeyLike }): Promise<string>;
}

export async function createTestKeys(): Promise<TestKeys> {
    const { publicKey, privateKey } = await generateKeyPair('RS256');
    const jwk = await exportJWK(publicKey);
    const keys = createLocalJWKSet({ keys: [{ ...jwk, kid: 'test-key', alg: 'RS256' }] });
    const verifier = new AccessVerifier({ audience: TEST_AUDIENCE, keys });

    return {
        privateKey,
        verifier,
        sign: (claims, options = {}) =>
            new SignJWT(claims)
                .setProtectedHeader({ alg: 'RS256', kid: 'test-key' })
                .setAudience(options.audience ?? TEST_AUDIENCE)
                .setIssuedAt()
                .setExpirationTime(options.expiresAt ?? '5m')
                .sign(options.key ?? privateKey),
    };
}

export interface AllowlistFile {
    path: string;
    cleanup(): Promise<void>;
}

export async function writeAllowlistFile(contents: string): Promise<AllowlistFile> {
    const dir = await mkdtemp(join(tmpdir(), 'allowlist-'));
    const path = join(dir, 'post_allowlist.json');
    await writeFile(path, contents, 'utf8');
    return { path, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

export interface TestContext {
    app: ReturnType<typeof createApp>;
    store: MemoryObjectStore;
    records: MemoryRecordRepository;
    keys: TestKeys;
    lines: Array<Record<string, unknown>>;
    uploaderToken: string;
    readerToken: string;
    cleanup(): Promise<void>;
}

export interface TestContextOverrides {
    maxFileSize?: number;
    maxDimension?: number;
    originsRegex?: RegExp;
}

export async function createTestContext(overrides: TestContextOverrides = {}): Promise<TestContext> {
    const store = new MemoryObjectStore();
    const records = new MemoryRecordRepository();
    const keys = await createTestKeys();
    const { logger, lines } = createCapturingLogger();
    const allowlistFile = await writeAllowlistFile(JSON.stringify([UPLOADER_EMAIL]));
    const maxFileSize = overrides.maxFileSize ?? 5 * 1024 * 1024;
    const maxDimension = overrides.maxDimension ?? 4096;

    const images = new ImageService({ store, records, logger, publicUrl: PUBLIC_URL, maxFileSize, maxDimension });
    const app = createApp({
        config: {
            access: {
                teamDomain: 'team.example.com',
                audience: TEST_AUDIENCE,
                certsUrl: 'https://team.example.com/cdn-cgi/access/certs',
                jwksCacheTtlMs: 60_000,
                excludePaths: ['/health'],
            },
            cors: { origins: ['https://app.example.com'], originsRegex: overrides.originsRegex ?? /^https:\/\/[a-z]+\.preview\.example\.com$/ },
            images: { maxFileSize, maxDimension },
        },
        logger,
        images,
        records,
        verifier: keys.verifier,
        allowlist: new Allowlist({ file: allowlistFile.path, cacheTtlMs: 60_000, logger }),
    });

    return {
        app,
        store,
        records,
        keys,
        lines,
        uploaderToken: await keys.sign({ email: UPLOADER_EMAIL, sub: 'user-1' }),
        readerToken: await keys.sign({ email: READER_EMAIL, sub: 'user-2' }),
        cleanup: allowlistFile.cleanup,
    };
}
