import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { z, type ZodError } from 'zod';
import { zValidator } from '@hono/zod-validator';
import { requireUploader } from '../middleware/allowlist';
import type { Allowlist } from '../lib/allowlist';
import { parseDimension } from '../lib/dimensions';
import { AppError } from '../lib/errors';
import { FORMAT_CAPABILITIES, formatFromExtension, hasImageExtension, type ImageFormat } from '../lib/formats';
import { IMAGE_CACHE_CONTROL, type ImageService } from '../lib/images';
import type { ImageRecordRepository } from '../lib/records';
import type { HonoEnv } from '../types';

export const PROJECT_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/;
export const KEY_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

// Room for the JSON envelope and a data: URL prefix around the base64 text.
const ENVELOPE_ALLOWANCE_BYTES = 64 * 1024;

export interface ImageRoutesOptions {
    images: ImageService;
    records: ImageRecordRepository;
    allowlist: Allowlist;
    maxFileSize: number;
    maxDimension: number;
}

const uploadSchema = z.object({
    image: z.string().min(1, 'image is required'),
    project: z.string().regex(PROJECT_PATTERN, 'project must be 1-64 letters, digits, "_" or "-"'),
    key: z
        .string()
        .regex(KEY_PATTERN, 'key must be 1-128 letters, digits, ".", "_" or "-"')
        // `k.png` would be stored as `k.png.png` and read back as key `k`.
        .refine((key) => !hasImageExtension(key), 'key must not end with an image extension'),
});

const listSchema = z.object({
    project: z.string().regex(PROJECT_PATTERN).optional(),
    limit: z.coerce.number().int().min(1).max(200).default(50),
    cursor: z.string().min(1).optional(),
});

function describeIssues(error: ZodError): string {
    const first = error.errors[0];
    return first ? `Validation error: ${first.path.join('.') || 'body'} - ${first.message}` : 'Validation error';
}

/** Splits `key.ext` into key and format; a name without a known extension is all key. */
export function parseImageFilename(filename: string): { key: string; format?: ImageFormat } {
    const dot = filename.lastIndexOf('.');
    if (dot > 0) {
        const format = formatFromExtension(filename.slice(dot + 1));
        if (format) {
            return { key: filename.slice(0, dot), format };
        }
    }
    return { key: filename };
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
    const out = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(out).set(bytes);
    return out;
}

export function imageRoutes(options: ImageRoutesOptions): Hono<HonoEnv> {
    const app = new Hono<HonoEnv>();
    const { images, records } = options;

    /**
     * POST /image
     * Stores a base64 image at {project}/{key}.{ext}, replacing any object at that path.
     */
    app.post(
        '/image',
        requireUploader(options.allowlist),
        bodyLimit({
            maxSize: Math.ceil((options.maxFileSize * 4) / 3) + ENVELOPE_ALLOWANCE_BYTES,
            onError: () => {
                throw AppError.payloadTooLarge(options.maxFileSize);
            },
        }),
        zValidator('json', uploadSchema, (result) => {
            if (!result.success) {
                throw AppError.invalidPayload(describeIssues(result.error));
            }
        }),
        async (c) => {
            const body = c.req.valid('json');
            const result = await images.upload(body);
            return c.json(result);
        }
    );

    /**
     * GET /image/:project/:filename?width=&height=
     * Serves the original, or an aspect-preserving resize cached beside it.
     */
    app.get('/image/:project/:filename', async (c) => {
        const project = c.req.param('project');
        const { key, format } = parseImageFilename(c.req.param('filename'));
        if (!PROJECT_PATTERN.test(project) || !KEY_PATTERN.test(key)) {
            throw AppError.notFound();
        }

        const width = parseDimension('width', c.req.query('width'), options.maxDimension);
        const height = parseDimension('height', c.req.query('height'), options.maxDimension);

        const result = await images.fetch({ project, key, format, width, height });

        c.header('Content-Type', FORMAT_CAPABILITIES[result.format].mime);
        c.header('Cache-Control', IMAGE_CACHE_CONTROL);
        c.header('X-Image-Width', String(result.width));
        c.header('X-Image-Height', String(result.height));
        c.header('X-Cache', result.cache);
        return c.body(toArrayBuffer(result.body));
    });

    /**
     * GET /images?project=&limit=&cursor=
     * Lists recorded uploads ordered by project and key.
     */
    app.get(
        '/images',
        zValidator('query', listSchema, (result) => {
            if (!result.success) {
                throw AppError.invalidPayload(describeIssues(result.error));
            }
        }),
        async (c) => {
            const query = c.req.valid('query');
            const page = await records.list(query);
            return c.json({
                images: page.records.map((record) => ({
                    project: record.project,
                    key: record.key,
                    format: record.format,
                    width: record.width,
                    height: record.height,
                    size: record.size,
                    url: images.publicUrl(record.project, record.key, record.format),
                })),
                nextCursor: page.nextCursor,
            });
        }
    );

    return app;
}
