import { neon, type NeonQueryFunction } from '@neondatabase/serverless';
import { z } from 'zod';
import { AppError } from './errors';
import { IMAGE_FORMATS, type ImageFormat } from './formats';

export interface ImageRecord {
    project: string;
    key: string;
    format: ImageFormat;
    width: number;
    height: number;
    size: number;
    objectKey: string;
    updatedAt: Date;
}

export interface ListQuery {
    project?: string;
    limit: number;
    cursor?: string;
}

export interface ListPage {
    records: ImageRecord[];
    nextCursor: string | null;
}

export interface ImageRecordRepository {
    upsert(record: ImageRecord): Promise<void>;
    get(project: string, key: string): Promise<ImageRecord | null>;
    list(query: ListQuery): Promise<ListPage>;
}

export interface CursorPosition {
    project: string;
    key: string;
}

const cursorSchema = z.tuple([z.string(), z.string()]);

export function encodeCursor(position: CursorPosition): string {
    return Buffer.from(JSON.stringify([position.project, position.key])).toString('base64url');
}

export function decodeCursor(cursor: string): CursorPosition {
    try {
        const [project, key] = cursorSchema.parse(JSON.parse(Buffer.from(cursor, 'base64url').toString('utf8')));
        return { project, key };
    } catch {
        throw AppError.invalidPayload('Invalid cursor');
    }
}

const rowSchema = z.object({
    project: z.string(),
    key: z.string(),
    format: z.enum(IMAGE_FORMATS),
    width: z.coerce.number(),
    height: z.coerce.number(),
    size: z.coerce.number(),
    object_key: z.string(),
    updated_at: z.coerce.date(),
});

function toRecord(row: unknown): ImageRecord {
    const r = rowSchema.parse(row);
    return {
        project: r.project,
        key: r.key,
        format: r.format,
        width: r.width,
        height: r.height,
        size: r.size,
        objectKey: r.object_key,
        updatedAt: r.updated_at,
    };
}

export const getSql = (databaseUrl: string): NeonQueryFunction<false, false> => neon(databaseUrl);

export async function ensureSchema(sql: NeonQueryFunction<false, false>): Promise<void> {
    await sql`
        CREATE TABLE IF NOT EXISTS images (
            project TEXT NOT NULL,
            key TEXT NOT NULL,
            format TEXT NOT NULL,
            width INTEGER NOT NULL,
            height INTEGER NOT NULL,
            size INTEGER NOT NULL,
            object_key TEXT NOT NULL,
            updated_at TIMESTAMPTZ NOT NULL DEFAULT now(),
            PRIMARY KEY (project, key)
        )
    `;
}

export class PgImageRecordRepository implements ImageRecordRepository {
    constructor(private readonly sql: NeonQueryFunction<false, false>) {}

    async upsert(record: ImageRecord): Promise<void> {
        await this.sql`
            INSERT INTO images (project, key, format, width, height, size, object_key, updated_at)
            VALUES (
                ${record.project}, ${record.key}, ${record.format}, ${record.width},
                ${record.height}, ${record.size}, ${record.objectKey}, ${record.updatedAt.toISOString()}
            )
            ON CONFLICT (project, key) DO UPDATE SET
                format = EXCLUDED.format,
                width = EXCLUDED.width,
                height = EXCLUDED.height,
                size = EXCLUDED.size,
                object_key = EXCLUDED.object_key,
                updated_at = EXCLUDED.updated_at
        `;
    }

    async get(project: string, key: string): Promise<ImageRecord | null> {
        const rows = await this.sql`
            SELECT project, key, format, width, height, size, object_key, updated_at
            FROM images
            WHERE project = ${project} AND key = ${key}
            LIMIT 1
        `;
        const [row] = rows;
        return row ? toRecord(row) : null;
    }

    async list(query: ListQuery): Promise<ListPage> {
        const after = query.cursor ? decodeCursor(query.cursor) : null;
        const project = query.project ?? null;

        const rows = await this.sql`
            SELECT project, key, format, width, height, size, object_key, updated_at
            FROM images
            WHERE (${project}::text IS NULL OR project = ${project}::text)
              AND (${after?.project ?? null}::text IS NULL OR (project, key) > (${after?.project ?? null}::text, ${after?.key ?? null}::text))
            ORDER BY project, key
            LIMIT ${query.limit + 1}
        `;

        const records = rows.map(toRecord);
        const hasMore = records.length > query.limit;
        const page = hasMore ? records.slice(0, query.limit) : records;
        const last = page[page.length - 1];

        return {
            records: page,
            nextCursor: hasMore && last ? encodeCursor(last) : null,
        };
    }
}
