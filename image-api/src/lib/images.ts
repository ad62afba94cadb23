import { AppError } from './errors';
import {
    FORMAT_CAPABILITIES,
    IMAGE_FORMATS,
    readDimensions,
    resizeImage,
    sniffFormat,
    type Dimensions,
    type ImageFormat,
} from './formats';
import { computeTargetDimensions, type RequestedSize } from './dimensions';
import type { Logger } from './logger';
import type { ImageRecord, ImageRecordRepository } from './records';
import type { ObjectHead, ObjectStore } from './storage';

export const DERIVED_PREFIX = '_derived';
export const IMAGE_CACHE_CONTROL = 'public, max-age=2592000, stale-while-revalidate=1209600';

export interface ImageServiceOptions {
    store: ObjectStore;
    records: ImageRecordRepository;
    logger: Logger;
    publicUrl: string;
    maxFileSize: number;
    maxDimension: number;
}

export interface UploadInput {
    project: string;
    key: string;
    /** Base64 payload, optionally as a `data:` URL. */
    image: string;
}

export interface UploadResult {
    url: string;
    width: number;
    height: number;
    size: number;
}

export interface FetchInput extends RequestedSize {
    project: string;
    key: string;
    format?: ImageFormat;
}

export type CacheStatus = 'original' | 'hit' | 'miss';

export interface FetchResult {
    body: Buffer;
    format: ImageFormat;
    width: number;
    height: number;
    size: number;
    cache: CacheStatus;
}

interface ResolvedOriginal {
    objectKey: string;
    format: ImageFormat;
    head: ObjectHead;
}

const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;
const DATA_URL_PREFIX = /^data:[^;,]*;base64,/i;

export function decodeBase64Image(input: string): Buffer {
    const compact = input.replace(DATA_URL_PREFIX, '').replace(/\s+/g, '');
    if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_BODY.test(compact)) {
        throw AppError.invalidPayload('Image is not valid base64');
    }
    return Buffer.from(compact, 'base64');
}

export const originalObjectKey = (project: string, key: string, format: ImageFormat): string =>
    `${project}/${key}.${FORMAT_CAPABILITIES[format].extension}`;

/** Short token tying a derivative to the exact bytes of its original. */
export function fingerprint(etag: string | undefined): string {
    const cleaned = (etag ?? '').replace(/[^A-Za-z0-9]/g, '').toLowerCase();
    return cleaned.length > 0 ? cleaned.slice(0, 32) : 'unversioned';
}

export const derivedObjectKey = (
    project: string,
    key: string,
    format: ImageFormat,
    etag: string | undefined,
    size: Dimensions
): string =>
    `${DERIVED_PREFIX}/${project}/${key}/${fingerprint(etag)}/${size.width}x${size.height}.${FORMAT_CAPABILITIES[format].extension}`;

function dimensionsFromMetadata(metadata: Record<string, string>): Dimensions | null {
    const width = Number(metadata.width);
    const height = Number(metadata.height);
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
        return null;
    }
    return { width, height };
}

export class ImageService {
    constructor(private readonly options: ImageServiceOptions) {}

    publicUrl(project: string, key: string, format: ImageFormat): string {
        return `${this.options.publicUrl}/image/${originalObjectKey(project, key, format)}`;
    }

    async upload(input: UploadInput): Promise<UploadResult> {
        const { store, records, logger, maxFileSize } = this.options;

        const bytes = decodeBase64Image(input.image);
        const format = sniffFormat(bytes);
        if (!format) {
            throw AppError.unsupportedFormat();
        }
        if (bytes.byteLength > maxFileSize) {
            throw AppError.payloadTooLarge(maxFileSize);
        }

        let dimensions: Dimensions;
        try {
            dimensions = await readDimensions(bytes);
        } catch (err) {
            logger.debug('upload_decode_failed', { project: input.project, key: input.key, error: String(err) });
            throw AppError.invalidPayload('Image could not be decoded');
        }

        const objectKey = originalObjectKey(input.project, input.key, format);
        await store.put(objectKey, bytes, {
            contentType: FORMAT_CAPABILITIES[format].mime,
            cacheControl: IMAGE_CACHE_CONTROL,
            metadata: {
                width: String(dimensions.width),
                height: String(dimensions.height),
            },
        });

        const record: ImageRecord = {
            project: input.project,
            key: input.key,
            format,
            width: dimensions.width,
            height: dimensions.height,
            size: bytes.byteLength,
            objectKey,
            updatedAt: new Date(),
        };
        await records.upsert(record);

        logger.info('image_uploaded', {
            object_key: objectKey,
            format,
            width: dimensions.width,
            height: dimensions.height,
            size: bytes.byteLength,
        });

        return {
            url: this.publicUrl(input.project, input.key, format),
            width: dimensions.width,
            height: dimensions.height,
            size: bytes.byteLength,
        };
    }

    async fetch(input: FetchInput): Promise<FetchResult> {
        const { store, logger, maxDimension } = this.options;
        const original = await this.resolveOriginal(input.project, input.key, input.format);
        const resizing = input.width !== undefined || input.height !== undefined;

        let source: Buffer | null = null;
        let naturalSize = dimensionsFromMetadata(original.head.metadata);
        if (!naturalSize || !resizing) {
            source = await this.readOriginal(original);
            naturalSize ??= await this.decodeDimensions(source, original.objectKey);
        }

        const target = computeTargetDimensions(naturalSize, input, maxDimension);
        if (!target || (target.width === naturalSize.width && target.height === naturalSize.height)) {
            source ??= await this.readOriginal(original);
            return {
                body: source,
                format: original.format,
                ...naturalSize,
                size: source.byteLength,
                cache: 'original',
            };
        }

        const derivedKey = derivedObjectKey(input.project, input.key, original.format, original.head.etag, target);
        const cached = await store.get(derivedKey);
        if (cached) {
            logger.debug('derivative_hit', { object_key: derivedKey });
            return {
                body: cached.body,
                format: original.format,
                ...target,
                size: cached.body.byteLength,
                cache: 'hit',
            };
        }

        source ??= await this.readOriginal(original);
        let resized: Buffer;
        try {
            resized = await resizeImage(source, original.format, target);
        } catch (err) {
            throw AppError.decodeFailure(original.objectKey, err);
        }

        await store.put(derivedKey, resized, {
            contentType: FORMAT_CAPABILITIES[original.format].mime,
            cacheControl: IMAGE_CACHE_CONTROL,
            metadata: {
                width: String(target.width),
                height: String(target.height),
                source: original.objectKey,
            },
        });
        logger.info('derivative_created', {
            object_key: derivedKey,
            source: original.objectKey,
            width: target.width,
            height: target.height,
            size: resized.byteLength,
        });

        return {
            body: resized,
            format: original.format,
            ...target,
            size: resized.byteLength,
            cache: 'miss',
        };
    }

    /**
     * An explicit format names exactly one object. Without one, the recorded
     * format of the latest upload wins; probing covers objects with no record.
     */
    private async resolveOriginal(project: string, key: string, format?: ImageFormat): Promise<ResolvedOriginal> {
        const { records, logger } = this.options;
        if (format) {
            return (await this.headOriginal(project, key, format)) ?? this.notFound();
        }

        const record = await records.get(project, key);
        if (record) {
            const recorded = await this.headOriginal(project, key, record.format);
            if (recorded) return recorded;
            logger.warn('recorded_original_missing', { object_key: record.objectKey });
        }

        for (const candidate of IMAGE_FORMATS) {
            if (candidate === record?.format) continue;
            const found = await this.headOriginal(project, key, candidate);
            if (found) return found;
        }
        return this.notFound();
    }

    private async headOriginal(project: string, key: string, format: ImageFormat): Promise<ResolvedOriginal | null> {
        const objectKey = originalObjectKey(project, key, format);
        const head = await this.options.store.head(objectKey);
        return head ? { objectKey, format, head } : null;
    }

    private notFound(): never {
        throw AppError.notFound();
    }

    private async readOriginal(original: ResolvedOriginal): Promise<Buffer> {
        const object = await this.options.store.get(original.objectKey);
        if (!object) {
            throw AppError.notFound();
        }
        return object.body;
    }

    private async decodeDimensions(bytes: Buffer, objectKey: string): Promise<Dimensions> {
        try {
            return await readDimensions(bytes);
        } catch (err) {
            throw AppError.decodeFailure(objectKey, err);
        }
    }
}
