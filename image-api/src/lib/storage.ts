import {
    S3Client,
    S3ServiceException,
    GetObjectCommand,
    HeadObjectCommand,
    PutObjectCommand,
} from '@aws-sdk/client-s3';
import { AppError } from './errors';
import type { AppConfig } from './config';

export interface ObjectHead {
    size: number;
    contentType?: string;
    etag?: string;
    metadata: Record<string, string>;
}

export interface StoredObject extends ObjectHead {
    body: Buffer;
}

export interface PutOptions {
    contentType: string;
    metadata?: Record<string, string>;
    cacheControl?: string;
}

/**
 * Minimal object storage surface the image service needs.
 * `head` and `get` resolve to null for missing keys; every other failure
 * surfaces as a STORAGE_UNAVAILABLE AppError.
 */
export interface ObjectStore {
    head(key: string): Promise<ObjectHead | null>;
    get(key: string): Promise<StoredObject | null>;
    put(key: string, body: Buffer, options: PutOptions): Promise<{ etag?: string }>;
}

export const createS3Client = (config: AppConfig['s3']): S3Client => {
    return new S3Client({
        region: config.region,
        endpoint: config.endpoint,
        credentials: config.credentials,
        forcePathStyle: config.forcePathStyle,
    });
};

export function isMissingObject(err: unknown): boolean {
    if (!(err instanceof S3ServiceException)) return false;
    return err.name === 'NoSuchKey' || err.name === 'NotFound' || err.$metadata.httpStatusCode === 404;
}

export class S3ObjectStore implements ObjectStore {
    constructor(
        private readonly client: S3Client,
        private readonly bucket: string
    ) {}

    async head(key: string): Promise<ObjectHead | null> {
        try {
            const res = await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
            return {
                size: res.ContentLength ?? 0,
                contentType: res.ContentType,
                etag: res.ETag,
                metadata: res.Metadata ?? {},
            };
        } catch (err) {
            if (isMissingObject(err)) return null;
            throw AppError.storageUnavailable(err);
        }
    }

    async get(key: string): Promise<StoredObject | null> {
        try {
            const res = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
            if (!res.Body) {
                throw new Error(`Empty body for ${key}`);
            }
            const bytes = await res.Body.transformToByteArray();
            return {
                body: Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength),
                size: res.ContentLength ?? bytes.byteLength,
                contentType: res.ContentType,
                etag: res.ETag,
                metadata: res.Metadata ?? {},
            };
        } catch (err) {
            if (isMissingObject(err)) return null;
            throw AppError.storageUnavailable(err);
        }
    }

    async put(key: string, body: Buffer, options: PutOptions): Promise<{ etag?: string }> {
        try {
            const res = await this.client.send(new PutObjectCommand({
                Bucket: this.bucket,
                Key: key,
                Body: body,
                ContentType: options.contentType,
                CacheControl: options.cacheControl,
                Metadata: options.metadata,
            }));
            return { etag: res.ETag };
        } catch (err) {
            throw AppError.storageUnavailable(err);
        }
    }
}
