import type { ContentfulStatusCode } from 'hono/utils/http-status';

export type ErrorCode =
    | 'UNAUTHORIZED'
    | 'FORBIDDEN'
    | 'INVALID_PAYLOAD'
    | 'UNSUPPORTED_FORMAT'
    | 'PAYLOAD_TOO_LARGE'
    | 'NOT_FOUND'
    | 'INVALID_DIMENSIONS'
    | 'DECODE_FAILURE'
    | 'STORAGE_UNAVAILABLE'
    | 'IDENTITY_UNAVAILABLE'
    | 'INTERNAL_ERROR';

export interface ErrorResponse {
    error: string;
    code: ErrorCode;
    request_id: string;
}

export class AppError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly statusCode: ContentfulStatusCode,
        public readonly isOperational: boolean = true,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'AppError';
    }

    static unauthorized(message: string = 'Unauthorized'): AppError {
        return new AppError('UNAUTHORIZED', message, 401);
    }

    static forbidden(message: string = 'Forbidden'): AppError {
        return new AppError('FORBIDDEN', message, 403);
    }

    static invalidPayload(message: string = 'Invalid payload'): AppError {
        return new AppError('INVALID_PAYLOAD', message, 400);
    }

    static unsupportedFormat(message: string = 'Unsupported image format'): AppError {
        return new AppError('UNSUPPORTED_FORMAT', message, 415);
    }

    static payloadTooLarge(maxBytes?: number): AppError {
        const message = maxBytes === undefined
            ? 'Payload too large'
            : `Image exceeds the ${maxBytes} byte limit`;
        return new AppError('PAYLOAD_TOO_LARGE', message, 413);
    }

    static notFound(message: string = 'Image not found'): AppError {
        return new AppError('NOT_FOUND', message, 404);
    }

    static invalidDimensions(message: string): AppError {
        return new AppError('INVALID_DIMENSIONS', message, 400);
    }

    static decodeFailure(objectKey: string, cause?: unknown): AppError {
        return new AppError('DECODE_FAILURE', `Stored image ${objectKey} could not be decoded`, 500, false, { cause });
    }

    static storageUnavailable(cause?: unknown): AppError {
        return new AppError('STORAGE_UNAVAILABLE', 'Object storage unavailable', 503, false, { cause });
    }

    static identityUnavailable(cause?: unknown): AppError {
        return new AppError('IDENTITY_UNAVAILABLE', 'Identity provider unavailable', 503, false, { cause });
    }

    static internal(message: string = 'Internal server error', cause?: unknown): AppError {
        return new AppError('INTERNAL_ERROR', message, 500, false, { cause });
    }
}
