import { AppError } from './errors';
import type { Dimensions } from './formats';

export interface RequestedSize {
    width?: number;
    height?: number;
}

const POSITIVE_INTEGER = /^[0-9]+$/;

/**
 * Parses a `width`/`height` query value. Absent or empty means "not requested".
 */
export function parseDimension(name: string, raw: string | undefined, maxDimension: number): number | undefined {
    if (raw === undefined || raw === '') return undefined;
    if (!POSITIVE_INTEGER.test(raw)) {
        throw AppError.invalidDimensions(`${name} must be a positive integer`);
    }
    const value = Number(raw);
    if (value < 1) {
        throw AppError.invalidDimensions(`${name} must be at least 1`);
    }
    if (value > maxDimension) {
        throw AppError.invalidDimensions(`${name} must be at most ${maxDimension}`);
    }
    return value;
}

/**
 * Scales `original` to the requested size keeping its aspect ratio.
 * When both sides are requested, width is authoritative and height is recomputed.
 * Returns null when nothing was requested.
 */
export function computeTargetDimensions(
    original: Dimensions,
    requested: RequestedSize,
    maxDimension: number
): Dimensions | null {
    let target: Dimensions;
    if (requested.width !== undefined) {
        target = {
            width: requested.width,
            height: Math.max(1, Math.round((original.height * requested.width) / original.width)),
        };
    } else if (requested.height !== undefined) {
        target = {
            width: Math.max(1, Math.round((original.width * requested.height) / original.height)),
            height: requested.height,
        };
    } else {
        return null;
    }

    if (target.width > maxDimension || target.height > maxDimension) {
        throw AppError.invalidDimensions(
            `Resizing to ${target.width}x${target.height} exceeds the ${maxDimension}px limit`
        );
    }
    return target;
}
