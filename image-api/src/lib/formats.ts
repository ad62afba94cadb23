import sharp, { type Sharp } from 'sharp';

export const IMAGE_FORMATS = ['png', 'jpeg', 'webp', 'avif'] as const;
export type ImageFormat = typeof IMAGE_FORMATS[number];

export interface FormatCapability {
    mime: string;
    extension: string;
    aliases: readonly string[];
    /** True when the leading bytes carry this format's signature. */
    sniff(bytes: Uint8Array): boolean;
    encode(pipeline: Sharp): Sharp;
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const AVIF_BRANDS = new Set(['avif', 'avis']);

function startsWith(bytes: Uint8Array, signature: readonly number[], offset = 0): boolean {
    if (bytes.length < offset + signature.length) return false;
    return signature.every((byte, i) => bytes[offset + i] === byte);
}

function ascii(bytes: Uint8Array, start: number, end: number): string {
    return String.fromCharCode(...bytes.subarray(start, end));
}

// ISO-BMFF: [size:u32][ftyp][major brand][minor version][compatible brands...]
function isAvif(bytes: Uint8Array): boolean {
    if (bytes.length < 16 || ascii(bytes, 4, 8) !== 'ftyp') return false;
    const boxSize = ((bytes[0] << 24) | (bytes[1] << 16) | (bytes[2] << 8) | bytes[3]) >>> 0;
    if (AVIF_BRANDS.has(ascii(bytes, 8, 12))) return true;
    const end = Math.min(boxSize, bytes.length);
    for (let offset = 16; offset + 4 <= end; offset += 4) {
        if (AVIF_BRANDS.has(ascii(bytes, offset, offset + 4))) return true;
    }
    return false;
}

export const FORMAT_CAPABILITIES = {
    png: {
        mime: 'image/png',
        extension: 'png',
        aliases: [],
        sniff: (bytes) => startsWith(bytes, PNG_SIGNATURE),
        encode: (pipeline) => pipeline.png({ compressionLevel: 9 }),
    },
    jpeg: {
        mime: 'image/jpeg',
        extension: 'jpeg',
        aliases: ['jpg'],
        sniff: (bytes) => startsWith(bytes, [0xff, 0xd8, 0xff]),
        encode: (pipeline) => pipeline.jpeg({ quality: 90 }),
    },
    webp: {
        mime: 'image/webp',
        extension: 'webp',
        aliases: [],
        sniff: (bytes) => bytes.length >= 12 && ascii(bytes, 0, 4) === 'RIFF' && ascii(bytes, 8, 12) === 'WEBP',
        encode: (pipeline) => pipeline.webp({ quality: 90 }),
    },
    avif: {
        mime: 'image/avif',
        extension: 'avif',
        aliases: [],
        sniff: isAvif,
        encode: (pipeline) => pipeline.avif({ quality: 60 }),
    },
} satisfies Record<ImageFormat, FormatCapability>;

export function sniffFormat(bytes: Uint8Array): ImageFormat | null {
    return IMAGE_FORMATS.find((format) => FORMAT_CAPABILITIES[format].sniff(bytes)) ?? null;
}

export function formatFromExtension(extension: string): ImageFormat | null {
    const ext = extension.toLowerCase();
    return IMAGE_FORMATS.find((format) => {
        const capability: FormatCapability = FORMAT_CAPABILITIES[format];
        return capability.extension === ext || capability.aliases.includes(ext);
    }) ?? null;
}

/** True when `name` ends in `.<ext>` for a known format, e.g. `a.png` or `b.JPG`. */
export function hasImageExtension(name: string): boolean {
    const dot = name.lastIndexOf('.');
    return dot > 0 && formatFromExtension(name.slice(dot + 1)) !== null;
}

export interface Dimensions {
    width: number;
    height: number;
}

/** Reads the pixel dimensions from the image header. */
export async function readDimensions(bytes: Buffer): Promise<Dimensions> {
    const { width, height } = await sharp(bytes).metadata();
    if (!width || !height) {
        throw new Error('Image header carries no dimensions');
    }
    return { width, height };
}

export async function resizeImage(bytes: Buffer, format: ImageFormat, target: Dimensions): Promise<Buffer> {
    const pipeline = sharp(bytes).resize(target.width, target.height, {
        fit: 'fill',
        kernel: 'lanczos3',
    });
    return FORMAT_CAPABILITIES[format].encode(pipeline).toBuffer();
}
