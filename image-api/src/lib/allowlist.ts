import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { AppError } from './errors';
import type { Logger } from './logger';

const allowlistSchema = z.array(z.string());

export const normalizeIdentity = (identity: string): string => identity.trim().toLowerCase();

export interface AllowlistOptions {
    file: string;
    cacheTtlMs: number;
    logger: Logger;
    now?: () => number;
}

/**
 * Uploader allowlist backed by a JSON file holding an array of identities.
 * The parsed set is kept until it is older than `cacheTtlMs`; a TTL of 0
 * re-reads the file on every check.
 */
export class Allowlist {
    private entries: Set<string> | null = null;
    private loadedAt = 0;
    private readonly now: () => number;

    constructor(private readonly options: AllowlistOptions) {
        this.now = options.now ?? Date.now;
    }

    async has(identity: string): Promise<boolean> {
        const entries = await this.current();
        return entries.has(normalizeIdentity(identity));
    }

    async refresh(): Promise<Set<string>> {
        let raw: string;
        try {
            raw = await readFile(this.options.file, 'utf8');
        } catch (err) {
            this.options.logger.error('allowlist_read_failed', { file: this.options.file, error: String(err) });
            throw AppError.internal('Allowlist unavailable', err);
        }

        let parsed: string[];
        try {
            parsed = allowlistSchema.parse(JSON.parse(raw));
        } catch (err) {
            this.options.logger.error('allowlist_invalid', { file: this.options.file, error: String(err) });
            throw AppError.internal('Allowlist unavailable', err);
        }

        this.entries = new Set(parsed.map(normalizeIdentity).filter(Boolean));
        this.loadedAt = this.now();
        this.options.logger.debug('allowlist_loaded', { file: this.options.file, entries: this.entries.size });
        return this.entries;
    }

    private async current(): Promise<Set<string>> {
        if (this.entries && this.now() - this.loadedAt < this.options.cacheTtlMs) {
            return this.entries;
        }
        return this.refresh();
    }
}
