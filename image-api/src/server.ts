import { serve, type ServerType } from '@hono/node-server';
import { createApp } from './index';
import { createAccessVerifier } from './lib/access';
import { Allowlist } from './lib/allowlist';
import { ConfigError, loadConfig } from './lib/config';
import { ImageService } from './lib/images';
import { createLogger, describeError } from './lib/logger';
import { ensureSchema, getSql, PgImageRecordRepository } from './lib/records';
import { createS3Client, S3ObjectStore } from './lib/storage';

async function main(): Promise<void> {
    const config = loadConfig();
    const log = createLogger(config.logLevel, { service: 'image-api' });

    const sql = getSql(config.databaseUrl);
    await ensureSchema(sql);
    log.info('database_ready');

    const records = new PgImageRecordRepository(sql);
    const store = new S3ObjectStore(createS3Client(config.s3), config.s3.bucket);
    const images = new ImageService({
        store,
        records,
        logger: log,
        publicUrl: config.publicUrl,
        maxFileSize: config.images.maxFileSize,
        maxDimension: config.images.maxDimension,
    });

    const app = createApp({
        config,
        logger: log,
        images,
        records,
        verifier: createAccessVerifier(config.access),
        allowlist: new Allowlist({
            file: config.allowlist.file,
            cacheTtlMs: config.allowlist.cacheTtlMs,
            logger: log,
        }),
    });

    const server: ServerType = serve({
        fetch: app.fetch,
        port: config.port,
        hostname: config.hostname,
    }, (info) => {
        log.info('server_listening', { address: info.address, port: info.port, bucket: config.s3.bucket });
    });

    const shutdown = (signal: NodeJS.Signals) => {
        log.info('server_stopping', { signal });
        server.close((err) => {
            if (err) {
                log.error('server_close_failed', describeError(err));
                process.exit(1);
            }
            process.exit(0);
        });
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
    if (err instanceof ConfigError) {
        console.error(JSON.stringify({ level: 'error', event: 'config_invalid', issues: err.issues }));
    } else {
        console.error(JSON.stringify({ level: 'error', event: 'startup_failed', ...describeError(err) }));
    }
    process.exit(1);
});
