import { createApp } from './app';
import { TtlCache } from './cache/ttlCache';
import { loadConfig } from './config';
import { createLogger } from './logger';

const config = loadConfig();
const logger = createLogger({ level: config.logLevel, file: config.logFile, name: 'ttl-flight-cache' });

const cache = new TtlCache<string, unknown>({
    defaultTtlMs: config.defaultTtlMs,
    defaultTimeoutMs: config.defaultTimeoutMs,
    sweepIntervalMs: config.sweepIntervalMs,
    timeoutCooldownMs: config.timeoutCooldownMs,
    logger
});

const app = createApp({ cache, logger });
const server = app.listen(config.port, () => logger.info({ port: config.port }, 'cache admin listening'));

function shutdown() {
    logger.info('shutting down server');

    cache.dispose();
    server.close((err) => {
        if (err) {
            logger.error({ error: String(err) }, 'HTTP server close failed');
            process.exit(1);
        }
        logger.info('HTTP server closed');
        process.exit(0);
    });
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
