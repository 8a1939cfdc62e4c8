import express, { NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import { Logger } from 'pino';
import { TtlCache } from './cache/ttlCache';
import { ConfigurationError } from './errors';
import { logger as defaultLogger } from './logger';

export type AppDeps = {
    cache: TtlCache<string, unknown>;
    logger?: Logger;
};

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(v => typeof v === 'string');
}

export function createApp({ cache, logger = defaultLogger }: AppDeps) {
    const app = express();
    app.use(bodyParser.json());

    app.get('/health', (req, res) => {
        return res.json({ status: 'ok' });
    });

    app.get('/metrics', (req, res) => {
        return res.json(cache.getStats());
    });

    app.get('/cache/entries', (req, res) => {
        // JSON has no Infinity: a null ttlMs means the entry never expires
        const entries = cache.entries().map(entry => ({
            ...entry,
            ttlMs: Number.isFinite(entry.ttlMs) ? entry.ttlMs : null
        }));
        return res.json({ entries });
    });

    app.delete('/cache/:key', (req, res) => {
        const invalidated = cache.invalidate(req.params.key);
        return res.json({ key: req.params.key, invalidated });
    });

    app.post('/admin/cache/invalidate', (req, res) => {
        const keys: unknown = req.body?.keys;
        if (!isStringArray(keys) || keys.length === 0) {
            return res.status(400).json({ error: 'keys must be a non-empty array of strings' });
        }

        const invalidated = keys.filter(key => cache.invalidate(key));
        logger.info({ requested: keys.length, invalidated: invalidated.length }, 'cacheKeysInvalidated');
        return res.json({ invalidated });
    });

    app.post('/admin/cache/clear', (req, res) => {
        const cleared = cache.size;
        cache.clear();
        logger.info({ cleared }, 'cacheClearedByAdmin');
        return res.json({ success: true, cleared });
    });

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof ConfigurationError) {
            return res.status(400).json({ error: err.message });
        }
        if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
            return res.status(400).json({ error: 'request body must be valid JSON' });
        }
        logger.error({ error: String(err), path: req.path }, 'requestFailed');
        return res.status(500).json({ error: String(err) });
    });

    return app;
}
