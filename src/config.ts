import { LevelWithSilent } from 'pino';
import { ConfigurationError } from './errors';
import { isLogLevel } from './logger';

export type AppConfig = {
    defaultTtlMs: number;
    defaultTimeoutMs: number;
    sweepIntervalMs: number;
    timeoutCooldownMs: number;
    port: number;
    logLevel: LevelWithSilent;
    logFile?: string;
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${raw}"`);
    }
    return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
    const logLevel = env.LOG_LEVEL?.trim() || 'info';
    if (!isLogLevel(logLevel)) {
        throw new ConfigurationError(`LOG_LEVEL must be a pino level, got "${logLevel}"`);
    }

    return {
        defaultTtlMs: readInt(env, 'CACHE_DEFAULT_TTL_MS', 1000 * 60 * 5, 1),
        defaultTimeoutMs: readInt(env, 'CACHE_DEFAULT_TIMEOUT_MS', 5000, 1),
        sweepIntervalMs: readInt(env, 'CACHE_SWEEP_INTERVAL_MS', 0, 0),
        timeoutCooldownMs: readInt(env, 'CACHE_TIMEOUT_COOLDOWN_MS', 0, 0),
        port: readInt(env, 'PORT', 3000, 0),
        logLevel,
        logFile: env.LOG_FILE?.trim() || undefined
    };
}
