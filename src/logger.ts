import pino, { Logger, LevelWithSilent } from 'pino';

export type LoggerOptions = {
    level?: LevelWithSilent;
    file?: string;
    name?: string;
};

export const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function isLogLevel(value: string): value is LevelWithSilent {
    return LOG_LEVELS.some(level => level === value);
}

/**
 * With a `file`, every record at `level` goes to the file and only warnings
 * and errors reach the console. Without one, a single stdout stream is used.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
    const level = opts.level ?? 'info';

    if (!opts.file || level === 'silent') {
        return pino({ name: opts.name, level });
    }

    const streams = pino.multistream([
        { level, stream: pino.destination({ dest: opts.file, mkdir: true, sync: true }) },
        { level: 'warn', stream: process.stderr }
    ]);
    return pino({ name: opts.name, level }, streams);
}

function levelFromEnv(): LevelWithSilent {
    const raw = process.env.LOG_LEVEL;
    return raw && isLogLevel(raw) ? raw : 'info';
}

/** Stdout only. File output is set up by the server from its loaded config. */
export const logger = createLogger({ level: levelFromEnv() });
