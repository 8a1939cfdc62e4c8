export class CacheError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ConfigurationError extends CacheError {}

export type TimeoutReason = 'elapsed' | 'cooldown';

export class TimeoutError extends CacheError {
    constructor(
        readonly label: string,
        readonly timeoutMs: number,
        readonly reason: TimeoutReason = 'elapsed'
    ) {
        super(reason === 'elapsed'
            ? `${label} timed out after ${timeoutMs}ms`
            : `${label} is cooling down after a timeout`);
    }
}

export class ComputationError extends CacheError {
    constructor(readonly label: string, cause: unknown) {
        super(`${label} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    }
}

/**
 * Throws a ConfigurationError unless `value` is a positive, finite number.
 * `allowInfinite` admits `Infinity` for durations that mean "never".
 */
export function assertPositiveDuration(
    name: string,
    value: number,
    opts: { allowInfinite?: boolean } = {}
): void {
    if (typeof value !== 'number' || Number.isNaN(value) || value <= 0) {
        throw new ConfigurationError(`${name} must be a positive number of milliseconds, got ${String(value)}`);
    }
    if (!Number.isFinite(value) && !opts.allowInfinite) {
        throw new ConfigurationError(`${name} must be finite, got ${String(value)}`);
    }
}
