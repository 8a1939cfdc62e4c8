import { Logger } from 'pino';
import { assertPositiveDuration, ConfigurationError, TimeoutError } from '../errors';
import { logger as defaultLogger } from '../logger';
import { CacheMetrics } from '../metrics';
import { Computation, TimeoutExecutor } from '../timeout/timeoutExecutor';
import {
    Cache,
    CacheEntry,
    CacheEntrySnapshot,
    CacheStats,
    ComputeOptions,
    PendingComputation,
    Slot
} from './cacheInterface';

export type TtlCacheOptions = {
    defaultTtlMs: number;
    defaultTimeoutMs: number;
    logger?: Logger;
    /** Run prune() on this interval. 0 or unset keeps expiry purely lazy. */
    sweepIntervalMs?: number;
    timeoutCooldownMs?: number;
    now?: () => number;
};

function isFresh<K, V>(entry: CacheEntry<K, V>, now: number): boolean {
    return now - entry.createdAt < entry.ttlMs;
}

/**
 * Memoizes computed values per key with time-based expiry.
 *
 * Concurrent callers asking for the same missing key share one computation
 * round. Every round carries a generation; its result is installed only if
 * the key's slot still holds that round's pending marker, so invalidate(),
 * clear() and set() all keep an in-flight round from resurrecting a value.
 *
 * Table updates happen synchronously between awaits, which is the only
 * mutual exclusion the single-threaded event loop needs. Nothing is held
 * across a computation.
 */
export class TtlCache<K, V> implements Cache<K, V> {
    private table = new Map<K, Slot<K, V>>();
    private generation = 0;
    private sweepTimer: NodeJS.Timeout | null = null;
    private readonly metrics = new CacheMetrics();
    private readonly executor: TimeoutExecutor;
    private readonly defaultTtlMs: number;
    private readonly defaultTimeoutMs: number;
    private readonly logger: Logger;
    private readonly now: () => number;

    constructor(opts: TtlCacheOptions) {
        assertPositiveDuration('defaultTtlMs', opts.defaultTtlMs, { allowInfinite: true });
        assertPositiveDuration('defaultTimeoutMs', opts.defaultTimeoutMs);

        this.defaultTtlMs = opts.defaultTtlMs;
        this.defaultTimeoutMs = opts.defaultTimeoutMs;
        this.logger = opts.logger ?? defaultLogger;
        this.now = opts.now ?? Date.now;
        this.executor = new TimeoutExecutor({
            cooldownMs: opts.timeoutCooldownMs,
            logger: this.logger,
            now: this.now
        });

        const sweepIntervalMs = opts.sweepIntervalMs ?? 0;
        if (!Number.isFinite(sweepIntervalMs) || sweepIntervalMs < 0) {
            throw new ConfigurationError(`sweepIntervalMs must be >= 0, got ${String(sweepIntervalMs)}`);
        }
        if (sweepIntervalMs > 0) {
            this.sweepTimer = setInterval(() => this.prune(), sweepIntervalMs);
            this.sweepTimer.unref();
        }
    }

    async getOrCompute(key: K, compute: Computation<V>, opts: ComputeOptions = {}): Promise<V> {
        const ttlMs = opts.ttlMs ?? this.defaultTtlMs;
        const timeoutMs = opts.timeoutMs ?? this.defaultTimeoutMs;
        assertPositiveDuration('ttlMs', ttlMs, { allowInfinite: true });
        assertPositiveDuration('timeoutMs', timeoutMs);

        const slot = this.table.get(key);

        if (slot?.state === 'pending') {
            this.metrics.recordCoalesced();
            return slot.pending.promise;
        }

        if (slot?.state === 'valid') {
            if (!opts.forceRefresh && isFresh(slot.entry, this.now())) {
                this.metrics.recordHit();
                return slot.entry.value;
            }
            if (!opts.forceRefresh) {
                this.metrics.recordEvictions(1);
            }
            this.table.delete(key);
        }

        this.metrics.recordMiss();
        return this.startRound(key, compute, ttlMs, timeoutMs).promise;
    }

    invalidate(key: K): boolean {
        const removed = this.table.delete(key);
        if (removed) {
            this.logger.debug({ key: String(key) }, 'cacheKeyInvalidated');
        }
        return removed;
    }

    /**
     * Drops every entry and pending marker. In-flight rounds still settle for
     * their own waiters, but their results are not installed.
     */
    clear(): void {
        const size = this.table.size;
        this.table.clear();
        this.logger.debug({ size }, 'cacheCleared');
    }

    peek(key: K): V | undefined {
        return this.freshEntry(key)?.value;
    }

    /** True for a fresh entry, including one whose value is `undefined`. */
    has(key: K): boolean {
        return this.freshEntry(key) !== undefined;
    }

    set(key: K, value: V, ttlMs: number = this.defaultTtlMs): void {
        assertPositiveDuration('ttlMs', ttlMs, { allowInfinite: true });
        this.table.set(key, {
            state: 'valid',
            entry: { key, value, createdAt: this.now(), ttlMs, generation: ++this.generation }
        });
    }

    /** Fresh entries with their remaining TTL. */
    entries(): CacheEntrySnapshot<K, V>[] {
        const now = this.now();
        const entries: CacheEntrySnapshot<K, V>[] = [];

        for (const slot of this.table.values()) {
            if (slot.state !== 'valid' || !isFresh(slot.entry, now)) continue;
            const { key, value, createdAt, ttlMs } = slot.entry;
            entries.push({ key, value, createdAt, ttlMs: ttlMs - (now - createdAt) });
        }

        return entries;
    }

    /** Also drops timeout cool-down records that have run out. */
    prune(): number {
        this.executor.pruneCooldowns();

        const now = this.now();
        let removed = 0;
        for (const [key, slot] of this.table.entries()) {
            if (slot.state === 'valid' && !isFresh(slot.entry, now)) {
                this.table.delete(key);
                removed++;
            }
        }
        if (removed > 0) {
            this.metrics.recordEvictions(removed);
            this.logger.debug({ removed }, 'staleEntriesPruned');
        }
        return removed;
    }

    get size(): number {
        return this.entries().length;
    }

    get pendingCount(): number {
        let count = 0;
        for (const slot of this.table.values()) {
            if (slot.state === 'pending') count++;
        }
        return count;
    }

    getStats(): CacheStats {
        return {
            ...this.metrics.getMetrics(),
            size: this.size,
            pending: this.pendingCount
        };
    }

    dispose(): void {
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = null;
        }
    }

    private freshEntry(key: K): CacheEntry<K, V> | undefined {
        const slot = this.table.get(key);
        if (slot?.state !== 'valid') return undefined;
        if (!isFresh(slot.entry, this.now())) {
            this.table.delete(key);
            this.metrics.recordEvictions(1);
            return undefined;
        }
        return slot.entry;
    }

    private startRound(key: K, compute: Computation<V>, ttlMs: number, timeoutMs: number): PendingComputation<K, V> {
        const generation = ++this.generation;
        const startedAt = this.now();
        const label = String(key);

        this.metrics.recordComputationStarted();
        this.logger.debug({ key: label, generation, timeoutMs }, 'computationStarted');

        const promise = this.executor.run(compute, timeoutMs, label, key).then(
            (value) => {
                this.install(key, generation, value, ttlMs, startedAt);
                return value;
            },
            (err: unknown) => {
                this.abandon(key, generation, err);
                throw err;
            }
        );

        const pending: PendingComputation<K, V> = { key, generation, startedAt, promise };
        this.table.set(key, { state: 'pending', pending });
        return pending;
    }

    private isCurrentRound(key: K, generation: number): boolean {
        const slot = this.table.get(key);
        return slot?.state === 'pending' && slot.pending.generation === generation;
    }

    private install(key: K, generation: number, value: V, ttlMs: number, startedAt: number): void {
        const now = this.now();
        this.metrics.recordCompleted(now - startedAt);

        if (!this.isCurrentRound(key, generation)) {
            this.metrics.recordDiscarded();
            this.logger.debug({ key: String(key), generation }, 'staleRoundDiscarded');
            return;
        }

        this.table.set(key, {
            state: 'valid',
            entry: { key, value, createdAt: now, ttlMs, generation }
        });
    }

    private abandon(key: K, generation: number, err: unknown): void {
        if (err instanceof TimeoutError) {
            this.metrics.recordTimeout();
        } else {
            this.metrics.recordFailure();
        }

        if (this.isCurrentRound(key, generation)) {
            this.table.delete(key);
        }
        this.logger.warn({ key: String(key), generation, error: String(err) }, 'computationRoundFailed');
    }
}
