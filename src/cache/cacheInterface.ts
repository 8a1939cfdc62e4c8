import { Computation } from '../timeout/timeoutExecutor';
import { CacheMetricsSnapshot } from '../metrics';

export type ComputeOptions = {
    ttlMs?: number;
    timeoutMs?: number;
    /** Start a new round even if a fresh entry exists. An in-flight round is still joined. */
    forceRefresh?: boolean;
};

export interface Cache<K, V> {
    getOrCompute(key: K, compute: Computation<V>, opts?: ComputeOptions): Promise<V>;
    invalidate(key: K): boolean;
    clear(): void;
}

export interface CacheEntry<K, V> {
    key: K;
    value: V;
    createdAt: number;
    ttlMs: number;
    generation: number;
}

export interface PendingComputation<K, V> {
    key: K;
    generation: number;
    startedAt: number;
    promise: Promise<V>;
}

export type Slot<K, V> =
    | { state: 'valid'; entry: CacheEntry<K, V> }
    | { state: 'pending'; pending: PendingComputation<K, V> };

export interface CacheEntrySnapshot<K, V> {
    key: K;
    value: V;
    createdAt: number;
    ttlMs: number; // Remaining TTL in milliseconds
}

export type CacheStats = CacheMetricsSnapshot & {
    size: number;
    pending: number;
};
