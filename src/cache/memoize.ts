import { TtlCache } from './ttlCache';

export type MemoizeOptions<A extends unknown[], K> = {
    key: (...args: A) => K;
    ttlMs?: number;
    timeoutMs?: number;
};

export type Memoized<A extends unknown[], V> = ((...args: A) => Promise<V>) & {
    /** Recompute for these arguments even if a fresh value is cached. */
    refresh: (...args: A) => Promise<V>;
    invalidate: (...args: A) => boolean;
};

/** Routes every call of `fn` through `cache`, keyed by `opts.key(...args)`. */
export function memoize<A extends unknown[], K, V>(
    cache: TtlCache<K, V>,
    fn: (...args: A) => V | Promise<V>,
    opts: MemoizeOptions<A, K>
): Memoized<A, V> {
    const call = async (forceRefresh: boolean, args: A): Promise<V> =>
        cache.getOrCompute(
            opts.key(...args),
            () => fn(...args),
            { ttlMs: opts.ttlMs, timeoutMs: opts.timeoutMs, forceRefresh }
        );

    const memoized = (...args: A): Promise<V> => call(false, args);

    return Object.assign(memoized, {
        refresh: (...args: A): Promise<V> => call(true, args),
        invalidate: (...args: A): boolean => cache.invalidate(opts.key(...args))
    });
}
