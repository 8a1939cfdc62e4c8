export { TtlCache, TtlCacheOptions } from './cache/ttlCache';
export {
    Cache,
    CacheEntry,
    CacheEntrySnapshot,
    CacheStats,
    ComputeOptions,
    PendingComputation
} from './cache/cacheInterface';
export { memoize, Memoized, MemoizeOptions } from './cache/memoize';
export { TimeoutExecutor, TimeoutExecutorOptions, Computation } from './timeout/timeoutExecutor';
export { TaskRunner, TaskRunnerOptions, NamedTask, TaskOutcome } from './runner/taskRunner';
export { CacheMetrics, CacheMetricsSnapshot } from './metrics';
export {
    CacheError,
    ConfigurationError,
    TimeoutError,
    TimeoutReason,
    ComputationError,
    assertPositiveDuration
} from './errors';
export { loadConfig, AppConfig } from './config';
export { createLogger, LoggerOptions } from './logger';
export { createApp } from './app';
