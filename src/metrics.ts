export type CacheMetricsSnapshot = {
    hits: number;
    misses: number;
    coalesced: number;
    computations: number;
    completed: number;
    timeouts: number;
    failures: number;
    discarded: number;
    evictions: number;
    averageComputeTimeMs: number;
};

export class CacheMetrics {
    private hits = 0;
    private misses = 0;
    private coalesced = 0;
    private computations = 0;
    private completed = 0;
    private timeouts = 0;
    private failures = 0;
    private discarded = 0;
    private evictions = 0;
    private averageComputeTime = 0; // Exponential moving average in milliseconds
    private readonly alpha = 0.1; // Smoothing factor for EMA

    recordHit() {
        this.hits++;
    }

    recordMiss() {
        this.misses++;
    }

    recordCoalesced() {
        this.coalesced++;
    }

    recordComputationStarted() {
        this.computations++;
    }

    recordTimeout() {
        this.timeouts++;
    }

    recordFailure() {
        this.failures++;
    }

    recordDiscarded() {
        this.discarded++;
    }

    recordEvictions(count: number) {
        this.evictions += count;
    }

    recordCompleted(ms: number) {
        this.completed++;
        if (this.completed === 1) {
            this.averageComputeTime = ms;
        } else {
            // new_avg = alpha * new_value + (1 - alpha) * old_avg
            this.averageComputeTime = this.alpha * ms + (1 - this.alpha) * this.averageComputeTime;
        }
    }

    getMetrics(): CacheMetricsSnapshot {
        return {
            hits: this.hits,
            misses: this.misses,
            coalesced: this.coalesced,
            computations: this.computations,
            completed: this.completed,
            timeouts: this.timeouts,
            failures: this.failures,
            discarded: this.discarded,
            evictions: this.evictions,
            averageComputeTimeMs: Math.round(this.averageComputeTime * 100) / 100,
        };
    }

    reset() {
        this.hits = 0;
        this.misses = 0;
        this.coalesced = 0;
        this.computations = 0;
        this.completed = 0;
        this.timeouts = 0;
        this.failures = 0;
        this.discarded = 0;
        this.evictions = 0;
        this.averageComputeTime = 0;
    }
}
