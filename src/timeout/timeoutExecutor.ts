import { Logger } from 'pino';
import { assertPositiveDuration, ComputationError, ConfigurationError, TimeoutError } from '../errors';
import { logger as defaultLogger } from '../logger';

/**
 * A unit of work run under a deadline. The signal is aborted when the
 * deadline fires; computations that ignore it keep running in the background.
 */
export type Computation<T> = (signal: AbortSignal) => T | Promise<T>;

export type TimeoutExecutorOptions = {
    /** After a cool-down key times out, refuse further runs of it for this long. 0 disables. */
    cooldownMs?: number;
    logger?: Logger;
    now?: () => number;
};

/**
 * Runs computations with an enforced maximum duration.
 *
 * Cancellation is best effort: on timeout the caller is released and the
 * computation's AbortSignal fires, but nothing forces the work to stop.
 * Synchronous CPU-bound work holds the event loop, so the deadline can only
 * be observed once it yields.
 */
export class TimeoutExecutor {
    private readonly cooldownMs: number;
    private readonly logger: Logger;
    private readonly now: () => number;
    private timedOutAt = new Map<unknown, number>();

    constructor(opts: TimeoutExecutorOptions = {}) {
        this.cooldownMs = opts.cooldownMs ?? 0;
        if (!Number.isFinite(this.cooldownMs) || this.cooldownMs < 0) {
            throw new ConfigurationError(`cooldownMs must be >= 0, got ${String(opts.cooldownMs)}`);
        }
        this.logger = opts.logger ?? defaultLogger;
        this.now = opts.now ?? Date.now;
    }

    isCoolingDown(cooldownKey: unknown): boolean {
        const since = this.timedOutAt.get(cooldownKey);
        if (since === undefined) return false;
        if (this.now() - since < this.cooldownMs) return true;
        this.timedOutAt.delete(cooldownKey);
        return false;
    }

    /** Drops cool-down records whose window has passed. Returns how many were removed. */
    pruneCooldowns(): number {
        const now = this.now();
        let removed = 0;
        for (const [cooldownKey, since] of this.timedOutAt.entries()) {
            if (now - since >= this.cooldownMs) {
                this.timedOutAt.delete(cooldownKey);
                removed++;
            }
        }
        return removed;
    }

    get cooldownCount(): number {
        return this.timedOutAt.size;
    }

    /**
     * `label` names the run in errors and logs. Cool-down is tracked per
     * `cooldownKey`, compared by identity, which defaults to the label.
     */
    async run<T>(
        computation: Computation<T>,
        timeoutMs: number,
        label = 'computation',
        cooldownKey: unknown = label
    ): Promise<T> {
        assertPositiveDuration('timeoutMs', timeoutMs);

        this.pruneCooldowns();
        if (this.isCoolingDown(cooldownKey)) {
            this.logger.debug({ label, cooldownMs: this.cooldownMs }, 'computationRefusedDuringCooldown');
            throw new TimeoutError(label, timeoutMs, 'cooldown');
        }

        const controller = new AbortController();

        return new Promise<T>((resolve, reject) => {
            let settled = false;

            const timer = setTimeout(() => {
                settled = true;
                const error = new TimeoutError(label, timeoutMs);
                if (this.cooldownMs > 0) {
                    this.timedOutAt.set(cooldownKey, this.now());
                }
                this.logger.warn({ label, timeoutMs }, 'computationTimedOut');
                controller.abort(error);
                reject(error);
            }, timeoutMs);

            void Promise.resolve()
                .then(() => computation(controller.signal))
                .then(
                    (value) => {
                        if (settled) {
                            this.logger.debug({ label }, 'lateResultDiscarded');
                            return;
                        }
                        settled = true;
                        clearTimeout(timer);
                        resolve(value);
                    },
                    (err: unknown) => {
                        if (settled) {
                            this.logger.debug({ label, error: String(err) }, 'lateFailureDiscarded');
                            return;
                        }
                        settled = true;
                        clearTimeout(timer);
                        this.logger.warn({ label, error: String(err) }, 'computationFailed');
                        reject(new ComputationError(label, err));
                    }
                );
        });
    }
}
