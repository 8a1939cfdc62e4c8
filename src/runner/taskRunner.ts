import { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { assertPositiveDuration, ConfigurationError } from '../errors';
import { logger as defaultLogger } from '../logger';
import { Computation, TimeoutExecutor } from '../timeout/timeoutExecutor';

export type NamedTask<T> = {
    id: string;
    run: Computation<T>;
    timeoutMs?: number;
};

export type TaskOutcome<T> =
    | { status: 'fulfilled'; value: T }
    | { status: 'rejected'; error: unknown };

export type TaskRunnerOptions = {
    concurrency: number;
    defaultTimeoutMs: number;
    executor?: TimeoutExecutor;
    logger?: Logger;
};

type QueuedTask = () => Promise<void>;

/**
 * Runs named tasks in parallel, each bounded by a timeout, and collects
 * every outcome by id. At most `concurrency` tasks are active at once
 * across all batches.
 */
export class TaskRunner {
    private queue: QueuedTask[] = [];
    private active = 0;
    private readonly executor: TimeoutExecutor;
    private readonly logger: Logger;

    constructor(private opts: TaskRunnerOptions) {
        if (!Number.isInteger(opts.concurrency) || opts.concurrency < 1) {
            throw new ConfigurationError(`concurrency must be a positive integer, got ${String(opts.concurrency)}`);
        }
        assertPositiveDuration('defaultTimeoutMs', opts.defaultTimeoutMs);
        this.logger = opts.logger ?? defaultLogger;
        this.executor = opts.executor ?? new TimeoutExecutor({ logger: this.logger });
    }

    async runAll<T>(tasks: NamedTask<T>[]): Promise<Record<string, TaskOutcome<T>>> {
        const ids = new Set<string>();
        for (const task of tasks) {
            if (!task.id) {
                throw new ConfigurationError('task id must be a non-empty string');
            }
            if (ids.has(task.id)) {
                throw new ConfigurationError(`duplicate task id "${task.id}"`);
            }
            assertPositiveDuration(`timeoutMs of ${task.id}`, task.timeoutMs ?? this.opts.defaultTimeoutMs);
            ids.add(task.id);
        }

        const batchId = uuidv4();
        const startTime = Date.now();
        this.logger.info({ batchId, tasks: tasks.length }, 'batchStarted');

        const results = new Map<string, TaskOutcome<T>>();
        await Promise.all(tasks.map(task => new Promise<void>((resolve) => {
            const timeoutMs = task.timeoutMs ?? this.opts.defaultTimeoutMs;
            this.queue.push(async () => {
                try {
                    const value = await this.executor.run(task.run, timeoutMs, task.id);
                    results.set(task.id, { status: 'fulfilled', value });
                } catch (error) {
                    this.logger.warn({ batchId, taskId: task.id, error: String(error) }, 'taskFailed');
                    results.set(task.id, { status: 'rejected', error });
                } finally {
                    resolve();
                }
            });
            this.processQueue();
        })));

        const failed = [...results.values()].filter(r => r.status === 'rejected').length;
        this.logger.info({ batchId, tasks: tasks.length, failed, durationMs: Date.now() - startTime }, 'batchCompleted');
        // fromEntries defines own properties, so ids such as "__proto__" stay plain keys
        return Object.fromEntries(results);
    }

    getStats() {
        return {
            active: this.active,
            queued: this.queue.length
        };
    }

    private processQueue(): void {
        while (this.active < this.opts.concurrency) {
            const next = this.queue.shift();
            if (!next) return;
            this.active++;
            void next().finally(() => {
                this.active--;
                this.processQueue();
            });
        }
    }
}
