import { TimeoutExecutor } from '../src/timeout/timeoutExecutor';
import { ComputationError, ConfigurationError, TimeoutError } from '../src/errors';
import { captureLogger, ManualClock, sleep } from './helpers';

describe('TimeoutExecutor', () => {
    let executor: TimeoutExecutor;

    beforeEach(() => {
        executor = new TimeoutExecutor();
    });

    describe('completion before the deadline', () => {
        it('should resolve with the value of an async computation', async () => {
            const result = await executor.run(async () => 'ok', 100);
            expect(result).toBe('ok');
        });

        it('should resolve with the value of a synchronous computation', async () => {
            const result = await executor.run(() => 42, 100);
            expect(result).toBe(42);
        });

        it('should not abort the signal of a computation that finished in time', async () => {
            let seen: AbortSignal | undefined;
            await executor.run((signal) => {
                seen = signal;
                return 'done';
            }, 100);

            expect(seen?.aborted).toBe(false);
        });
    });

    describe('deadline enforcement', () => {
        it('should reject with TimeoutError at the deadline, not when the work finishes', async () => {
            const startTime = Date.now();
            const err = await executor
                .run((signal) => sleep(10_000, signal).then(() => 'late'), 50, 'slow')
                .catch((e: unknown) => e);

            expect(err).toBeInstanceOf(TimeoutError);
            expect(err).toMatchObject({ label: 'slow', timeoutMs: 50, reason: 'elapsed' });
            expect(Date.now() - startTime).toBeLessThan(2000);
        });

        it('should abort the computation signal with the TimeoutError', async () => {
            let seen: AbortSignal | undefined;
            const err = await executor
                .run((signal) => {
                    seen = signal;
                    return sleep(10_000, signal);
                }, 20)
                .catch((e: unknown) => e);

            expect(seen?.aborted).toBe(true);
            expect(seen?.reason).toBe(err);
        });

        it('should release the caller even if the computation ignores the signal', async () => {
            const err = await executor
                .run(() => sleep(150).then(() => 'ignored'), 20)
                .catch((e: unknown) => e);

            expect(err).toBeInstanceOf(TimeoutError);
            // Let the background work finish; its result is dropped.
            await sleep(200);
        });

        it('should log the timeout as a warning', async () => {
            const { logger, records } = captureLogger();
            const logged = new TimeoutExecutor({ logger });

            await logged.run((signal) => sleep(10_000, signal), 20, 'slow').catch(() => undefined);

            expect(records).toContainEqual({ level: 40, msg: 'computationTimedOut' });
        });
    });

    describe('computation failures', () => {
        it('should wrap a rejected computation in ComputationError', async () => {
            const cause = new Error('boom');
            const err = await executor
                .run(async () => {
                    throw cause;
                }, 100, 'fetch')
                .catch((e: unknown) => e);

            expect(err).toBeInstanceOf(ComputationError);
            if (err instanceof ComputationError) {
                expect(err.label).toBe('fetch');
                expect(err.message).toBe('fetch failed: boom');
                expect(err.cause).toBe(cause);
            }
        });

        it('should report a synchronous throw as a rejection', async () => {
            const pending = executor.run(() => {
                throw new Error('sync');
            }, 100);

            await expect(pending).rejects.toBeInstanceOf(ComputationError);
        });

        it('should describe non-Error failures', async () => {
            const err = await executor
                .run(() => Promise.reject('plain string'), 100)
                .catch((e: unknown) => e);

            expect(err).toBeInstanceOf(ComputationError);
            if (err instanceof ComputationError) {
                expect(err.message).toBe('computation failed: plain string');
                expect(err.cause).toBe('plain string');
            }
        });
    });

    describe('configuration', () => {
        it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY])(
            'should reject timeout %p without running the computation',
            async (timeoutMs) => {
                const computation = jest.fn(() => 'never');

                await expect(executor.run(computation, timeoutMs)).rejects.toBeInstanceOf(ConfigurationError);
                expect(computation).not.toHaveBeenCalled();
            }
        );

        it('should refuse a negative cooldown', () => {
            expect(() => new TimeoutExecutor({ cooldownMs: -1 })).toThrow(ConfigurationError);
        });
    });

    describe('timeout cooldown', () => {
        let clock: ManualClock;

        beforeEach(() => {
            clock = new ManualClock(0);
            executor = new TimeoutExecutor({ cooldownMs: 1000, now: clock.now });
        });

        it('should refuse the same label while cooling down', async () => {
            await executor.run((signal) => sleep(10_000, signal), 20, 'slow').catch(() => undefined);
            expect(executor.isCoolingDown('slow')).toBe(true);

            const computation = jest.fn(() => 'fast now');
            clock.advance(999);
            const err = await executor.run(computation, 100, 'slow').catch((e: unknown) => e);

            expect(err).toBeInstanceOf(TimeoutError);
            expect(err).toMatchObject({ reason: 'cooldown', label: 'slow' });
            expect(computation).not.toHaveBeenCalled();
        });

        it('should let other labels run during a cooldown', async () => {
            await executor.run((signal) => sleep(10_000, signal), 20, 'slow').catch(() => undefined);

            await expect(executor.run(() => 'other', 100, 'other')).resolves.toBe('other');
        });

        it('should run the label again once the cooldown has passed', async () => {
            await executor.run((signal) => sleep(10_000, signal), 20, 'slow').catch(() => undefined);

            clock.advance(1000);
            expect(executor.isCoolingDown('slow')).toBe(false);
            await expect(executor.run(() => 'recovered', 100, 'slow')).resolves.toBe('recovered');
        });

        it('should track cooldowns by key identity, not by label', async () => {
            const first = { id: 1 };
            const second = { id: 1 };
            await executor.run((signal) => sleep(10_000, signal), 20, 'same', first).catch(() => undefined);

            expect(executor.isCoolingDown(first)).toBe(true);
            expect(executor.isCoolingDown('same')).toBe(false);
            await expect(executor.run(() => 'fine', 100, 'same', second)).resolves.toBe('fine');
        });

        it('should drop expired cooldown records when another label runs', async () => {
            await executor.run((signal) => sleep(10_000, signal), 20, 'a').catch(() => undefined);
            await executor.run((signal) => sleep(10_000, signal), 20, 'b').catch(() => undefined);
            expect(executor.cooldownCount).toBe(2);

            clock.advance(1000);
            await executor.run(() => 'c', 100, 'c');

            expect(executor.cooldownCount).toBe(0);
        });

        it('should prune only expired cooldown records', async () => {
            await executor.run((signal) => sleep(10_000, signal), 20, 'old').catch(() => undefined);
            clock.advance(600);
            await executor.run((signal) => sleep(10_000, signal), 20, 'recent').catch(() => undefined);

            clock.advance(500);
            expect(executor.pruneCooldowns()).toBe(1);
            expect(executor.isCoolingDown('recent')).toBe(true);
        });

        it('should not record timeouts when the cooldown is disabled', async () => {
            const plain = new TimeoutExecutor({ now: clock.now });
            await plain.run((signal) => sleep(10_000, signal), 20, 'slow').catch(() => undefined);

            expect(plain.isCoolingDown('slow')).toBe(false);
        });
    });
});
