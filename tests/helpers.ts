import pino, { Logger } from 'pino';

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        const timer = setTimeout(resolve, ms);
        signal?.addEventListener('abort', () => {
            clearTimeout(timer);
            reject(signal.reason);
        }, { once: true });
    });
}

export type Deferred<T> = {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (error: unknown) => void;
};

export function deferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => undefined;
    let reject: (error: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

/** A logger whose records are collected as parsed objects. */
export function captureLogger(): { logger: Logger; records: Array<{ level: number; msg: string }> } {
    const records: Array<{ level: number; msg: string }> = [];
    const logger = pino({ level: 'debug' }, {
        write(line: string) {
            const parsed: { level: number; msg: string } = JSON.parse(line);
            records.push({ level: parsed.level, msg: parsed.msg });
        }
    });
    return { logger, records };
}

export class ManualClock {
    constructor(public time = 0) {}

    now = (): number => this.time;

    advance(ms: number): void {
        this.time += ms;
    }
}
