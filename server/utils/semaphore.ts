/**
 * Semaphore
 *
 * A counting semaphore for limiting concurrent async work, plus a Mutex
 * (one permit) for serializing multi-step sections that span awaits.
 *
 * @example
 * const limit = new Semaphore(3);
 * await limit.run(() => plex.renameTitle(ratingKey, title));
 */
export class Semaphore {
    private permits: number;
    private waiting: (() => void)[] = [];

    /**
     * @param permits Maximum concurrent operations allowed
     */
    constructor(permits: number) {
        if (permits < 1) {
            throw new Error('Semaphore permits must be at least 1');
        }
        this.permits = permits;
    }

    /**
     * Acquire a permit, waiting if none are available
     */
    async acquire(): Promise<void> {
        if (this.permits > 0) {
            this.permits--;
            return;
        }
        await new Promise<void>(resolve => {
            this.waiting.push(resolve);
        });
    }

    /**
     * Release a permit, handing it straight to the next waiter if any
     */
    release(): void {
        const next = this.waiting.shift();
        if (next) {
            next();
        } else {
            this.permits++;
        }
    }

    /**
     * Run `task` while holding a permit. The permit is released even when
     * the task throws; the error propagates to the caller.
     */
    async run<T>(task: () => T | Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await task();
        } finally {
            this.release();
        }
    }

    get available(): number {
        return this.permits;
    }

    get queueLength(): number {
        return this.waiting.length;
    }
}

/**
 * Single-permit semaphore. Waiters are served in FIFO order.
 */
export class Mutex extends Semaphore {
    constructor() {
        super(1);
    }

    get locked(): boolean {
        return this.available === 0;
    }
}
