// src/concurrency.ts

/** Counting semaphore: at most `maxSlots` holders, the rest wait in FIFO order. */
export class ConcurrencyLimiter {
    private activeCount = 0;
    private queue: Array<() => void> = [];

    constructor(private readonly maxSlots: number) { }

    async acquireSlot(): Promise<void> {
        if (this.activeCount < this.maxSlots) {
            this.activeCount++;
            return;
        }

        return new Promise<void>((resolve) => {
            this.queue.push(resolve);
        });
    }

    releaseSlot(): void {
        const next = this.queue.shift();
        if (next) {
            next();
        } else {
            this.activeCount--;
        }
    }

    get active(): number {
        return this.activeCount;
    }

    get waiting(): number {
        return this.queue.length;
    }
}
