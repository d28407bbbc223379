/**
 * Asynchronous reader/writer lock
 * @fileoverview Shared/exclusive lock for promise-based code with FIFO hand-off
 */

interface Waiter {
    exclusive: boolean;
    grant: () => void;
}

/**
 * Many readers or one writer. Acquisitions are granted in arrival order:
 * a reader arriving while anyone is queued waits behind them, so a steady
 * stream of readers cannot starve a writer.
 */
export class ReadWriteLock {
    private activeReaders = 0;
    private writerActive = false;
    private readonly queue: Waiter[] = [];

    get readers(): number {
        return this.activeReaders;
    }

    get writing(): boolean {
        return this.writerActive;
    }

    get pending(): number {
        return this.queue.length;
    }

    acquireShared(): Promise<void> {
        if (!this.writerActive && this.queue.length === 0) {
            this.activeReaders++;
            return Promise.resolve();
        }
        return this.enqueue(false);
    }

    acquireExclusive(): Promise<void> {
        if (!this.writerActive && this.activeReaders === 0 && this.queue.length === 0) {
            this.writerActive = true;
            return Promise.resolve();
        }
        return this.enqueue(true);
    }

    releaseShared(): void {
        if (this.activeReaders === 0) {
            throw new Error('releaseShared called without a shared holder');
        }
        this.activeReaders--;
        this.drain();
    }

    releaseExclusive(): void {
        if (!this.writerActive) {
            throw new Error('releaseExclusive called without an exclusive holder');
        }
        this.writerActive = false;
        this.drain();
    }

    private enqueue(exclusive: boolean): Promise<void> {
        return new Promise<void>(resolve => {
            this.queue.push({ exclusive, grant: resolve });
        });
    }

    private drain(): void {
        while (this.queue.length > 0 && !this.writerActive) {
            const next = this.queue[0];
            if (!next) {
                return;
            }

            if (next.exclusive) {
                if (this.activeReaders > 0) {
                    return;
                }
                this.queue.shift();
                this.writerActive = true;
                next.grant();
                return;
            }

            this.queue.shift();
            this.activeReaders++;
            next.grant();
        }
    }
}
