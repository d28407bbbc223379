/**
 * Request and transfer statistics
 * @fileoverview Per-key counters that also feed a parent (process-wide) instance
 */

import { Logger } from '../middleware/logging';

export interface StatsSnapshot {
    requests: number;
    completed: number;
    disconnects: number;
    sentBytes: number;
    receivedBytes: number;
    hits: number;
    hitBytes: number;
    misses: number;
    missBytes: number;
    errors: number;
}

type Counter = keyof StatsSnapshot;

const MB = 1024 * 1024;

function emptySnapshot(): StatsSnapshot {
    return {
        requests: 0,
        completed: 0,
        disconnects: 0,
        sentBytes: 0,
        receivedBytes: 0,
        hits: 0,
        hitBytes: 0,
        misses: 0,
        missBytes: 0,
        errors: 0
    };
}

/**
 * Monotonic counters. Every event is applied to this instance and, when
 * present, to the parent at the moment it fires, so the parent always
 * equals the sum of its children without summing at report time.
 */
export class Stats {
    private readonly counters: StatsSnapshot = emptySnapshot();

    constructor(
        public readonly name: string,
        private readonly parent?: Stats
    ) { }

    private add(counter: Counter, amount: number): void {
        this.counters[counter] += amount;
        this.parent?.add(counter, amount);
    }

    requested(): void {
        this.add('requests', 1);
    }

    completed(): void {
        this.add('completed', 1);
    }

    hit(bytes: number): void {
        this.add('hits', 1);
        this.add('hitBytes', bytes);
        this.add('sentBytes', bytes);
    }

    miss(bytes: number): void {
        this.add('misses', 1);
        this.add('missBytes', bytes);
        this.add('sentBytes', bytes);
    }

    error(bytes: number = 0): void {
        this.add('errors', 1);
        this.add('sentBytes', bytes);
    }

    disconnect(): void {
        this.add('disconnects', 1);
    }

    received(bytes: number): void {
        this.add('receivedBytes', bytes);
    }

    snapshot(): StatsSnapshot {
        return { ...this.counters };
    }

    /**
     * Three-line report, e.g.
     *
     *     TOTALS
     *     req:      4/4        0 dc  hit      3:1      3.0×    err: 0
     *     sent:      1.5MB  recv:      0.5MB 3.0×
     */
    formatReport(extra: string = ''): string {
        const s = this.counters;

        const rate = s.misses === 0 ? '∞' : `${(s.hits / s.misses).toFixed(1).padStart(3)}×`;
        const sentMb = s.sentBytes / MB;
        const receivedMb = s.receivedBytes / MB;
        const transferRate = receivedMb === 0 ? '∞' : `${(sentMb / receivedMb).toFixed(1).padStart(3)}×`;

        return [
            `${this.name}${extra}`,
            `req: ${String(s.completed).padStart(6)}/${String(s.requests).padEnd(6)}  ` +
            `${String(s.disconnects).padStart(3)} dc  ` +
            `hit ${String(s.hits).padStart(6)}:${String(s.misses).padEnd(6)} ${rate.padEnd(6)}  ` +
            `err: ${s.errors}`,
            `sent: ${sentMb.toFixed(1).padStart(8)}MB  recv: ${receivedMb.toFixed(1).padStart(8)}MB ${transferRate}`
        ].join('\n');
    }

    report(logger: Logger, extra: string = ''): void {
        logger.info(this.formatReport(extra));
    }
}
