/**
 * Key Lock Registry
 * @fileoverview Maps cache keys to reader/writer locks with usage counters
 */

import { CACHE_CONFIG } from '../config/constants';
import { Stats } from '../services/stats-service';
import { ReadWriteLock } from './read-write-lock';

/**
 * Lock state for one cache key. Carries no durable state, so a swept
 * entry that is recreated by a later request loses nothing but counters.
 */
export class LockEntry {
    readonly lock = new ReadWriteLock();
    readonly stats: Stats;
    readers = 0;
    writers = 0;
    touched: number;

    constructor(public readonly key: string, totals: Stats, now: number = Date.now()) {
        this.stats = new Stats(key, totals);
        this.touched = now;
    }

    isIdle(idleMs: number, now: number = Date.now()): boolean {
        return this.readers === 0 && this.writers === 0 && now - this.touched > idleMs;
    }
}

export interface SweepResult {
    active: LockEntry[];
    expired: LockEntry[];
}

export interface KeyLockRegistryOptions {
    totals?: Stats;
    clock?: () => number;
}

export class KeyLockRegistry {
    readonly totals: Stats;
    private readonly entries = new Map<string, LockEntry>();
    private readonly registryLock = new ReadWriteLock();
    private readonly clock: () => number;

    constructor(options: KeyLockRegistryOptions = {}) {
        this.totals = options.totals ?? new Stats('TOTALS');
        this.clock = options.clock ?? Date.now;
    }

    get size(): number {
        return this.entries.size;
    }

    /**
     * Take a shared (read) lock on a key
     */
    async acquireShared(key: string): Promise<LockEntry> {
        const entry = await this.lookup(key);
        await entry.lock.acquireShared();
        entry.readers++;
        entry.touched = this.clock();
        return entry;
    }

    releaseShared(entry: LockEntry): void {
        entry.readers--;
        entry.lock.releaseShared();
    }

    /**
     * Take the exclusive (write) lock on a key. Never call this while
     * holding the shared lock on the same key.
     */
    async acquireExclusive(key: string): Promise<LockEntry> {
        const entry = await this.lookup(key);
        await entry.lock.acquireExclusive();
        entry.writers++;
        entry.touched = this.clock();
        return entry;
    }

    releaseExclusive(entry: LockEntry): void {
        entry.writers--;
        entry.lock.releaseExclusive();
    }

    /**
     * Remove entries idle for longer than `idleMs`
     */
    async sweepIdle(idleMs: number = CACHE_CONFIG.LOCK_IDLE_MS): Promise<SweepResult> {
        await this.registryLock.acquireExclusive();
        try {
            const now = this.clock();
            const result: SweepResult = { active: [], expired: [] };

            for (const [key, entry] of this.entries) {
                if (entry.isIdle(idleMs, now)) {
                    this.entries.delete(key);
                    result.expired.push(entry);
                } else {
                    result.active.push(entry);
                }
            }

            return result;
        } finally {
            this.registryLock.releaseExclusive();
        }
    }

    /**
     * Double-checked lazy creation: the common case of a known key only
     * needs the shared section of the registry lock.
     */
    private async lookup(key: string): Promise<LockEntry> {
        await this.registryLock.acquireShared();
        let entry: LockEntry | undefined;
        try {
            entry = this.entries.get(key);
        } finally {
            this.registryLock.releaseShared();
        }
        if (entry) {
            return entry;
        }

        await this.registryLock.acquireExclusive();
        try {
            entry = this.entries.get(key);
            if (!entry) {
                entry = new LockEntry(key, this.totals, this.clock());
                this.entries.set(key, entry);
            }
            return entry;
        } finally {
            this.registryLock.releaseExclusive();
        }
    }
}
