/**
 * Unit tests for the key lock registry
 */

import { KeyLockRegistry } from '../../../src/cache/key-lock-registry';
import { Stats } from '../../../src/services/stats-service';

const MINUTE_MS = 60 * 1000;

describe('KeyLockRegistry', () => {
    let now: number;
    let registry: KeyLockRegistry;

    beforeEach(() => {
        now = 1_000_000;
        registry = new KeyLockRegistry({ clock: () => now });
    });

    test('should create one entry per key', async () => {
        const first = await registry.acquireShared('movie.mp4');
        const second = await registry.acquireShared('movie.mp4');

        expect(second).toBe(first);
        expect(first.readers).toBe(2);
        expect(registry.size).toBe(1);

        registry.releaseShared(first);
        registry.releaseShared(second);
        expect(first.readers).toBe(0);
    });

    test('should create a single entry under concurrent first use', async () => {
        const entries = await Promise.all([
            registry.acquireShared('song.ogg'),
            registry.acquireShared('song.ogg'),
            registry.acquireShared('song.ogg'),
        ]);

        expect(new Set(entries).size).toBe(1);
        expect(registry.size).toBe(1);
    });

    test('should keep keys independent', async () => {
        const writer = await registry.acquireExclusive('a.bin');
        const reader = await registry.acquireShared('b.bin');

        expect(writer.writers).toBe(1);
        expect(reader.readers).toBe(1);
    });

    test('should hold back readers while the key is written', async () => {
        const writer = await registry.acquireExclusive('a.bin');
        let granted = false;
        const pending = registry.acquireShared('a.bin').then(entry => {
            granted = true;
            return entry;
        });
        await new Promise(resolve => setImmediate(resolve));

        expect(granted).toBe(false);

        registry.releaseExclusive(writer);
        const reader = await pending;

        expect(granted).toBe(true);
        expect(reader).toBe(writer);
        expect(writer.writers).toBe(0);
    });

    test('should feed entry statistics into the totals', async () => {
        const totals = new Stats('TOTALS');
        registry = new KeyLockRegistry({ totals });

        const entry = await registry.acquireShared('a.bin');
        entry.stats.requested();
        entry.stats.hit(42);
        registry.releaseShared(entry);

        expect(registry.totals).toBe(totals);
        expect(totals.snapshot()).toMatchObject({ requests: 1, hits: 1, sentBytes: 42 });
        expect(entry.stats.name).toBe('a.bin');
    });

    describe('sweepIdle', () => {
        test('should remove entries idle for longer than the limit', async () => {
            const idle = await registry.acquireShared('old.bin');
            registry.releaseShared(idle);

            now += 11 * MINUTE_MS;
            const fresh = await registry.acquireShared('new.bin');
            registry.releaseShared(fresh);

            const result = await registry.sweepIdle(10 * MINUTE_MS);

            expect(result.expired).toEqual([idle]);
            expect(result.active).toEqual([fresh]);
            expect(registry.size).toBe(1);
        });

        test('should keep entries that are still held', async () => {
            const held = await registry.acquireShared('busy.bin');
            now += 60 * MINUTE_MS;

            const result = await registry.sweepIdle(10 * MINUTE_MS);

            expect(result.expired).toHaveLength(0);
            expect(result.active).toEqual([held]);
        });

        test('should hand out a new entry after a sweep', async () => {
            const before = await registry.acquireShared('x.bin');
            registry.releaseShared(before);
            now += 11 * MINUTE_MS;
            await registry.sweepIdle(10 * MINUTE_MS);

            const after = await registry.acquireShared('x.bin');

            expect(after).not.toBe(before);
            expect(after.stats.snapshot().requests).toBe(0);
        });
    });
});
