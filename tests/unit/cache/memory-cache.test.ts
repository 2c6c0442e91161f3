/**
 * Unit tests for the in-memory response cache
 */

import { MemoryCache } from '../../../src/cache/memory-cache';
import { Logger } from '../../../src/utils/logger';

function silentLogger(): Logger {
    return { error: jest.fn(), warn: jest.fn(), info: jest.fn(), debug: jest.fn() };
}

describe('MemoryCache', () => {
    let now: number;
    let nowSpy: jest.SpyInstance<number, []>;

    beforeEach(() => {
        now = 1_000_000;
        nowSpy = jest.spyOn(Date, 'now').mockImplementation(() => now);
    });

    afterEach(() => {
        nowSpy.mockRestore();
    });

    test('should return stored values before they expire', async () => {
        const cache = new MemoryCache<string>({ defaultTtl: 1000, logger: silentLogger() });
        await cache.set('k', 'v');

        now += 1000;

        expect(await cache.get('k')).toBe('v');
        expect(await cache.has('k')).toBe(true);
    });

    test('should drop expired values on read', async () => {
        const cache = new MemoryCache<string>({ defaultTtl: 1000, logger: silentLogger() });
        await cache.set('k', 'v');

        now += 1001;

        expect(await cache.get('k')).toBeNull();
        expect(cache.getStats().entryCount).toBe(0);
    });

    test('should honour a per-entry ttl', async () => {
        const cache = new MemoryCache<string>({ defaultTtl: 1000, logger: silentLogger() });
        await cache.set('short', 'v', { ttl: 10 });

        now += 11;

        expect(await cache.has('short')).toBe(false);
    });

    test('should evict the least recently used entry at capacity', async () => {
        const cache = new MemoryCache<number>({ defaultTtl: 1000, maxEntries: 2, logger: silentLogger() });
        await cache.set('a', 1);
        await cache.set('b', 2);
        await cache.get('a');
        await cache.set('c', 3);

        expect(cache.getKeys()).toEqual(['a', 'c']);
    });

    test('should track hits and misses', async () => {
        const cache = new MemoryCache<number>({ defaultTtl: 1000, logger: silentLogger() });
        await cache.set('a', 1);
        await cache.get('a');
        await cache.get('a');
        await cache.get('missing');

        const stats = cache.getStats();
        expect(stats.hits).toBe(2);
        expect(stats.misses).toBe(1);
        expect(stats.entryCount).toBe(1);
        expect(stats.hitRate).toBeCloseTo(66.667, 2);

        cache.resetStats();
        expect(cache.getStats().hits).toBe(0);
    });

    test('should remove expired entries on cleanup', async () => {
        const logger = silentLogger();
        const cache = new MemoryCache<number>({ defaultTtl: 1000, logger });
        await cache.set('old', 1);
        now += 500;
        await cache.set('new', 2);
        now += 600;

        expect(await cache.cleanup()).toBe(1);
        expect(cache.getKeys()).toEqual(['new']);
        expect(logger.debug).toHaveBeenCalledWith('Memory cache cleanup: removed 1 expired entries');
    });

    test('should delete and clear entries', async () => {
        const cache = new MemoryCache<number>({ defaultTtl: 1000, logger: silentLogger() });
        await cache.set('a', 1);
        await cache.set('b', 2);

        expect(await cache.delete('a')).toBe(true);
        expect(await cache.delete('a')).toBe(false);

        await cache.clear();
        expect(cache.getKeys()).toEqual([]);
        expect(cache.getStats().entryCount).toBe(0);
    });
});
