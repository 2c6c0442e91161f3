/**
 * Memory Cache for search responses
 * @fileoverview In-memory TTL cache with LRU eviction
 */

import { BaseCache, CacheConfig, CacheEntry, CacheOptions } from './base-cache';

/**
 * In-memory cache implementation with LRU eviction.
 * Expired entries are dropped when read or by an explicit cleanup().
 */
export class MemoryCache<T> extends BaseCache<T> {
    private readonly cache = new Map<string, CacheEntry<T>>();
    private readonly maxEntries: number;

    constructor(config: CacheConfig & { maxEntries?: number }) {
        super(config);
        this.maxEntries = config.maxEntries || 1000;
    }

    async get(key: string): Promise<T | null> {
        const entry = this.cache.get(key);

        if (!entry) {
            this.stats.misses++;
            return null;
        }

        if (this.isExpired(entry)) {
            this.cache.delete(key);
            this.stats.misses++;
            this.stats.entryCount = this.cache.size;
            return null;
        }

        // Move to end (LRU update)
        this.cache.delete(key);
        this.cache.set(key, entry);

        this.stats.hits++;
        return entry.data;
    }

    async set(key: string, data: T, options?: CacheOptions): Promise<void> {
        this.cache.delete(key);
        this.evictIfNeeded();
        this.cache.set(key, this.createEntry(data, options));
        this.stats.entryCount = this.cache.size;
    }

    async has(key: string): Promise<boolean> {
        const entry = this.cache.get(key);

        if (!entry) {
            return false;
        }

        if (this.isExpired(entry)) {
            this.cache.delete(key);
            this.stats.entryCount = this.cache.size;
            return false;
        }

        return true;
    }

    async delete(key: string): Promise<boolean> {
        const hadEntry = this.cache.delete(key);
        this.stats.entryCount = this.cache.size;
        return hadEntry;
    }

    async clear(): Promise<void> {
        this.cache.clear();
        this.stats.entryCount = 0;
    }

    async cleanup(): Promise<number> {
        const now = Date.now();
        let deletedCount = 0;

        for (const [key, entry] of this.cache.entries()) {
            if (this.isExpired(entry, now)) {
                this.cache.delete(key);
                deletedCount++;
            }
        }

        this.stats.entryCount = this.cache.size;

        if (deletedCount > 0) {
            this.logger.debug(`Memory cache cleanup: removed ${deletedCount} expired entries`);
        }

        return deletedCount;
    }

    getKeys(): string[] {
        return Array.from(this.cache.keys());
    }

    /**
     * Evict least recently used entries while at capacity
     */
    private evictIfNeeded(): void {
        while (this.cache.size >= this.maxEntries) {
            const oldest = this.cache.keys().next();
            if (oldest.done) {
                break;
            }
            this.cache.delete(oldest.value);
        }
    }
}
