/**
 * Base Cache for search responses
 * @fileoverview Cache interfaces and shared bookkeeping for response caches
 */

import { Logger, logger as defaultLogger } from '../utils/logger';

/**
 * Cache entry with metadata
 */
export interface CacheEntry<T> {
    /** Cached data */
    data: T;
    /** Creation timestamp */
    timestamp: number;
    /** Time-to-live in milliseconds */
    ttl: number;
    /** Computed expiration timestamp */
    expiresAt: number;
}

/**
 * Cache configuration options
 */
export interface CacheConfig {
    /** Default TTL in milliseconds */
    defaultTtl: number;
    /** Logger instance */
    logger?: Logger;
}

/**
 * Cache statistics for monitoring
 */
export interface CacheStats {
    hits: number;
    misses: number;
    entryCount: number;
    /** Hit rate percentage */
    hitRate: number;
}

/**
 * Cache operation options
 */
export interface CacheOptions {
    /** Custom TTL for this entry */
    ttl?: number;
}

export interface ICache<T> {
    get(key: string): Promise<T | null>;
    set(key: string, data: T, options?: CacheOptions): Promise<void>;
    has(key: string): Promise<boolean>;
    delete(key: string): Promise<boolean>;
    clear(): Promise<void>;
    /** Remove expired entries, returning how many were removed */
    cleanup(): Promise<number>;
    getStats(): CacheStats;
}

function emptyStats(): CacheStats {
    return {
        hits: 0,
        misses: 0,
        entryCount: 0,
        hitRate: 0
    };
}

/**
 * Abstract base cache implementation
 */
export abstract class BaseCache<T> implements ICache<T> {
    protected readonly defaultTtl: number;
    protected readonly logger: Logger;
    protected stats: CacheStats = emptyStats();

    constructor(config: CacheConfig) {
        this.defaultTtl = config.defaultTtl;
        this.logger = config.logger ?? defaultLogger;
    }

    /**
     * Check if cache entry is expired
     */
    protected isExpired(entry: CacheEntry<T>, now: number = Date.now()): boolean {
        return now > entry.expiresAt;
    }

    /**
     * Create cache entry with proper metadata
     */
    protected createEntry(data: T, options?: CacheOptions): CacheEntry<T> {
        const now = Date.now();
        const ttl = options?.ttl ?? this.defaultTtl;

        return {
            data,
            timestamp: now,
            ttl,
            expiresAt: now + ttl
        };
    }

    protected updateStats(): void {
        const total = this.stats.hits + this.stats.misses;
        this.stats.hitRate = total > 0 ? (this.stats.hits / total) * 100 : 0;
    }

    abstract get(key: string): Promise<T | null>;
    abstract set(key: string, data: T, options?: CacheOptions): Promise<void>;
    abstract has(key: string): Promise<boolean>;
    abstract delete(key: string): Promise<boolean>;
    abstract clear(): Promise<void>;
    abstract cleanup(): Promise<number>;

    getStats(): CacheStats {
        this.updateStats();
        return { ...this.stats };
    }

    resetStats(): void {
        this.stats = emptyStats();
    }
}
