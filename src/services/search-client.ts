/**
 * Maven Central Search Client
 * @fileoverview Issues search requests against the select endpoint and decodes the results
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { MemoryCache } from '../cache/memory-cache';
import { CACHE_CONFIG, CLIENT_CONFIG, RETRY_CONFIG, SEARCH_API, SEARCH_CORES } from '../config/constants';
import { Query } from '../request/query';
import { SearchRequest } from '../request/search-request';
import { DocumentSchema, decodeSearchResponse } from '../response/decoder';
import { extractHighlightedFields } from '../response/highlighting';
import { Artifact, ArtifactSchema, Version, VersionSchema } from '../types/documents';
import { SearchDocument, SearchResponse } from '../types/search';
import { TransportError, createHttpError, createNetworkError } from '../utils/errors';
import { Logger, logger as defaultLogger } from '../utils/logger';

/**
 * Field holding fully qualified class names in the gav core
 */
const CLASS_HIGHLIGHT_FIELD = 'fch';

/**
 * Client configuration
 */
export interface SearchClientConfig {
    baseUrl?: string;
    timeout?: number;
    userAgent?: string;
    /** Retries after the first attempt */
    maxRetries?: number;
    /** Initial backoff, doubled on each retry */
    retryBackoffMs?: number;
    cache?: {
        enabled?: boolean;
        ttlMs?: number;
        maxEntries?: number;
    };
    logger?: Logger;
}

/**
 * Outcome of one request in a batch, keyed by the request's query key
 */
export type BatchSearchResult<Doc extends SearchDocument> =
    | { ok: true; result: SearchResponse<Doc> }
    | { ok: false; error: Error };

function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorDetail(data: unknown): string | undefined {
    if (typeof data === 'string') {
        return data || undefined;
    }
    if (typeof data === 'object' && data !== null) {
        if ('message' in data && typeof data.message === 'string') {
            return data.message;
        }
        if ('error' in data && typeof data.error === 'string') {
            return data.error;
        }
    }
    return undefined;
}

/**
 * Maven Central search client
 */
export class MavenSearchClient {
    private readonly httpClient: AxiosInstance;
    private readonly baseUrl: string;
    private readonly maxRetries: number;
    private readonly retryBackoffMs: number;
    private readonly cache: MemoryCache<unknown> | null;
    private readonly logger: Logger;

    constructor(config: SearchClientConfig = {}) {
        this.baseUrl = (config.baseUrl || CLIENT_CONFIG.BASE_URL).replace(/\/$/, '');
        this.maxRetries = config.maxRetries ?? RETRY_CONFIG.MAX_RETRIES;
        this.retryBackoffMs = config.retryBackoffMs ?? RETRY_CONFIG.BACKOFF_MS;
        this.logger = config.logger ?? defaultLogger;

        this.httpClient = axios.create({
            baseURL: this.baseUrl,
            timeout: config.timeout || CLIENT_CONFIG.TIMEOUT_MS,
            headers: {
                'User-Agent': config.userAgent || CLIENT_CONFIG.USER_AGENT,
                'Accept': 'application/json'
            },
            // Status handling happens in execute()
            validateStatus: () => true
        });

        const cacheEnabled = config.cache?.enabled ?? CACHE_CONFIG.ENABLED;
        this.cache = cacheEnabled
            ? new MemoryCache<unknown>({
                defaultTtl: config.cache?.ttlMs ?? CACHE_CONFIG.CACHE_TTL_MS,
                maxEntries: config.cache?.maxEntries ?? CACHE_CONFIG.MAX_ENTRIES,
                logger: this.logger
            })
            : null;
    }

    getBaseUrl(): string {
        return this.baseUrl;
    }

    /**
     * Path and query string for a search request, relative to the base URL
     */
    buildSearchPath(request: SearchRequest): string {
        return `${SEARCH_API.SELECT_PATH}?${request.toRequestParams()}`;
    }

    /**
     * Fetch the undecoded payload of a search request.
     * Reads the cache but never fills it; only decoded payloads are cached.
     */
    async searchRaw(request: SearchRequest): Promise<unknown> {
        const path = this.buildSearchPath(request);
        const cached = await this.readCache(path);
        return cached !== null ? cached : this.execute(path);
    }

    /**
     * Run a search and decode every document with `documentSchema`
     */
    async search<Doc extends SearchDocument>(
        request: SearchRequest,
        documentSchema: DocumentSchema<Doc>
    ): Promise<SearchResponse<Doc>> {
        const path = this.buildSearchPath(request);
        const cached = await this.readCache(path);
        if (cached !== null) {
            return decodeSearchResponse(cached, documentSchema);
        }

        const payload = await this.execute(path);
        const result = decodeSearchResponse(payload, documentSchema);
        if (this.cache) {
            await this.cache.set(path, payload);
        }
        return result;
    }

    async searchArtifacts(request: SearchRequest): Promise<SearchResponse<Artifact>> {
        return this.search(request, ArtifactSchema);
    }

    async searchVersions(request: SearchRequest): Promise<SearchResponse<Version>> {
        return this.search(request, VersionSchema);
    }

    /**
     * Artifacts matching a group and artifact id
     */
    async searchByGroupAndArtifact(groupId: string, artifactId: string, limit?: number): Promise<Artifact[]> {
        const request = new SearchRequest()
            .setQuery(new Query().setGroupId(groupId).setArtifactId(artifactId));
        if (limit !== undefined && limit > 0) {
            request.setLimit(limit);
        }
        const result = await this.searchArtifacts(request);
        return result.response.docs;
    }

    /**
     * Versions of one artifact, as ordered by the service
     */
    async listVersions(groupId: string, artifactId: string, limit?: number): Promise<Version[]> {
        const request = new SearchRequest()
            .setQuery(new Query().setGroupId(groupId).setArtifactId(artifactId))
            .setCore(SEARCH_CORES.GAV);
        if (limit !== undefined && limit > 0) {
            request.setLimit(limit);
        }
        const result = await this.searchVersions(request);
        return result.response.docs;
    }

    /**
     * Latest version of one artifact, or null when the service knows none
     */
    async getLatestVersion(groupId: string, artifactId: string): Promise<Version | null> {
        const versions = await this.listVersions(groupId, artifactId, 1);
        return versions[0] ?? null;
    }

    /**
     * Versions containing a fully qualified class name, with highlighted class names
     */
    async searchClassesWithHighlighting(
        fullyQualifiedClassName: string,
        limit?: number
    ): Promise<{ versions: Version[]; highlights: Map<string, string[]> }> {
        const request = new SearchRequest()
            .setQuery(new Query().setFullyQualifiedClassName(fullyQualifiedClassName))
            .enableHighlighting([CLASS_HIGHLIGHT_FIELD]);
        if (limit !== undefined && limit > 0) {
            request.setLimit(limit);
        }
        const result = await this.searchVersions(request);
        return {
            versions: result.response.docs,
            highlights: extractHighlightedFields(result, CLASS_HIGHLIGHT_FIELD)
        };
    }

    /**
     * Run several searches concurrently. Results are keyed by each request's
     * query key, or by `request-<index>` when it has none; a failed request does
     * not fail the batch. Requests sharing a query key overwrite each other, the
     * later request in the list winning.
     */
    async searchBatch<Doc extends SearchDocument>(
        requests: SearchRequest[],
        documentSchema: DocumentSchema<Doc>
    ): Promise<Map<string, BatchSearchResult<Doc>>> {
        const settled = await Promise.allSettled(
            requests.map((request) => this.search(request, documentSchema))
        );

        const results = new Map<string, BatchSearchResult<Doc>>();
        settled.forEach((outcome, index) => {
            const key = requests[index]?.getQueryKey() || `request-${index}`;
            if (outcome.status === 'fulfilled') {
                results.set(key, { ok: true, result: outcome.value });
            } else {
                const error = outcome.reason instanceof Error
                    ? outcome.reason
                    : new Error(String(outcome.reason));
                results.set(key, { ok: false, error });
            }
        });
        return results;
    }

    private async readCache(path: string): Promise<unknown> {
        if (!this.cache) {
            return null;
        }
        const cached = await this.cache.get(path);
        if (cached !== null) {
            this.logger.debug('Search cache hit', { path });
        }
        return cached;
    }

    async clearCache(): Promise<void> {
        if (this.cache) {
            await this.cache.clear();
        }
    }

    /**
     * GET with retries on network failures and retryable statuses
     */
    private async execute(path: string): Promise<unknown> {
        const url = `${this.baseUrl}${path}`;
        const retryable: readonly number[] = RETRY_CONFIG.RETRYABLE_STATUS;
        let lastError: TransportError | undefined;

        for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
            if (attempt > 0) {
                const backoff = this.retryBackoffMs * 2 ** (attempt - 1);
                this.logger.warn('Retrying search request', { url, attempt, backoff, reason: lastError?.message });
                await delay(backoff);
            }

            let response: AxiosResponse<unknown>;
            try {
                this.logger.debug('Sending search request', { url, attempt });
                response = await this.httpClient.get<unknown>(path);
            } catch (error) {
                lastError = createNetworkError(url, error);
                continue;
            }

            if (response.status >= 200 && response.status < 300) {
                return response.data;
            }

            lastError = createHttpError(response.status, url, errorDetail(response.data));
            if (!retryable.includes(response.status)) {
                break;
            }
        }

        const failure = lastError ?? createNetworkError(url, 'no attempt was made');
        this.logger.error('Search request failed', { url, kind: failure.kind, status: failure.status });
        throw failure;
    }
}
