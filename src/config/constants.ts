/**
 * Configuration Constants
 * @fileoverview Configuration constants for the Maven Central search client
 */

/**
 * Maven Central Search API Configuration
 */
export const SEARCH_API = {
    BASE_URL: 'https://search.maven.org',
    SELECT_PATH: '/solrsearch/select',
    TIMEOUT_MS: 30000,
    USER_AGENT: 'maven-search-client/1.0'
} as const;

/**
 * Query and request rendering defaults
 */
export const SEARCH_DEFAULTS = {
    LIMIT_MAX: 200,
    DEFAULT_START: 0,
    WILDCARD_QUERY: '*:*',
    CONJUNCTION: ' AND ',
    RESPONSE_FORMAT: 'json',
    HIGHLIGHT_OPEN: '<em>',
    HIGHLIGHT_CLOSE: '</em>',
    HIGHLIGHT_SNIPPETS: 3
} as const;

/**
 * Solr cores exposed by the search endpoint
 */
export const SEARCH_CORES = {
    /** One document per group/artifact/version triple */
    GAV: 'gav'
} as const;

/**
 * Retry Configuration
 */
export const RETRY_CONFIG = {
    MAX_RETRIES: 3,
    BACKOFF_MS: 500,
    RETRYABLE_STATUS: [429, 502, 503, 504]
} as const;

/**
 * Cache Configuration
 */
export const CACHE_CONFIG = {
    ENABLED: false,
    CACHE_TTL_MS: 300000, // 5 minutes
    MAX_ENTRIES: 1000
} as const;

/**
 * HTTP Status Codes
 */
export const HTTP_STATUS = {
    BAD_REQUEST: 400,
    UNAUTHORIZED: 401,
    FORBIDDEN: 403,
    NOT_FOUND: 404,
    TOO_MANY_REQUESTS: 429,
    INTERNAL_SERVER_ERROR: 500
} as const;

/**
 * Parse a timeout in milliseconds, falling back to the default when unset or not a positive number
 */
export function parseTimeout(value: string | undefined): number {
    const parsed = parseInt(value || '', 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : SEARCH_API.TIMEOUT_MS;
}

/**
 * Client Configuration from Environment
 */
export const CLIENT_CONFIG = {
    BASE_URL: process.env['MAVEN_SEARCH_BASE_URL'] || SEARCH_API.BASE_URL,
    TIMEOUT_MS: parseTimeout(process.env['MAVEN_SEARCH_TIMEOUT_MS']),
    USER_AGENT: process.env['MAVEN_SEARCH_USER_AGENT'] || SEARCH_API.USER_AGENT
} as const;
