/**
 * Error types for the Maven Central search client
 * @fileoverview Decode and transport errors plus HTTP status classification
 */

import { HTTP_STATUS } from '../config/constants';

/**
 * Category of a failed HTTP exchange
 */
export type TransportErrorKind =
    | 'rate_limited'
    | 'not_found'
    | 'unauthorized'
    | 'forbidden'
    | 'bad_request'
    | 'server_error'
    | 'http_error'
    | 'network';

/**
 * Base class for every error raised by this package
 */
export class SearchClientError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Raised when a payload is not valid JSON or lacks the expected envelope
 */
export class DecodeError extends SearchClientError {
    /** Dotted path of the element that failed, empty for the payload itself */
    readonly path: string;

    constructor(message: string, path = '', options?: { cause?: unknown }) {
        super(path ? `${message} (at ${path})` : message, options);
        this.path = path;
    }
}

/**
 * Raised when the HTTP exchange fails or answers with an error status
 */
export class TransportError extends SearchClientError {
    readonly kind: TransportErrorKind;
    readonly status: number | undefined;
    readonly url: string;

    constructor(kind: TransportErrorKind, message: string, url: string, status?: number, options?: { cause?: unknown }) {
        super(message, options);
        this.kind = kind;
        this.status = status;
        this.url = url;
    }
}

/**
 * Map an HTTP status code to a transport error kind
 */
export function classifyHttpStatus(status: number): TransportErrorKind {
    switch (status) {
        case HTTP_STATUS.TOO_MANY_REQUESTS:
            return 'rate_limited';
        case HTTP_STATUS.NOT_FOUND:
            return 'not_found';
        case HTTP_STATUS.UNAUTHORIZED:
            return 'unauthorized';
        case HTTP_STATUS.FORBIDDEN:
            return 'forbidden';
        case HTTP_STATUS.BAD_REQUEST:
            return 'bad_request';
        default:
            return status >= HTTP_STATUS.INTERNAL_SERVER_ERROR ? 'server_error' : 'http_error';
    }
}

const KIND_TITLES: Record<TransportErrorKind, string> = {
    rate_limited: 'Rate limited by search service',
    not_found: 'Resource not found',
    unauthorized: 'Unauthorized request',
    forbidden: 'Forbidden request',
    bad_request: 'Bad request',
    server_error: 'Search service error',
    http_error: 'Unexpected HTTP status',
    network: 'Network failure',
};

/**
 * Create a TransportError for an HTTP status answered by the service
 */
export function createHttpError(status: number, url: string, detail?: string): TransportError {
    const kind = classifyHttpStatus(status);
    const message = detail
        ? `${KIND_TITLES[kind]} (HTTP ${status}): ${detail}`
        : `${KIND_TITLES[kind]} (HTTP ${status})`;
    return new TransportError(kind, message, url, status);
}

/**
 * Create a TransportError for a request that never got a response
 */
export function createNetworkError(url: string, cause: unknown): TransportError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new TransportError('network', `${KIND_TITLES.network}: ${reason}`, url, undefined, { cause });
}
