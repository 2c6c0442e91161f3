/**
 * Maven Central search client
 * @fileoverview Public entry point
 */

export { Query } from './request/query';
export type { QueryField } from './request/query';
export { AdvancedSearchOptions, makeDependencyQuery, makeLicenseQuery } from './request/advanced-search';
export { SearchRequest, SEARCH_REQUEST_LIMIT_MAX } from './request/search-request';
export { decodeSearchResponse, decodeArtifactResponse, decodeVersionResponse } from './response/decoder';
export type { DocumentSchema } from './response/decoder';
export { getHighlights, getHighlightFragments, extractHighlightedFields, stripEmphasis } from './response/highlighting';
export { getFacetFieldCounts } from './response/facets';
export { ArtifactSchema, VersionSchema } from './types/documents';
export type { Artifact, Version } from './types/documents';
export type {
    FacetCounts,
    FacetFieldEntry,
    FacetValueCount,
    Highlighting,
    ResponseBody,
    ResponseHeader,
    ResponseParams,
    SearchDocument,
    SearchResponse
} from './types/search';
export { MavenSearchClient } from './services/search-client';
export type { SearchClientConfig, BatchSearchResult } from './services/search-client';
export { MemoryCache } from './cache/memory-cache';
export type { CacheStats } from './cache/base-cache';
export { SearchClientError, DecodeError, TransportError, classifyHttpStatus } from './utils/errors';
export type { TransportErrorKind } from './utils/errors';
export { ConsoleLogger, LogLevel, logger } from './utils/logger';
export type { Logger } from './utils/logger';
export { encodeParamValue } from './utils/request-utils';
