/**
 * Search response envelope types
 * @fileoverview Generic response container shared by every document shape
 */

/**
 * Minimal capability of a document: the key used by the highlighting map
 */
export interface SearchDocument {
    id: string;
}

/**
 * Request parameters echoed by the service
 */
export type ResponseParams = Record<string, string | string[]>;

export interface ResponseHeader {
    status: number;
    QTime: number;
    params: ResponseParams;
}

export interface ResponseBody<Doc extends SearchDocument> {
    numFound: number;
    start: number;
    /** In service order, never re-sorted */
    docs: Doc[];
}

/**
 * One entry of a facet field list: value followed by count
 */
export type FacetFieldEntry = string | number;

export interface FacetCounts {
    /** Field name to alternating value/count entries */
    facetFields?: Record<string, FacetFieldEntry[]>;
    /** Facet query to match count */
    facetQueries?: Record<string, number>;
    facetDates?: Record<string, unknown>;
}

/**
 * Document id to field name to highlighted fragments
 */
export type Highlighting = Record<string, Record<string, string[]>>;

/**
 * Decoded search response.
 * `facetCounts` and `highlighting` are null when the service sent no such block.
 */
export interface SearchResponse<Doc extends SearchDocument> {
    responseHeader: ResponseHeader;
    response: ResponseBody<Doc>;
    facetCounts: FacetCounts | null;
    highlighting: Highlighting | null;
}

export interface FacetValueCount {
    value: string;
    count: number;
}
