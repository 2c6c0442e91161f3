/**
 * Search Request Builder
 * @fileoverview Chainable search configuration rendered to an encoded parameter string
 */

import { SEARCH_DEFAULTS } from '../config/constants';
import { formatParam } from '../utils/request-utils';
import { Query } from './query';

export const SEARCH_REQUEST_LIMIT_MAX = SEARCH_DEFAULTS.LIMIT_MAX;

/**
 * One search against the select endpoint.
 *
 * Mutators never fail. Negative `start` or `limit` values are accepted as
 * given and produce a request the service will reject or misread.
 */
export class SearchRequest {
    start: number = SEARCH_DEFAULTS.DEFAULT_START;
    limit: number = SEARCH_REQUEST_LIMIT_MAX;
    query: Query = new Query();
    core = '';
    sortField = '';
    sortAscending = true;
    facetEnabled = false;
    facetFields: string[] = [];
    /** Caller-side correlation tag, never sent to the service */
    queryKey = '';
    readonly customParams = new Map<string, string>();

    setStart(start: number): this {
        this.start = start;
        return this;
    }

    setLimit(limit: number): this {
        this.limit = limit;
        return this;
    }

    setQuery(query: Query): this {
        this.query = query;
        return this;
    }

    setCore(core: string): this {
        this.core = core;
        return this;
    }

    setSort(field: string, ascending = true): this {
        this.sortField = field;
        this.sortAscending = ascending;
        return this;
    }

    setSortAscending(ascending: boolean): this {
        this.sortAscending = ascending;
        return this;
    }

    /**
     * Turn faceting on, replacing any previous facet fields
     */
    enableFacet(...fields: string[]): this {
        this.facetEnabled = true;
        this.facetFields = fields;
        return this;
    }

    disableFacet(): this {
        this.facetEnabled = false;
        this.facetFields = [];
        return this;
    }

    setQueryKey(key: string): this {
        this.queryKey = key;
        return this;
    }

    getQueryKey(): string {
        return this.queryKey;
    }

    addCustomParam(key: string, value: string): this {
        this.customParams.set(key, value);
        return this;
    }

    /**
     * Ask the service for highlighted fragments of the given fields
     */
    enableHighlighting(fields: string[], snippets: number = SEARCH_DEFAULTS.HIGHLIGHT_SNIPPETS): this {
        return this.addCustomParam('hl', 'true')
            .addCustomParam('hl.fl', fields.join(','))
            .addCustomParam('hl.snippets', String(snippets));
    }

    /**
     * Render the encoded parameter string.
     *
     * The mandatory parameters always come first and are never read from the
     * custom parameters, so a custom key named `q`, `rows`, `wt` or `start`
     * appears twice in the output.
     */
    toRequestParams(): string {
        const params = [
            formatParam('q', this.query.render()),
            formatParam('rows', this.limit),
            formatParam('wt', SEARCH_DEFAULTS.RESPONSE_FORMAT),
            formatParam('start', this.start),
        ];

        if (this.core !== '') {
            params.push(formatParam('core', this.core));
        }

        if (this.sortField !== '') {
            const direction = this.sortAscending ? 'asc' : 'desc';
            params.push(formatParam('sort', `${this.sortField} ${direction}`));
        }

        if (this.facetEnabled) {
            params.push(formatParam('facet', 'true'));
            for (const field of this.facetFields) {
                params.push(formatParam('facet.field', field));
            }
        }

        for (const [key, value] of this.customParams) {
            params.push(formatParam(key, value));
        }

        return params.join('&');
    }
}
