/**
 * Unit tests for the public entry point
 */

import { MavenSearchClient, Query, SearchRequest, decodeVersionResponse, makeDependencyQuery } from '../../src';

describe('Public API', () => {
    test('should expose the builder, decoder and client', () => {
        const params = new SearchRequest()
            .setQuery(new Query().setCustomQuery(makeDependencyQuery('org.example', '')))
            .setLimit(1)
            .toRequestParams();

        expect(params).toBe('q=d:org.example&rows=1&wt=json&start=0');
        expect(typeof decodeVersionResponse).toBe('function');
        expect(typeof MavenSearchClient).toBe('function');
    });
});
