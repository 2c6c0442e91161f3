/**
 * Unit tests for the search request builder
 */

import { Query } from '../../../src/request/query';
import { SEARCH_REQUEST_LIMIT_MAX, SearchRequest } from '../../../src/request/search-request';

describe('SearchRequest', () => {
    describe('defaults', () => {
        test('should start at zero with the maximum limit and an empty query', () => {
            const request = new SearchRequest();

            expect(request.start).toBe(0);
            expect(request.limit).toBe(SEARCH_REQUEST_LIMIT_MAX);
            expect(SEARCH_REQUEST_LIMIT_MAX).toBe(200);
            expect(request.query.isEmpty()).toBe(true);
            expect(request.toRequestParams()).toBe('q=*:*&rows=200&wt=json&start=0');
        });
    });

    describe('toRequestParams', () => {
        test('should render start, limit and core in fixed order', () => {
            const params = new SearchRequest().setStart(0).setLimit(10).setCore('gav').toRequestParams();

            expect(params).toBe('q=*:*&rows=10&wt=json&start=0&core=gav');
        });

        test('should encode the rendered query', () => {
            const params = new SearchRequest()
                .setQuery(new Query().setGroupId('org.example').setArtifactId('core'))
                .toRequestParams();

            expect(params).toBe('q=g:org.example+AND+a:core&rows=200&wt=json&start=0');
        });

        test('should render every section in order', () => {
            const params = new SearchRequest()
                .setQuery(new Query().setGroupId('org.example'))
                .setStart(20)
                .setLimit(50)
                .setCore('gav')
                .setSort('timestamp', false)
                .enableFacet('p')
                .addCustomParam('fl', 'id')
                .toRequestParams();

            expect(params).toBe(
                'q=g:org.example&rows=50&wt=json&start=20&core=gav&sort=timestamp+desc&facet=true&facet.field=p&fl=id'
            );
        });

        test('should emit each mandatory parameter exactly once', () => {
            const params = new SearchRequest()
                .setCore('gav')
                .setSort('g')
                .enableFacet('p', 'g')
                .addCustomParam('hl', 'true')
                .toRequestParams();

            expect(params).toHaveParamCount('q', 1);
            expect(params).toHaveParamCount('rows', 1);
            expect(params).toHaveParamCount('wt', 1);
            expect(params).toHaveParamCount('start', 1);
        });

        test('should accept negative pagination values unvalidated', () => {
            const params = new SearchRequest().setStart(-5).setLimit(-1).toRequestParams();

            expect(params).toBe('q=*:*&rows=-1&wt=json&start=-5');
        });

        test('should render identical strings on repeated calls', () => {
            const request = new SearchRequest().enableFacet('p').addCustomParam('fl', 'id,g');

            expect(request.toRequestParams()).toBe(request.toRequestParams());
        });
    });

    describe('sort', () => {
        test('should render ascending by default', () => {
            expect(new SearchRequest().setSort('timestamp').toRequestParams())
                .toBe('q=*:*&rows=200&wt=json&start=0&sort=timestamp+asc');
        });

        test('should flip only the direction when the ascending flag changes', () => {
            const request = new SearchRequest().setSort('timestamp', true);
            expect(request.toRequestParams()).toContain('&sort=timestamp+asc');

            request.setSortAscending(false);
            expect(request.toRequestParams()).toContain('&sort=timestamp+desc');
            expect(request.toRequestParams()).toHaveParamCount('sort', 1);
        });

        test('should omit sort without a field regardless of direction', () => {
            const params = new SearchRequest().setSortAscending(false).toRequestParams();

            expect(params).toBe('q=*:*&rows=200&wt=json&start=0');
        });
    });

    describe('facets', () => {
        test('should emit only the toggle when no fields are given', () => {
            const params = new SearchRequest().enableFacet().toRequestParams();

            expect(params).toBe('q=*:*&rows=200&wt=json&start=0&facet=true');
            expect(params).toHaveParamCount('facet.field', 0);
        });

        test('should emit one facet.field per field in the supplied order', () => {
            const params = new SearchRequest().enableFacet('p', 'g', 'ec').toRequestParams();

            expect(params).toBe('q=*:*&rows=200&wt=json&start=0&facet=true&facet.field=p&facet.field=g&facet.field=ec');
        });

        test('should replace fields on a second call and clear them when disabled', () => {
            const request = new SearchRequest().enableFacet('p', 'g').enableFacet('ec');
            expect(request.facetFields).toEqual(['ec']);

            request.disableFacet();
            expect(request.toRequestParams()).toBe('q=*:*&rows=200&wt=json&start=0');
        });
    });

    describe('custom parameters', () => {
        test('should keep the last value for a repeated key', () => {
            const params = new SearchRequest()
                .addCustomParam('fl', 'id')
                .addCustomParam('fl', 'id,g,a')
                .toRequestParams();

            expect(params).toBe('q=*:*&rows=200&wt=json&start=0&fl=id,g,a');
        });

        test('should duplicate a mandatory key when a custom parameter collides', () => {
            const params = new SearchRequest().addCustomParam('rows', '5').toRequestParams();

            expect(params).toBe('q=*:*&rows=200&wt=json&start=0&rows=5');
            expect(params).toHaveParamCount('rows', 2);
        });

        test('should encode custom values', () => {
            const params = new SearchRequest().addCustomParam('fq', 'p:jar AND v:1.0&x').toRequestParams();

            expect(params).toContain('&fq=p:jar+AND+v:1.0%26x');
        });

        test('should add highlighting parameters', () => {
            const params = new SearchRequest().enableHighlighting(['fch', 'text'], 5).toRequestParams();

            expect(params).toContain('&hl=true');
            expect(params).toContain('&hl.fl=fch,text');
            expect(params).toContain('&hl.snippets=5');
        });
    });

    describe('query key', () => {
        test('should store the key without rendering it', () => {
            const request = new SearchRequest().setQueryKey('batch-7');

            expect(request.getQueryKey()).toBe('batch-7');
            expect(request.toRequestParams()).toBe('q=*:*&rows=200&wt=json&start=0');
        });
    });
});
