/**
 * Facet helpers
 * @fileoverview Pairs facet field value/count lists
 */

import { FacetCounts, FacetValueCount } from '../types/search';

/**
 * Pair a facet field's alternating value/count list.
 * A trailing value without a count is dropped.
 */
export function getFacetFieldCounts(facetCounts: FacetCounts | null, field: string): FacetValueCount[] {
    const entries = facetCounts?.facetFields?.[field];
    if (!entries) {
        return [];
    }

    const counts: FacetValueCount[] = [];
    for (let i = 0; i + 1 < entries.length; i += 2) {
        const value = entries[i];
        const count = entries[i + 1];
        counts.push({
            value: String(value),
            count: typeof count === 'number' ? count : Number(count),
        });
    }
    return counts;
}
