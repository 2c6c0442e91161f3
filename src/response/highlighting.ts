/**
 * Highlighting helpers
 * @fileoverview Lookups into the highlighting map and emphasis marker removal
 */

import { SEARCH_DEFAULTS } from '../config/constants';
import { SearchDocument, SearchResponse } from '../types/search';

/**
 * Highlighted fields of one document, looked up by its id exactly as returned
 */
export function getHighlights<Doc extends SearchDocument>(
    result: SearchResponse<Doc>,
    doc: Doc
): Record<string, string[]> | undefined {
    return result.highlighting?.[doc.id];
}

/**
 * Fragments for one field of one document, empty when none were returned
 */
export function getHighlightFragments<Doc extends SearchDocument>(
    result: SearchResponse<Doc>,
    doc: Doc,
    field: string
): string[] {
    return getHighlights(result, doc)?.[field] ?? [];
}

/**
 * Document id to fragments for one field, skipping documents without any
 */
export function extractHighlightedFields<Doc extends SearchDocument>(
    result: SearchResponse<Doc>,
    field: string
): Map<string, string[]> {
    const extracted = new Map<string, string[]>();
    if (!result.highlighting) {
        return extracted;
    }

    for (const [docId, fields] of Object.entries(result.highlighting)) {
        const fragments = fields[field];
        if (fragments && fragments.length > 0) {
            extracted.set(docId, fragments);
        }
    }
    return extracted;
}

/**
 * Remove the emphasis markers from a fragment by literal substring removal.
 * Nested or unbalanced markers are not a supported shape.
 */
export function stripEmphasis(fragment: string): string {
    return fragment
        .split(SEARCH_DEFAULTS.HIGHLIGHT_OPEN).join('')
        .split(SEARCH_DEFAULTS.HIGHLIGHT_CLOSE).join('');
}
