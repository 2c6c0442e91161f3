/**
 * Request Utilities
 * @fileoverview Parameter encoding for search query strings
 */

/**
 * Form-encode a single query string key or value.
 *
 * Spaces become `+`; `:`, `*` and `,` stay literal so that field clauses such as
 * `g:org.example` and the match-all clause `*:*` read the way the search
 * service documents them.
 */
export function encodeParamValue(value: string): string {
    return encodeURIComponent(value)
        .replace(/%20/g, '+')
        .replace(/%3A/gi, ':')
        .replace(/%2C/gi, ',');
}

/**
 * Render one `key=value` pair
 */
export function formatParam(key: string, value: string | number): string {
    return `${encodeParamValue(key)}=${encodeParamValue(String(value))}`;
}
