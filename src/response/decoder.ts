/**
 * Response Decoder
 * @fileoverview Decodes the select endpoint's JSON envelope into typed search responses
 */

import { z } from 'zod';
import { Artifact, ArtifactSchema, Version, VersionSchema } from '../types/documents';
import { FacetCounts, SearchDocument, SearchResponse } from '../types/search';
import { DecodeError } from '../utils/errors';

const ResponseHeaderSchema = z.object({
    status: z.number().int(),
    QTime: z.number().int(),
    params: z.record(z.union([z.string(), z.array(z.string())])).default({}),
});

const ResponseBodySchema = z.object({
    numFound: z.number().int(),
    start: z.number().int(),
    docs: z.array(z.unknown()),
});

const FacetCountsSchema = z.object({
    facet_fields: z.record(z.array(z.union([z.string(), z.number()]))).optional(),
    facet_queries: z.record(z.number()).optional(),
    facet_dates: z.record(z.unknown()).optional(),
});

const HighlightingSchema = z.record(z.record(z.array(z.string())));

const EnvelopeSchema = z.object({
    responseHeader: ResponseHeaderSchema,
    response: ResponseBodySchema,
    facet_counts: FacetCountsSchema.nullish(),
    highlighting: HighlightingSchema.nullish(),
});

type WireFacetCounts = z.infer<typeof FacetCountsSchema>;

/**
 * Schema describing one document shape
 */
export type DocumentSchema<Doc extends SearchDocument> = z.ZodType<Doc, z.ZodTypeDef, unknown>;

function formatPath(path: ReadonlyArray<string | number>): string {
    return path.map(String).join('.');
}

function firstIssue(error: z.ZodError): z.ZodIssue | undefined {
    return error.issues[0];
}

function parsePayload(raw: unknown): unknown {
    if (typeof raw !== 'string') {
        return raw;
    }
    try {
        return JSON.parse(raw);
    } catch (error) {
        throw new DecodeError('Search response is not valid JSON', '', { cause: error });
    }
}

function convertFacetCounts(wire: WireFacetCounts): FacetCounts {
    const facetCounts: FacetCounts = {};
    if (wire.facet_fields) {
        facetCounts.facetFields = wire.facet_fields;
    }
    if (wire.facet_queries) {
        facetCounts.facetQueries = wire.facet_queries;
    }
    if (wire.facet_dates) {
        facetCounts.facetDates = wire.facet_dates;
    }
    return facetCounts;
}

/**
 * Decode a search response, validating every document against `documentSchema`.
 *
 * `raw` may be the JSON text or an already parsed value. Absent facet or
 * highlighting blocks decode to null.
 *
 * @throws DecodeError when the payload is not JSON, lacks the header or body,
 * or holds a document that does not match the schema
 */
export function decodeSearchResponse<Doc extends SearchDocument>(
    raw: unknown,
    documentSchema: DocumentSchema<Doc>
): SearchResponse<Doc> {
    const payload = parsePayload(raw);

    const envelope = EnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
        const issue = firstIssue(envelope.error);
        throw new DecodeError(
            `Malformed search response: ${issue?.message ?? 'unknown issue'}`,
            issue ? formatPath(issue.path) : '',
            { cause: envelope.error }
        );
    }

    const { responseHeader, response, facet_counts, highlighting } = envelope.data;

    const docs = response.docs.map((doc, index) => {
        const parsed = documentSchema.safeParse(doc);
        if (!parsed.success) {
            const issue = firstIssue(parsed.error);
            throw new DecodeError(
                `Malformed search document: ${issue?.message ?? 'unknown issue'}`,
                formatPath(['response', 'docs', index, ...(issue?.path ?? [])]),
                { cause: parsed.error }
            );
        }
        return parsed.data;
    });

    return {
        responseHeader,
        response: {
            numFound: response.numFound,
            start: response.start,
            docs,
        },
        facetCounts: facet_counts ? convertFacetCounts(facet_counts) : null,
        highlighting: highlighting ?? null,
    };
}

export function decodeArtifactResponse(raw: unknown): SearchResponse<Artifact> {
    return decodeSearchResponse(raw, ArtifactSchema);
}

export function decodeVersionResponse(raw: unknown): SearchResponse<Version> {
    return decodeSearchResponse(raw, VersionSchema);
}
