/**
 * Query Model
 * @fileoverview A single search predicate rendered to the service's query syntax
 */

import { SEARCH_DEFAULTS } from '../config/constants';

/**
 * Field prefixes understood by the search service, in rendering order
 */
const QUERY_FIELDS = [
    ['groupId', 'g'],
    ['artifactId', 'a'],
    ['version', 'v'],
    ['tags', 'tags'],
    ['sha1', '1'],
    ['className', 'c'],
    ['fullyQualifiedClassName', 'fc'],
    ['packaging', 'p'],
    ['classifier', 'l'],
] as const;

export type QueryField = (typeof QUERY_FIELDS)[number][0];

/**
 * Search predicate over artifact coordinates and content.
 *
 * Field values are not escaped; callers must pre-sanitize values that contain
 * query grammar metacharacters.
 */
export class Query {
    groupId = '';
    artifactId = '';
    version = '';
    tags = '';
    sha1 = '';
    className = '';
    fullyQualifiedClassName = '';
    packaging = '';
    classifier = '';
    /** Raw query; when set it replaces every field clause */
    customQuery = '';

    setGroupId(groupId: string): this {
        this.groupId = groupId;
        return this;
    }

    setArtifactId(artifactId: string): this {
        this.artifactId = artifactId;
        return this;
    }

    setVersion(version: string): this {
        this.version = version;
        return this;
    }

    setTags(tags: string): this {
        this.tags = tags;
        return this;
    }

    setSha1(sha1: string): this {
        this.sha1 = sha1;
        return this;
    }

    setClassName(className: string): this {
        this.className = className;
        return this;
    }

    setFullyQualifiedClassName(fullyQualifiedClassName: string): this {
        this.fullyQualifiedClassName = fullyQualifiedClassName;
        return this;
    }

    setPackaging(packaging: string): this {
        this.packaging = packaging;
        return this;
    }

    setClassifier(classifier: string): this {
        this.classifier = classifier;
        return this;
    }

    setCustomQuery(query: string): this {
        this.customQuery = query;
        return this;
    }

    /**
     * Clauses contributed by the non-empty fields, in rendering order
     */
    clauses(): string[] {
        const clauses: string[] = [];
        for (const [field, prefix] of QUERY_FIELDS) {
            const value = this[field];
            if (value !== '') {
                clauses.push(`${prefix}:${value}`);
            }
        }
        return clauses;
    }

    isEmpty(): boolean {
        return this.customQuery === '' && this.clauses().length === 0;
    }

    /**
     * Render the predicate, unencoded. An empty query matches everything.
     */
    render(): string {
        if (this.customQuery !== '') {
            return this.customQuery;
        }

        const clauses = this.clauses();
        if (clauses.length === 0) {
            return SEARCH_DEFAULTS.WILDCARD_QUERY;
        }
        return clauses.join(SEARCH_DEFAULTS.CONJUNCTION);
    }
}
