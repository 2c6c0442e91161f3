/**
 * Advanced search helpers
 * @fileoverview Dependency and license clauses plus a coordinate options builder
 */

import { Query } from './query';

/**
 * Build a dependency clause from a group/artifact pair.
 * Returns an empty string when both are empty, meaning "no such clause".
 */
export function makeDependencyQuery(groupId: string, artifactId: string): string {
    if (groupId !== '' && artifactId !== '') {
        return `d:${groupId}:${artifactId}`;
    }
    if (groupId !== '') {
        return `d:${groupId}`;
    }
    if (artifactId !== '') {
        return `d:*:${artifactId}`;
    }
    return '';
}

/**
 * Build a license clause. An empty license yields the bare prefix.
 */
export function makeLicenseQuery(license: string): string {
    return `l:${license}`;
}

/**
 * Coordinate filters for advanced searches
 */
export class AdvancedSearchOptions {
    groupId = '';
    artifactId = '';
    version = '';
    packaging = '';
    classifier = '';

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

    setPackaging(packaging: string): this {
        this.packaging = packaging;
        return this;
    }

    setClassifier(classifier: string): this {
        this.classifier = classifier;
        return this;
    }

    toQuery(): Query {
        return new Query()
            .setGroupId(this.groupId)
            .setArtifactId(this.artifactId)
            .setVersion(this.version)
            .setPackaging(this.packaging)
            .setClassifier(this.classifier);
    }
}
