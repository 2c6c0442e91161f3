/**
 * Search document shapes
 * @fileoverview Artifact and Version documents returned by the select endpoint
 */

import { z } from 'zod';

/**
 * Artifact document (default core): one entry per group/artifact pair
 */
export const ArtifactSchema = z.object({
    id: z.string(),
    g: z.string().optional(), // groupId
    a: z.string().optional(), // artifactId
    latestVersion: z.string().optional(),
    repositoryId: z.string().optional(),
    p: z.string().optional(), // packaging
    timestamp: z.number().int().optional(),
    versionCount: z.number().int().optional(),
    text: z.array(z.string()).optional(),
    ec: z.array(z.string()).optional(), // extension classifier
});
export type Artifact = z.infer<typeof ArtifactSchema>;

/**
 * Version document (gav core): one entry per group/artifact/version triple
 */
export const VersionSchema = z.object({
    id: z.string(),
    g: z.string().optional(),
    a: z.string().optional(),
    v: z.string().optional(), // version
    p: z.string().optional(),
    timestamp: z.number().int().optional(),
    ec: z.array(z.string()).optional(),
    tags: z.array(z.string()).optional(),
});
export type Version = z.infer<typeof VersionSchema>;
