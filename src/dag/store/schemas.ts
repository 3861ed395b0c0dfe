/**
 * @file Cache Store Schemas
 *
 * Zod runtime schemas for everything the store reads back from disk:
 * artifact metadata, run registry entries and params registry entries.
 * A file that fails its schema is reported, never silently replaced.
 *
 * @module dag/store/schemas
 */

import { z } from 'zod';
import type { ParamsDump } from '../fingerprint/types.js';
import type { ArtifactMetadata, ParamsRegistryEntry, RunEntry } from './types.js';

// ─── Params Dump ──────────────────────────────────────────────────────────────

export const ParamsDumpSchema: z.ZodType<ParamsDump> = z.lazy(() =>
    z.record(z.string(), z.union([z.string(), z.null(), ParamsDumpSchema])),
);

// ─── Artifact Metadata ────────────────────────────────────────────────────────

export const ArtifactMetadataSchema: z.ZodType<ArtifactMetadata> = z.object({
    artifact_name: z.string(),
    stage:         z.string(),
    record_name:   z.string(),
    params_hash:   z.string(),
    params:        ParamsDumpSchema,
    stage_chain:   z.array(z.string()),
    run_reference: z.string(),
    cacher:        z.string(),
    timestamp:     z.string(),
});

// ─── Registries ───────────────────────────────────────────────────────────────

export const RunEntrySchema: z.ZodType<RunEntry> = z.object({
    reference:       z.string(),
    experiment_name: z.string(),
    run_number:      z.number().int().positive(),
    timestamp:       z.string(),
    status:          z.enum(['incomplete', 'complete', 'failed']),
    param_names:     z.array(z.string()),
    hashes:          z.array(z.string()),
    store_full:      z.boolean(),
});

export const ParamsRegistryEntrySchema: z.ZodType<ParamsRegistryEntry> = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('params'),   hash: z.string(), params: ParamsDumpSchema }),
    z.object({ kind: z.literal('combined'), hash: z.string(), contributing: z.array(z.string()) }),
]);
