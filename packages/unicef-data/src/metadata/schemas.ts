/**
 * Zod schemas for the on-disk metadata tables
 *
 * Each file may open with a `_metadata` header; everything else is keyed by
 * indicator code, prefix, ISO3 code or dataflow id.
 */

import { z } from 'zod';

export const MetadataHeaderSchema = z
  .object({
    version: z.coerce.string().optional(),
    synced_at: z.coerce.string().optional(),
    source: z.string().optional(),
  })
  .passthrough();

export type MetadataHeader = z.infer<typeof MetadataHeaderSchema>;

const StringOrListSchema = z.union([z.string(), z.array(z.string())]);

/** Integer tiers 1-4 as written by the sync tooling, or the tier name */
export const TierSchema = z.union([
  z.number().int().min(1).max(4),
  z.enum(['verified', 'limited_or_deprecated', 'no_data', 'orphan']),
]);

export const IndicatorRecordSchema = z
  .object({
    code: z.string().optional(),
    name: z.string().nullish(),
    description: z.string().nullish(),
    category: z.string().nullish(),
    dataflow: StringOrListSchema.nullish(),
    dataflows: StringOrListSchema.nullish(),
    tier: TierSchema.optional(),
    tier_reason: z.string().nullish(),
    disaggregations: z.array(z.string()).nullish(),
    disaggregations_with_totals: z.array(z.string()).nullish(),
  })
  .passthrough();

export type IndicatorRecord = z.infer<typeof IndicatorRecordSchema>;

export const IndicatorsFileSchema = z.object({
  _metadata: MetadataHeaderSchema.optional(),
  indicators: z.record(z.string(), IndicatorRecordSchema),
});

export const FallbackSequencesFileSchema = z.object({
  _metadata: MetadataHeaderSchema.optional(),
  fallback_sequences: z.record(z.string(), z.array(z.string().min(1)).min(1)),
});

export const DataflowOverridesFileSchema = z.object({
  _metadata: MetadataHeaderSchema.optional(),
  overrides: z.record(z.string(), z.string().min(1)),
});

export const CountriesFileSchema = z.object({
  _metadata: MetadataHeaderSchema.optional(),
  countries: z.record(z.string(), z.string()),
});

export const RegionsFileSchema = z.object({
  _metadata: MetadataHeaderSchema.optional(),
  regions: z.record(z.string(), z.string()),
});

export const DataflowFileSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  agency: z.string().default('UNICEF'),
  version: z.coerce.string().default('1.0'),
  synced_at: z.coerce.string().optional(),
  dimensions: z.array(
    z.object({
      id: z.string().min(1),
      position: z.number().int().positive(),
      codelist: z.string().nullish(),
      values: z.array(z.coerce.string()).optional(),
    })
  ),
  time_dimension: z.string().default('TIME_PERIOD'),
  primary_measure: z.string().default('OBS_VALUE'),
  attributes: z
    .array(
      z.object({
        id: z.string().min(1),
        codelist: z.string().nullish(),
      })
    )
    .default([]),
});

export type DataflowFile = z.infer<typeof DataflowFileSchema>;

/**
 * Flatten zod issues into "path: message" strings
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
