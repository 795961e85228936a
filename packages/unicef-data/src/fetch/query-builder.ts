/**
 * SDMX query construction
 *
 * The series key is positional: one `.`-separated segment per dimension in
 * the dataflow's declared order. An unconstrained dimension is an empty
 * segment, several allowed codes are joined with `+`, and a filter naming a
 * dimension the dataflow does not have is dropped rather than guessed.
 *
 *   {base}/data/{AGENCY},{DATAFLOW},{VERSION}/{KEY}?format=csv&labels=id[&startPeriod=Y][&endPeriod=Y]
 *
 * @module fetch/query-builder
 */

import { z } from 'zod';

import { InvalidQueryError } from '../core/errors.js';
import {
  TOTAL_CODE,
  type DataflowSchema,
  type QuerySpec,
  type YearRange,
} from '../core/types.js';
import type { SdmxEndpointConfig } from '../core/config.js';

/** Dimensions that carry the area code, in the order they are looked for */
export const AREA_DIMENSIONS: readonly string[] = ['REF_AREA', 'COUNTRY'];
export const INDICATOR_DIMENSION = 'INDICATOR';

const CODE_PATTERN = /^[A-Za-z0-9_\-]+$/;

const CodeSchema = z.string().trim().min(1).regex(CODE_PATTERN, 'must contain only letters, digits, "_" or "-"');
const YearSchema = z.number().int().min(1900).max(2100);

const QuerySpecInputSchema = z
  .object({
    indicatorCode: CodeSchema,
    countries: z.union([z.literal('all'), z.array(CodeSchema)]).nullish(),
    years: z
      .object({
        start: YearSchema.optional(),
        end: YearSchema.optional(),
        list: z.array(YearSchema).min(1).optional(),
      })
      .nullish(),
    filters: z.record(z.string(), z.union([CodeSchema, z.array(CodeSchema)])).optional(),
    totals: z.boolean().optional(),
  })
  .refine(
    (input) =>
      input.years?.start === undefined ||
      input.years.end === undefined ||
      input.years.start <= input.years.end,
    { message: 'start year must not be after end year', path: ['years'] }
  );

export interface QuerySpecInput {
  readonly indicatorCode: string;
  /** ISO3 or aggregate codes; 'all', null or an empty list mean every area */
  readonly countries?: readonly string[] | 'all' | null;
  readonly years?: YearRange | null;
  readonly filters?: Readonly<Record<string, string | readonly string[]>>;
  readonly totals?: boolean;
}

/**
 * Validate caller input into a QuerySpec
 *
 * @throws {InvalidQueryError} with one issue per violated rule
 */
export function buildQuerySpec(input: QuerySpecInput): QuerySpec {
  const parsed = QuerySpecInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new InvalidQueryError(`Invalid query: ${issues.join('; ')}`, issues);
  }

  const { indicatorCode, countries, years, filters, totals } = parsed.data;

  const normalizedFilters: Record<string, readonly string[]> = {};
  for (const [dimension, value] of Object.entries(filters ?? {})) {
    const codes = typeof value === 'string' ? [value] : value;
    if (codes.length > 0) {
      normalizedFilters[dimension.trim().toUpperCase()] = [...new Set(codes)];
    }
  }

  const countryList =
    countries === null || countries === undefined || countries === 'all'
      ? 'all'
      : [...new Set(countries.map((c) => c.toUpperCase()))];

  return {
    indicatorCode,
    countries: countryList === 'all' || countryList.length === 0 ? 'all' : countryList,
    ...(years ? { years: normalizeYears(years) } : {}),
    filters: normalizedFilters,
    totals: totals ?? false,
  };
}

function normalizeYears(years: YearRange): YearRange {
  if (years.list && years.list.length > 0) {
    const list = [...new Set(years.list)].sort((a, b) => a - b);
    return { start: list[0], end: list[list.length - 1], list };
  }
  return {
    ...(years.start !== undefined ? { start: years.start } : {}),
    ...(years.end !== undefined ? { end: years.end } : {}),
  };
}

export interface SeriesKey {
  readonly key: string;
  /** Filter dimensions the dataflow does not declare */
  readonly droppedFilters: readonly string[];
}

/**
 * Build the positional series key for one dataflow
 *
 * @param totalsFor - dimensions whose `_T` default is pushed into the key
 *   when `spec.totals` is set
 */
export function buildSeriesKey(
  spec: QuerySpec,
  schema: DataflowSchema | undefined,
  totalsFor: readonly string[] = []
): SeriesKey {
  const areaSegment = spec.countries === 'all' ? '' : spec.countries.join('+');
  const filterDims = Object.keys(spec.filters);

  if (!schema) {
    return { key: `${areaSegment}.${spec.indicatorCode}.`, droppedFilters: filterDims };
  }

  const declared = new Set(schema.dimensions.map((dim) => dim.id));
  const segments = schema.dimensions
    .filter((dim) => dim.id !== schema.timeDimension)
    .map((dim) => {
      if (AREA_DIMENSIONS.includes(dim.id)) {
        return areaSegment;
      }
      if (dim.id === INDICATOR_DIMENSION) {
        return spec.indicatorCode;
      }
      const allowed = spec.filters[dim.id];
      if (allowed && allowed.length > 0) {
        return allowed.join('+');
      }
      if (spec.totals && totalsFor.includes(dim.id)) {
        return TOTAL_CODE;
      }
      return '';
    });

  return {
    key: segments.join('.'),
    droppedFilters: filterDims.filter((dim) => !declared.has(dim)),
  };
}

/**
 * Full data URL for the first page
 */
export function buildDataUrl(
  endpoint: SdmxEndpointConfig,
  dataflowId: string,
  key: string,
  years?: YearRange
): string {
  const params = new URLSearchParams({ format: 'csv', labels: 'id' });
  if (years?.start !== undefined) {
    params.set('startPeriod', String(years.start));
  }
  if (years?.end !== undefined) {
    params.set('endPeriod', String(years.end));
  }

  const base = endpoint.baseUrl.replace(/\/+$/, '');
  return `${base}/data/${endpoint.agency},${dataflowId},${endpoint.version}/${key}?${params.toString()}`;
}

/**
 * URL for a continuation page starting at row `startIndex`
 */
export function withPage(url: string, startIndex: number, count: number): string {
  return `${url}&startIndex=${startIndex}&count=${count}`;
}
