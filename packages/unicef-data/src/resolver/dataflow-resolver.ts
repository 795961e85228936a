/**
 * Dataflow Resolver
 *
 * Maps an indicator code to the ordered list of dataflows to try:
 *
 * 1. direct  - the indicator's own dataflows, with GLOBAL_DATAFLOW appended
 * 2. prefix  - the fallback sequence for the code's prefix, as stored
 * 3. default - the DEFAULT sequence, or GLOBAL_DATAFLOW alone
 *
 * Pure and total: the same store and code always give the same non-empty
 * list, and nothing here throws. Failures surface later, per candidate.
 *
 * @module resolver/dataflow-resolver
 */

import { UNIVERSAL_FALLBACK_DATAFLOW } from '../core/types.js';
import type { MetadataStore } from '../metadata/store.js';

export type ResolutionTier = 'direct' | 'prefix' | 'default';

export interface Resolution {
  readonly indicatorCode: string;
  readonly tier: ResolutionTier;
  readonly prefix: string;
  readonly candidates: readonly string[];
}

export interface ResolveOptions {
  /** Caller-chosen dataflow, tried before every resolved candidate */
  readonly preferred?: string;
}

/**
 * Prefix used to key the fallback table: the text before the first `_`,
 * or the leading run of letters when there is no `_`. Upper case.
 */
export function extractPrefix(indicatorCode: string): string {
  const code = indicatorCode.trim().toUpperCase();
  const underscore = code.indexOf('_');
  if (underscore >= 0) {
    return code.slice(0, underscore);
  }
  const letters = /^[A-Z]+/.exec(code);
  return letters ? letters[0] : code;
}

function dedupe(values: readonly string[]): string[] {
  return [...new Set(values)];
}

/**
 * Resolve with the tier that produced the candidates
 */
export function explainResolution(
  store: MetadataStore,
  indicatorCode: string,
  options: ResolveOptions = {}
): Resolution {
  const code = indicatorCode.trim();
  const prefix = extractPrefix(code);
  const base = resolveTiers(store, code, prefix);
  const preferred = options.preferred?.trim();

  return {
    indicatorCode: code,
    tier: base.tier,
    prefix,
    candidates: preferred ? dedupe([preferred, ...base.candidates]) : base.candidates,
  };
}

/**
 * Ordered candidate dataflows for an indicator
 */
export function resolveCandidates(
  store: MetadataStore,
  indicatorCode: string,
  options: ResolveOptions = {}
): readonly string[] {
  return explainResolution(store, indicatorCode, options).candidates;
}

function resolveTiers(
  store: MetadataStore,
  code: string,
  prefix: string
): { tier: ResolutionTier; candidates: readonly string[] } {
  const direct = store.getIndicator(code)?.directDataflows ?? [];
  if (direct.length > 0) {
    const candidates = dedupe(direct);
    if (!candidates.includes(UNIVERSAL_FALLBACK_DATAFLOW)) {
      candidates.push(UNIVERSAL_FALLBACK_DATAFLOW);
    }
    return { tier: 'direct', candidates };
  }

  const sequence = prefix ? store.getFallbackSequence(prefix) : undefined;
  if (sequence && sequence.length > 0) {
    return { tier: 'prefix', candidates: [...sequence] };
  }

  const fallback = store.getDefaultSequence();
  return {
    tier: 'default',
    candidates: fallback && fallback.length > 0 ? [...fallback] : [UNIVERSAL_FALLBACK_DATAFLOW],
  };
}

/**
 * Resolver bound to a store
 */
export class DataflowResolver {
  constructor(private readonly store: MetadataStore) {}

  resolve(indicatorCode: string, options?: ResolveOptions): readonly string[] {
    return resolveCandidates(this.store, indicatorCode, options);
  }

  explain(indicatorCode: string, options?: ResolveOptions): Resolution {
    return explainResolution(this.store, indicatorCode, options);
  }
}
