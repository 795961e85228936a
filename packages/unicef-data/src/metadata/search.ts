/**
 * Indicator discovery over the metadata snapshot
 */

import type { IndicatorEntry } from '../core/types.js';
import type { MetadataStore } from './store.js';

export const UNKNOWN_CATEGORY = 'UNKNOWN';

export interface SearchOptions {
  /** Case-insensitive substring of code, name or description */
  readonly query?: string;
  /** Category or dataflow, case-insensitive */
  readonly category?: string;
  /** 0 or undefined means no limit */
  readonly limit?: number;
}

export interface IndicatorMatch {
  readonly code: string;
  readonly name: string;
  readonly category: string;
  readonly description: string;
  readonly dataflows: readonly string[];
}

export interface SearchResult {
  readonly matches: IndicatorMatch[];
  /** Matches before the limit was applied */
  readonly total: number;
}

export interface CategoryCount {
  readonly category: string;
  readonly count: number;
}

export function categoryOf(entry: IndicatorEntry): string {
  return entry.category ?? entry.directDataflows[0] ?? UNKNOWN_CATEGORY;
}

/**
 * Matches sorted by category, then code
 */
export function searchIndicators(store: MetadataStore, options: SearchOptions = {}): SearchResult {
  const query = options.query?.trim().toLowerCase() || undefined;
  const category = options.category?.trim().toUpperCase() || undefined;

  const matches: IndicatorMatch[] = [];
  for (const entry of store.listIndicators()) {
    const entryCategory = categoryOf(entry);
    if (
      category !== undefined &&
      entryCategory.toUpperCase() !== category &&
      !entry.directDataflows.some((dataflow) => dataflow.toUpperCase() === category)
    ) {
      continue;
    }

    if (query !== undefined) {
      const haystacks = [entry.code, entry.name, entry.description ?? ''];
      if (!haystacks.some((text) => text.toLowerCase().includes(query))) {
        continue;
      }
    }

    matches.push({
      code: entry.code,
      name: entry.name,
      category: entryCategory,
      description: entry.description ?? '',
      dataflows: entry.directDataflows,
    });
  }

  matches.sort((a, b) => a.category.localeCompare(b.category) || a.code.localeCompare(b.code));

  const limit = options.limit ?? 0;
  return {
    matches: limit > 0 ? matches.slice(0, limit) : matches,
    total: matches.length,
  };
}

/**
 * Indicator count per category, largest first
 */
export function listCategories(store: MetadataStore): CategoryCount[] {
  const counts = new Map<string, number>();
  for (const entry of store.listIndicators()) {
    const category = categoryOf(entry);
    counts.set(category, (counts.get(category) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([category, count]) => ({ category, count }))
    .sort((a, b) => b.count - a.count || a.category.localeCompare(b.category));
}
