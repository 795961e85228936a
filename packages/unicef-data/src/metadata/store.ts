/**
 * Metadata Store
 *
 * Read-only snapshot of the indicator table, prefix fallback sequences,
 * dataflow schemas, and country / region names. Never mutated after
 * construction; a reload builds a new store and swaps the reference held by
 * MetadataRegistry.
 *
 * @module metadata/store
 */

import {
  DEFAULT_SEQUENCE_KEY,
  type DataflowSchema,
  type IndicatorEntry,
} from '../core/types.js';
import { DEFAULT_FALLBACK_SEQUENCES } from './defaults.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export type MetadataSource = 'files' | 'defaults' | 'mixed';

export interface MetadataSnapshot {
  readonly indicators: ReadonlyMap<string, IndicatorEntry>;
  readonly fallbackSequences: ReadonlyMap<string, readonly string[]>;
  readonly dataflows: ReadonlyMap<string, DataflowSchema>;
  readonly countries: ReadonlyMap<string, string>;
  readonly regions: ReadonlyMap<string, string>;
  /** When the tables were generated, if recorded */
  readonly syncedAt: Date | null;
  readonly loadedAt: Date;
  readonly version: string | null;
  readonly source: MetadataSource;
}

/**
 * Plain-object input for building a store in code
 */
export interface MetadataStoreInit {
  readonly indicators?: readonly IndicatorEntry[];
  readonly fallbackSequences?: Readonly<Record<string, readonly string[]>>;
  readonly dataflows?: readonly DataflowSchema[];
  readonly countries?: Readonly<Record<string, string>>;
  readonly regions?: Readonly<Record<string, string>>;
  readonly syncedAt?: Date | null;
  readonly loadedAt?: Date;
  readonly version?: string | null;
  readonly source?: MetadataSource;
}

export class MetadataStore {
  private readonly snapshot: MetadataSnapshot;

  constructor(snapshot: MetadataSnapshot) {
    this.snapshot = snapshot;
  }

  static create(init: MetadataStoreInit = {}): MetadataStore {
    return new MetadataStore({
      indicators: new Map((init.indicators ?? []).map((entry) => [entry.code, entry])),
      fallbackSequences: new Map(Object.entries(init.fallbackSequences ?? {})),
      dataflows: new Map((init.dataflows ?? []).map((schema) => [schema.id, schema])),
      countries: new Map(Object.entries(init.countries ?? {})),
      regions: new Map(Object.entries(init.regions ?? {})),
      syncedAt: init.syncedAt ?? null,
      loadedAt: init.loadedAt ?? new Date(),
      version: init.version ?? null,
      source: init.source ?? 'files',
    });
  }

  /**
   * Store holding only the built-in fallback table
   */
  static fromDefaults(): MetadataStore {
    return MetadataStore.create({
      fallbackSequences: DEFAULT_FALLBACK_SEQUENCES,
      source: 'defaults',
    });
  }

  get source(): MetadataSource {
    return this.snapshot.source;
  }

  get syncedAt(): Date | null {
    return this.snapshot.syncedAt;
  }

  get loadedAt(): Date {
    return this.snapshot.loadedAt;
  }

  get version(): string | null {
    return this.snapshot.version;
  }

  get indicatorCount(): number {
    return this.snapshot.indicators.size;
  }

  getIndicator(code: string): IndicatorEntry | undefined {
    return this.snapshot.indicators.get(code);
  }

  /**
   * All indicators, ordered by code
   */
  listIndicators(): IndicatorEntry[] {
    return [...this.snapshot.indicators.values()].sort((a, b) => a.code.localeCompare(b.code));
  }

  getFallbackSequence(prefix: string): readonly string[] | undefined {
    return this.snapshot.fallbackSequences.get(prefix);
  }

  /**
   * Sequence for prefixes missing from the table, when the table defines one
   */
  getDefaultSequence(): readonly string[] | undefined {
    return this.snapshot.fallbackSequences.get(DEFAULT_SEQUENCE_KEY);
  }

  /**
   * Prefixes with a sequence, excluding DEFAULT
   */
  listPrefixes(): string[] {
    return [...this.snapshot.fallbackSequences.keys()].filter((key) => key !== DEFAULT_SEQUENCE_KEY);
  }

  getDataflowSchema(id: string): DataflowSchema | undefined {
    return this.snapshot.dataflows.get(id);
  }

  listDataflows(): DataflowSchema[] {
    return [...this.snapshot.dataflows.values()].sort((a, b) => a.id.localeCompare(b.id));
  }

  countryName(iso3: string): string | undefined {
    return this.snapshot.countries.get(iso3) ?? this.snapshot.regions.get(iso3);
  }

  /**
   * Whether a REF_AREA code names a region or other aggregate
   */
  isAggregate(code: string): boolean {
    return this.snapshot.regions.has(code);
  }

  get hasRegionCodes(): boolean {
    return this.snapshot.regions.size > 0;
  }

  /**
   * Days since the tables were generated; falls back to load time
   */
  ageInDays(now: Date = new Date()): number {
    const reference = this.snapshot.syncedAt ?? this.snapshot.loadedAt;
    return (now.getTime() - reference.getTime()) / MS_PER_DAY;
  }

  isStale(maxAgeDays: number, now: Date = new Date()): boolean {
    return this.ageInDays(now) > maxAgeDays;
  }
}
