/**
 * Metadata Registry
 *
 * Holds the current MetadataStore behind a single reference. `reload()`
 * builds a complete new store before swapping, so readers see either the old
 * table or the new one, never a mix. Injected into the resolver and the
 * client instead of living in module state.
 *
 * @module metadata/registry
 */

import { logger as rootLogger, type Logger } from '../core/utils/logger.js';
import { loadMetadata, type MetadataLoadReport } from './loader.js';
import { MetadataStore } from './store.js';

export interface MetadataRegistryOptions {
  readonly directory: string;
  /** Age after which a refresh warning is logged (default: 30) */
  readonly staleAfterDays?: number;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

export interface MetadataStatus {
  readonly directory: string;
  readonly loaded: boolean;
  readonly source: MetadataStore['source'] | null;
  readonly indicators: number;
  readonly syncedAt: string | null;
  readonly ageDays: number | null;
  readonly stale: boolean;
  readonly errors: readonly string[];
}

export class MetadataRegistry {
  private store: MetadataStore | null = null;
  private lastReport: MetadataLoadReport | null = null;
  private pending: Promise<MetadataStore> | null = null;
  private readonly directory: string;
  private readonly staleAfterDays: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: MetadataRegistryOptions) {
    this.directory = options.directory;
    this.staleAfterDays = options.staleAfterDays ?? 30;
    this.logger = options.logger ?? rootLogger.child('metadata');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Registry already holding a store (no files involved)
   */
  static of(store: MetadataStore, options?: Partial<MetadataRegistryOptions>): MetadataRegistry {
    const registry = new MetadataRegistry({ directory: '(in-memory)', ...options });
    registry.store = store;
    return registry;
  }

  /**
   * Current store, loading it on first use
   */
  async current(): Promise<MetadataStore> {
    if (this.store) {
      return this.store;
    }
    return this.reload();
  }

  /**
   * Load a fresh store and swap it in. Concurrent callers share one load.
   */
  reload(): Promise<MetadataStore> {
    if (this.pending) {
      return this.pending;
    }

    this.pending = loadMetadata(this.directory, { logger: this.logger, now: this.now() })
      .then((report) => {
        this.lastReport = report;
        this.store = report.store;
        this.warnIfStale(report.store);
        return report.store;
      })
      .finally(() => {
        this.pending = null;
      });

    return this.pending;
  }

  /**
   * Drop the current store; the next `current()` reloads
   */
  clear(): void {
    this.store = null;
    this.lastReport = null;
  }

  status(): MetadataStatus {
    const store = this.store;
    return {
      directory: this.directory,
      loaded: store !== null,
      source: store?.source ?? null,
      indicators: store?.indicatorCount ?? 0,
      syncedAt: store?.syncedAt?.toISOString() ?? null,
      ageDays: store ? Math.floor(store.ageInDays(this.now())) : null,
      stale: store ? store.isStale(this.staleAfterDays, this.now()) : false,
      errors: this.lastReport?.errors.map((error) => error.message) ?? [],
    };
  }

  private warnIfStale(store: MetadataStore): void {
    if (store.source === 'defaults' || !store.isStale(this.staleAfterDays, this.now())) {
      return;
    }
    this.logger.warn('Metadata is stale; refresh the metadata tables', {
      ageDays: Math.floor(store.ageInDays(this.now())),
      staleAfterDays: this.staleAfterDays,
      syncedAt: store.syncedAt?.toISOString() ?? null,
    });
  }
}
