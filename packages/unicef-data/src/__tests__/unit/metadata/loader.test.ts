/**
 * Metadata Loader Tests
 *
 * Loads the bundled tables, then temporary directories with missing and
 * broken files to check the fallback to built-in defaults.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadMetadata, toIndicatorEntry } from '../../../metadata/loader.js';
import { DEFAULT_FALLBACK_SEQUENCES } from '../../../metadata/defaults.js';
import { BUNDLED_METADATA_DIR } from '../../../core/config.js';
import { extractPrefix } from '../../../resolver/dataflow-resolver.js';
import { silentLogger } from '../../helpers.js';

const INDICATORS_YAML = `_metadata:
  version: '9.9'
  synced_at: '2026-01-15T00:00:00Z'
indicators:
  CME_MRY0T4:
    name: Under-five mortality rate
    category: CME
    dataflow: CME
    tier: 1
    disaggregations: [sex, WEALTH_QUINTILE]
    disaggregations_with_totals: [SEX]
  NT_ANT_BAZ_NE2:
    name: Thinness
    tier: 3
    tier_reason: no observations
`;

describe('loadMetadata', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'unicef-data-meta-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads the bundled tables without errors', async () => {
    const { store, errors } = await loadMetadata(BUNDLED_METADATA_DIR, { logger: silentLogger });

    expect(errors).toEqual([]);
    expect(store.source).toBe('files');
    expect(store.getIndicator('CME_MRY0T4')?.directDataflows).toEqual(['CME']);
    expect(store.getFallbackSequence('CME')).toEqual(DEFAULT_FALLBACK_SEQUENCES.CME);
    expect(store.getDataflowSchema('CME')?.dimensions.map((d) => d.id)).toEqual([
      'REF_AREA',
      'INDICATOR',
      'SEX',
      'WEALTH_QUINTILE',
    ]);
    expect(store.countryName('BRA')).toBe('Brazil');
    expect(store.isAggregate('UNICEF_SSA')).toBe(true);
    expect(store.syncedAt?.toISOString()).toBe('2026-09-30T00:00:00.000Z');
  });

  it('matches the built-in fallback table exactly', async () => {
    const { store } = await loadMetadata(BUNDLED_METADATA_DIR, { logger: silentLogger });
    for (const [prefix, sequence] of Object.entries(DEFAULT_FALLBACK_SEQUENCES)) {
      expect(store.getFallbackSequence(prefix)).toEqual(sequence);
    }
    expect(store.listPrefixes()).toHaveLength(Object.keys(DEFAULT_FALLBACK_SEQUENCES).length - 1);
  });

  it('has a non-empty sequence for the prefix of every bundled indicator', async () => {
    const { store } = await loadMetadata(BUNDLED_METADATA_DIR, { logger: silentLogger });
    const indicators = store.listIndicators();
    expect(indicators.length).toBeGreaterThan(0);

    const uncovered = indicators
      .map((entry) => extractPrefix(entry.code))
      .filter((prefix) => (store.getFallbackSequence(prefix)?.length ?? 0) === 0);
    expect(uncovered).toEqual([]);
  });

  it('puts overrides ahead of recorded dataflows and adds unlisted ones', async () => {
    const { store } = await loadMetadata(BUNDLED_METADATA_DIR, { logger: silentLogger });
    expect(store.getIndicator('PT_F_20-24_MRD_U18_TND')?.directDataflows).toEqual(['PT_CM', 'PT']);
    expect(store.getIndicator('ED_MAT_G23')?.directDataflows).toEqual(['EDUCATION_UIS_SDG']);
  });

  it('falls back to built-in sequences when files are missing', async () => {
    const { store, errors, loadedFiles } = await loadMetadata(dir, { logger: silentLogger });

    expect(store.source).toBe('defaults');
    expect(store.indicatorCount).toBe(0);
    expect(store.getDefaultSequence()).toEqual(['GLOBAL_DATAFLOW']);
    expect(loadedFiles).toEqual([]);
    // five tables plus the dataflows directory
    expect(errors).toHaveLength(6);
    expect(errors[0]?.message).toBe(
      `Metadata unavailable at ${join(dir, '_unicefdata_indicators_metadata.yaml')}: file not found`
    );
  });

  it('converts indicator records and reports a partial load as mixed', async () => {
    await writeFile(join(dir, '_unicefdata_indicators_metadata.yaml'), INDICATORS_YAML);
    const { store } = await loadMetadata(dir, { logger: silentLogger });

    expect(store.source).toBe('mixed');
    expect(store.version).toBe('9.9');
    expect(store.syncedAt?.toISOString()).toBe('2026-01-15T00:00:00.000Z');
    expect(store.getIndicator('CME_MRY0T4')).toEqual({
      code: 'CME_MRY0T4',
      name: 'Under-five mortality rate',
      directDataflows: ['CME'],
      tier: 'verified',
      disaggregations: ['SEX', 'WEALTH_QUINTILE'],
      disaggregationsWithTotals: ['SEX'],
      category: 'CME',
    });
    expect(store.getIndicator('NT_ANT_BAZ_NE2')?.tier).toBe('no_data');
    expect(store.getIndicator('NT_ANT_BAZ_NE2')?.tierReason).toBe('no observations');
  });

  it('reports invalid YAML and invalid shapes without aborting', async () => {
    await writeFile(join(dir, '_dataflow_fallback_sequences.yaml'), 'fallback_sequences: [unclosed');
    await writeFile(join(dir, '_dataflow_overrides.yaml'), 'overrides:\n  IM_DTP3: [not, a, string]\n');
    await writeFile(join(dir, '_unicefdata_countries.yaml'), 'countries:\n  USA: United States\n');

    const { store, errors } = await loadMetadata(dir, { logger: silentLogger });

    const byFile = (name: string): string | undefined =>
      errors.find((error) => error.path === join(dir, name))?.message;
    expect(byFile('_dataflow_fallback_sequences.yaml')).toContain('invalid YAML');
    expect(byFile('_dataflow_overrides.yaml')).toContain('overrides.IM_DTP3');
    expect(store.getFallbackSequence('CME')).toEqual(DEFAULT_FALLBACK_SEQUENCES.CME);
    expect(store.countryName('USA')).toBe('United States');
  });

  it('sorts dataflow dimensions by position', async () => {
    await mkdir(join(dir, 'dataflows'));
    await writeFile(
      join(dir, 'dataflows', 'IMMUNISATION.yaml'),
      `id: IMMUNISATION
dimensions:
  - id: INDICATOR
    position: 2
  - id: REF_AREA
    position: 1
`
    );
    const { store } = await loadMetadata(dir, { logger: silentLogger });

    expect(store.getDataflowSchema('IMMUNISATION')).toEqual({
      id: 'IMMUNISATION',
      agency: 'UNICEF',
      version: '1.0',
      dimensions: [
        { id: 'REF_AREA', position: 1 },
        { id: 'INDICATOR', position: 2 },
      ],
      timeDimension: 'TIME_PERIOD',
      primaryMeasure: 'OBS_VALUE',
      attributes: [],
    });
  });
});

describe('toIndicatorEntry', () => {
  it('prefers dataflow over dataflows and dedupes', () => {
    const entry = toIndicatorEntry('ED_X', {
      dataflow: ['EDUCATION', ' EDUCATION '],
      dataflows: ['IGNORED'],
    });
    expect(entry.directDataflows).toEqual(['EDUCATION']);
    expect(entry.name).toBe('ED_X');
  });

  it('accepts tier names', () => {
    expect(toIndicatorEntry('MG_X', { tier: 'orphan' }).tier).toBe('orphan');
  });
});
