/**
 * Built-in fallback table
 *
 * Used when `_dataflow_fallback_sequences.yaml` is missing or invalid.
 * Order within each sequence is significant and must stay identical to the
 * bundled YAML.
 */

import { DEFAULT_SEQUENCE_KEY, UNIVERSAL_FALLBACK_DATAFLOW } from '../core/types.js';

export const DEFAULT_FALLBACK_SEQUENCES: Readonly<Record<string, readonly string[]>> = {
  CME: ['CME', 'CME_DF_2021_WQ', 'MORTALITY', UNIVERSAL_FALLBACK_DATAFLOW],
  COD: ['CAUSE_OF_DEATH', 'CME', 'MORTALITY', UNIVERSAL_FALLBACK_DATAFLOW],
  ED: ['EDUCATION_UIS_SDG', 'EDUCATION', UNIVERSAL_FALLBACK_DATAFLOW],
  PT: ['PT', 'PT_CM', 'PT_FGM', 'CHILD_PROTECTION', UNIVERSAL_FALLBACK_DATAFLOW],
  NT: ['NUTRITION', UNIVERSAL_FALLBACK_DATAFLOW],
  WS: ['WASH_HOUSEHOLDS', 'WASH_SCHOOLS', 'WASH_HEALTHCARE_FACILITY', UNIVERSAL_FALLBACK_DATAFLOW],
  HVA: ['HIV_AIDS', UNIVERSAL_FALLBACK_DATAFLOW],
  IM: ['IMMUNISATION', UNIVERSAL_FALLBACK_DATAFLOW],
  MNCH: ['MNCH', UNIVERSAL_FALLBACK_DATAFLOW],
  ECD: ['ECD', UNIVERSAL_FALLBACK_DATAFLOW],
  PV: ['CHLD_PVTY', UNIVERSAL_FALLBACK_DATAFLOW],
  DM: ['DM', UNIVERSAL_FALLBACK_DATAFLOW],
  MG: ['MIGRATION', UNIVERSAL_FALLBACK_DATAFLOW],
  FP: ['FAMILY_PLANNING', UNIVERSAL_FALLBACK_DATAFLOW],
  GN: ['GENDER', UNIVERSAL_FALLBACK_DATAFLOW],
  SPP: ['SOC_PROTECTION', UNIVERSAL_FALLBACK_DATAFLOW],
  WT: ['PT', 'CHILD_PROTECTION', UNIVERSAL_FALLBACK_DATAFLOW],
  FD: ['EDUCATION', 'EDUCATION_FLS', UNIVERSAL_FALLBACK_DATAFLOW],
  TRGT: ['CHILD_RELATED_SDG', UNIVERSAL_FALLBACK_DATAFLOW],
  ECON: ['ECONOMIC', UNIVERSAL_FALLBACK_DATAFLOW],
  [DEFAULT_SEQUENCE_KEY]: [UNIVERSAL_FALLBACK_DATAFLOW],
};
