// ===========================================
// DISEASE TABLE
// Integrated exposure-response parameters per cause
// RR = 1 + alpha * (1 - exp(-gamma * exposure^delta))
// ===========================================

import { AgeGroup } from '../../types/index.js';
import type { DiseaseParams } from '../../types/index.js';

export const DISEASE_TABLE: readonly DiseaseParams[] = Object.freeze([
  { name: 'Ischemic heart disease', category: 'Cardiovascular', alpha: 0.2969, gamma: 0.0133, delta: 1 },
  { name: 'Stroke', category: 'Cardiovascular', alpha: 0.312, gamma: 0.0098, delta: 1 },
  { name: 'Chronic obstructive pulmonary disease', category: 'Respiratory', alpha: 0.268, gamma: 0.0105, delta: 1 },
  { name: 'Lower respiratory infections', category: 'Respiratory', alpha: 0.357, gamma: 0.0154, delta: 1 },
  { name: 'Upper respiratory infections', category: 'Respiratory', alpha: 0.185, gamma: 0.012, delta: 1 },
  { name: 'Tracheal, bronchus, and lung cancer', category: 'Cancer', alpha: 0.405, gamma: 0.0185, delta: 1 },
  { name: 'Larynx cancer', category: 'Cancer', alpha: 0.32, gamma: 0.016, delta: 1 },
  { name: 'Tuberculosis', category: 'Infectious', alpha: 0.22, gamma: 0.0095, delta: 1 },
  { name: 'Diabetes mellitus', category: 'Metabolic', alpha: 0.165, gamma: 0.0088, delta: 1 },
  { name: 'Asthma', category: 'Respiratory', alpha: 0.235, gamma: 0.011, delta: 1 },
] satisfies DiseaseParams[]);

export const DISEASE_NAMES: readonly string[] = DISEASE_TABLE.map((d) => d.name);

const BY_NAME = new Map(DISEASE_TABLE.map((d): [string, DiseaseParams] => [d.name, d]));

export function diseaseParams(name: string): DiseaseParams | undefined {
  return BY_NAME.get(name);
}

// Canonical table position, used to break ties
export function diseaseRank(name: string): number {
  const index = DISEASE_NAMES.indexOf(name);
  return index === -1 ? DISEASE_NAMES.length : index;
}

export interface AgeVulnerability {
  label: string;
  minAge: number;
  maxAge: number;
  multiplier: number;
}

export const AGE_VULNERABILITY: Readonly<Record<AgeGroup, AgeVulnerability>> = Object.freeze({
  [AgeGroup.CHILDREN]: { label: 'Children (0-14)', minAge: 0, maxAge: 14, multiplier: 1.3 },
  [AgeGroup.ADULTS]: { label: 'Adults (15-64)', minAge: 15, maxAge: 64, multiplier: 1.0 },
  [AgeGroup.ELDERLY]: { label: 'Elderly (65+)', minAge: 65, maxAge: 150, multiplier: 1.5 },
});

export const AGE_GROUPS: readonly AgeGroup[] = [AgeGroup.CHILDREN, AgeGroup.ADULTS, AgeGroup.ELDERLY];

/**
 * Map a GBD-style age band ("<1 year", "65-69 years", "95+ years") to a group.
 */
export function ageGroupForBand(ageName: string): AgeGroup | undefined {
  const trimmed = ageName.trim();
  let start: number | undefined;
  if (/^<\s*1\b/.test(trimmed)) {
    start = 0;
  } else {
    const lead = /^(\d+)/.exec(trimmed);
    start = lead?.[1] !== undefined ? Number(lead[1]) : undefined;
  }
  if (start === undefined) return undefined;

  return AGE_GROUPS.find((group) => {
    const band = AGE_VULNERABILITY[group];
    return start !== undefined && start >= band.minAge && start <= band.maxAge;
  });
}
