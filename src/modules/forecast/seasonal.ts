// ===========================================
// SEASONAL FACTORS
// Monthly multipliers applied to an annual mean
// ===========================================

import { MONTH_NAMES } from '../nlp/lexicon.js';

type MonthlyFactors = readonly [
  number, number, number, number, number, number,
  number, number, number, number, number, number,
];

// Burning season peaks Feb-Mar, monsoon washout Jun-Aug
const SOUTHEAST_ASIA: MonthlyFactors = [1.2, 1.25, 1.2, 1.1, 0.9, 0.8, 0.75, 0.8, 0.85, 0.95, 1.1, 1.15];

const SEASONAL_FACTORS: Readonly<Record<string, MonthlyFactors>> = {
  'Southeast Asia': SOUTHEAST_ASIA,
  'ASEAN': SOUTHEAST_ASIA,
  // Post-monsoon crop burning and winter inversions
  'South Asia': [1.3, 1.25, 1.15, 1.1, 1.05, 0.9, 0.85, 0.85, 0.9, 1.1, 1.25, 1.3],
  // Winter heating season
  'East Asia': [1.25, 1.2, 1.1, 1.0, 0.95, 0.9, 0.9, 0.95, 1.0, 1.1, 1.2, 1.25],
};

const NEUTRAL_FACTOR = 1.0;

export function seasonalFactor(region: string | undefined, month: number): number {
  const factors = region ? SEASONAL_FACTORS[region] : undefined;
  return factors?.[month - 1] ?? NEUTRAL_FACTOR;
}

export function hasSeasonalPattern(region: string | undefined): boolean {
  return region !== undefined && region in SEASONAL_FACTORS;
}

export function monthName(month: number): string {
  return MONTH_NAMES[month - 1] ?? `Month ${month}`;
}
