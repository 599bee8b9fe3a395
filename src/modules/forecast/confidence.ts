// ===========================================
// FORECAST CONFIDENCE
// Confidence decays with distance from the last observed year
// ===========================================

import { ConfidenceTier } from '../../types/index.js';
import type { ForecastConfidence } from '../../types/index.js';

const CONFIDENCE_BANDS: ReadonlyArray<{ maxHorizon: number; tier: ConfidenceTier; score: number }> = [
  { maxHorizon: 3, tier: ConfidenceTier.HIGH, score: 0.9 },
  { maxHorizon: 7, tier: ConfidenceTier.MODERATE, score: 0.7 },
  { maxHorizon: 12, tier: ConfidenceTier.LOW, score: 0.5 },
];

const SPECULATIVE = { tier: ConfidenceTier.SPECULATIVE, score: 0.3 } as const;

/**
 * Horizon 0 or less means an observed year.
 */
export function forecastConfidence(horizonYears: number): ForecastConfidence {
  const horizon = Math.max(0, horizonYears);
  const band = CONFIDENCE_BANDS.find((b) => horizon <= b.maxHorizon);
  return band
    ? { tier: band.tier, score: band.score, horizonYears: horizon }
    : { tier: SPECULATIVE.tier, score: SPECULATIVE.score, horizonYears: horizon };
}
