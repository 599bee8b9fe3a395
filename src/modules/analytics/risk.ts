// ===========================================
// RISK SCORING
// Composite 0-1 score and PM2.5 risk tiers
// ===========================================

import { RiskTier } from '../../types/index.js';

// ============ SCORING WEIGHTS ============

export const RISK_WEIGHTS = {
  pm25: 0.6,
  yoy: 0.25,
  interval: 0.15,
} as const;

const RANGES = {
  pm25: { min: 5, max: 100 },
  yoyPct: { min: -20, max: 20 },
  interval: { min: 0, max: 30 },
} as const;

// Upper bounds are inclusive on the lower tier
const TIER_BOUNDS: ReadonlyArray<{ max: number; tier: RiskTier; inclusive: boolean }> = [
  { max: 12, tier: RiskTier.LOW, inclusive: false },
  { max: 35.5, tier: RiskTier.MODERATE, inclusive: true },
  { max: 55.5, tier: RiskTier.HIGH, inclusive: true },
];

/**
 * Linear clamp-and-rescale to [0, 1]
 */
export function normalize(value: number, min: number, max: number): number {
  if (max <= min) return 0.5;
  return Math.min(1, Math.max(0, (value - min) / (max - min)));
}

export interface RiskScore {
  score: number;
  components: { pm25: number; yoy: number; interval: number };
}

export function riskScore(pm25: number, yoyPct: number, interval: number): RiskScore {
  const components = {
    pm25: normalize(pm25, RANGES.pm25.min, RANGES.pm25.max),
    yoy: normalize(yoyPct, RANGES.yoyPct.min, RANGES.yoyPct.max),
    interval: normalize(interval, RANGES.interval.min, RANGES.interval.max),
  };

  return {
    score:
      components.pm25 * RISK_WEIGHTS.pm25 +
      components.yoy * RISK_WEIGHTS.yoy +
      components.interval * RISK_WEIGHTS.interval,
    components,
  };
}

export function riskTier(pm25: number): RiskTier {
  for (const bound of TIER_BOUNDS) {
    if (bound.inclusive ? pm25 <= bound.max : pm25 < bound.max) {
      return bound.tier;
    }
  }
  return RiskTier.VERY_HIGH;
}
