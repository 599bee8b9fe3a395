// ===========================================
// FORECAST UNCERTAINTY
// ===========================================

import type { ForecastPoint } from '../../types/index.js';
import { clampToTmrel } from '../../utils/constants.js';
import { forecastConfidence } from '../forecast/confidence.js';
import type { UncertaintyResult } from './types.js';

/**
 * ± interval around a point: pm25 × (1 − score) × 0.5. Observed points
 * carry a zero-width interval. The lower bound never drops below TMREL.
 */
export function pointUncertainty(point: ForecastPoint): UncertaintyResult {
  const confidence = point.isPredicted && point.confidence ? point.confidence : forecastConfidence(0);
  const interval = point.isPredicted ? point.pm25 * (1 - confidence.score) * 0.5 : 0;

  return {
    country: point.country,
    year: point.year,
    pm25: point.pm25,
    isPredicted: point.isPredicted,
    tier: confidence.tier,
    score: confidence.score,
    horizonYears: confidence.horizonYears,
    interval,
    low: clampToTmrel(point.pm25 - interval),
    high: point.pm25 + interval,
  };
}
