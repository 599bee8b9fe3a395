// ===========================================
// FORECAST FEATURES
// Per-step feature vector and the recursive multi-year loop
// ===========================================

import { clampToTmrel } from '../../utils/constants.js';
import type { YearValue } from '../../types/index.js';

export const FEATURE_NAMES = [
  'lag_1y',
  'lag_3y',
  'yoy_change',
  'yoy_pct_change',
  'rolling_mean_3y',
  'rolling_mean_5y',
  'year',
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];
export type FeatureVector = Record<FeatureName, number>;

// Below this many points a step falls back to persistence
const MIN_HISTORY_POINTS = 3;

export interface Predictor {
  predict(features: readonly number[]): number;
}

export interface ForecastStep {
  year: number;
  pm25: number;
  // null when the step used persistence instead of the model
  features: FeatureVector | null;
}

function windowMean(history: ReadonlyMap<number, number>, from: number, to: number): number | undefined {
  let sum = 0;
  let count = 0;
  for (let y = from; y <= to; y++) {
    const value = history.get(y);
    if (value !== undefined) {
      sum += value;
      count++;
    }
  }
  return count > 0 ? sum / count : undefined;
}

/**
 * Features for predicting `year` from the working history ending at year-1.
 * Returns null when the history cannot support a model step.
 */
export function buildFeatures(history: ReadonlyMap<number, number>, year: number): FeatureVector | null {
  const lag1 = history.get(year - 1);
  if (history.size < MIN_HISTORY_POINTS || lag1 === undefined) {
    return null;
  }

  const lag2 = history.get(year - 2);
  const yoyChange = lag2 === undefined ? 0 : lag1 - lag2;
  const yoyPctChange = lag2 === undefined || Math.abs(lag2) <= 0.001 ? 0 : yoyChange / lag2;

  return {
    lag_1y: lag1,
    lag_3y: history.get(year - 3) ?? lag1,
    yoy_change: yoyChange,
    yoy_pct_change: yoyPctChange,
    rolling_mean_3y: windowMean(history, year - 3, year - 1) ?? lag1,
    rolling_mean_5y: windowMean(history, year - 5, year - 1) ?? lag1,
    year,
  };
}

export function toFeatureArray(features: FeatureVector): number[] {
  return FEATURE_NAMES.map((name) => features[name]);
}

function latestValue(history: ReadonlyMap<number, number>): number | undefined {
  let latestYear = -Infinity;
  let value: number | undefined;
  for (const [year, pm25] of history) {
    if (year > latestYear) {
      latestYear = year;
      value = pm25;
    }
  }
  return value;
}

/**
 * Predict one year at a time from the year after the last observation up to
 * `targetYear`, feeding every clamped prediction back into a local copy of
 * the history. Returns one step per predicted year, ascending.
 */
export function runRecursiveForecast(
  predictor: Predictor,
  observed: readonly YearValue[],
  targetYear: number
): ForecastStep[] {
  const working = new Map<number, number>(observed.map((p): [number, number] => [p.year, p.pm25]));
  const lastObserved = Math.max(...observed.map((p) => p.year));
  const steps: ForecastStep[] = [];

  for (let year = lastObserved + 1; year <= targetYear; year++) {
    const features = buildFeatures(working, year);
    const persisted = working.get(year - 1) ?? latestValue(working) ?? 0;

    let raw = persisted;
    if (features) {
      const predicted = predictor.predict(toFeatureArray(features));
      raw = Number.isFinite(predicted) ? predicted : persisted;
    }

    const pm25 = clampToTmrel(raw);
    working.set(year, pm25);
    steps.push({ year, pm25, features });
  }

  return steps;
}
