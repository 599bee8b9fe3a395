import { describe, expect, it, vi } from 'vitest';
import { ConfidenceTier, TrendDirection } from '../src/types/index.js';
import { FEATURE_NAMES, buildFeatures, runRecursiveForecast } from '../src/modules/forecast/features.js';
import type { Predictor } from '../src/modules/forecast/features.js';
import { createForecastModel } from '../src/modules/forecast/forecast-model.js';
import type { ForecastModel } from '../src/modules/forecast/forecast-model.js';
import { forecastConfidence } from '../src/modules/forecast/confidence.js';
import { PM25Forecaster, changeDirection } from '../src/modules/forecast/pm25-forecaster.js';
import { RegionResolver } from '../src/modules/nlp/region-resolver.js';
import { NoDataError, ReferenceDataError, UnknownCountryError } from '../src/utils/errors.js';
import { driftModel, fixtureData, fixtureStack } from './fixtures.js';

const THAILAND = new Map([
  [2015, 30],
  [2016, 28],
  [2017, 26],
  [2018, 25],
  [2019, 24],
]);

describe('buildFeatures', () => {
  it('computes lags, changes and rolling means from the prior years', () => {
    const features = buildFeatures(THAILAND, 2020);
    expect(features).not.toBeNull();
    expect(features?.lag_1y).toBe(24);
    expect(features?.lag_3y).toBe(26);
    expect(features?.yoy_change).toBe(-1);
    expect(features?.yoy_pct_change).toBeCloseTo(-0.04);
    expect(features?.rolling_mean_3y).toBeCloseTo(25);
    expect(features?.rolling_mean_5y).toBeCloseTo(26.6);
    expect(features?.year).toBe(2020);
  });

  it('needs at least three points and the previous year', () => {
    expect(buildFeatures(new Map([[2018, 10], [2019, 12]]), 2020)).toBeNull();
    expect(buildFeatures(THAILAND, 2022)).toBeNull();
  });
});

describe('runRecursiveForecast', () => {
  const minusOne: Predictor = { predict: (f) => (f[0] ?? 0) - 1 };

  it('uses persistence until the history supports the model', () => {
    const steps = runRecursiveForecast(minusOne, [{ year: 2018, pm25: 10 }, { year: 2019, pm25: 12 }], 2021);
    expect(steps).toEqual([
      { year: 2020, pm25: 12, features: null },
      expect.objectContaining({ year: 2021, pm25: 11 }),
    ]);
  });

  it('falls back to persistence when the model returns a non-finite value', () => {
    const broken: Predictor = { predict: () => Number.NaN };
    const observed = [...THAILAND].map(([year, pm25]) => ({ year, pm25 }));
    expect(runRecursiveForecast(broken, observed, 2020)[0]?.pm25).toBe(24);
  });

  it('clamps every step to the TMREL floor', () => {
    const crash: Predictor = { predict: () => -50 };
    const observed = [...THAILAND].map(([year, pm25]) => ({ year, pm25 }));
    expect(runRecursiveForecast(crash, observed, 2022).map((s) => s.pm25)).toEqual([5, 5, 5]);
  });
});

describe('forecast models', () => {
  it('evaluates a tree ensemble dump', () => {
    const model = createForecastModel({
      kind: 'tree_ensemble',
      version: 'test-tree',
      featureNames: [...FEATURE_NAMES],
      base_score: 0,
      trees: [
        {
          nodeid: 0,
          split: 'f0',
          split_condition: 20,
          yes: 1,
          no: 2,
          missing: 1,
          children: [
            { nodeid: 1, leaf: 10 },
            { nodeid: 2, leaf: 30 },
          ],
        },
        {
          nodeid: 0,
          split: 'year',
          split_condition: 2025,
          yes: 1,
          no: 2,
          missing: 2,
          children: [
            { nodeid: 1, leaf: 0.5 },
            { nodeid: 2, leaf: -0.5 },
          ],
        },
      ],
    });

    expect(model.kind).toBe('tree_ensemble');
    expect(model.predict([15, 0, 0, 0, 0, 0, 2020])).toBe(10.5);
    expect(model.predict([25, 0, 0, 0, 0, 0, 2030])).toBe(29.5);
    expect(model.predict([])).toBe(9.5);
  });

  it('rejects artifacts whose features are out of order', () => {
    expect(() =>
      createForecastModel({
        kind: 'linear',
        version: 'bad',
        featureNames: ['year', 'lag_1y'],
        intercept: 0,
        coefficients: {},
      })
    ).toThrow(ReferenceDataError);
  });

  it('rejects coefficients for unknown features', () => {
    expect(() =>
      createForecastModel({
        kind: 'linear',
        version: 'bad',
        featureNames: [...FEATURE_NAMES],
        intercept: 0,
        coefficients: { humidity: 1 },
      })
    ).toThrow('unknown features: humidity');
  });
});

describe('forecastConfidence', () => {
  it.each([
    [1, ConfidenceTier.HIGH, 0.9],
    [3, ConfidenceTier.HIGH, 0.9],
    [4, ConfidenceTier.MODERATE, 0.7],
    [7, ConfidenceTier.MODERATE, 0.7],
    [8, ConfidenceTier.LOW, 0.5],
    [12, ConfidenceTier.LOW, 0.5],
    [13, ConfidenceTier.SPECULATIVE, 0.3],
  ])('horizon %i is %s', (horizon, tier, score) => {
    expect(forecastConfidence(horizon)).toEqual({ tier, score, horizonYears: horizon });
  });

  it('treats negative horizons as observed', () => {
    expect(forecastConfidence(-2)).toEqual({ tier: ConfidenceTier.HIGH, score: 0.9, horizonYears: 0 });
  });
});

describe('PM25Forecaster', () => {
  const { forecaster } = fixtureStack(-1);

  it('returns observed values as-is', () => {
    expect(forecaster.forecast('Thailand', 2019)).toEqual({
      country: 'Thailand',
      year: 2019,
      pm25: 24,
      isPredicted: false,
    });
  });

  it('predicts recursively, one model call per year', () => {
    const base = driftModel(-1);
    const predict = vi.fn((features: readonly number[]) => base.predict(features));
    const counting: ForecastModel = {
      kind: base.kind,
      version: base.version,
      featureNames: base.featureNames,
      predict,
    };
    const data = fixtureData();
    const point = new PM25Forecaster(data, counting, new RegionResolver(data)).forecast('Thailand', 2027);

    expect(predict).toHaveBeenCalledTimes(8);
    expect(point.pm25).toBe(16);
    expect(point.isPredicted).toBe(true);
    expect(point.confidence).toEqual({ tier: ConfidenceTier.LOW, score: 0.5, horizonYears: 8 });
  });

  it('is deterministic', () => {
    expect(forecaster.forecast('Vietnam', 2031)).toEqual(forecaster.forecast('Vietnam', 2031));
  });

  it('never predicts below 5.0', () => {
    expect(forecaster.forecast('France', 2021).pm25).toBe(5);
  });

  it('builds a series from one pass', () => {
    expect(forecaster.series('Thailand', 2018, 2021).map((p) => [p.pm25, p.isPredicted])).toEqual([
      [25, false],
      [24, false],
      [23, true],
      [22, true],
    ]);
  });

  it('rejects years before the first observation', () => {
    expect(() => forecaster.forecast('Thailand', 2010)).toThrow(NoDataError);
  });

  it('rejects unknown countries', () => {
    expect(() => forecaster.forecast('Narnia', 2020)).toThrow(UnknownCountryError);
  });

  it('computes change between two years', () => {
    expect(forecaster.change('Thailand', 2015, 2019)).toEqual({
      country: 'Thailand',
      fromYear: 2015,
      toYear: 2019,
      pm25From: 30,
      pm25To: 24,
      absChange: -6,
      pctChange: -20,
      direction: TrendDirection.DECREASING,
    });
    expect(forecaster.yoyChange('Japan', 2019).direction).toBe(TrendDirection.STABLE);
  });

  it('classifies changes with a 2% band', () => {
    expect(changeDirection(2)).toBe(TrendDirection.STABLE);
    expect(changeDirection(2.01)).toBe(TrendDirection.INCREASING);
    expect(changeDirection(-2.01)).toBe(TrendDirection.DECREASING);
  });

  it('decomposes a year into seasonal months', () => {
    const months = forecaster.monthly('Thailand', 2019);
    expect(months).toHaveLength(12);
    expect(months[0]).toMatchObject({ month: 1, monthName: 'January', seasonalFactor: 1.2 });
    expect(months[0]?.pm25).toBeCloseTo(28.8);
    expect(months[6]).toEqual({ month: 7, monthName: 'July', pm25: 18, seasonalFactor: 0.75 });
    expect(forecaster.monthly('France', 2019).every((m) => m.pm25 === 6 && m.seasonalFactor === 1)).toBe(true);
  });

  it('clamps monthly values to 5.0', () => {
    expect(forecaster.forecastMonth('Japan', 2026, 6)).toEqual({
      month: 6,
      monthName: 'June',
      pm25: 5,
      seasonalFactor: 0.9,
    });
  });

  it('exposes the features behind a predicted year', () => {
    expect(forecaster.stepFeatures('Thailand', 2019)).toBeNull();
    expect(forecaster.stepFeatures('Thailand', 2020)?.lag_1y).toBe(24);
  });
});
