import { buildReferenceData } from '../src/data/reference-data.js';
import type { RawReferenceData, ReferenceData } from '../src/data/reference-data.js';
import { FEATURE_NAMES } from '../src/modules/forecast/features.js';
import { createForecastModel } from '../src/modules/forecast/forecast-model.js';
import type { ForecastModel } from '../src/modules/forecast/forecast-model.js';
import { PM25Forecaster } from '../src/modules/forecast/pm25-forecaster.js';
import { HealthRiskEngine } from '../src/modules/health/health-risk-engine.js';
import { RegionResolver } from '../src/modules/nlp/region-resolver.js';
import { ExecutiveAnalytics } from '../src/modules/analytics/executive-analytics.js';
import { QueryEngine } from '../src/modules/query-engine.js';
import { createLogger } from '../src/utils/logger.js';

export const REFERENCE_YEAR = 2026;

export const silentLogger = createLogger({ nodeEnv: 'test', logLevel: 'silent' });

function series(start: number, values: number[]): Array<{ year: number; pm25: number }> {
  return values.map((pm25, i) => ({ year: start + i, pm25 }));
}

/**
 * Five countries observed 2015-2019. Laos has no health baselines, Africa
 * lists only a country without data.
 */
export const FIXTURE_RAW: RawReferenceData = {
  history: {
    Thailand: series(2015, [30, 28, 26, 25, 24]),
    'Viet Nam': series(2015, [40, 42, 38, 41, 39]),
    Laos: series(2015, [20, 20, 20, 20, 20]),
    Japan: series(2015, [12, 12, 12, 12, 12]),
    France: series(2015, [10, 9, 8, 7, 6]),
  },
  baselines: {
    Thailand: {
      populationProxy: 1_000_000,
      years: {
        '2019': {
          'Ischemic heart disease': { all: 1000, children: 100, adults: 300, elderly: 600 },
          Stroke: { all: 500 },
        },
      },
    },
    Vietnam: {
      populationProxy: 2_000_000,
      years: { '2019': { 'Ischemic heart disease': { all: 2000 } } },
    },
    Japan: {
      years: { '2019': { Stroke: { all: 800 } } },
    },
    France: {
      populationProxy: 500_000,
      years: { '2018': { 'Ischemic heart disease': { all: 300 } } },
    },
  },
  regions: {
    'Southeast Asia': ['Thailand', 'Vietnam', 'Laos'],
    ASEAN: ['Thailand', 'Viet Nam', 'Laos'],
    'East Asia': ['Japan'],
    Europe: ['France'],
    Africa: ['Chad'],
  },
};

export function fixtureData(overrides: Partial<RawReferenceData> = {}): ReferenceData {
  return buildReferenceData({ ...FIXTURE_RAW, ...overrides });
}

/**
 * Linear model that predicts last year's value plus `drift`.
 */
export function driftModel(drift = 0): ForecastModel {
  return createForecastModel({
    kind: 'linear',
    version: 'test-drift',
    featureNames: [...FEATURE_NAMES],
    intercept: drift,
    coefficients: { lag_1y: 1 },
  });
}

export interface FixtureStack {
  data: ReferenceData;
  regions: RegionResolver;
  forecaster: PM25Forecaster;
  health: HealthRiskEngine;
  analytics: ExecutiveAnalytics;
}

export function fixtureStack(drift = 0, data: ReferenceData = fixtureData()): FixtureStack {
  const regions = new RegionResolver(data);
  const forecaster = new PM25Forecaster(data, driftModel(drift), regions);
  const health = new HealthRiskEngine(data);
  return { data, regions, forecaster, health, analytics: new ExecutiveAnalytics(forecaster, health) };
}

export function fixtureEngine(model: ForecastModel = driftModel(0), data: ReferenceData = fixtureData()): QueryEngine {
  return new QueryEngine({
    data,
    model,
    referenceYear: REFERENCE_YEAR,
    defaultTopN: 5,
    logger: silentLogger,
  });
}
