// ===========================================
// MODULE: PM2.5 FORECASTER
// Observed history plus recursive annual forecasts and monthly decomposition
// ===========================================

import { NoDataError, UnknownCountryError } from '../../utils/errors.js';
import { clampToTmrel } from '../../utils/constants.js';
import { TrendDirection } from '../../types/index.js';
import type { ForecastPoint, MonthlyPoint, Pm25Change, YearValue } from '../../types/index.js';
import type { ReferenceData } from '../../data/reference-data.js';
import type { RegionResolver } from '../nlp/region-resolver.js';
import { forecastConfidence } from './confidence.js';
import { runRecursiveForecast } from './features.js';
import type { FeatureVector } from './features.js';
import type { ForecastModel } from './forecast-model.js';
import { monthName, seasonalFactor } from './seasonal.js';

// Relative moves inside this band read as flat
const STABLE_BAND_PCT = 2;

export function changeDirection(pctChange: number): TrendDirection {
  if (pctChange > STABLE_BAND_PCT) return TrendDirection.INCREASING;
  if (pctChange < -STABLE_BAND_PCT) return TrendDirection.DECREASING;
  return TrendDirection.STABLE;
}

export class PM25Forecaster {
  constructor(
    private readonly data: ReferenceData,
    private readonly model: ForecastModel,
    private readonly regions: RegionResolver
  ) {}

  countries(): string[] {
    return [...this.data.history.keys()].sort();
  }

  hasCountry(country: string): boolean {
    return this.data.history.has(country);
  }

  history(country: string): readonly YearValue[] {
    const series = this.data.history.get(country);
    if (!series || series.length === 0) {
      throw new UnknownCountryError(country);
    }
    return series;
  }

  lastObservedYear(country: string): number {
    const series = this.history(country);
    return series[series.length - 1]?.year ?? 0;
  }

  firstObservedYear(country: string): number {
    return this.history(country)[0]?.year ?? 0;
  }

  forecast(country: string, year: number): ForecastPoint {
    const [point] = this.series(country, year, year);
    if (!point) {
      throw new NoDataError(`No PM2.5 value for ${country} in ${year}`, { country, year });
    }
    return point;
  }

  /**
   * Every year of [start, end] from a single recursive pass.
   */
  series(country: string, start: number, end: number): ForecastPoint[] {
    const observed = this.history(country);
    const first = observed[0]?.year ?? start;
    const last = this.lastObservedYear(country);

    if (start > end) {
      return this.series(country, end, start);
    }
    if (start < first) {
      throw new NoDataError(
        `PM2.5 data for ${country} starts in ${first}; ${start} is before the first observation`,
        { country, year: start, firstObservedYear: first }
      );
    }

    const values = new Map<number, number>(observed.map((p): [number, number] => [p.year, p.pm25]));
    if (end > last) {
      for (const step of runRecursiveForecast(this.model, observed, end)) {
        values.set(step.year, step.pm25);
      }
    }

    const points: ForecastPoint[] = [];
    for (let year = start; year <= end; year++) {
      const pm25 = values.get(year);
      if (pm25 === undefined) {
        throw new NoDataError(`No PM2.5 observation for ${country} in ${year}`, { country, year });
      }

      const isPredicted = year > last;
      points.push({
        country,
        year,
        pm25,
        isPredicted,
        ...(isPredicted ? { confidence: forecastConfidence(year - last) } : {}),
      });
    }
    return points;
  }

  change(country: string, fromYear: number, toYear: number): Pm25Change {
    const [low, high] = fromYear <= toYear ? [fromYear, toYear] : [toYear, fromYear];
    const points = this.series(country, low, high);
    const byYear = new Map(points.map((p): [number, number] => [p.year, p.pm25]));

    const pm25From = byYear.get(fromYear) ?? 0;
    const pm25To = byYear.get(toYear) ?? 0;
    const absChange = pm25To - pm25From;
    const pctChange = pm25From > 0 ? (absChange / pm25From) * 100 : 0;

    return {
      country,
      fromYear,
      toYear,
      pm25From,
      pm25To,
      absChange,
      pctChange,
      direction: changeDirection(pctChange),
    };
  }

  yoyChange(country: string, year: number): Pm25Change {
    return this.change(country, year - 1, year);
  }

  monthly(country: string, year: number): MonthlyPoint[] {
    const annual = this.forecast(country, year).pm25;
    const region = this.regions.homeRegion(country);

    return Array.from({ length: 12 }, (_, i) => {
      const month = i + 1;
      const factor = seasonalFactor(region, month);
      return {
        month,
        monthName: monthName(month),
        pm25: clampToTmrel(annual * factor),
        seasonalFactor: factor,
      };
    });
  }

  forecastMonth(country: string, year: number, month: number): MonthlyPoint {
    const point = this.monthly(country, year)[month - 1];
    if (!point) {
      throw new NoDataError(`Month ${month} is outside 1-12`, { month });
    }
    return point;
  }

  /**
   * Feature vector the model saw when predicting `year`. Null for observed
   * years and persistence steps.
   */
  stepFeatures(country: string, year: number): FeatureVector | null {
    const observed = this.history(country);
    if (year <= this.lastObservedYear(country)) {
      return null;
    }
    const step = runRecursiveForecast(this.model, observed, year).find((s) => s.year === year);
    return step?.features ?? null;
  }

  modelInfo(): { kind: string; version: string } {
    return { kind: this.model.kind, version: this.model.version };
  }
}
