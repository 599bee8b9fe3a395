// ===========================================
// MODULE: EXECUTIVE ANALYTICS
// Scenarios, trends, risk, rankings and explanations over the
// forecaster and the health engine
// ===========================================

import { NoDataError, isAirQueryError } from '../../utils/errors.js';
import { TMREL, clampToTmrel } from '../../utils/constants.js';
import { TrendDirection } from '../../types/index.js';
import type { HealthImpact, HealthQueryOptions, PercentSign } from '../../types/index.js';
import type { ResolvedScope } from '../nlp/region-resolver.js';
import type { PM25Forecaster } from '../forecast/pm25-forecaster.js';
import { changeDirection } from '../forecast/pm25-forecaster.js';
import { buildFeatures } from '../forecast/features.js';
import type { FeatureName } from '../forecast/features.js';
import type { HealthRiskEngine } from '../health/health-risk-engine.js';
import { riskScore, riskTier } from './risk.js';
import { coefficientOfVariation, mean, pctChange, stdDev } from './statistics.js';
import { pointUncertainty } from './uncertainty.js';
import type {
  BurdenEntry,
  BurdenMetric,
  DalyResult,
  DeathsChange,
  DeathsChangeEntry,
  Explanation,
  FeatureDriver,
  HealthComparisonResult,
  ImprovementEntry,
  MonthRanking,
  Pm25ChangeResult,
  Pm25RankEntry,
  Ranked,
  Ranking,
  RiskProfile,
  RiskRankEntry,
  ScenarioResult,
  SensitivityEntry,
  SensitivityResult,
  StabilityEntry,
  TrendResult,
  UncertaintyResult,
} from './types.js';

// ============ CONSTANTS ============

// WHO-style approximation of years lost per attributable death
export const DALYS_PER_DEATH = 12.5;

export const DEFAULT_SENSITIVITY_PERCENT = 5;

// Coefficient of variation (%) below which a series reads as stable
const STABLE_CV_PCT = 5;

// How far back a deaths comparison looks for a usable previous year
const DEATHS_LOOKBACK_YEARS = 5;

const TOP_SCENARIO_DISEASES = 3;
const TOP_EXPLAINED_DISEASES = 2;

export const FEATURE_LABELS: Readonly<Record<FeatureName, string>> = {
  lag_1y: 'Previous year PM2.5 level',
  lag_3y: 'PM2.5 level three years ago',
  yoy_change: 'Year-over-year change trajectory',
  yoy_pct_change: 'Year-over-year percentage change',
  rolling_mean_3y: '3-year moving average trend',
  rolling_mean_5y: '5-year moving average trend',
  year: 'Calendar year (temporal trend)',
};

const TOP_DRIVERS: readonly FeatureName[] = ['lag_1y', 'yoy_change', 'rolling_mean_3y'];

// ============ OPTION TYPES ============

export interface RankOptions {
  ascending?: boolean;
  topN?: number;
}

export interface BurdenOptions extends RankOptions {
  metric?: BurdenMetric;
}

// ============ RANKING HELPERS ============

function byCountry(a: { country: string }, b: { country: string }): number {
  return a.country < b.country ? -1 : a.country > b.country ? 1 : 0;
}

/**
 * Sort by value (ties by country name), number the rows and cut to topN.
 */
function toRanking<T extends { country: string }>(
  scope: ResolvedScope,
  rows: T[],
  value: (row: T) => number,
  order: 'asc' | 'desc',
  topN: number | undefined,
  window: { year?: number; startYear?: number; endYear?: number }
): Ranking<T> {
  if (rows.length === 0) {
    throw new NoDataError(`No country in ${scope.label} has enough data for this ranking`, {
      scope: scope.label,
      ...window,
    });
  }

  const sorted = [...rows].sort((a, b) => {
    const diff = order === 'asc' ? value(a) - value(b) : value(b) - value(a);
    return diff || byCountry(a, b);
  });
  const limited = topN !== undefined && topN > 0 ? sorted.slice(0, topN) : sorted;

  return {
    scope: scope.label,
    ...window,
    order,
    total: rows.length,
    entries: limited.map((row, i) => ({ ...row, rank: i + 1 })),
  };
}

export class ExecutiveAnalytics {
  constructor(
    private readonly forecaster: PM25Forecaster,
    private readonly health: HealthRiskEngine
  ) {}

  // ============ HEALTH LOOKUPS ============

  /**
   * Health impact at an explicit PM2.5 level. NoDataError when the country
   * has no disease baselines, or none for the requested disease.
   */
  impactAt(country: string, year: number, pm25: number, options: HealthQueryOptions = {}): HealthImpact {
    const impact = this.health.attributableDeaths(country, year, clampToTmrel(pm25), options);
    if (impact.dataSource === 'none') {
      throw new NoDataError(`No health baseline data for ${country}`, { country, year });
    }
    if (impact.diseaseFilter !== undefined && impact.perDisease.length === 0) {
      throw new NoDataError(`No ${impact.diseaseFilter} baseline for ${country}`, {
        country,
        year,
        disease: impact.diseaseFilter,
      });
    }
    return impact;
  }

  impact(country: string, year: number, options: HealthQueryOptions = {}): HealthImpact {
    return this.impactAt(country, year, this.forecaster.forecast(country, year).pm25, options);
  }

  healthComparison(left: string, right: string, year: number): HealthComparisonResult {
    const comparison = this.health.compare(this.impact(left, year), this.impact(right, year));
    return { year, ...comparison };
  }

  // ============ SCENARIO ============

  scenario(
    country: string,
    year: number,
    percent: number,
    sign: PercentSign,
    options: HealthQueryOptions = {}
  ): ScenarioResult {
    const point = this.forecaster.forecast(country, year);
    // zero stays +0 under either sign
    const signedPercent = percent === 0 ? 0 : Math.abs(percent) * sign;
    const scenarioPm25 = clampToTmrel(point.pm25 * (1 + signedPercent / 100));

    const baseline = this.impactAt(country, year, point.pm25, options);
    const scenario = this.impactAt(country, year, scenarioPm25, options);

    return {
      country,
      year,
      percent: Math.abs(percent),
      sign,
      signedPercent,
      isIncrease: sign > 0,
      baselinePm25: point.pm25,
      scenarioPm25,
      baselineDeaths: baseline.totalDeaths,
      scenarioDeaths: scenario.totalDeaths,
      preventedDeaths: baseline.totalDeaths - scenario.totalDeaths,
      baselineRatePer100k: baseline.ratePer100k,
      scenarioRatePer100k: scenario.ratePer100k,
      topScenarioDiseases: this.health.topDiseases(scenario, TOP_SCENARIO_DISEASES),
      confidence: pointUncertainty(point),
    };
  }

  // ============ TREND & CHANGE ============

  trend(country: string, startYear: number, endYear: number): TrendResult {
    const [start, end] = startYear <= endYear ? [startYear, endYear] : [endYear, startYear];
    const points = this.forecaster.series(country, start, end);
    const values = points.map((p) => p.pm25);

    const startPm25 = values[0] ?? 0;
    const endPm25 = values[values.length - 1] ?? 0;
    const change = pctChange(startPm25, endPm25);
    const cv = coefficientOfVariation(values);

    return {
      country,
      startYear: start,
      endYear: end,
      points,
      startPm25,
      endPm25,
      pctChange: change,
      direction: changeDirection(change),
      mean: mean(values),
      stdDev: stdDev(values),
      cv,
      stabilityLabel: cv < STABLE_CV_PCT ? 'Stable' : 'Volatile',
    };
  }

  pm25Change(country: string, fromYear: number, toYear: number): Pm25ChangeResult {
    const change = this.forecaster.change(country, fromYear, toYear);
    const last = this.forecaster.lastObservedYear(country);
    return { ...change, fromPredicted: fromYear > last, toPredicted: toYear > last };
  }

  // ============ UNCERTAINTY & RISK ============

  uncertainty(country: string, year: number): UncertaintyResult {
    return pointUncertainty(this.forecaster.forecast(country, year));
  }

  riskProfile(country: string, year: number): RiskProfile {
    const point = this.forecaster.forecast(country, year);
    const yoyPct =
      year - 1 >= this.forecaster.firstObservedYear(country)
        ? this.forecaster.yoyChange(country, year).pctChange
        : 0;
    const { interval } = pointUncertainty(point);
    const { score, components } = riskScore(point.pm25, yoyPct, interval);

    return {
      country,
      year,
      pm25: point.pm25,
      yoyPct,
      interval,
      score,
      tier: riskTier(point.pm25),
      aqiCategory: this.health.aqiCategory(point.pm25),
      components,
    };
  }

  // ============ BURDEN ============

  dalys(country: string, year: number, options: HealthQueryOptions = {}): DalyResult {
    const impact = this.impact(country, year, options);
    return {
      country,
      year,
      pm25: impact.pm25,
      ageGroup: options.ageGroup,
      deaths: impact.totalDeaths,
      dalys: impact.totalDeaths * DALYS_PER_DEATH,
      ciLow: impact.ciLow * DALYS_PER_DEATH,
      ciHigh: impact.ciHigh * DALYS_PER_DEATH,
      perDisease: impact.perDisease.map((d) => ({
        disease: d.disease,
        deaths: d.attributedDeaths,
        dalys: d.attributedDeaths * DALYS_PER_DEATH,
      })),
    };
  }

  /**
   * Deaths in `year` against the closest earlier year with health data,
   * looking back up to five years.
   */
  deathsChange(country: string, year: number): DeathsChange {
    const current = this.impact(country, year);
    const firstYear = this.forecaster.firstObservedYear(country);

    for (let previousYear = year - 1; previousYear >= year - DEATHS_LOOKBACK_YEARS; previousYear--) {
      if (previousYear < firstYear) break;
      const previous = this.impact(country, previousYear);
      if (previous.totalDeaths <= 0) continue;

      const delta = current.totalDeaths - previous.totalDeaths;
      return {
        country,
        year,
        previousYear,
        pm25Current: current.pm25,
        pm25Previous: previous.pm25,
        deathsCurrent: current.totalDeaths,
        deathsPrevious: previous.totalDeaths,
        delta,
        pctChange: pctChange(previous.totalDeaths, current.totalDeaths),
        direction: delta > 0 ? 'Increased' : delta < 0 ? 'Decreased' : 'Unchanged',
      };
    }

    throw new NoDataError(`No previous-year health data available for ${country} before ${year}`, {
      country,
      year,
    });
  }

  // ============ EXPLAINABILITY ============

  explain(country?: string, year?: number): Explanation {
    const assumptions = [
      `Excess exposure is PM2.5 above the ${TMREL} µg/m³ TMREL`,
      'Forecasts beyond the last observed year are built one year at a time',
      'Health confidence interval spans 80-120% of the central estimate',
    ];

    if (country === undefined || year === undefined) {
      return {
        drivers: TOP_DRIVERS.map((feature) => ({ feature, label: FEATURE_LABELS[feature] })),
        topDiseases: [],
        assumptions,
      };
    }

    const point = this.forecaster.forecast(country, year);
    const features =
      this.forecaster.stepFeatures(country, year) ??
      buildFeatures(
        new Map(this.forecaster.history(country).map((p): [number, number] => [p.year, p.pm25])),
        year
      );
    const drivers: FeatureDriver[] = TOP_DRIVERS.map((feature) => ({
      feature,
      label: FEATURE_LABELS[feature],
      ...(features ? { value: features[feature] } : {}),
    }));

    const impact = this.health.attributableDeaths(country, year, point.pm25);
    if (impact.baselineYear !== undefined && impact.baselineYear !== year) {
      assumptions.push(`Disease baselines taken from ${impact.baselineYear}, the nearest available year`);
    }

    return {
      drivers,
      country,
      year,
      pm25: point.pm25,
      excessExposure: impact.excessExposure,
      isPredicted: point.isPredicted,
      topDiseases: this.health.topDiseases(impact, TOP_EXPLAINED_DISEASES),
      uncertainty: pointUncertainty(point),
      assumptions,
    };
  }

  // ============ MONTHS ============

  monthRanking(country: string, year: number, order: MonthRanking['order']): MonthRanking {
    const months = [...this.forecaster.monthly(country, year)].sort((a, b) =>
      order === 'cleanest-first' ? a.pm25 - b.pm25 || a.month - b.month : b.pm25 - a.pm25 || a.month - b.month
    );
    const [pick] = months;
    if (!pick) {
      throw new NoDataError(`No monthly breakdown for ${country} in ${year}`, { country, year });
    }
    return { country, year, order, months, pick };
  }

  bestMonth(country: string, year: number): MonthRanking {
    return this.monthRanking(country, year, 'cleanest-first');
  }

  worstMonth(country: string, year: number): MonthRanking {
    return this.monthRanking(country, year, 'dirtiest-first');
  }

  // ============ RANKINGS ============

  rankPm25(scope: ResolvedScope, year: number, options: RankOptions = {}): Ranking<Pm25RankEntry> {
    const rows = this.collect(scope, (country) => {
      const point = this.forecaster.forecast(country, year);
      return { country, pm25: point.pm25, isPredicted: point.isPredicted };
    });
    return toRanking<Pm25RankEntry>(scope, rows, (r) => r.pm25, options.ascending ? 'asc' : 'desc', options.topN, {
      year,
    });
  }

  /**
   * Lowest coefficient of variation first; `ascending: false` puts the most
   * volatile first.
   */
  rankStability(
    scope: ResolvedScope,
    startYear: number,
    endYear: number,
    options: RankOptions = {}
  ): Ranking<StabilityEntry> {
    const rows = this.collect(scope, (country) => {
      const trend = this.trend(country, startYear, endYear);
      return {
        country,
        cv: trend.cv,
        meanPm25: trend.mean,
        stdPm25: trend.stdDev,
        label: trend.stabilityLabel,
      };
    });
    const order = options.ascending === false ? 'desc' : 'asc';
    return toRanking<StabilityEntry>(scope, rows, (r) => r.cv, order, options.topN, {
      startYear: Math.min(startYear, endYear),
      endYear: Math.max(startYear, endYear),
    });
  }

  /**
   * Most negative percentage change first; `ascending: false` lists the
   * fastest worsening first.
   */
  fastestImproving(
    scope: ResolvedScope,
    startYear: number,
    endYear: number,
    options: RankOptions = {}
  ): Ranking<ImprovementEntry> {
    const rows = this.collect(scope, (country) => {
      const trend = this.trend(country, startYear, endYear);
      const direction: ImprovementEntry['direction'] =
        trend.direction === TrendDirection.DECREASING
          ? 'Improving'
          : trend.direction === TrendDirection.INCREASING
            ? 'Worsening'
            : 'Flat';
      return {
        country,
        pm25Start: trend.startPm25,
        pm25End: trend.endPm25,
        pctChange: trend.pctChange,
        direction,
      };
    });
    const order = options.ascending === false ? 'desc' : 'asc';
    return toRanking<ImprovementEntry>(scope, rows, (r) => r.pctChange, order, options.topN, {
      startYear: Math.min(startYear, endYear),
      endYear: Math.max(startYear, endYear),
    });
  }

  /**
   * Deaths or DALYs per country. Countries with no attributable deaths are left out.
   */
  healthBurdenRanking(scope: ResolvedScope, year: number, options: BurdenOptions = {}): Ranking<BurdenEntry> {
    const metric = options.metric ?? 'deaths';
    const rows = this.collect(scope, (country) => {
      const impact = this.impact(country, year);
      if (impact.totalDeaths <= 0) return undefined;
      return {
        country,
        pm25: impact.pm25,
        deaths: impact.totalDeaths,
        value: metric === 'dalys' ? impact.totalDeaths * DALYS_PER_DEATH : impact.totalDeaths,
        metric,
      };
    });
    const order = options.ascending === false ? 'desc' : 'asc';
    return toRanking<BurdenEntry>(scope, rows, (r) => r.value, order, options.topN, { year });
  }

  lowestHealthBurden(scope: ResolvedScope, year: number, options: BurdenOptions = {}): Ranking<BurdenEntry> {
    return this.healthBurdenRanking(scope, year, { ...options, ascending: true });
  }

  /**
   * Deaths prevented per 1% PM2.5 reduction, most sensitive first.
   */
  sensitivity(
    scope: ResolvedScope,
    year: number,
    reductionPercent: number = DEFAULT_SENSITIVITY_PERCENT,
    options: RankOptions = {}
  ): SensitivityResult {
    const reduction = Math.abs(reductionPercent);
    const rows = this.collect(scope, (country) => {
      const result = this.scenario(country, year, reduction, -1);
      if (result.baselineDeaths <= 0) return undefined;
      return {
        country,
        pm25Baseline: result.baselinePm25,
        pm25Scenario: result.scenarioPm25,
        baselineDeaths: result.baselineDeaths,
        scenarioDeaths: result.scenarioDeaths,
        prevented: result.preventedDeaths,
        preventedPer1Pct: reduction > 0 ? result.preventedDeaths / reduction : 0,
      };
    });

    const ranking = toRanking<SensitivityEntry>(scope, rows, (r) => r.preventedPer1Pct, 'desc', options.topN, {
      year,
    });
    return {
      ...ranking,
      reductionPercent: reduction,
      avgPreventedPer1Pct: mean(rows.map((r) => r.preventedPer1Pct)),
    };
  }

  deathsChangeRanking(scope: ResolvedScope, year: number, options: RankOptions = {}): Ranking<DeathsChangeEntry> {
    const rows = this.collect(scope, (country) => this.deathsChange(country, year));
    const order = options.ascending ? 'asc' : 'desc';
    return toRanking<DeathsChangeEntry>(scope, rows, (r) => r.pctChange, order, options.topN, { year });
  }

  rankRisk(scope: ResolvedScope, year: number, options: RankOptions = {}): Ranking<RiskRankEntry> {
    const rows = this.collect(scope, (country) => this.riskProfile(country, year));
    const order = options.ascending ? 'asc' : 'desc';
    return toRanking<RiskRankEntry>(scope, rows, (r) => r.score, order, options.topN, { year });
  }

  /**
   * Top of the risk ranking. `lowest` flips it to the safest country.
   */
  highestRisk(scope: ResolvedScope, year: number, lowest = false): Ranked<RiskRankEntry> {
    const [top] = this.rankRisk(scope, year, { ascending: lowest, topN: 1 }).entries;
    if (!top) {
      throw new NoDataError(`No risk score available in ${scope.label}`, { scope: scope.label, year });
    }
    return top;
  }

  // ============ INTERNALS ============

  /**
   * Run `row` for every country in scope. Countries that fail with a domain
   * error, or return undefined, are skipped.
   */
  private collect<T>(scope: ResolvedScope, row: (country: string) => T | undefined): T[] {
    const rows: T[] = [];
    for (const country of scope.countries) {
      try {
        const value = row(country);
        if (value !== undefined) rows.push(value);
      } catch (error) {
        if (!isAirQueryError(error)) throw error;
      }
    }
    return rows;
  }
}
