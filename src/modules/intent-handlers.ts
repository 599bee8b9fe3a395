// ===========================================
// INTENT HANDLERS
// One handler per intent: validate entities, call analytics, return payload
// ===========================================

import { Intent } from '../types/index.js';
import type { HealthQueryOptions, ParsedQuery } from '../types/index.js';
import { MissingRequiredEntityError } from '../utils/errors.js';
import type { ExecutiveAnalytics } from './analytics/executive-analytics.js';
import type { PM25Forecaster } from './forecast/pm25-forecaster.js';
import type { HealthRiskEngine } from './health/health-risk-engine.js';
import type { RegionResolver, ResolvedScope } from './nlp/region-resolver.js';

// Window used by trend-style questions that name no year
const DEFAULT_WINDOW_YEARS = 5;
const DEFAULT_TOP_DISEASES = 3;

export interface HandlerContext {
  analytics: ExecutiveAnalytics;
  forecaster: PM25Forecaster;
  health: HealthRiskEngine;
  regions: RegionResolver;
  referenceYear: number;
  defaultTopN: number;
}

export type IntentHandler = (parsed: ParsedQuery, ctx: HandlerContext) => unknown;

export type HandledIntent = Exclude<Intent, Intent.UNRECOGNIZED>;

// ============ DIRECTION FLAGS ============

const ASCENDING_PM25 = /\b(?:cleanest|least\s+polluted|lowest(?:\s+pm)?|best\s+air)\b/i;
const VOLATILE_FIRST = /\b(?:volatile|volatility|unstable|least\s+stable)\b/i;
const WORSENING_FIRST = /\b(?:worsening|worst\s+trend|deteriorat\w*|getting\s+worse)\b/i;
const LOWEST_RISK = /\b(?:lowest|least|safest|smallest)\b/i;
const DALY_METRIC = /\bdalys?\b|disability[-\s]adjusted/i;

// ============ ENTITY GUARDS ============

function requireCountryYear(intent: Intent, parsed: ParsedQuery): { country: string; year: number } {
  const { country, year } = parsed;
  if (country === undefined || year === undefined) {
    const missing = [...(country === undefined ? ['country'] : []), ...(year === undefined ? ['year'] : [])];
    throw new MissingRequiredEntityError(intent, missing);
  }
  return { country, year };
}

function requireCountry(intent: Intent, parsed: ParsedQuery): string {
  if (parsed.country === undefined) {
    throw new MissingRequiredEntityError(intent, ['country']);
  }
  return parsed.country;
}

function healthOptions(parsed: ParsedQuery): HealthQueryOptions {
  return {
    ...(parsed.ageGroup ? { ageGroup: parsed.ageGroup } : {}),
    ...(parsed.disease ? { disease: parsed.disease } : {}),
  };
}

function scopeOf(parsed: ParsedQuery, ctx: HandlerContext): ResolvedScope {
  return ctx.regions.scope({ region: parsed.region, countries: parsed.countries });
}

/**
 * Country-level questions with exactly one country and no region stay on that country.
 */
function narrowScope(parsed: ParsedQuery, ctx: HandlerContext): ResolvedScope {
  if (parsed.country !== undefined && parsed.countries.length === 1 && parsed.region === undefined) {
    return { label: parsed.country, countries: [parsed.country] };
  }
  return scopeOf(parsed, ctx);
}

/**
 * Two or more years span first..last. One year pairs with the reference
 * year, or with the five years after it when they coincide. None means the
 * five years from the reference year.
 */
export function trendWindow(parsed: ParsedQuery, referenceYear: number): { start: number; end: number } {
  const first = parsed.years[0];
  const last = parsed.years[parsed.years.length - 1];

  if (first !== undefined && last !== undefined && parsed.years.length >= 2) {
    return { start: first, end: last };
  }
  if (first !== undefined) {
    if (first === referenceYear) return { start: first, end: first + DEFAULT_WINDOW_YEARS };
    return { start: Math.min(first, referenceYear), end: Math.max(first, referenceYear) };
  }
  return { start: referenceYear, end: referenceYear + DEFAULT_WINDOW_YEARS };
}

// ============ HANDLERS ============

export const INTENT_HANDLERS: Readonly<Record<HandledIntent, IntentHandler>> = {
  [Intent.SCENARIO_PM25_CHANGE]: (parsed, ctx) => {
    const { country, year } = requireCountryYear(Intent.SCENARIO_PM25_CHANGE, parsed);
    if (parsed.percent === undefined) {
      throw new MissingRequiredEntityError(Intent.SCENARIO_PM25_CHANGE, ['percent']);
    }
    return ctx.analytics.scenario(country, year, parsed.percent, parsed.percentSign ?? -1, healthOptions(parsed));
  },

  [Intent.SENSITIVITY_PM25_DEATHS]: (parsed, ctx) =>
    ctx.analytics.sensitivity(narrowScope(parsed, ctx), parsed.year ?? ctx.referenceYear, parsed.percent, {
      topN: parsed.topN ?? ctx.defaultTopN,
    }),

  [Intent.LOWEST_HEALTH_BURDEN]: (parsed, ctx) =>
    ctx.analytics.lowestHealthBurden(scopeOf(parsed, ctx), parsed.year ?? ctx.referenceYear, {
      metric: DALY_METRIC.test(parsed.rawMessage) ? 'dalys' : 'deaths',
      topN: parsed.topN ?? ctx.defaultTopN,
    }),

  [Intent.FASTEST_IMPROVEMENT_PM25]: (parsed, ctx) => {
    const { start, end } = trendWindow(parsed, ctx.referenceYear);
    return ctx.analytics.fastestImproving(scopeOf(parsed, ctx), start, end, {
      ascending: !WORSENING_FIRST.test(parsed.rawMessage),
      topN: parsed.topN ?? ctx.defaultTopN,
    });
  },

  [Intent.STABILITY_PM25]: (parsed, ctx) => {
    const { start, end } = trendWindow(parsed, ctx.referenceYear);
    return ctx.analytics.rankStability(scopeOf(parsed, ctx), start, end, {
      ascending: !VOLATILE_FIRST.test(parsed.rawMessage),
      topN: parsed.topN ?? ctx.defaultTopN,
    });
  },

  [Intent.RANK_PM25]: (parsed, ctx) =>
    ctx.analytics.rankPm25(scopeOf(parsed, ctx), parsed.year ?? ctx.referenceYear, {
      ascending: ASCENDING_PM25.test(parsed.rawMessage),
      topN: parsed.topN ?? ctx.defaultTopN,
    }),

  [Intent.DEATHS_CHANGE_YOY]: (parsed, ctx) => {
    const year = parsed.year ?? ctx.referenceYear;
    if (parsed.country !== undefined && parsed.countries.length === 1) {
      return ctx.analytics.deathsChange(parsed.country, year);
    }
    return ctx.analytics.deathsChangeRanking(scopeOf(parsed, ctx), year, {
      topN: parsed.topN ?? ctx.defaultTopN,
    });
  },

  [Intent.LIST_COUNTRIES]: (parsed, ctx) => {
    const scope = parsed.region ? scopeOf(parsed, ctx) : undefined;
    const countries = scope ? scope.countries : ctx.forecaster.countries();
    return {
      scope: scope?.label ?? 'Global',
      count: countries.length,
      countries,
      regions: ctx.regions.supportedRegions(),
    };
  },

  [Intent.RISK_RANKING]: (parsed, ctx) =>
    ctx.analytics.rankRisk(scopeOf(parsed, ctx), parsed.year ?? ctx.referenceYear, {
      topN: parsed.topN ?? ctx.defaultTopN,
    }),

  [Intent.HIGHEST_RISK_COUNTRY]: (parsed, ctx) =>
    ctx.analytics.highestRisk(
      scopeOf(parsed, ctx),
      parsed.year ?? ctx.referenceYear,
      LOWEST_RISK.test(parsed.rawMessage)
    ),

  [Intent.HEALTH_DALYS]: (parsed, ctx) => {
    if (parsed.country !== undefined && parsed.countries.length === 1) {
      const { country, year } = requireCountryYear(Intent.HEALTH_DALYS, parsed);
      return ctx.analytics.dalys(country, year, healthOptions(parsed));
    }
    return ctx.analytics.healthBurdenRanking(scopeOf(parsed, ctx), parsed.year ?? ctx.referenceYear, {
      metric: 'dalys',
      ascending: false,
      topN: parsed.topN ?? ctx.defaultTopN,
    });
  },

  [Intent.EXPLAINABILITY]: (parsed, ctx) => ctx.analytics.explain(parsed.country, parsed.year),

  [Intent.RISK_LEVEL]: (parsed, ctx) => {
    const { country, year } = requireCountryYear(Intent.RISK_LEVEL, parsed);
    return ctx.analytics.riskProfile(country, year);
  },

  [Intent.TREND_PM25]: (parsed, ctx) => {
    const country = requireCountry(Intent.TREND_PM25, parsed);
    const { start, end } = trendWindow(parsed, ctx.referenceYear);
    return ctx.analytics.trend(country, start, end);
  },

  [Intent.PM25_CHANGE]: (parsed, ctx) => {
    const country = requireCountry(Intent.PM25_CHANGE, parsed);
    const from = parsed.years[0];
    const to = parsed.years[parsed.years.length - 1];
    if (from === undefined || to === undefined || from === to) {
      throw new MissingRequiredEntityError(Intent.PM25_CHANGE, ['two years']);
    }
    return ctx.analytics.pm25Change(country, from, to);
  },

  [Intent.COMPARE_HEALTH]: (parsed, ctx) => {
    const [left, right] = parsed.countries;
    if (left === undefined || right === undefined) {
      throw new MissingRequiredEntityError(Intent.COMPARE_HEALTH, ['two countries']);
    }
    if (parsed.year === undefined) {
      throw new MissingRequiredEntityError(Intent.COMPARE_HEALTH, ['year']);
    }
    return ctx.analytics.healthComparison(left, right, parsed.year);
  },

  [Intent.HEALTH_RATE]: (parsed, ctx) => {
    const { country, year } = requireCountryYear(Intent.HEALTH_RATE, parsed);
    const impact = ctx.analytics.impact(country, year, healthOptions(parsed));
    return {
      country,
      year,
      pm25: impact.pm25,
      ageGroup: impact.ageGroup,
      ratePer100k: impact.ratePer100k,
      totalDeaths: impact.totalDeaths,
      populationProxy: impact.populationProxy,
      dataSource: impact.dataSource,
    };
  },

  [Intent.HEALTH_DEATHS]: (parsed, ctx) => {
    const { country, year } = requireCountryYear(Intent.HEALTH_DEATHS, parsed);
    return ctx.analytics.impact(country, year, healthOptions(parsed));
  },

  [Intent.TOP_DISEASES]: (parsed, ctx) => {
    const { country, year } = requireCountryYear(Intent.TOP_DISEASES, parsed);
    const impact = ctx.analytics.impact(country, year, { ageGroup: parsed.ageGroup });
    const diseases = ctx.health.topDiseases(impact, parsed.topN ?? DEFAULT_TOP_DISEASES);
    return { country, year, pm25: impact.pm25, totalDeaths: impact.totalDeaths, diseases };
  },

  [Intent.BEST_MONTH]: (parsed, ctx) => {
    const { country, year } = requireCountryYear(Intent.BEST_MONTH, parsed);
    return ctx.analytics.bestMonth(country, year);
  },

  [Intent.WORST_MONTH]: (parsed, ctx) => {
    const { country, year } = requireCountryYear(Intent.WORST_MONTH, parsed);
    return ctx.analytics.worstMonth(country, year);
  },

  [Intent.PM25_FORECAST_MONTHLY]: (parsed, ctx) => {
    const { country, year } = requireCountryYear(Intent.PM25_FORECAST_MONTHLY, parsed);
    if (parsed.month === undefined) {
      throw new MissingRequiredEntityError(Intent.PM25_FORECAST_MONTHLY, ['month']);
    }
    const annual = ctx.forecaster.forecast(country, year);
    return {
      ...annual,
      annualPm25: annual.pm25,
      ...ctx.forecaster.forecastMonth(country, year, parsed.month),
    };
  },

  [Intent.PM25_FORECAST]: (parsed, ctx) => {
    const { country, year } = requireCountryYear(Intent.PM25_FORECAST, parsed);
    const point = ctx.forecaster.forecast(country, year);
    return {
      ...point,
      aqiCategory: ctx.health.aqiCategory(point.pm25),
      uncertainty: ctx.analytics.uncertainty(country, year),
    };
  },
};
