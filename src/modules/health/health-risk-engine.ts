// ===========================================
// MODULE: HEALTH RISK ENGINE
// PM2.5 exposure -> attributable deaths via exposure-response curves
// ===========================================

import { TMREL } from '../../utils/constants.js';
import { UnknownDiseaseError } from '../../utils/errors.js';
import type {
  AgeGroup,
  AgeGroupImpact,
  AqiCategory,
  DiseaseImpact,
  DiseaseParams,
  HealthImpact,
  HealthQueryOptions,
} from '../../types/index.js';
import type { CountryBaseline, DetailRecord, ReferenceData } from '../../data/reference-data.js';
import { LEXICON } from '../nlp/lexicon.js';
import { VocabularyMatcher } from '../nlp/vocabulary-matcher.js';
import {
  AGE_GROUPS,
  AGE_VULNERABILITY,
  DISEASE_NAMES,
  DISEASE_TABLE,
  ageGroupForBand,
  diseaseParams,
  diseaseRank,
} from './disease-table.js';

// ============ CONSTANTS ============

const CI_LOW_FACTOR = 0.8;
const CI_HIGH_FACTOR = 1.2;
const PER_100K = 100_000;

const AQI_BANDS: ReadonlyArray<{ below: number; level: string; color: string }> = [
  { below: 12, level: 'Good', color: '#4CAF50' },
  { below: 35.5, level: 'Moderate', color: '#FFC107' },
  { below: 55.5, level: 'Unhealthy for Sensitive Groups', color: '#FF9800' },
  { below: 150.5, level: 'Unhealthy', color: '#F44336' },
  { below: 250.5, level: 'Very Unhealthy', color: '#9C27B0' },
];
const HAZARDOUS: AqiCategory = { level: 'Hazardous', color: '#7B1FA2' };

// ============ TYPES ============

export interface ExposureResponse {
  relativeRisk: number;
  attributableFraction: number;
}

export interface HealthComparison {
  left: HealthImpact;
  right: HealthImpact;
  higherBurden: string | null;
}

interface Accumulator {
  baseline: number;
  attributed: number;
}

// ============ PURE HELPERS ============

export function exposureResponse(pm25: number, params: DiseaseParams): ExposureResponse {
  const exposure = Math.max(0, pm25 - TMREL);
  if (exposure <= 0) {
    return { relativeRisk: 1, attributableFraction: 0 };
  }
  const relativeRisk = 1 + params.alpha * (1 - Math.exp(-params.gamma * Math.pow(exposure, params.delta)));
  return { relativeRisk, attributableFraction: (relativeRisk - 1) / relativeRisk };
}

export function aqiCategory(pm25: number): AqiCategory {
  const band = AQI_BANDS.find((b) => pm25 < b.below);
  return band ? { level: band.level, color: band.color } : { ...HAZARDOUS };
}

function nearestYear(years: Iterable<number>, target: number): number | undefined {
  let best: number | undefined;
  for (const year of years) {
    if (
      best === undefined ||
      Math.abs(year - target) < Math.abs(best - target) ||
      (Math.abs(year - target) === Math.abs(best - target) && year < best)
    ) {
      best = year;
    }
  }
  return best;
}

function byDeathsThenCanonical(a: DiseaseImpact, b: DiseaseImpact): number {
  return b.attributedDeaths - a.attributedDeaths || diseaseRank(a.disease) - diseaseRank(b.disease);
}

function toDiseaseImpact(params: DiseaseParams, pm25: number, acc: Accumulator): DiseaseImpact {
  const { relativeRisk, attributableFraction } = exposureResponse(pm25, params);
  return {
    disease: params.name,
    category: params.category,
    baselineDeaths: acc.baseline,
    relativeRisk,
    attributableFraction,
    attributedDeaths: acc.attributed,
    ciLow: acc.attributed * CI_LOW_FACTOR,
    ciHigh: acc.attributed * CI_HIGH_FACTOR,
  };
}

function toAgeBreakdown(totals: ReadonlyMap<AgeGroup, number>): AgeGroupImpact[] {
  const sum = [...totals.values()].reduce((s, v) => s + v, 0);
  return AGE_GROUPS.filter((group) => totals.has(group)).map((group) => {
    const deaths = totals.get(group) ?? 0;
    const vulnerability = AGE_VULNERABILITY[group];
    return {
      ageGroup: group,
      label: vulnerability.label,
      multiplier: vulnerability.multiplier,
      attributedDeaths: deaths,
      ciLow: deaths * CI_LOW_FACTOR,
      ciHigh: deaths * CI_HIGH_FACTOR,
      sharePct: sum > 0 ? (deaths / sum) * 100 : 0,
    };
  });
}

// ============ ENGINE ============

export class HealthRiskEngine {
  private readonly diseaseMatcher = new VocabularyMatcher(
    DISEASE_NAMES,
    Object.fromEntries(
      Object.entries(LEXICON.diseaseKeywords).flatMap(([disease, keywords]) =>
        keywords.map((keyword): [string, string] => [keyword, disease])
      )
    )
  );

  constructor(private readonly data: ReferenceData) {}

  diseases(): string[] {
    return DISEASE_TABLE.map((d) => d.name);
  }

  hasBaseline(country: string): boolean {
    const baseline = this.data.baselines.get(country);
    return baseline !== undefined && baseline.years.size > 0;
  }

  aqiCategory(pm25: number): AqiCategory {
    return aqiCategory(pm25);
  }

  /**
   * Canonical disease name for a caller-supplied one ("stroke", "heart disease").
   */
  resolveDisease(name: string): string {
    const disease = this.diseaseMatcher.best(name);
    if (disease === undefined) {
      throw new UnknownDiseaseError(name, [...DISEASE_NAMES]);
    }
    return disease;
  }

  /**
   * Deaths attributable to PM2.5 above TMREL. Uses the extended age-band
   * records when loaded for the country, else the aggregated baselines.
   */
  attributableDeaths(
    country: string,
    year: number,
    pm25: number,
    requested: HealthQueryOptions = {}
  ): HealthImpact {
    const options: HealthQueryOptions = {
      ...requested,
      disease: requested.disease === undefined ? undefined : this.resolveDisease(requested.disease),
    };
    const shell: HealthImpact = {
      country,
      year,
      pm25,
      excessExposure: Math.max(0, pm25 - TMREL),
      tmrel: TMREL,
      aqiCategory: aqiCategory(pm25),
      ageGroup: options.ageGroup,
      diseaseFilter: options.disease,
      totalDeaths: 0,
      ciLow: 0,
      ciHigh: 0,
      ratePer100k: 0,
      populationProxy: 0,
      perDisease: [],
      ageBreakdown: [],
      dataSource: 'none',
    };

    const baseline = this.data.baselines.get(country);
    const records = this.data.detail?.get(country);

    const computed =
      (records && this.fromDetail(shell, records, options)) ??
      (baseline && this.fromBaseline(shell, baseline, options)) ??
      shell;

    const populationProxy = baseline?.populationProxy ?? this.summedBaseline(baseline, computed.baselineYear);
    return {
      ...computed,
      populationProxy,
      ratePer100k: populationProxy > 0 ? (computed.totalDeaths / populationProxy) * PER_100K : 0,
    };
  }

  topDiseases(impact: HealthImpact, k: number): DiseaseImpact[] {
    return [...impact.perDisease].sort(byDeathsThenCanonical).slice(0, Math.max(0, k));
  }

  /**
   * Two impacts side by side. Each keeps its own baseline and population.
   */
  compare(left: HealthImpact, right: HealthImpact): HealthComparison {
    let higherBurden: string | null = null;
    if (left.totalDeaths > right.totalDeaths) higherBurden = left.country;
    else if (right.totalDeaths > left.totalDeaths) higherBurden = right.country;
    return { left, right, higherBurden };
  }

  // ============ BASELINE PATH ============

  private fromBaseline(
    shell: HealthImpact,
    baseline: CountryBaseline,
    options: HealthQueryOptions
  ): HealthImpact | undefined {
    const baselineYear = nearestYear(baseline.years.keys(), shell.year);
    const diseases = baselineYear === undefined ? undefined : baseline.years.get(baselineYear);
    if (baselineYear === undefined || !diseases) {
      return undefined;
    }

    const multiplier = options.ageGroup ? AGE_VULNERABILITY[options.ageGroup].multiplier : 1;
    const perDisease: DiseaseImpact[] = [];
    const ageTotals = new Map<AgeGroup, number>();

    for (const params of DISEASE_TABLE) {
      if (options.disease && params.name !== options.disease) continue;
      const entry = diseases.get(params.name);
      if (!entry) continue;

      const { attributableFraction } = exposureResponse(shell.pm25, params);
      const deathsBase = options.ageGroup ? entry[options.ageGroup] ?? entry.all : entry.all;
      perDisease.push(
        toDiseaseImpact(params, shell.pm25, {
          baseline: deathsBase,
          attributed: deathsBase * multiplier * attributableFraction,
        })
      );

      for (const group of AGE_GROUPS) {
        if (options.ageGroup && group !== options.ageGroup) continue;
        const band = entry[group];
        if (band === undefined) continue;
        const attributed = band * AGE_VULNERABILITY[group].multiplier * attributableFraction;
        ageTotals.set(group, (ageTotals.get(group) ?? 0) + attributed);
      }
    }

    perDisease.sort(byDeathsThenCanonical);
    const totalDeaths = perDisease.reduce((sum, d) => sum + d.attributedDeaths, 0);

    return {
      ...shell,
      totalDeaths,
      ciLow: totalDeaths * CI_LOW_FACTOR,
      ciHigh: totalDeaths * CI_HIGH_FACTOR,
      perDisease,
      ageBreakdown: toAgeBreakdown(ageTotals),
      dataSource: 'baseline',
      baselineYear,
    };
  }

  private summedBaseline(baseline: CountryBaseline | undefined, year: number | undefined): number {
    if (!baseline || year === undefined) return 0;
    const diseases = baseline.years.get(year);
    if (!diseases) return 0;
    let sum = 0;
    for (const entry of diseases.values()) {
      sum += entry.all;
    }
    return sum;
  }

  // ============ EXTENDED PATH ============

  private fromDetail(
    shell: HealthImpact,
    records: readonly DetailRecord[],
    options: HealthQueryOptions
  ): HealthImpact | undefined {
    const baselineYear = nearestYear(
      records.map((r) => r.year),
      shell.year
    );
    if (baselineYear === undefined) return undefined;

    const diseaseTotals = new Map<string, Accumulator>();
    const ageTotals = new Map<AgeGroup, number>();

    for (const record of records) {
      if (record.year !== baselineYear || record.measure !== 'Deaths') continue;

      const group = ageGroupForBand(record.ageName);
      const params = diseaseParams(record.cause);
      if (!group || !params) continue;
      if (options.ageGroup && group !== options.ageGroup) continue;
      if (options.disease && params.name !== options.disease) continue;

      const { attributableFraction } = exposureResponse(shell.pm25, params);
      const attributed = record.val * AGE_VULNERABILITY[group].multiplier * attributableFraction;

      const acc = diseaseTotals.get(params.name) ?? { baseline: 0, attributed: 0 };
      acc.baseline += record.val;
      acc.attributed += attributed;
      diseaseTotals.set(params.name, acc);
      ageTotals.set(group, (ageTotals.get(group) ?? 0) + attributed);
    }

    if (diseaseTotals.size === 0) return undefined;

    const perDisease = DISEASE_TABLE.flatMap((params) => {
      const acc = diseaseTotals.get(params.name);
      return acc ? [toDiseaseImpact(params, shell.pm25, acc)] : [];
    }).sort(byDeathsThenCanonical);
    const totalDeaths = perDisease.reduce((sum, d) => sum + d.attributedDeaths, 0);

    return {
      ...shell,
      totalDeaths,
      ciLow: totalDeaths * CI_LOW_FACTOR,
      ciHigh: totalDeaths * CI_HIGH_FACTOR,
      perDisease,
      ageBreakdown: toAgeBreakdown(ageTotals),
      dataSource: 'extended',
      baselineYear,
    };
  }
}
