// ===========================================
// EXECUTIVE ANALYTICS - TYPE DEFINITIONS
// ===========================================

import type {
  AgeGroup,
  AqiCategory,
  ConfidenceTier,
  DiseaseImpact,
  ForecastPoint,
  HealthImpact,
  MonthlyPoint,
  Pm25Change,
  RiskTier,
  TrendDirection,
} from '../../types/index.js';

export type BurdenMetric = 'deaths' | 'dalys';

// ============ SINGLE-COUNTRY RESULTS ============

export interface ScenarioResult {
  country: string;
  year: number;
  percent: number;
  sign: 1 | -1;
  signedPercent: number;
  isIncrease: boolean;
  baselinePm25: number;
  scenarioPm25: number;
  baselineDeaths: number;
  scenarioDeaths: number;
  // Negative when the scenario raises pollution
  preventedDeaths: number;
  baselineRatePer100k: number;
  scenarioRatePer100k: number;
  topScenarioDiseases: DiseaseImpact[];
  confidence: UncertaintyResult;
}

export interface TrendResult {
  country: string;
  startYear: number;
  endYear: number;
  points: ForecastPoint[];
  startPm25: number;
  endPm25: number;
  pctChange: number;
  direction: TrendDirection;
  mean: number;
  stdDev: number;
  cv: number;
  stabilityLabel: 'Stable' | 'Volatile';
}

export interface UncertaintyResult {
  country: string;
  year: number;
  pm25: number;
  isPredicted: boolean;
  tier: ConfidenceTier;
  score: number;
  horizonYears: number;
  // ± half-width in µg/m³
  interval: number;
  low: number;
  high: number;
}

export interface RiskProfile {
  country: string;
  year: number;
  pm25: number;
  yoyPct: number;
  interval: number;
  score: number;
  tier: RiskTier;
  aqiCategory: AqiCategory;
  components: {
    pm25: number;
    yoy: number;
    interval: number;
  };
}

export interface DalyResult {
  country: string;
  year: number;
  pm25: number;
  ageGroup?: AgeGroup;
  deaths: number;
  dalys: number;
  ciLow: number;
  ciHigh: number;
  perDisease: Array<{ disease: string; deaths: number; dalys: number }>;
}

export interface DeathsChange {
  country: string;
  year: number;
  previousYear: number;
  pm25Current: number;
  pm25Previous: number;
  deathsCurrent: number;
  deathsPrevious: number;
  delta: number;
  pctChange: number;
  direction: 'Increased' | 'Decreased' | 'Unchanged';
}

export interface FeatureDriver {
  feature: string;
  label: string;
  value?: number;
}

export interface Explanation {
  drivers: FeatureDriver[];
  country?: string;
  year?: number;
  pm25?: number;
  excessExposure?: number;
  isPredicted?: boolean;
  topDiseases: DiseaseImpact[];
  uncertainty?: UncertaintyResult;
  assumptions: string[];
}

export interface MonthRanking {
  country: string;
  year: number;
  order: 'cleanest-first' | 'dirtiest-first';
  months: MonthlyPoint[];
  pick: MonthlyPoint;
}

export interface HealthComparisonResult {
  year: number;
  left: HealthImpact;
  right: HealthImpact;
  higherBurden: string | null;
}

export interface Pm25ChangeResult extends Pm25Change {
  fromPredicted: boolean;
  toPredicted: boolean;
}

// ============ RANKINGS ============

export type Ranked<T> = T & { rank: number };

export interface Ranking<T> {
  scope: string;
  year?: number;
  startYear?: number;
  endYear?: number;
  order: 'asc' | 'desc';
  total: number;
  entries: Array<Ranked<T>>;
}

export interface Pm25RankEntry {
  country: string;
  pm25: number;
  isPredicted: boolean;
}

export interface StabilityEntry {
  country: string;
  cv: number;
  meanPm25: number;
  stdPm25: number;
  label: 'Stable' | 'Volatile';
}

export interface ImprovementEntry {
  country: string;
  pm25Start: number;
  pm25End: number;
  pctChange: number;
  direction: 'Improving' | 'Worsening' | 'Flat';
}

export interface BurdenEntry {
  country: string;
  pm25: number;
  deaths: number;
  value: number;
  metric: BurdenMetric;
}

export interface SensitivityEntry {
  country: string;
  pm25Baseline: number;
  pm25Scenario: number;
  baselineDeaths: number;
  scenarioDeaths: number;
  prevented: number;
  preventedPer1Pct: number;
}

export interface SensitivityResult extends Ranking<SensitivityEntry> {
  reductionPercent: number;
  avgPreventedPer1Pct: number;
}

export type RiskRankEntry = RiskProfile;

export type DeathsChangeEntry = DeathsChange;
