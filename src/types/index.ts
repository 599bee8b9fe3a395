// ===========================================
// AIRHEALTH QUERY ENGINE - TYPE DEFINITIONS
// ===========================================

// ============ ENUMS ============

export enum Intent {
  // Priority A - overrides everything below
  SCENARIO_PM25_CHANGE = 'SCENARIO_PM25_CHANGE',
  SENSITIVITY_PM25_DEATHS = 'SENSITIVITY_PM25_DEATHS',
  LOWEST_HEALTH_BURDEN = 'LOWEST_HEALTH_BURDEN',
  FASTEST_IMPROVEMENT_PM25 = 'FASTEST_IMPROVEMENT_PM25',
  STABILITY_PM25 = 'STABILITY_PM25',
  RANK_PM25 = 'RANK_PM25',
  DEATHS_CHANGE_YOY = 'DEATHS_CHANGE_YOY',
  LIST_COUNTRIES = 'LIST_COUNTRIES',

  // Priority B - standard intents
  RISK_RANKING = 'RISK_RANKING',
  HIGHEST_RISK_COUNTRY = 'HIGHEST_RISK_COUNTRY',
  HEALTH_DALYS = 'HEALTH_DALYS',
  EXPLAINABILITY = 'EXPLAINABILITY',
  RISK_LEVEL = 'RISK_LEVEL',
  TREND_PM25 = 'TREND_PM25',
  PM25_CHANGE = 'PM25_CHANGE',
  COMPARE_HEALTH = 'COMPARE_HEALTH',
  HEALTH_RATE = 'HEALTH_RATE',
  HEALTH_DEATHS = 'HEALTH_DEATHS',
  TOP_DISEASES = 'TOP_DISEASES',
  BEST_MONTH = 'BEST_MONTH',
  WORST_MONTH = 'WORST_MONTH',

  // Forecast fallbacks
  PM25_FORECAST_MONTHLY = 'PM25_FORECAST_MONTHLY',
  PM25_FORECAST = 'PM25_FORECAST',

  UNRECOGNIZED = 'UNRECOGNIZED',
}

export enum AgeGroup {
  CHILDREN = 'children',
  ADULTS = 'adults',
  ELDERLY = 'elderly',
}

// Forecast confidence decays with distance from the last observed year
export enum ConfidenceTier {
  HIGH = 'High',
  MODERATE = 'Moderate',
  LOW = 'Low',
  SPECULATIVE = 'Speculative',
}

export enum RiskTier {
  LOW = 'Low',
  MODERATE = 'Moderate',
  HIGH = 'High',
  VERY_HIGH = 'Very High',
}

export enum TrendDirection {
  INCREASING = 'Increasing',
  DECREASING = 'Decreasing',
  STABLE = 'Stable',
}

export type PercentSign = 1 | -1;

// ============ CONFIG TYPES ============

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  port: number;
  referenceYear: number;
  defaultTopN: number;

  data: {
    dataDir: string;
    pm25HistoryPath: string;
    diseaseBaselinePath: string;
    regionsPath: string;
    modelPath: string;
    healthDetailPath: string | null;
  };
}

// ============ QUERY TYPES ============

export interface ParsedQuery {
  rawMessage: string;
  country?: string;
  countries: string[];
  region?: string;
  year?: number;
  years: number[];
  percent?: number;
  percentSign?: PercentSign;
  month?: number;
  ageGroup?: AgeGroup;
  disease?: string;
  topN?: number;
}

// ============ FORECAST TYPES ============

export interface YearValue {
  year: number;
  pm25: number;
}

export interface ForecastConfidence {
  tier: ConfidenceTier;
  score: number;
  horizonYears: number;
}

export interface ForecastPoint {
  country: string;
  year: number;
  pm25: number;
  isPredicted: boolean;
  confidence?: ForecastConfidence;
}

export interface MonthlyPoint {
  month: number;
  monthName: string;
  pm25: number;
  seasonalFactor: number;
}

export interface Pm25Change {
  country: string;
  fromYear: number;
  toYear: number;
  pm25From: number;
  pm25To: number;
  absChange: number;
  pctChange: number;
  direction: TrendDirection;
}

// ============ HEALTH TYPES ============

export interface DiseaseParams {
  name: string;
  category: 'Cardiovascular' | 'Respiratory' | 'Cancer' | 'Infectious' | 'Metabolic';
  alpha: number;
  gamma: number;
  delta: number;
}

export interface DiseaseImpact {
  disease: string;
  category: string;
  baselineDeaths: number;
  relativeRisk: number;
  attributableFraction: number;
  attributedDeaths: number;
  ciLow: number;
  ciHigh: number;
}

export interface AgeGroupImpact {
  ageGroup: AgeGroup;
  label: string;
  multiplier: number;
  attributedDeaths: number;
  ciLow: number;
  ciHigh: number;
  sharePct: number;
}

export interface AqiCategory {
  level: string;
  color: string;
}

export type HealthDataSource = 'extended' | 'baseline' | 'none';

export interface HealthQueryOptions {
  ageGroup?: AgeGroup;
  disease?: string;
}

export interface HealthImpact {
  country: string;
  year: number;
  pm25: number;
  excessExposure: number;
  tmrel: number;
  aqiCategory: AqiCategory;
  ageGroup?: AgeGroup;
  diseaseFilter?: string;
  totalDeaths: number;
  ciLow: number;
  ciHigh: number;
  ratePer100k: number;
  populationProxy: number;
  perDisease: DiseaseImpact[];
  ageBreakdown: AgeGroupImpact[];
  dataSource: HealthDataSource;
  baselineYear?: number;
}

// ============ RESULT TYPES ============

export interface ResultError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface ChatResult {
  requestId: string;
  intent: Intent;
  answer?: string;
  data: unknown;
  parsed: ParsedQuery;
  error?: ResultError;
}

export interface EngineStatus {
  modelLoaded: boolean;
  modelKind: string;
  modelVersion: string;
  countryCount: number;
  regionCount: number;
  detailSource: 'loaded' | 'fallback';
  referenceYear: number;
}
