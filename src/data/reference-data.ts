// ===========================================
// REFERENCE DATA PROVIDER
// Read-only country, region and health baseline tables
// ===========================================

import fs from 'node:fs';
import { z } from 'zod';
import { ReferenceDataError, wrapError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { AppConfig, YearValue } from '../types/index.js';
import { canonicalCountry } from './country-names.js';

// ============ FILE SCHEMAS ============

const historySchema = z.record(
  z.string(),
  z
    .array(
      z.object({
        year: z.number().int().min(1900).max(2100),
        pm25: z.number().nonnegative(),
      })
    )
    .min(1)
);

const baselineEntrySchema = z.object({
  all: z.number().nonnegative(),
  children: z.number().nonnegative().optional(),
  adults: z.number().nonnegative().optional(),
  elderly: z.number().nonnegative().optional(),
});

const baselinesSchema = z.record(
  z.string(),
  z.object({
    populationProxy: z.number().positive().optional(),
    years: z.record(z.string().regex(/^\d{4}$/), z.record(z.string(), baselineEntrySchema)),
  })
);

const regionsSchema = z.record(z.string(), z.array(z.string()).min(1));

const detailSchema = z.array(
  z.object({
    location: z.string(),
    year: z.number().int(),
    cause: z.string(),
    ageName: z.string(),
    measure: z.string(),
    val: z.number().nonnegative(),
  })
);

export type RawHistory = z.infer<typeof historySchema>;
export type RawBaselines = z.infer<typeof baselinesSchema>;
export type RawRegions = z.infer<typeof regionsSchema>;
export type RawDetailRecords = z.infer<typeof detailSchema>;
export type DiseaseBaselineEntry = z.infer<typeof baselineEntrySchema>;

// ============ IN-MEMORY SHAPES ============

export interface CountryBaseline {
  populationProxy: number | null;
  years: ReadonlyMap<number, ReadonlyMap<string, DiseaseBaselineEntry>>;
}

export interface DetailRecord {
  country: string;
  year: number;
  cause: string;
  ageName: string;
  measure: string;
  val: number;
}

export interface ReferenceData {
  history: ReadonlyMap<string, readonly YearValue[]>;
  baselines: ReadonlyMap<string, CountryBaseline>;
  regions: ReadonlyMap<string, readonly string[]>;
  // null when the extended detail source is not configured or failed to load
  detail: ReadonlyMap<string, readonly DetailRecord[]> | null;
}

export interface RawReferenceData {
  history: RawHistory;
  baselines: RawBaselines;
  regions: RawRegions;
  detail?: RawDetailRecords | null;
}

// ============ BUILDERS ============

function buildHistory(raw: RawHistory): Map<string, readonly YearValue[]> {
  const history = new Map<string, readonly YearValue[]>();

  for (const [name, points] of Object.entries(raw)) {
    const byYear = new Map<number, number>();
    for (const point of points) {
      byYear.set(point.year, point.pm25);
    }
    const series = [...byYear.entries()]
      .sort((a, b) => a[0] - b[0])
      .map(([year, pm25]) => Object.freeze({ year, pm25 }));
    history.set(canonicalCountry(name), Object.freeze(series));
  }

  return history;
}

function buildBaselines(raw: RawBaselines): Map<string, CountryBaseline> {
  const baselines = new Map<string, CountryBaseline>();

  for (const [name, entry] of Object.entries(raw)) {
    const years = new Map<number, ReadonlyMap<string, DiseaseBaselineEntry>>();
    for (const [yearKey, diseases] of Object.entries(entry.years)) {
      const byDisease = new Map<string, DiseaseBaselineEntry>();
      for (const [disease, values] of Object.entries(diseases)) {
        byDisease.set(disease, Object.freeze({ ...values }));
      }
      years.set(Number(yearKey), byDisease);
    }
    baselines.set(
      canonicalCountry(name),
      Object.freeze({ populationProxy: entry.populationProxy ?? null, years })
    );
  }

  return baselines;
}

function buildRegions(raw: RawRegions): Map<string, readonly string[]> {
  const regions = new Map<string, readonly string[]>();
  for (const [region, members] of Object.entries(raw)) {
    regions.set(region, Object.freeze([...new Set(members.map(canonicalCountry))]));
  }
  return regions;
}

function buildDetail(raw: RawDetailRecords): Map<string, readonly DetailRecord[]> {
  const grouped = new Map<string, DetailRecord[]>();

  for (const record of raw) {
    const country = canonicalCountry(record.location);
    const list = grouped.get(country) ?? [];
    list.push(
      Object.freeze({
        country,
        year: record.year,
        cause: record.cause,
        ageName: record.ageName,
        measure: record.measure,
        val: record.val,
      })
    );
    grouped.set(country, list);
  }

  const detail = new Map<string, readonly DetailRecord[]>();
  for (const [country, records] of grouped) {
    detail.set(country, Object.freeze(records));
  }
  return detail;
}

/**
 * Build the immutable reference tables from already-parsed raw documents.
 * Country names are normalised through the synonym table on the way in.
 */
export function buildReferenceData(raw: RawReferenceData): ReferenceData {
  return Object.freeze({
    history: buildHistory(raw.history),
    baselines: buildBaselines(raw.baselines),
    regions: buildRegions(raw.regions),
    detail: raw.detail ? buildDetail(raw.detail) : null,
  });
}

// ============ FILE LOADING ============

function readJson<T>(filePath: string, schema: z.ZodType<T>, source: string): T {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ReferenceDataError(`Cannot read ${source} at ${filePath}`, source, wrapError(error));
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ReferenceDataError(`${source} at ${filePath} is not valid JSON`, source, wrapError(error));
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new ReferenceDataError(
      `${source} at ${filePath} failed validation${where ? ` at '${where}'` : ''}: ${issue?.message ?? 'invalid'}`,
      source,
      parsed.error
    );
  }

  return parsed.data;
}

/**
 * Optional extended detail source. Any failure degrades to the baseline table.
 */
function readDetail(filePath: string | null, log: Logger): RawDetailRecords | null {
  if (!filePath) {
    return null;
  }

  try {
    return readJson(filePath, detailSchema, 'health detail records');
  } catch (error) {
    log.warn(
      { error: wrapError(error).message, path: filePath },
      'Extended health detail unavailable - using aggregated baselines'
    );
    return null;
  }
}

export function loadReferenceData(paths: AppConfig['data'], log: Logger): ReferenceData {
  const raw: RawReferenceData = {
    history: readJson(paths.pm25HistoryPath, historySchema, 'PM2.5 history'),
    baselines: readJson(paths.diseaseBaselinePath, baselinesSchema, 'disease baselines'),
    regions: readJson(paths.regionsPath, regionsSchema, 'region table'),
    detail: readDetail(paths.healthDetailPath, log),
  };

  const data = buildReferenceData(raw);

  log.info(
    {
      countries: data.history.size,
      baselineCountries: data.baselines.size,
      regions: data.regions.size,
      detailCountries: data.detail?.size ?? 0,
    },
    'Reference data loaded'
  );

  return data;
}
