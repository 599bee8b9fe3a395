import { describe, expect, it } from 'vitest';
import { AgeGroup } from '../src/types/index.js';
import { HealthRiskEngine, aqiCategory, exposureResponse } from '../src/modules/health/health-risk-engine.js';
import { DISEASE_TABLE, ageGroupForBand, diseaseParams } from '../src/modules/health/disease-table.js';
import type { DiseaseParams } from '../src/types/index.js';
import { UnknownDiseaseError } from '../src/utils/errors.js';
import { fixtureData } from './fixtures.js';

function params(name: string): DiseaseParams {
  const found = diseaseParams(name);
  if (!found) throw new Error(`missing disease ${name}`);
  return found;
}

const IHD = params('Ischemic heart disease');
const STROKE = params('Stroke');
const af = (pm25: number, p: DiseaseParams): number => exposureResponse(pm25, p).attributableFraction;

describe('exposureResponse', () => {
  it('is neutral at or below the TMREL', () => {
    expect(exposureResponse(5, IHD)).toEqual({ relativeRisk: 1, attributableFraction: 0 });
    expect(exposureResponse(3, IHD)).toEqual({ relativeRisk: 1, attributableFraction: 0 });
  });

  it('keeps RR >= 1 and AF in [0, 1) for every disease', () => {
    for (const disease of DISEASE_TABLE) {
      for (const pm25 of [5, 12, 35, 100, 500]) {
        const { relativeRisk, attributableFraction } = exposureResponse(pm25, disease);
        expect(relativeRisk).toBeGreaterThanOrEqual(1);
        expect(attributableFraction).toBeGreaterThanOrEqual(0);
        expect(attributableFraction).toBeLessThan(1);
      }
    }
  });

  it('follows the saturating curve', () => {
    const expected = 1 + 0.2969 * (1 - Math.exp(-0.0133 * 19));
    expect(exposureResponse(24, IHD).relativeRisk).toBeCloseTo(expected, 10);
    expect(exposureResponse(24, IHD).attributableFraction).toBeCloseTo((expected - 1) / expected, 10);
  });
});

describe('aqiCategory', () => {
  it.each([
    [11.9, 'Good'],
    [12, 'Moderate'],
    [35.5, 'Unhealthy for Sensitive Groups'],
    [55.5, 'Unhealthy'],
    [150.5, 'Very Unhealthy'],
    [250.5, 'Hazardous'],
  ])('%d µg/m³ is %s', (pm25, level) => {
    expect(aqiCategory(pm25).level).toBe(level);
  });
});

describe('ageGroupForBand', () => {
  it.each([
    ['<1 year', AgeGroup.CHILDREN],
    ['10-14 years', AgeGroup.CHILDREN],
    ['15-19 years', AgeGroup.ADULTS],
    ['60-64 years', AgeGroup.ADULTS],
    ['65-69 years', AgeGroup.ELDERLY],
    ['95+ years', AgeGroup.ELDERLY],
  ])('%s -> %s', (band, group) => {
    expect(ageGroupForBand(band)).toBe(group);
  });

  it('ignores aggregate bands', () => {
    expect(ageGroupForBand('All ages')).toBeUndefined();
  });
});

describe('HealthRiskEngine', () => {
  const engine = new HealthRiskEngine(fixtureData());

  it('attributes nothing at the TMREL', () => {
    const impact = engine.attributableDeaths('Thailand', 2019, 5);
    expect(impact.totalDeaths).toBe(0);
    expect(impact.perDisease.every((d) => d.attributedDeaths === 0)).toBe(true);
    expect(impact.excessExposure).toBe(0);
  });

  it('applies the attributable fraction to all-ages baselines', () => {
    const impact = engine.attributableDeaths('Thailand', 2019, 24);
    const ihd = 1000 * af(24, IHD);
    const stroke = 500 * af(24, STROKE);

    expect(impact.dataSource).toBe('baseline');
    expect(impact.baselineYear).toBe(2019);
    expect(impact.excessExposure).toBe(19);
    expect(impact.perDisease.map((d) => d.disease)).toEqual(['Ischemic heart disease', 'Stroke']);
    expect(impact.perDisease[0]?.attributedDeaths).toBeCloseTo(ihd, 8);
    expect(impact.totalDeaths).toBeCloseTo(ihd + stroke, 8);
    expect(impact.ciLow).toBeCloseTo((ihd + stroke) * 0.8, 8);
    expect(impact.ciHigh).toBeCloseTo((ihd + stroke) * 1.2, 8);
    expect(impact.ratePer100k).toBeCloseTo(((ihd + stroke) / 1_000_000) * 100_000, 8);
  });

  it('uses the age band baseline with its multiplier', () => {
    const impact = engine.attributableDeaths('Thailand', 2019, 24, { ageGroup: AgeGroup.ELDERLY });
    // Stroke has no elderly band and falls back to all ages
    expect(impact.totalDeaths).toBeCloseTo(600 * 1.5 * af(24, IHD) + 500 * 1.5 * af(24, STROKE), 8);
    expect(impact.ageBreakdown.map((a) => a.ageGroup)).toEqual([AgeGroup.ELDERLY]);
  });

  it('scales an unbanded baseline by 1.5 for the elderly', () => {
    const all = engine.attributableDeaths('Vietnam', 2019, 39);
    const elderly = engine.attributableDeaths('Vietnam', 2019, 39, { ageGroup: AgeGroup.ELDERLY });
    expect(elderly.totalDeaths).toBeCloseTo(all.totalDeaths * 1.5, 8);
  });

  it('breaks deaths down by age band with shares', () => {
    const { ageBreakdown } = engine.attributableDeaths('Thailand', 2019, 24);
    expect(ageBreakdown.map((a) => a.ageGroup)).toEqual([AgeGroup.CHILDREN, AgeGroup.ADULTS, AgeGroup.ELDERLY]);
    expect(ageBreakdown[2]?.sharePct).toBeCloseTo((900 / 1330) * 100, 8);
  });

  it('narrows to one disease', () => {
    const impact = engine.attributableDeaths('Thailand', 2019, 24, { disease: 'Stroke' });
    expect(impact.perDisease).toHaveLength(1);
    expect(impact.totalDeaths).toBeCloseTo(500 * af(24, STROKE), 8);
  });

  it.each([
    ['Stroke', 'Stroke'],
    ['stroke', 'Stroke'],
    ['heart disease', 'Ischemic heart disease'],
    ['strok', 'Stroke'],
  ])('resolves disease name %s to %s', (name, expected) => {
    expect(engine.resolveDisease(name)).toBe(expected);
  });

  it('rejects a disease outside the table', () => {
    expect(() => engine.resolveDisease('sunburn')).toThrow(UnknownDiseaseError);
    expect(() => engine.attributableDeaths('Thailand', 2019, 24, { disease: 'sunburn' })).toThrow(UnknownDiseaseError);
  });

  it('canonicalises the disease filter before narrowing', () => {
    const impact = engine.attributableDeaths('Thailand', 2019, 24, { disease: 'stroke' });
    expect(impact.diseaseFilter).toBe('Stroke');
    expect(impact.perDisease.map((d) => d.disease)).toEqual(['Stroke']);
    expect(impact.totalDeaths).toBeCloseTo(500 * af(24, STROKE), 8);
  });

  it('uses the nearest baseline year', () => {
    expect(engine.attributableDeaths('France', 2030, 6).baselineYear).toBe(2018);
  });

  it('breaks baseline-year ties toward the earlier year', () => {
    const tied = new HealthRiskEngine(
      fixtureData({
        baselines: {
          Peru: {
            populationProxy: 100_000,
            years: { '2017': { Stroke: { all: 10 } }, '2019': { Stroke: { all: 20 } } },
          },
        },
      })
    );
    expect(tied.attributableDeaths('Peru', 2018, 30).baselineYear).toBe(2017);
  });

  it('sums all-ages baselines when no population proxy is given', () => {
    const impact = engine.attributableDeaths('Japan', 2019, 12);
    expect(impact.populationProxy).toBe(800);
    expect(impact.ratePer100k).toBeCloseTo((impact.totalDeaths / 800) * 100_000, 8);
  });

  it('returns an empty impact for a country without baselines', () => {
    const impact = engine.attributableDeaths('Laos', 2019, 20);
    expect(impact.dataSource).toBe('none');
    expect(impact.totalDeaths).toBe(0);
    expect(impact.perDisease).toEqual([]);
  });

  it('orders top diseases by deaths, ties by table order', () => {
    const impact = engine.attributableDeaths('Thailand', 2019, 24);
    expect(engine.topDiseases(impact, 1).map((d) => d.disease)).toEqual(['Ischemic heart disease']);

    const flat = engine.attributableDeaths('Thailand', 2019, 5);
    expect(engine.topDiseases(flat, 2).map((d) => d.disease)).toEqual(['Ischemic heart disease', 'Stroke']);
  });

  it('compares two countries side by side', () => {
    const thailand = engine.attributableDeaths('Thailand', 2019, 24);
    const vietnam = engine.attributableDeaths('Vietnam', 2019, 39);
    expect(engine.compare(thailand, vietnam).higherBurden).toBe('Vietnam');
    expect(engine.compare(thailand, thailand).higherBurden).toBeNull();
  });

  describe('extended detail records', () => {
    const detailed = new HealthRiskEngine(
      fixtureData({
        detail: [
          { location: 'Thailand', year: 2019, cause: 'Stroke', ageName: '70-74 years', measure: 'Deaths', val: 200 },
          { location: 'Thailand', year: 2019, cause: 'Asthma', ageName: '<1 year', measure: 'Deaths', val: 10 },
          { location: 'Thailand', year: 2019, cause: 'Stroke', ageName: '70-74 years', measure: 'DALYs', val: 9000 },
          { location: 'Thailand', year: 2019, cause: 'Road injuries', ageName: '20-24 years', measure: 'Deaths', val: 50 },
          { location: 'Thailand', year: 2016, cause: 'Stroke', ageName: '70-74 years', measure: 'Deaths', val: 999 },
        ],
      })
    );

    it('scales each record by its age group multiplier', () => {
      const impact = detailed.attributableDeaths('Thailand', 2019, 24);
      const stroke = 200 * 1.5 * af(24, STROKE);
      const asthma = 10 * 1.3 * af(24, params('Asthma'));

      expect(impact.dataSource).toBe('extended');
      expect(impact.baselineYear).toBe(2019);
      expect(impact.perDisease.map((d) => d.disease)).toEqual(['Stroke', 'Asthma']);
      expect(impact.totalDeaths).toBeCloseTo(stroke + asthma, 8);
      expect(impact.ageBreakdown.map((a) => a.ageGroup)).toEqual([AgeGroup.CHILDREN, AgeGroup.ELDERLY]);
    });

    it('falls back to baselines for countries without records', () => {
      expect(detailed.attributableDeaths('Vietnam', 2019, 39).dataSource).toBe('baseline');
    });
  });
});
