import { describe, expect, it } from 'vitest';
import { Intent } from '../src/types/index.js';
import { IntentDispatcher, compileRules } from '../src/modules/nlp/intent-dispatcher.js';
import { QueryParser } from '../src/modules/nlp/query-parser.js';
import { RegionResolver } from '../src/modules/nlp/region-resolver.js';
import { DISEASE_NAMES } from '../src/modules/health/disease-table.js';
import { REFERENCE_YEAR, fixtureData } from './fixtures.js';

const data = fixtureData();
const parser = new QueryParser({
  countries: data.history.keys(),
  diseases: DISEASE_NAMES,
  regions: new RegionResolver(data),
  referenceYear: REFERENCE_YEAR,
});
const dispatcher = new IntentDispatcher();

function intentOf(message: string): Intent {
  return dispatcher.dispatch(parser.parse(message), message);
}

describe('IntentDispatcher', () => {
  it.each([
    ['What if PM2.5 drops 15% in Thailand in 2027?', Intent.SCENARIO_PM25_CHANGE],
    ['Which countries are most sensitive to pollution?', Intent.SENSITIVITY_PM25_DEATHS],
    ['Which country has the lowest health burden in 2019?', Intent.LOWEST_HEALTH_BURDEN],
    ['Which countries are improving fastest?', Intent.FASTEST_IMPROVEMENT_PM25],
    ['Most stable countries in Europe', Intent.STABILITY_PM25],
    ['Top 3 most polluted countries in 2019', Intent.RANK_PM25],
    ['Did deaths increase compared to last year in Thailand?', Intent.DEATHS_CHANGE_YOY],
    ['List all countries', Intent.LIST_COUNTRIES],
    ['Show the risk ranking for ASEAN in 2027', Intent.RISK_RANKING],
    ['Which country has the highest risk score in 2027?', Intent.HIGHEST_RISK_COUNTRY],
    ['How many DALYs in Thailand in 2027?', Intent.HEALTH_DALYS],
    ['Why is PM2.5 high in Thailand?', Intent.EXPLAINABILITY],
    ['What is the risk level for Vietnam in 2027?', Intent.RISK_LEVEL],
    ['PM2.5 trend in Japan', Intent.TREND_PM25],
    ['PM2.5 in Thailand from 2015 to 2019', Intent.PM25_CHANGE],
    ['Compare health impact of Thailand and Vietnam in 2019', Intent.COMPARE_HEALTH],
    ['What is the death rate per 100,000 in Thailand 2019?', Intent.HEALTH_RATE],
    ['How many deaths are attributable to PM2.5 in Thailand in 2019?', Intent.HEALTH_DEATHS],
    ['Which diseases are linked to pollution in Thailand 2019', Intent.TOP_DISEASES],
    ['Cleanest month to visit Thailand in 2027', Intent.BEST_MONTH],
    ['What is the most polluted month in Thailand 2027?', Intent.WORST_MONTH],
    ['Air quality in Thailand in March 2027', Intent.PM25_FORECAST_MONTHLY],
    ['PM2.5 forecast for Japan', Intent.PM25_FORECAST],
    ['Thailand 2030', Intent.PM25_FORECAST],
  ])('%s -> %s', (message, expected) => {
    expect(intentOf(message)).toBe(expected);
  });

  it('lets a percentage override trend wording', () => {
    expect(intentOf('PM2.5 trend in Thailand if it falls by 10%')).toBe(Intent.SCENARIO_PM25_CHANGE);
  });

  it('needs two years before a change question matches', () => {
    expect(intentOf('What is the change in Thailand in 2019')).toBe(Intent.PM25_FORECAST);
  });

  it('returns UNRECOGNIZED instead of throwing', () => {
    expect(intentOf('hello there')).toBe(Intent.UNRECOGNIZED);
    expect(intentOf('')).toBe(Intent.UNRECOGNIZED);
  });

  it('reports the winning rule and pattern', () => {
    const message = 'Thailand 2030';
    expect(dispatcher.match(parser.parse(message), message)).toEqual({
      intent: Intent.PM25_FORECAST,
      ruleId: 'C3',
      pattern: null,
    });
  });

  it('evaluates a custom table top to bottom', () => {
    const custom = new IntentDispatcher(
      compileRules([
        { id: 'X1', intent: Intent.TREND_PM25, patterns: ['\\bfoo\\b'] },
        { id: 'X2', intent: Intent.RANK_PM25, patterns: ['\\bfoo\\b'] },
      ])
    );
    expect(custom.ruleCount()).toBe(2);
    expect(custom.dispatch(parser.parse('foo'), 'foo')).toBe(Intent.TREND_PM25);
  });
});
