// ===========================================
// MODULE: QUERY ENGINE
// Raw text in, ChatResult out. Never throws from handle().
// ===========================================

import { v4 as uuidv4 } from 'uuid';
import { Intent } from '../types/index.js';
import type {
  ChatResult,
  EngineStatus,
  ForecastPoint,
  HealthImpact,
  HealthQueryOptions,
  MonthlyPoint,
  ParsedQuery,
} from '../types/index.js';
import { isAirQueryError } from '../utils/errors.js';
import { requestLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { ReferenceData } from '../data/reference-data.js';
import { canonicalCountry } from '../data/country-names.js';
import { ExecutiveAnalytics } from './analytics/executive-analytics.js';
import type { ForecastModel } from './forecast/forecast-model.js';
import { PM25Forecaster } from './forecast/pm25-forecaster.js';
import { HealthRiskEngine } from './health/health-risk-engine.js';
import { INTENT_HANDLERS } from './intent-handlers.js';
import type { HandlerContext } from './intent-handlers.js';
import { IntentDispatcher } from './nlp/intent-dispatcher.js';
import { QueryParser } from './nlp/query-parser.js';
import { RegionResolver } from './nlp/region-resolver.js';
import { ResultAssembler } from './result-assembler.js';

export interface QueryEngineOptions {
  data: ReferenceData;
  model: ForecastModel;
  referenceYear: number;
  defaultTopN: number;
  logger: Logger;
}

export class QueryEngine {
  readonly regions: RegionResolver;
  readonly forecaster: PM25Forecaster;
  readonly health: HealthRiskEngine;
  readonly analytics: ExecutiveAnalytics;

  private readonly parser: QueryParser;
  private readonly dispatcher: IntentDispatcher;
  private readonly assembler = new ResultAssembler();
  private readonly context: HandlerContext;
  private readonly logger: Logger;

  constructor(private readonly options: QueryEngineOptions) {
    const { data, model } = options;
    this.logger = options.logger;

    this.regions = new RegionResolver(data);
    this.forecaster = new PM25Forecaster(data, model, this.regions);
    this.health = new HealthRiskEngine(data);
    this.analytics = new ExecutiveAnalytics(this.forecaster, this.health);

    this.parser = new QueryParser({
      countries: data.history.keys(),
      diseases: this.health.diseases(),
      regions: this.regions,
      referenceYear: options.referenceYear,
    });
    this.dispatcher = new IntentDispatcher();

    this.context = {
      analytics: this.analytics,
      forecaster: this.forecaster,
      health: this.health,
      regions: this.regions,
      referenceYear: options.referenceYear,
      defaultTopN: options.defaultTopN,
    };
  }

  // ============ CHAT ============

  parse(message: string): ParsedQuery {
    return this.parser.parse(message);
  }

  handle(message: string): ChatResult {
    const requestId = uuidv4();
    let log = requestLogger(this.logger, requestId);
    const startTime = Date.now();

    let parsed: ParsedQuery = { rawMessage: message, countries: [], years: [] };
    let intent: Intent = Intent.UNRECOGNIZED;

    try {
      parsed = this.parser.parse(message);
      const match = this.dispatcher.match(parsed, message);
      intent = match.intent;
      log = requestLogger(this.logger, requestId, intent);

      log.debug({ ruleId: match.ruleId, parsed }, 'Query dispatched');

      if (intent === Intent.UNRECOGNIZED) {
        log.info({ message }, 'Query not recognised');
        return this.assembler.unrecognized(requestId, parsed);
      }

      const data = INTENT_HANDLERS[intent](parsed, this.context);
      log.info({ durationMs: Date.now() - startTime }, 'Query answered');
      return this.assembler.success(requestId, intent, parsed, data);
    } catch (error) {
      if (isAirQueryError(error)) {
        log.info({ code: error.code, context: error.context }, error.message);
        return this.assembler.failure(requestId, intent, parsed, error);
      }

      log.error({ err: error, message }, 'Unexpected error while answering query');
      return this.assembler.internal(requestId, intent, parsed);
    }
  }

  // ============ DIRECT OPERATIONS ============

  /**
   * Known country for a caller-supplied name, matching synonyms and case.
   * Unknown names come back unchanged so lookups raise UnknownCountryError.
   */
  resolveCountry(name: string): string {
    const canonical = canonicalCountry(name);
    const lower = canonical.toLowerCase();
    return this.listCountries().find((known) => known.toLowerCase() === lower) ?? canonical;
  }

  predict(country: string, year: number): ForecastPoint {
    return this.forecaster.forecast(this.resolveCountry(country), year);
  }

  predictMonthly(country: string, year: number, month: number): MonthlyPoint & { country: string; year: number } {
    const resolved = this.resolveCountry(country);
    return { country: resolved, year, ...this.forecaster.forecastMonth(resolved, year, month) };
  }

  healthRisk(country: string, year: number, options: HealthQueryOptions = {}): HealthImpact {
    return this.analytics.impact(this.resolveCountry(country), year, options);
  }

  listCountries(): string[] {
    return this.forecaster.countries();
  }

  status(): EngineStatus {
    const model = this.forecaster.modelInfo();
    return {
      modelLoaded: true,
      modelKind: model.kind,
      modelVersion: model.version,
      countryCount: this.options.data.history.size,
      regionCount: this.options.data.regions.size,
      detailSource: this.options.data.detail ? 'loaded' : 'fallback',
      referenceYear: this.options.referenceYear,
    };
  }
}
