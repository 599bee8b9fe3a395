// ===========================================
// QUERY PARSER
// Free text -> typed entities. Never throws; unset fields flow forward.
// ===========================================

import { AgeGroup } from '../../types/index.js';
import type { ParsedQuery, PercentSign } from '../../types/index.js';
import { COUNTRY_SYNONYMS } from '../../data/country-names.js';
import { LEXICON, wordPattern } from './lexicon.js';
import { RegionResolver } from './region-resolver.js';
import { VocabularyMatcher } from './vocabulary-matcher.js';

const AGE_CHECK_ORDER = [AgeGroup.ELDERLY, AgeGroup.CHILDREN, AgeGroup.ADULTS] as const;

const EXPLICIT_YEAR = /\b(?:19|20)\d{2}\b/g;
const PERCENT_SYMBOL = /(\d+(?:\.\d+)?)\s*%/;
const PERCENT_WORD = /(\d+(?:\.\d+)?)\s*percent\b/i;

export interface QueryParserOptions {
  countries: Iterable<string>;
  diseases: Iterable<string>;
  regions: RegionResolver;
  // Anchor for "next year", "in 3 years" and similar
  referenceYear: number;
}

/**
 * Start offsets of every whole-word occurrence of any keyword.
 */
function keywordPositions(text: string, keywords: readonly string[]): number[] {
  const positions: number[] = [];
  for (const keyword of keywords) {
    for (const found of text.matchAll(wordPattern(keyword, 'gi'))) {
      positions.push(found.index ?? 0);
    }
  }
  return positions;
}

export class QueryParser {
  private readonly countryMatcher: VocabularyMatcher;
  private readonly diseaseMatcher: VocabularyMatcher;
  private readonly regions: RegionResolver;
  private readonly referenceYear: number;

  constructor(options: QueryParserOptions) {
    this.countryMatcher = new VocabularyMatcher(options.countries, COUNTRY_SYNONYMS);
    this.diseaseMatcher = new VocabularyMatcher(options.diseases);
    this.regions = options.regions;
    this.referenceYear = options.referenceYear;
  }

  parse(message: string): ParsedQuery {
    const text = message.toLowerCase().trim();

    const countries = this.countryMatcher.match(message);
    const years = this.extractYears(text);
    const percent = this.extractPercent(text);

    return {
      rawMessage: message,
      country: countries[0],
      countries,
      region: this.regions.normalize(text),
      year: years[years.length - 1],
      years,
      percent: percent?.value,
      percentSign: this.extractSign(text, percent?.position),
      month: this.extractMonth(text),
      ageGroup: this.extractAgeGroup(text),
      disease: this.extractDisease(text),
      topN: this.extractTopN(text),
    };
  }

  private extractYears(text: string): number[] {
    const years = new Set<number>();
    for (const found of text.matchAll(EXPLICIT_YEAR)) {
      years.add(Number(found[0]));
    }

    const since = /\bsince\s+((?:19|20)\d{2})\b/.exec(text);
    if (since) {
      years.add(this.referenceYear);
    }

    if (years.size === 0) {
      const ref = this.referenceYear;
      if (/\bnext\s+year\b/.test(text)) years.add(ref + 1);
      if (/\blast\s+year\b/.test(text)) years.add(ref - 1);
      if (/\b(?:this|current)\s+year\b/.test(text)) years.add(ref);

      const inYears = /\bin\s+(\d{1,2})\s+years?\b/.exec(text);
      if (inYears?.[1]) years.add(ref + Number(inYears[1]));
    }

    return [...years].sort((a, b) => a - b);
  }

  private extractPercent(text: string): { value: number; position: number } | undefined {
    const found = PERCENT_SYMBOL.exec(text) ?? PERCENT_WORD.exec(text);
    if (!found?.[1]) {
      return undefined;
    }
    return { value: Number(found[1]), position: found.index };
  }

  /**
   * Direction keyword nearest the percent token wins. Without a percent the
   * earliest keyword decides. No keyword leaves the sign unset.
   */
  private extractSign(text: string, percentPosition: number | undefined): PercentSign | undefined {
    const increases = keywordPositions(text, LEXICON.increaseKeywords);
    const decreases = keywordPositions(text, LEXICON.decreaseKeywords);

    if (increases.length === 0 && decreases.length === 0) {
      return undefined;
    }
    if (increases.length === 0) return -1;
    if (decreases.length === 0) return 1;

    const anchor = percentPosition ?? 0;
    const nearest = (positions: number[]): number =>
      Math.min(...positions.map((p) => Math.abs(p - anchor)));

    return nearest(increases) < nearest(decreases) ? 1 : -1;
  }

  private extractMonth(text: string): number | undefined {
    let best: { month: number; position: number } | undefined;
    for (const [name, month] of Object.entries(LEXICON.months)) {
      const found = wordPattern(name).exec(text);
      if (found && (!best || found.index < best.position)) {
        best = { month, position: found.index };
      }
    }
    return best?.month;
  }

  private extractAgeGroup(text: string): AgeGroup | undefined {
    return AGE_CHECK_ORDER.find((group) =>
      LEXICON.ageKeywords[group].some((keyword) => wordPattern(keyword).test(text))
    );
  }

  private extractDisease(text: string): string | undefined {
    for (const [disease, keywords] of Object.entries(LEXICON.diseaseKeywords)) {
      if (keywords.some((keyword) => wordPattern(keyword).test(text))) {
        return disease;
      }
    }
    return this.diseaseMatcher.best(text);
  }

  private extractTopN(text: string): number | undefined {
    const found = /\btop\s+(\d{1,3})\b/.exec(text) ?? /\b(\d{1,3})\s+(?:most|least)\b/.exec(text);
    const value = found?.[1] ? Number(found[1]) : undefined;
    return value !== undefined && value > 0 ? value : undefined;
  }
}
