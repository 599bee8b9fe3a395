// ===========================================
// REGION RESOLVER
// Free-text region names -> canonical region -> member countries
// ===========================================

import { UnknownRegionError } from '../../utils/errors.js';
import type { ReferenceData } from '../../data/reference-data.js';

export const GLOBAL_REGION = 'Global';

// Order matters - more specific first
const REGION_PATTERNS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\basean\b/, 'ASEAN'],
  [/\bsouth[\s-]?east\s+asia(?:n)?\b/, 'Southeast Asia'],
  [/\bsouth\s+asia(?:n)?\b/, 'South Asia'],
  [/\beast\s+asia(?:n)?\b/, 'East Asia'],
  [/\bcentral\s+asia(?:n)?\b/, 'Central Asia'],
  [/\beurop(?:e|ean)\b/, 'Europe'],
  [/\b(?:eu|european\s+union)\b/, 'Europe'],
  [/\bafric(?:a|an)\b/, 'Africa'],
  [/\bnorth\s+americ(?:a|an)\b/, 'North America'],
  [/\bsouth\s+americ(?:a|an)\b/, 'South America'],
  [/\bcentral\s+americ(?:a|an)\b/, 'Central America'],
  [/\blatin\s+americ(?:a|an)\b/, 'South America'],
  [/\bmiddle\s+east(?:ern)?\b/, 'Middle East'],
  [/\boceani(?:a|an)\b/, 'Oceania'],
  [/\bcaribbean\b/, 'Caribbean'],
  [/\bglobal(?:ly)?\b/, GLOBAL_REGION],
  [/\bworld\s*wide\b/, GLOBAL_REGION],
  [/\ball\s+countr/, GLOBAL_REGION],
  // Recognised but unsupported - resolve() rejects them
  [/\bantarctic(?:a|an)?\b/, 'Antarctica'],
  [/\barctic\b/, 'Arctic'],
];

export interface ScopeRequest {
  region?: string;
  countries?: readonly string[];
}

export interface ResolvedScope {
  label: string;
  countries: string[];
}

export class RegionResolver {
  private readonly available: ReadonlySet<string>;

  constructor(private readonly data: ReferenceData) {
    this.available = new Set(data.history.keys());
  }

  /**
   * Canonical region named anywhere in the text, if any.
   */
  normalize(text: string): string | undefined {
    const lower = text.toLowerCase().trim();
    for (const [pattern, region] of REGION_PATTERNS) {
      if (pattern.test(lower)) {
        return region;
      }
    }
    return undefined;
  }

  supportedRegions(): string[] {
    return [...this.data.regions.keys()].sort();
  }

  /**
   * Countries with data in the named region. Accepts canonical names or
   * adjectives ("European"). Never returns an empty set.
   */
  resolve(nameOrAdjective: string): ReadonlySet<string> {
    const region = this.data.regions.has(nameOrAdjective)
      ? nameOrAdjective
      : this.normalize(nameOrAdjective) ?? nameOrAdjective;

    if (region === GLOBAL_REGION) {
      return this.available;
    }

    const members = this.data.regions.get(region);
    if (!members) {
      throw new UnknownRegionError(region, this.supportedRegions());
    }

    const matched = new Set(members.filter((country) => this.available.has(country)));
    if (matched.size === 0) {
      throw new UnknownRegionError(
        region,
        this.supportedRegions(),
        `No pollution data is available for any country in ${region}`
      );
    }

    return matched;
  }

  /**
   * Explicit list of two or more countries wins, then region, else every known country.
   */
  scope(request: ScopeRequest): ResolvedScope {
    const explicit = (request.countries ?? []).filter((c) => this.available.has(c));
    if (explicit.length >= 2) {
      return { label: explicit.join(', '), countries: [...new Set(explicit)].sort() };
    }

    if (request.region && request.region !== GLOBAL_REGION) {
      return { label: request.region, countries: [...this.resolve(request.region)].sort() };
    }

    return { label: GLOBAL_REGION, countries: [...this.available].sort() };
  }

  /**
   * First region in table order that lists the country.
   */
  homeRegion(country: string): string | undefined {
    for (const [region, members] of this.data.regions) {
      if (members.includes(country)) {
        return region;
      }
    }
    return undefined;
  }
}
