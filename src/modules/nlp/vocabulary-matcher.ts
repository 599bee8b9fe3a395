// ===========================================
// VOCABULARY MATCHER
// Exact phrase lookup with a fuzzy fallback over token windows
// ===========================================

import { wordPattern } from './lexicon.js';

const FUZZY_THRESHOLD = 0.8;
const MIN_FUZZY_LENGTH = 4;

interface Hit {
  term: string;
  position: number;
}

interface Token {
  text: string;
  start: number;
}

/**
 * Edit distance between two strings (insert, delete, substitute).
 */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

export function similarity(a: string, b: string): number {
  const maxLen = Math.max(a.length, b.length);
  if (maxLen === 0) return 1;
  return 1 - levenshtein(a, b) / maxLen;
}

export class VocabularyMatcher {
  // lowercase phrase -> canonical term, longest phrase first
  private readonly phrases: ReadonlyArray<readonly [string, string]>;
  private readonly canonical: ReadonlyMap<string, string>;
  private readonly maxWindow: number;

  constructor(vocabulary: Iterable<string>, aliases: Readonly<Record<string, string>> = {}) {
    const terms = new Set(vocabulary);
    const phraseMap = new Map<string, string>();

    for (const term of terms) {
      phraseMap.set(term.toLowerCase(), term);
    }
    for (const [alias, term] of Object.entries(aliases)) {
      // Aliases pointing outside the vocabulary are dropped
      if (terms.has(term) && !phraseMap.has(alias.toLowerCase())) {
        phraseMap.set(alias.toLowerCase(), term);
      }
    }

    this.phrases = [...phraseMap.entries()].sort((a, b) => b[0].length - a[0].length);
    this.canonical = new Map([...terms].map((t): [string, string] => [t.toLowerCase(), t]));
    this.maxWindow = Math.max(1, ...[...this.canonical.keys()].map((t) => t.split(/\s+/).length));
  }

  /**
   * Every vocabulary term mentioned in the text, first mention first.
   */
  match(text: string): string[] {
    let masked = text.toLowerCase();
    const hits: Hit[] = [];

    for (const [phrase, term] of this.phrases) {
      const pattern = wordPattern(phrase, 'gi');
      let found: RegExpExecArray | null;
      while ((found = pattern.exec(masked)) !== null) {
        hits.push({ term, position: found.index });
        masked =
          masked.slice(0, found.index) +
          ' '.repeat(found[0].length) +
          masked.slice(found.index + found[0].length);
      }
    }

    hits.push(...this.fuzzy(masked));

    const firstSeen = new Map<string, number>();
    for (const hit of hits) {
      const seen = firstSeen.get(hit.term);
      if (seen === undefined || hit.position < seen) {
        firstSeen.set(hit.term, hit.position);
      }
    }

    return [...firstSeen.entries()].sort((a, b) => a[1] - b[1]).map(([term]) => term);
  }

  best(text: string): string | undefined {
    return this.match(text)[0];
  }

  private fuzzy(masked: string): Hit[] {
    const tokens: Token[] = [];
    for (const found of masked.matchAll(/[a-z][a-z'-]*/g)) {
      tokens.push({ text: found[0], start: found.index ?? 0 });
    }

    const hits: Hit[] = [];
    let i = 0;
    while (i < tokens.length) {
      let accepted: { term: string; size: number; score: number } | undefined;

      for (let size = Math.min(this.maxWindow, tokens.length - i); size >= 1; size--) {
        const window = tokens.slice(i, i + size).map((t) => t.text).join(' ');
        if (window.length < MIN_FUZZY_LENGTH) continue;

        for (const [lower, term] of this.canonical) {
          const score = similarity(window, lower);
          if (score > FUZZY_THRESHOLD && (!accepted || score > accepted.score)) {
            accepted = { term, size, score };
          }
        }
      }

      const start = tokens[i]?.start ?? 0;
      if (accepted) {
        hits.push({ term: accepted.term, position: start });
        i += accepted.size;
      } else {
        i += 1;
      }
    }

    return hits;
  }
}
