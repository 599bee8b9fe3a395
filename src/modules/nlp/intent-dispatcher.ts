// ===========================================
// INTENT DISPATCHER
// Ordered rule table - first satisfied rule wins
// ===========================================

import { Intent } from '../../types/index.js';
import type { ParsedQuery } from '../../types/index.js';
import { INTENT_RULE_SOURCES } from './lexicon.js';
import type { IntentRuleSource } from './lexicon.js';

export interface IntentRule {
  id: string;
  intent: Intent;
  // Empty means the rule is decided by `when` alone
  patterns: readonly RegExp[];
  when?: (parsed: ParsedQuery) => boolean;
}

export interface DispatchMatch {
  intent: Intent;
  ruleId: string | null;
  pattern: string | null;
}

// Entity preconditions layered on top of the keyword patterns
const RULE_GUARDS: Readonly<Record<string, (parsed: ParsedQuery) => boolean>> = {
  B14: (p) => p.years.length >= 2,
  C1: (p) => p.country !== undefined && p.year !== undefined && p.month !== undefined,
  C2: (p) => p.country !== undefined,
  C3: (p) => p.country !== undefined && p.year !== undefined,
};

export function compileRules(sources: readonly IntentRuleSource[]): IntentRule[] {
  return sources.map((source) => ({
    id: source.id,
    intent: source.intent,
    patterns: source.patterns.map((pattern) => new RegExp(pattern, 'i')),
    when: RULE_GUARDS[source.id],
  }));
}

export class IntentDispatcher {
  private readonly rules: readonly IntentRule[];

  constructor(rules: readonly IntentRule[] = compileRules(INTENT_RULE_SOURCES)) {
    this.rules = rules;
  }

  dispatch(parsed: ParsedQuery, rawText: string): Intent {
    return this.match(parsed, rawText).intent;
  }

  /**
   * Winning rule with the pattern that fired, for request logs.
   */
  match(parsed: ParsedQuery, rawText: string): DispatchMatch {
    const text = rawText.toLowerCase().trim();

    for (const rule of this.rules) {
      let fired: RegExp | undefined;
      if (rule.patterns.length > 0) {
        fired = rule.patterns.find((pattern) => pattern.test(text));
        if (!fired) continue;
      }

      if (rule.when && !rule.when(parsed)) continue;

      return { intent: rule.intent, ruleId: rule.id, pattern: fired?.source ?? null };
    }

    return { intent: Intent.UNRECOGNIZED, ruleId: null, pattern: null };
  }

  ruleCount(): number {
    return this.rules.length;
  }
}
