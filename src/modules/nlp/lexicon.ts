// ===========================================
// QUERY LEXICON
// Keyword tables and intent patterns shipped with the engine
// ===========================================

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ReferenceDataError } from '../../utils/errors.js';
import { AgeGroup, Intent } from '../../types/index.js';

const lexiconSchema = z.object({
  increaseKeywords: z.array(z.string().min(1)),
  decreaseKeywords: z.array(z.string().min(1)),
  ageKeywords: z.object({
    [AgeGroup.ELDERLY]: z.array(z.string().min(1)),
    [AgeGroup.CHILDREN]: z.array(z.string().min(1)),
    [AgeGroup.ADULTS]: z.array(z.string().min(1)),
  }),
  diseaseKeywords: z.record(z.string(), z.array(z.string().min(1))),
  months: z.record(z.string(), z.number().int().min(1).max(12)),
});

const intentRulesSchema = z.object({
  rules: z
    .array(
      z.object({
        id: z.string(),
        intent: z.nativeEnum(Intent),
        patterns: z.array(z.string()),
      })
    )
    .min(1),
});

export type Lexicon = z.infer<typeof lexiconSchema>;
export type IntentRuleSource = z.infer<typeof intentRulesSchema>['rules'][number];

function readBundled<T>(fileName: string, schema: z.ZodType<T>): T {
  const filePath = fileURLToPath(new URL(`../../../data/${fileName}`, import.meta.url));
  try {
    return schema.parse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
  } catch (error) {
    throw new ReferenceDataError(
      `Bundled ${fileName} could not be loaded`,
      fileName,
      error instanceof Error ? error : undefined
    );
  }
}

export const LEXICON: Readonly<Lexicon> = Object.freeze(readBundled('lexicon.json', lexiconSchema));

export const INTENT_RULE_SOURCES: readonly IntentRuleSource[] = Object.freeze(
  readBundled('intent-rules.json', intentRulesSchema).rules
);

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive whole-word pattern for a keyword or phrase.
 * Phrases may start or end in punctuation ("u.s.").
 */
export function wordPattern(phrase: string, flags = 'i'): RegExp {
  return new RegExp(`(?<!\\w)${escapeRegExp(phrase)}(?!\\w)`, flags);
}
