import { z } from 'zod';

import { SCORED_INTENTS } from '@core/interfaces/index.js';

import rawRules from './intent-rules.json';

const ScoredIntentSchema = z.enum(SCORED_INTENTS);

const regexSource = z.string().refine((src) => {
  try {
    new RegExp(src);
    return true;
  } catch {
    return false;
  }
}, 'invalid regular expression');

export const IntentRulesSchema = z.object({
  intents: z
    .array(
      z.object({
        intent: ScoredIntentSchema,
        description: z.string(),
        patterns: z.array(regexSource),
        keywords: z.record(z.number().min(0).max(1)),
      }),
    )
    .min(1),
  contextClues: z.array(
    z.object({
      name: z.string(),
      pattern: regexSource,
      weight: z.number().min(0).max(1),
      caseSensitive: z.boolean().default(false),
      intents: z.array(ScoredIntentSchema).optional(),
    }),
  ),
  negations: z.array(regexSource),
  abbreviations: z.record(z.string()),
});

export type IntentRules = z.infer<typeof IntentRulesSchema>;

export const defaultIntentRules: IntentRules = IntentRulesSchema.parse(rawRules);
