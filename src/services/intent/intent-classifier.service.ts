import type {
  ClassificationResult,
  IntentMatch,
  IntentName,
  ScoredIntent,
} from '@core/interfaces/index.js';

import { config } from '@config/env.config.js';
import { logger } from '@utils/logger.js';
import { clamp } from '@utils/score.js';

import { defaultIntentRules, type IntentRules } from './intent.rules.js';

const PATTERN_WEIGHT = 0.3;
const KEYWORD_SCALE = 0.1;
const NEGATION_STEP = 0.2;
const MAX_NEGATION_PENALTY = 0.8;
const MULTI_INTENT_THRESHOLD = 0.4;
const COMPETITION_FACTOR = 0.1;
/** UNKNOWN scores 1 - best, so below this it outranks every intent; a tie goes to the intent. */
const UNKNOWN_FLOOR = 0.5;
const UNKNOWN_MIN_CONFIDENCE = 0.1;

const UNKNOWN_DESCRIPTION = 'Intent could not be determined from the input';

interface CompiledIntent {
  intent: ScoredIntent;
  description: string;
  patterns: { source: string; re: RegExp }[];
  keywords: { keyword: string; weight: number; re: RegExp }[];
}

interface CompiledClue {
  name: string;
  re: RegExp;
  weight: number;
  caseSensitive: boolean;
  intents?: ReadonlySet<ScoredIntent>;
}

export interface IntentClassifierOptions {
  rules?: IntentRules;
  maxInputLength?: number;
  multiIntentThreshold?: number;
  unknownFloor?: number;
}

export interface ClassificationSummary {
  totalClassified: number;
  intentDistribution: Partial<Record<IntentName, number>>;
  averageConfidence: number;
  multiIntentRate: number;
  mostCommonIntent: IntentName | null;
  confidenceBands: { high: number; medium: number; low: number };
}

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

function matchAll(re: RegExp, text: string): string[] {
  return text.match(re) ?? [];
}

export class IntentClassifier {
  private readonly intents: CompiledIntent[];
  private readonly clues: CompiledClue[];
  private readonly negations: RegExp[];
  private readonly abbreviations: { re: RegExp; replacement: string }[];
  private readonly maxInputLength: number;
  private readonly multiIntentThreshold: number;
  private readonly unknownFloor: number;

  constructor(options: IntentClassifierOptions = {}) {
    const rules = options.rules ?? defaultIntentRules;
    this.maxInputLength = options.maxInputLength ?? config.MAX_INPUT_LENGTH;
    this.multiIntentThreshold = options.multiIntentThreshold ?? MULTI_INTENT_THRESHOLD;
    this.unknownFloor = options.unknownFloor ?? UNKNOWN_FLOOR;

    this.intents = rules.intents.map((def) => ({
      intent: def.intent,
      description: def.description,
      patterns: def.patterns.map((source) => ({ source, re: new RegExp(source, 'gi') })),
      keywords: Object.entries(def.keywords).map(([keyword, weight]) => ({
        keyword,
        weight,
        re: new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'i'),
      })),
    }));
    this.clues = rules.contextClues.map((clue) => ({
      name: clue.name,
      re: new RegExp(clue.pattern, clue.caseSensitive ? 'g' : 'gi'),
      weight: clue.weight,
      caseSensitive: clue.caseSensitive,
      intents: clue.intents ? new Set(clue.intents) : undefined,
    }));
    this.negations = rules.negations.map((src) => new RegExp(src, 'i'));
    this.abbreviations = Object.entries(rules.abbreviations).map(([abbr, replacement]) => ({
      re: new RegExp(`\\b${escapeRegExp(abbr)}\\b`, 'g'),
      replacement,
    }));
  }

  classify(text: string): ClassificationResult {
    const notes: string[] = [];
    let input = typeof text === 'string' ? text : '';
    if (input.length > this.maxInputLength) {
      input = input.slice(0, this.maxInputLength);
      notes.push(`Input truncated to ${this.maxInputLength} characters`);
    }

    const normalized = input.replace(/\s+/g, ' ').trim();
    const processed = this.preprocess(normalized);

    const scored = this.intents.map((def) => this.scoreIntent(def, processed, normalized));

    // ties resolve to the earlier declared intent
    let best: IntentMatch | undefined;
    for (const match of scored) {
      if (!best || match.confidence > best.confidence) best = match;
    }
    const bestScore = best?.confidence ?? 0;

    let primary: IntentMatch;
    if (!best || bestScore < this.unknownFloor) {
      primary = {
        intent: 'UNKNOWN',
        confidence: Math.max(UNKNOWN_MIN_CONFIDENCE, 1 - bestScore),
        evidence: [],
        keywordsMatched: [],
        patternsMatched: [],
        contextClues: [],
      };
    } else {
      primary = best;
    }

    const secondary = scored
      .filter((m) => m !== primary && m.confidence >= this.multiIntentThreshold)
      .sort((a, b) => b.confidence - a.confidence);

    const competition = secondary.reduce((acc, m) => acc + m.confidence, 0) * COMPETITION_FACTOR;
    const overallConfidence = clamp(primary.confidence - competition);

    notes.push(...this.processingNotes(processed, primary, secondary));

    logger.debug(
      { intent: primary.intent, confidence: primary.confidence, secondary: secondary.length },
      '[intent] classified',
    );

    return Object.freeze({
      primaryIntent: Object.freeze(primary),
      secondaryIntents: Object.freeze(secondary.map((m) => Object.freeze(m))),
      overallConfidence,
      isMultiIntent: secondary.length > 0,
      processedText: processed,
      notes: Object.freeze(notes),
    });
  }

  classifyBatch(texts: readonly string[]): ClassificationResult[] {
    const results = texts.map((t) => this.classify(t));
    logger.info({ count: results.length }, '[intent] batch classified');
    return results;
  }

  describeIntent(intent: IntentName): string {
    if (intent === 'UNKNOWN') return UNKNOWN_DESCRIPTION;
    return this.intents.find((d) => d.intent === intent)?.description ?? UNKNOWN_DESCRIPTION;
  }

  summarize(results: readonly ClassificationResult[]): ClassificationSummary {
    const distribution: Partial<Record<IntentName, number>> = {};
    let confidenceSum = 0;
    let multi = 0;
    const bands = { high: 0, medium: 0, low: 0 };

    for (const r of results) {
      const intent = r.primaryIntent.intent;
      distribution[intent] = (distribution[intent] ?? 0) + 1;
      confidenceSum += r.overallConfidence;
      if (r.isMultiIntent) multi++;
      if (r.overallConfidence > 0.8) bands.high++;
      else if (r.overallConfidence >= 0.5) bands.medium++;
      else bands.low++;
    }

    let mostCommon: IntentName | null = null;
    for (const r of results) {
      const intent = r.primaryIntent.intent;
      if (mostCommon === null || (distribution[intent] ?? 0) > (distribution[mostCommon] ?? 0)) {
        mostCommon = intent;
      }
    }

    return {
      totalClassified: results.length,
      intentDistribution: distribution,
      averageConfidence: results.length ? confidenceSum / results.length : 0,
      multiIntentRate: results.length ? multi / results.length : 0,
      mostCommonIntent: mostCommon,
      confidenceBands: bands,
    };
  }

  private preprocess(normalized: string): string {
    let processed = normalized.toLowerCase().replace(/[^\w\s\-:.,!?']/g, ' ');
    for (const { re, replacement } of this.abbreviations) {
      processed = processed.replace(re, replacement);
    }
    return processed.replace(/\s+/g, ' ').trim();
  }

  private scoreIntent(def: CompiledIntent, processed: string, normalized: string): IntentMatch {
    const evidence: string[] = [];
    const keywordsMatched: string[] = [];
    const patternsMatched: string[] = [];
    const contextClues: string[] = [];
    let score = 0;

    for (const { source, re } of def.patterns) {
      const hits = matchAll(re, processed);
      if (hits.length === 0) continue;
      patternsMatched.push(source);
      evidence.push(...hits.map((h) => `Pattern match: ${h}`));
      score += PATTERN_WEIGHT;
    }

    for (const { keyword, weight, re } of def.keywords) {
      if (!re.test(processed)) continue;
      keywordsMatched.push(keyword);
      evidence.push(`Keyword match: ${keyword}`);
      score += weight * KEYWORD_SCALE;
    }

    for (const clue of this.clues) {
      if (clue.intents && !clue.intents.has(def.intent)) continue;
      const hits = matchAll(clue.re, clue.caseSensitive ? normalized : processed);
      if (hits.length === 0) continue;
      contextClues.push(...hits);
      evidence.push(...hits.map((h) => `Context clue (${clue.name}): ${h}`));
      score += clue.weight;
    }

    let negation = 0;
    for (const re of this.negations) {
      if (re.test(processed)) {
        negation += NEGATION_STEP;
        evidence.push(`Negation detected: ${re.source}`);
      }
    }
    negation = Math.min(negation, MAX_NEGATION_PENALTY);
    if (negation > 0) {
      score = def.intent === 'CANCEL_OPERATION' ? score + negation : score * (1 - negation);
    }

    return {
      intent: def.intent,
      confidence: clamp(score),
      evidence,
      keywordsMatched,
      patternsMatched,
      contextClues,
    };
  }

  private processingNotes(text: string, primary: IntentMatch, secondary: IntentMatch[]): string[] {
    const notes: string[] = [];
    const words = text ? text.split(' ').length : 0;

    if (words < 3) notes.push('Very short input - confidence may be low');
    else if (words > 50) notes.push('Long input - may contain multiple intents');

    if (primary.confidence < 0.3) {
      notes.push('Low confidence classification - input may be ambiguous');
    } else if (primary.confidence > 0.9 && primary.intent !== 'UNKNOWN') {
      notes.push('High confidence classification - clear intent detected');
    }

    if (secondary.length > 0) {
      const names = secondary.slice(0, 2).map((m) => m.intent);
      notes.push(`Multiple intents detected: also considering ${names.join(', ')}`);
    }

    if (primary.intent === 'UNKNOWN') {
      notes.push('No clear intent detected - may need human review');
      return notes;
    }

    const patterns = primary.patternsMatched.length;
    const keywords = primary.keywordsMatched.length;
    if (patterns === 0 && keywords > 0) {
      notes.push('Classification based on keywords only - no patterns matched');
    } else if (patterns > 0 && keywords === 0) {
      notes.push('Classification based on patterns only - no keywords matched');
    } else if (patterns === 0 && keywords === 0) {
      notes.push('Classification based on context clues only');
    }

    return notes;
  }
}
