import type {
  AppliedRisk,
  ClassificationResult,
  ConfidenceCalculation,
  ConfidenceFactor,
  ConfidenceFactorScore,
  ConfidenceLevel,
  ExtractedEntity,
  ExtractionResult,
  ReliabilityIndicators,
} from '@core/interfaces/index.js';

import { config } from '@config/env.config.js';
import { logger } from '@utils/logger.js';
import { clamp, mean, stdDev } from '@utils/score.js';
import { parseDateTime, systemClock, zonedNow, type Clock } from '@utils/time.js';

import {
  ENTITY_IMPORTANCE,
  EXPECTED_ENTITY_TYPES,
  FACTOR_WEIGHTS,
  LEVEL_THRESHOLDS,
  REQUIRED_ENTITY_TYPES,
  RISK_DESCRIPTIONS,
  RISK_PENALTIES,
  SUPPORTING_KEYWORDS,
  VALIDATION_FAILURE_CAP,
} from './confidence.tables.js';

const AMBIGUITY_THRESHOLD = 0.6;
const SHORT_TEXT_WORDS = 3;
const WEAK_ENTITY_CONFIDENCE = 0.5;
/** Pseudo-count that keeps the validation factor responsive when every entity failed. */
const VALIDATION_PRIOR = 0.1;

export interface ConfidenceCalculatorOptions {
  clock?: Clock;
  timezone?: string;
}

export interface ConfidenceExplanation {
  overallConfidence: number;
  level: ConfidenceLevel;
  weightedScore: number;
  factors: {
    factor: ConfidenceFactor;
    score: number;
    weight: number;
    contribution: number;
    evidence: readonly string[];
    notes: readonly string[];
  }[];
  risks: readonly AppliedRisk[];
  interval: { lower: number; upper: number; range: number };
  reliability: ReliabilityIndicators;
}

const fmt = (n: number) => n.toFixed(2);
const isFailed = (e: ExtractedEntity) => e.validation.state === 'failed';

function factor(
  name: ConfidenceFactor,
  score: number,
  evidence: string[] = [],
  notes: string[] = [],
): ConfidenceFactorScore {
  return { factor: name, score: clamp(score), weight: FACTOR_WEIGHTS[name], evidence, notes };
}

function levelFor(score: number): ConfidenceLevel {
  for (const [level, threshold] of LEVEL_THRESHOLDS) {
    if (score >= threshold) return level;
  }
  return 'very_low';
}

function hasWord(text: string, word: string): boolean {
  return new RegExp(`\\b${word}\\b`, 'i').test(text);
}

export class ConfidenceCalculator {
  private readonly clock: Clock;
  private readonly timezone: string;

  constructor(options: ConfidenceCalculatorOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.timezone = options.timezone ?? config.TIMEZONE;
  }

  calculate(
    text: string,
    classification: ClassificationResult,
    extraction: ExtractionResult,
  ): ConfidenceCalculation {
    // entities that failed validation only ever count against the request
    const sound = extraction.entities.filter((e) => !isFailed(e));

    const factorScores = [
      this.intentClarity(classification),
      this.entityCompleteness(classification, sound),
      this.entityValidation(extraction.entities),
      this.contextConsistency(text, classification, sound),
      this.textQuality(text),
      this.patternStrength(extraction.entities, sound),
      this.crossValidation(classification, sound),
      this.temporalConsistency(sound),
    ];

    const weightedScore = factorScores.reduce((acc, f) => acc + f.score * f.weight, 0);
    const risks = this.assessRisks(text, classification, extraction);
    const penalty = risks.reduce((acc, r) => acc + r.penalty, 0);
    const overallConfidence = clamp(weightedScore - penalty);

    const spread = stdDev(factorScores.map((f) => f.score));
    const calculation: ConfidenceCalculation = {
      overallConfidence,
      level: levelFor(overallConfidence),
      weightedScore: clamp(weightedScore),
      factorScores,
      risks,
      interval: {
        lower: clamp(overallConfidence - spread),
        upper: clamp(overallConfidence + spread),
      },
      reliability: this.reliability(factorScores, classification, extraction),
    };

    logger.debug(
      { overall: overallConfidence, level: calculation.level, risks: risks.map((r) => r.factor) },
      '[confidence] calculated',
    );
    return Object.freeze(calculation);
  }

  explain(calc: ConfidenceCalculation): ConfidenceExplanation {
    return {
      overallConfidence: calc.overallConfidence,
      level: calc.level,
      weightedScore: calc.weightedScore,
      factors: calc.factorScores.map((f) => ({
        factor: f.factor,
        score: f.score,
        weight: f.weight,
        contribution: f.score * f.weight,
        evidence: f.evidence,
        notes: f.notes,
      })),
      risks: calc.risks,
      interval: {
        lower: calc.interval.lower,
        upper: calc.interval.upper,
        range: calc.interval.upper - calc.interval.lower,
      },
      reliability: calc.reliability,
    };
  }

  private intentClarity(classification: ClassificationResult): ConfidenceFactorScore {
    const primary = classification.primaryIntent;
    const evidence = [`Primary intent confidence: ${fmt(primary.confidence)}`];
    const notes: string[] = [];
    let score = primary.confidence;

    const [topSecondary] = classification.secondaryIntents;
    if (topSecondary) {
      const penalty = topSecondary.confidence * 0.5;
      score = Math.max(0, score - penalty);
      evidence.push(`Secondary intent penalty: ${fmt(penalty)}`);
      notes.push(`Competing intent detected: ${topSecondary.intent}`);
    }

    const patterns = primary.patternsMatched.length;
    if (patterns > 1) {
      const bonus = Math.min(0.1, patterns * 0.05);
      score = Math.min(1, score + bonus);
      evidence.push(`Pattern bonus: ${fmt(bonus)}`);
    }

    if (primary.intent === 'UNKNOWN') {
      score *= 0.3;
      notes.push('Unknown intent significantly reduces clarity');
    }

    return factor('intent_clarity', score, evidence, notes);
  }

  private entityCompleteness(
    classification: ClassificationResult,
    entities: readonly ExtractedEntity[],
  ): ConfidenceFactorScore {
    const required = REQUIRED_ENTITY_TYPES[classification.primaryIntent.intent];
    const evidence: string[] = [];
    const notes: string[] = [];
    let score: number;

    if (required.length === 0) {
      score = 0.8;
      notes.push('No specific entity requirements for this intent');
    } else {
      const found = new Set(entities.map((e) => e.type));
      const missing = required.filter((t) => !found.has(t));
      score = 1 - missing.length / required.length;
      evidence.push(`Required entities: ${required.length}`);
      evidence.push(`Found entities: ${required.length - missing.length}`);
      evidence.push(`Completeness ratio: ${fmt(score)}`);
      if (missing.length > 0) notes.push(`Missing entities: ${missing.join(', ')}`);
    }

    if (entities.length > required.length) {
      const bonus = Math.min(0.1, (entities.length - required.length) * 0.02);
      score = Math.min(1, score + bonus);
      evidence.push(`Extra entities bonus: ${fmt(bonus)}`);
    }

    return factor('entity_completeness', score, evidence, notes);
  }

  private entityValidation(entities: readonly ExtractedEntity[]): ConfidenceFactorScore {
    if (entities.length === 0) {
      return factor('entity_validation', 0.5, [], ['No entities to validate']);
    }
    const passed = entities.filter((e) => !isFailed(e));
    const failed = entities.filter(isFailed);
    const passedWeight = passed.reduce((acc, e) => acc + ENTITY_IMPORTANCE[e.type], 0);
    const totalWeight = entities.reduce((acc, e) => acc + ENTITY_IMPORTANCE[e.type], 0);
    const score = (passedWeight + VALIDATION_PRIOR * 0.5) / (totalWeight + VALIDATION_PRIOR);

    const notes = failed.length > 0 ? [`Failed validation: ${failed.map((e) => e.type).join(', ')}`] : [];
    return factor(
      'entity_validation',
      score,
      [
        `Validated entities: ${passed.length}/${entities.length}`,
        `Weighted validation score: ${fmt(score)}`,
      ],
      notes,
    );
  }

  private contextConsistency(
    text: string,
    classification: ClassificationResult,
    entities: readonly ExtractedEntity[],
  ): ConfidenceFactorScore {
    const evidence: string[] = [];
    const notes: string[] = [];
    const expected = EXPECTED_ENTITY_TYPES[classification.primaryIntent.intent];
    const types = new Set(entities.map((e) => e.type));

    let consistency: number;
    if (expected.length > 0) {
      consistency = expected.filter((t) => types.has(t)).length / expected.length;
      evidence.push(`Entity-intent consistency: ${fmt(consistency)}`);
    } else {
      consistency = 0.7;
      notes.push('No specific entity expectations for this intent');
    }

    let contextRatio = 0.5;
    if (entities.length > 0) {
      const supported = entities.filter((e) =>
        (SUPPORTING_KEYWORDS[e.type] ?? []).some((kw) => hasWord(text, kw)),
      ).length;
      contextRatio = supported / entities.length;
      evidence.push(`Context support ratio: ${fmt(contextRatio)}`);
    }

    return factor('context_consistency', consistency * 0.6 + contextRatio * 0.4, evidence, notes);
  }

  private textQuality(text: string): ConfidenceFactorScore {
    const notes: string[] = [];
    const trimmed = text.trim();
    const words = trimmed ? trimmed.split(/\s+/) : [];
    const chars = text.length;

    let lengthScore: number;
    if (words.length < 3) {
      lengthScore = 0.3;
      notes.push('Very short text may lack context');
    } else if (words.length < 10) {
      lengthScore = 0.6;
      notes.push('Short text may be incomplete');
    } else if (words.length <= 100) {
      lengthScore = 1.0;
    } else {
      lengthScore = Math.max(0.7, 1 - (words.length - 100) * 0.01);
      notes.push('Long text may contain multiple requests');
    }

    const special = chars ? [...text].filter((c) => !/[A-Za-z0-9 ]/.test(c)).length / chars : 0;
    let charQuality = 1.0;
    if (special > 0.3) {
      charQuality = 0.6;
      notes.push('High ratio of special characters');
    }

    const upper = chars ? [...text].filter((c) => /[A-Z]/.test(c)).length / chars : 0;
    let capsScore: number;
    if (upper >= 0.1 && upper <= 0.3) capsScore = 1.0;
    else if (upper < 0.05) {
      capsScore = 0.7;
      notes.push('All lowercase text');
    } else if (upper > 0.8) {
      capsScore = 0.6;
      notes.push('All uppercase text');
    } else capsScore = 0.8;

    const lowered = words.map((w) => w.toLowerCase());
    const repetition = lowered.length ? new Set(lowered).size / lowered.length : 1;

    return factor(
      'text_quality',
      lengthScore * 0.4 + charQuality * 0.3 + capsScore * 0.2 + repetition * 0.1,
      [`Word count: ${words.length}`, `Length score: ${fmt(lengthScore)}`, `Repetition score: ${fmt(repetition)}`],
      notes,
    );
  }

  private patternStrength(
    all: readonly ExtractedEntity[],
    sound: readonly ExtractedEntity[],
  ): ConfidenceFactorScore {
    if (all.length === 0) {
      return factor('pattern_strength', 0.5, [], ['No entities to analyze patterns']);
    }
    // measured over every entity so a failed one dilutes the ratios
    const patternBased = sound.filter((e) => e.method.startsWith('pattern')).length;
    const strong = sound.filter((e) => e.confidence > 0.8).length;
    const avg = mean(sound.map((e) => e.confidence)) * (sound.length / all.length);
    const score = (patternBased / all.length) * 0.4 + (strong / all.length) * 0.4 + avg * 0.2;
    return factor('pattern_strength', score, [
      `Pattern-based extractions: ${patternBased}/${all.length}`,
      `High confidence entities: ${strong}`,
      `Average entity confidence: ${fmt(avg)}`,
    ]);
  }

  private crossValidation(
    classification: ClassificationResult,
    entities: readonly ExtractedEntity[],
  ): ConfidenceFactorScore {
    const keywords = classification.primaryIntent.keywordsMatched;
    if (keywords.length === 0) {
      return factor('cross_validation', 0.5, [], ['No intent keywords to cross-validate']);
    }
    const contextText = entities
      .flatMap((e) => e.contextClues)
      .join(' ')
      .toLowerCase();
    const supported = keywords.filter((kw) => contextText.includes(kw.toLowerCase())).length;
    return factor('cross_validation', supported / keywords.length, [
      `Cross-validated keywords: ${supported}/${keywords.length}`,
    ]);
  }

  private temporalConsistency(entities: readonly ExtractedEntity[]): ConfidenceFactorScore {
    const dates = entities.filter((e) => e.type === 'DATE');
    const times = entities.filter((e) => e.type === 'TIME');
    if (dates.length === 0 && times.length === 0) {
      return factor('temporal_consistency', 0.8, [], ['No temporal entities to validate']);
    }

    const notes: string[] = [];
    let checks = 0;
    let issues = 0;
    const today = zonedNow(this.clock, this.timezone).startOf('day');

    for (const d of dates) {
      checks++;
      const parsed = parseDateTime(d.normalizedValue, this.timezone);
      if (parsed && parsed < today) {
        issues++;
        notes.push(`Date in the past: ${d.normalizedValue}`);
      }
    }

    const distinctDates = new Set(dates.map((d) => d.normalizedValue));
    if (distinctDates.size > 1) {
      checks++;
      notes.push(`Multiple dates detected: ${distinctDates.size}`);
    }

    for (const t of times) {
      const range = /^(\d{2}:\d{2})-(\d{2}:\d{2})$/.exec(t.normalizedValue);
      if (!range) continue;
      checks++;
      if (range[2] <= range[1] && distinctDates.size <= 1) {
        issues++;
        notes.push(`Time range ends before it starts: ${t.normalizedValue}`);
      }
    }

    if (times.filter((t) => !t.normalizedValue.includes('-')).length > 2) {
      checks++;
      issues++;
      notes.push(`Multiple times detected: ${times.length}`);
    }

    const score = checks > 0 ? 1 - issues / checks : 1;
    return factor(
      'temporal_consistency',
      score,
      [`Temporal entities: ${dates.length} dates, ${times.length} times`],
      notes,
    );
  }

  private assessRisks(
    text: string,
    classification: ClassificationResult,
    extraction: ExtractionResult,
  ): AppliedRisk[] {
    const risks: AppliedRisk[] = [];
    const add = (name: AppliedRisk['factor'], penalty: number) =>
      risks.push({ factor: name, penalty, description: RISK_DESCRIPTIONS[name] });

    const [topSecondary] = classification.secondaryIntents;
    if (topSecondary && topSecondary.confidence > AMBIGUITY_THRESHOLD) {
      add('ambiguous_intent', RISK_PENALTIES.ambiguous_intent);
    }

    const failed = extraction.entities.filter(isFailed).length;
    if (failed > 0) {
      add('validation_failures', Math.min(VALIDATION_FAILURE_CAP, failed * RISK_PENALTIES.validation_failures));
    }

    const trimmed = text.trim();
    const words = trimmed ? trimmed.split(/\s+/).length : 0;
    if (words < SHORT_TEXT_WORDS) add('low_text_quality', RISK_PENALTIES.low_text_quality);

    const weak = extraction.entities.filter(
      (e) => isFailed(e) || e.confidence < WEAK_ENTITY_CONFIDENCE,
    ).length;
    if (extraction.entities.length > 0 && weak > extraction.entities.length / 2) {
      add('weak_patterns', RISK_PENALTIES.weak_patterns);
    }

    return risks;
  }

  private reliability(
    factors: readonly ConfidenceFactorScore[],
    classification: ClassificationResult,
    extraction: ExtractionResult,
  ): ReliabilityIndicators {
    const scores = factors.map((f) => f.score);
    const spread = stdDev(scores);
    return {
      scoreStdDev: spread,
      scoreRange: scores.length ? Math.max(...scores) - Math.min(...scores) : 0,
      consistentFactors: scores.filter((s) => s >= 0.6 && s <= 0.9).length,
      outlierFactors: scores.filter((s) => s < 0.3 || s > 0.95).length,
      intentEvidenceStrength: classification.primaryIntent.evidence.length,
      entityEvidenceStrength: extraction.entities.reduce((acc, e) => acc + e.contextClues.length, 0),
      stability: spread < 0.2 ? 'high' : spread < 0.4 ? 'medium' : 'low',
    };
  }
}
