export const CONFIDENCE_FACTORS = [
  'intent_clarity',
  'entity_completeness',
  'entity_validation',
  'context_consistency',
  'text_quality',
  'pattern_strength',
  'cross_validation',
  'temporal_consistency',
] as const;

export type ConfidenceFactor = (typeof CONFIDENCE_FACTORS)[number];

export type ConfidenceLevel = 'very_high' | 'high' | 'medium' | 'low' | 'very_low';

export type RiskFactor = 'ambiguous_intent' | 'validation_failures' | 'low_text_quality' | 'weak_patterns';

export interface ConfidenceFactorScore {
  readonly factor: ConfidenceFactor;
  readonly score: number;
  readonly weight: number;
  readonly evidence: readonly string[];
  readonly notes: readonly string[];
}

export interface AppliedRisk {
  readonly factor: RiskFactor;
  readonly penalty: number;
  readonly description: string;
}

export interface ReliabilityIndicators {
  readonly scoreStdDev: number;
  readonly scoreRange: number;
  readonly consistentFactors: number;
  readonly outlierFactors: number;
  readonly intentEvidenceStrength: number;
  readonly entityEvidenceStrength: number;
  readonly stability: 'high' | 'medium' | 'low';
}

export interface ConfidenceCalculation {
  readonly overallConfidence: number;
  readonly level: ConfidenceLevel;
  readonly weightedScore: number;
  readonly factorScores: readonly ConfidenceFactorScore[];
  readonly risks: readonly AppliedRisk[];
  readonly interval: { readonly lower: number; readonly upper: number };
  readonly reliability: ReliabilityIndicators;
}
