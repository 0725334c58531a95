import type { AppConfig } from '../config/config';
import type { DecisionRegime, LanguageCode, Reliability, Verdict, VerdictLabel } from '../../shared/types';

export interface CombinerInput {
  /** Absent when the model could not score the text. */
  fabricationProbability?: number;
  ruleAdjustment: number;
  professionalScore: number;
  detectedLanguage: LanguageCode;
  mappingCoverage?: number;
}

export type CombinerWeights = Pick<AppConfig['classification'], 'ruleWeight' | 'styleWeight' | 'ruleOnlyConfidenceCap'>;

export const DEFAULT_COMBINER_WEIGHTS: CombinerWeights = {
  ruleWeight: 0.5,
  styleWeight: 0.2,
  ruleOnlyConfidenceCap: 80,
};

const clamp = (value: number, min: number, max: number, fallback = min): number => {
  if (Number.isNaN(value)) return fallback;
  return Math.min(max, Math.max(min, value));
};

const round2 = (value: number): number => Math.round(value * 100) / 100;

export const reliabilityFor = (confidencePercent: number): Reliability => {
  if (confidencePercent > 85) return 'High';
  if (confidencePercent >= 70) return 'Medium';
  return 'Low';
};

const buildVerdict = (
  label: VerdictLabel,
  confidence: number,
  detectedLanguage: LanguageCode,
  regime: DecisionRegime,
): Verdict => {
  const confidencePercent = round2(clamp(confidence, 0, 100));
  return {
    label,
    confidencePercent,
    reliability: reliabilityFor(confidencePercent),
    detectedLanguage,
    regime,
  };
};

/**
 * Combined score in [0, 1]; higher means more likely fabricated. Rules and professional style pull it
 * toward Real.
 */
export const finalScore = (
  fabricationProbability: number,
  ruleAdjustment: number,
  professionalScore: number,
  weights: CombinerWeights = DEFAULT_COMBINER_WEIGHTS,
): number => {
  const p = clamp(fabricationProbability, 0, 1, 0.5);
  const adj = clamp(ruleAdjustment, -1, 1, 0);
  const prof = clamp(professionalScore, 0, 1, 0);
  return clamp(p - adj * weights.ruleWeight - prof * weights.styleWeight, 0, 1);
};

export const combine = (input: CombinerInput, weights: CombinerWeights = DEFAULT_COMBINER_WEIGHTS): Verdict => {
  const adj = clamp(input.ruleAdjustment, -1, 1, 0);
  const rulesOnly =
    input.detectedLanguage === 'hi' || input.detectedLanguage === 'gu' || input.fabricationProbability === undefined;

  if (rulesOnly) {
    const coverage = clamp(input.mappingCoverage ?? 1, 0, 1, 1);
    const confidence = 50 + Math.abs(adj) * (weights.ruleOnlyConfidenceCap - 50) * (0.5 + 0.5 * coverage);
    return buildVerdict(adj < 0 ? 'Fake' : 'Real', confidence, input.detectedLanguage, 'rules-only');
  }

  const score = finalScore(input.fabricationProbability ?? 0.5, adj, input.professionalScore, weights);
  const label: VerdictLabel = score >= 0.5 ? 'Fake' : 'Real';
  return buildVerdict(label, 50 + Math.abs(score - 0.5) * 100, input.detectedLanguage, 'model');
};
