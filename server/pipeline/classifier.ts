import { sha256Hex } from '../../shared/crypto';
import type { ExplainedVerdict } from '../../shared/types';
import { combine } from '../classification/combiner';
import { explainVerdict } from '../classification/explanation';
import { isModelLanguage, normalizeLanguage } from '../classification/language';
import { InsufficientInputError, type FeatureScorer } from '../classification/scorer';
import { ClassificationError } from './errors';
import type { PipelineContext } from './context';
import { validateText } from './validation';

/** Case is kept: the upper-case and punctuation checks read the text as written. */
export const classifyCacheKey = (text: string): string => `classify:${sha256Hex(text)}`;

/**
 * Scores one text. With no scorer, or when the model cannot read the text, the verdict comes from
 * the rules alone. The rule signals that fired travel with the verdict as its explanation.
 */
export const evaluateText = (
  text: string,
  context: PipelineContext,
  scorer: FeatureScorer | null,
): ExplainedVerdict => {
  const normalized = normalizeLanguage(text);
  const rules = context.rules.evaluate(text);

  let fabricationProbability: number | undefined;
  if (scorer && isModelLanguage(normalized.detectedLanguage)) {
    try {
      fabricationProbability = scorer.score(normalized.workingText);
    } catch (error) {
      if (!(error instanceof InsufficientInputError)) {
        throw error;
      }
      context.logger.debug('Model input too short after cleaning; using rules only', {
        cleanedLength: error.cleanedLength,
      });
    }
  }

  const verdict = combine(
    {
      fabricationProbability,
      ruleAdjustment: rules.ruleAdjustment,
      professionalScore: rules.professionalScore,
      detectedLanguage: normalized.detectedLanguage,
      mappingCoverage: normalized.mappingCoverage,
    },
    context.config.classification,
  );
  return { ...verdict, signals: rules.signals, reason: explainVerdict(verdict, rules.signals) };
};

export const classify = async (text: unknown, context: PipelineContext): Promise<ExplainedVerdict> => {
  const sanitized = validateText(text, context.config.classification);
  const { scorer } = context;
  if (!scorer) {
    throw new ClassificationError('ScorerUnavailable', 'The classification model is not loaded');
  }
  return context.classifyCache.getOrCompute(classifyCacheKey(sanitized), async () => {
    const verdict = evaluateText(sanitized, context, scorer);
    context.logger.info('Text classified', {
      label: verdict.label,
      confidence: verdict.confidencePercent,
      language: verdict.detectedLanguage,
      regime: verdict.regime,
    });
    return verdict;
  });
};
