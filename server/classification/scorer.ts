import stopwordList from '../../data/stopwords.json';
import type { AppConfig } from '../config/config';
import type { ModelBundle, ProbabilityModel } from './model';

const STOPWORDS = new Set<string>(stopwordList);

export class InsufficientInputError extends Error {
  constructor(readonly cleanedLength: number, readonly minLength: number) {
    super(`Cleaned text has ${cleanedLength} characters; at least ${minLength} are required`);
    this.name = 'InsufficientInputError';
  }
}

/**
 * Cleaning applied before vectorization. It must match what the model was trained on.
 */
export const cleanText = (text: string): string =>
  text
    .toLowerCase()
    .replace(/https?:\/\/\S+|www\.\S+/g, ' ')
    .replace(/<[^>]*>/g, ' ')
    .replace(/\S+@\S+/g, ' ')
    .replace(/[^a-z\s]/g, ' ')
    .split(/\s+/)
    .filter((token) => token.length > 2 && !STOPWORDS.has(token))
    .join(' ');

export interface FeatureScorer {
  /** Probability in [0, 1] that the text is fabricated. */
  score: (workingText: string) => number;
  /** Which bundle model `score` would use for this text. */
  selectModel: (cleanedText: string) => ProbabilityModel;
}

export type ScorerOptions = Pick<AppConfig['classification'], 'minTextLength' | 'headlineMaxChars'>;

export const createFeatureScorer = (bundle: ModelBundle, options: ScorerOptions): FeatureScorer => {
  const selectModel = (cleanedText: string): ProbabilityModel =>
    bundle.headline && cleanedText.length < options.headlineMaxChars ? bundle.headline : bundle.article;

  return {
    selectModel,
    score: (workingText) => {
      const cleaned = cleanText(workingText);
      if (cleaned.length < options.minTextLength) {
        throw new InsufficientInputError(cleaned.length, options.minTextLength);
      }
      const probability = selectModel(cleaned).predictFabrication(cleaned);
      return Number.isFinite(probability) ? Math.min(1, Math.max(0, probability)) : 0.5;
    },
  };
};
