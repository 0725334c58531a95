import type { AnalysisResult } from '../../shared/types';
import { attributeSource, type AttributionOptions } from './attribution';
import { classify } from './classifier';
import type { PipelineContext } from './context';
import { validateText } from './validation';

/** Classifies one text and names its source. Attribution runs only once classification succeeded. */
export const analyzeText = async (
  text: unknown,
  options: AttributionOptions,
  context: PipelineContext,
): Promise<AnalysisResult> => {
  const sanitized = validateText(text, context.config.classification);
  const verdict = await classify(sanitized, context);
  const source = await attributeSource(sanitized, context, options);
  return { ...verdict, source };
};
