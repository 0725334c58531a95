import type { RuleCheck, RuleSignal, Verdict, VerdictLabel } from '../../shared/types';

type Strength = 'strong' | 'moderate';

const SUMMARIES: Record<VerdictLabel, Record<Strength, string>> = {
  Real: {
    strong: 'The text reads like factual reporting: neutral wording, concrete details and no sensational patterns.',
    moderate:
      'The text partly matches reliable reporting, but confidence is moderate, so verify it with trusted sources.',
  },
  Fake: {
    strong:
      'The text carries wording and structure strongly associated with misinformation, such as sensational claims or weak sourcing.',
    moderate:
      'Some signals common in misinformation were found, but confidence is moderate, so check it against fact-checking sites.',
  },
};

const CHECK_LABELS: Record<RuleCheck, string> = {
  uppercase: 'upper-case emphasis',
  punctuation: 'repeated punctuation',
  sensational: 'sensational wording',
  'credible-source': 'named outlet',
  attribution: 'attributed claim',
  quantitative: 'specific figures',
};

const RULES_ONLY_NOTE = 'The statistical model was not used for this text; the verdict rests on the rules alone.';

/**
 * One-paragraph rationale for a verdict: a summary chosen by label and reliability, then the
 * rule signals that fired.
 */
export const explainVerdict = (verdict: Verdict, signals: readonly RuleSignal[]): string => {
  const strength: Strength = verdict.reliability === 'High' ? 'strong' : 'moderate';
  const parts = [SUMMARIES[verdict.label][strength]];
  if (verdict.regime === 'rules-only') {
    parts.push(RULES_ONLY_NOTE);
  }
  if (signals.length > 0) {
    const listed = signals.map((signal) => `${CHECK_LABELS[signal.check]} (${signal.detail})`).join('; ');
    parts.push(`Signals: ${listed}.`);
  }
  return parts.join(' ');
};
