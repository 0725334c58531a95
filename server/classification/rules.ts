import fs from 'node:fs/promises';
import JSON5 from 'json5';
import { z } from 'zod';
import type { RuleSignal } from '../../shared/types';

export const LexiconSchema = z.object({
  sensational: z.array(z.string().min(1)),
  credibleSources: z.array(z.string().min(1)),
  attribution: z.array(z.string().min(1)),
  magnitudes: z.array(z.string().min(1)),
});

export type Lexicon = z.infer<typeof LexiconSchema>;

export interface RuleEvaluation {
  /** Sum of signal weights clamped to [-1, 1]. */
  ruleAdjustment: number;
  /** Fraction of the four professional-style indicators present. */
  professionalScore: number;
  signals: RuleSignal[];
}

export interface RuleEngine {
  evaluate: (rawText: string) => RuleEvaluation;
}

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const LATIN_ONLY = /^[\x20-\x7e]+$/;

/** Latin phrases match on word boundaries; Indic phrases as plain substrings. */
const phrasePattern = (phrase: string): string => {
  const escaped = escapeRegExp(phrase.normalize('NFC').toLowerCase());
  return LATIN_ONLY.test(phrase) ? `(?<![a-z0-9])${escaped}(?![a-z0-9])` : escaped;
};

const compilePhrases = (phrases: string[]): RegExp[] => phrases.map((phrase) => new RegExp(phrasePattern(phrase), 'u'));

const matchedPhrases = (text: string, patterns: RegExp[], phrases: string[]): string[] =>
  phrases.filter((_, index) => patterns[index].test(text));

const round4 = (value: number): number => Number(value.toFixed(4));

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

const longestPunctuationRun = (text: string): number =>
  (text.match(/[!?]+/g) ?? []).reduce((max, run) => Math.max(max, run.length), 0);

const CURRENCY = /[$₹€£]\s?\d|(?<![a-z])(?:rs\.?|inr|usd)\s?\d/;
const PERCENTAGE = /\d(?:[\d,.]*\d)?\s?(?:%|percent(?![a-z])|per cent(?![a-z]))/;
const DIGIT = /\p{Nd}/u;
const PROPER_NOUN = /\b[A-Z][a-z]+\b/;

export const createRuleEngine = (lexicon: Lexicon): RuleEngine => {
  const sensational = compilePhrases(lexicon.sensational);
  const credible = compilePhrases(lexicon.credibleSources);
  const attribution = compilePhrases(lexicon.attribution);
  const magnitude = new RegExp(
    `\\p{Nd}[\\p{Nd},.]*\\s?(?:${lexicon.magnitudes.map(phrasePattern).join('|')})`,
    'u',
  );

  const checkUppercase = (text: string): RuleSignal | null => {
    let cased = 0;
    let upper = 0;
    for (const ch of text) {
      const lower = ch.toLowerCase();
      const up = ch.toUpperCase();
      if (lower === up) continue;
      cased += 1;
      if (ch === up) upper += 1;
    }
    if (cased >= 10 && upper / cased > 0.6) {
      return { check: 'uppercase', weight: -0.4, detail: `${Math.round((upper / cased) * 100)}% upper-case letters` };
    }
    const shouted = text.match(/\b[A-Z]{5,}\b/);
    if (shouted) {
      return { check: 'uppercase', weight: -0.15, detail: `all-caps word "${shouted[0]}"` };
    }
    return null;
  };

  const checkPunctuation = (text: string): RuleSignal | null => {
    const run = longestPunctuationRun(text);
    if (run >= 3) {
      return { check: 'punctuation', weight: -0.4, detail: `run of ${run} "!"/"?"` };
    }
    if (run === 2) {
      return { check: 'punctuation', weight: -0.25, detail: 'run of 2 "!"/"?"' };
    }
    const words = text.split(/\s+/).filter(Boolean).length;
    const marks = (text.match(/[!?]/g) ?? []).length;
    if (words > 0 && marks / words > 0.15) {
      return { check: 'punctuation', weight: -0.1, detail: `${marks} "!"/"?" in ${words} words` };
    }
    return null;
  };

  const checkSensational = (lowered: string): RuleSignal | null => {
    const hits = matchedPhrases(lowered, sensational, lexicon.sensational);
    if (hits.length === 0) return null;
    return { check: 'sensational', weight: Math.max(-0.6, round4(-0.3 * hits.length)), detail: hits.join(', ') };
  };

  const checkQuantitative = (text: string, lowered: string): RuleSignal | null => {
    if (CURRENCY.test(lowered) || PERCENTAGE.test(lowered) || magnitude.test(lowered)) {
      return { check: 'quantitative', weight: 0.25, detail: 'specific quantity' };
    }
    if (DIGIT.test(text)) {
      return { check: 'quantitative', weight: 0.1, detail: 'contains digits' };
    }
    return null;
  };

  const evaluate = (rawText: string): RuleEvaluation => {
    const text = rawText.normalize('NFC');
    const lowered = text.toLowerCase();

    const credibleHits = matchedPhrases(lowered, credible, lexicon.credibleSources);
    const attributionHits = matchedPhrases(lowered, attribution, lexicon.attribution);

    const candidates: Array<RuleSignal | null> = [
      checkUppercase(text),
      checkPunctuation(text),
      checkSensational(lowered),
      credibleHits.length > 0
        ? { check: 'credible-source', weight: 0.4, detail: credibleHits.join(', ') }
        : null,
      attributionHits.length > 0 ? { check: 'attribution', weight: 0.2, detail: attributionHits.join(', ') } : null,
      checkQuantitative(text, lowered),
    ];
    const signals = candidates.filter((signal): signal is RuleSignal => signal !== null);

    const total = signals.reduce((sum, signal) => sum + signal.weight, 0);

    const indicators = [
      credibleHits.length > 0 || attributionHits.length > 0,
      DIGIT.test(text),
      PROPER_NOUN.test(text),
      longestPunctuationRun(text) < 2,
    ];
    const professionalScore = indicators.filter(Boolean).length / indicators.length;

    return {
      ruleAdjustment: round4(clamp(total, -1, 1)),
      professionalScore,
      signals,
    };
  };

  return { evaluate };
};

export const parseLexicon = (raw: string): Lexicon => LexiconSchema.parse(JSON5.parse(raw));

export const loadLexicon = async (lexiconPath: string): Promise<Lexicon> =>
  parseLexicon(await fs.readFile(lexiconPath, 'utf-8'));
