import languageData from '../../data/languages.json';
import type { LanguageCode, Reliability, VerdictLabel } from '../../shared/types';

/** The language the statistical model was trained on. */
export const WORKING_LANGUAGE: LanguageCode = 'en';

type ScriptName = 'devanagari' | 'gujarati';

interface ScriptTable {
  virama: string;
  silent: Set<string>;
  consonants: Map<string, string>;
  vowels: Map<string, string>;
  vowelSigns: Map<string, string>;
  marks: Map<string, string>;
}

export interface NormalizedText {
  workingText: string;
  detectedLanguage: LanguageCode;
  /** Share of Indic-script characters the transliteration tables covered (1 when there were none). */
  mappingCoverage: number;
}

const buildTable = (raw: (typeof languageData.scripts)[ScriptName]): ScriptTable => ({
  virama: raw.virama,
  silent: new Set(raw.silent),
  consonants: new Map(Object.entries(raw.consonants)),
  vowels: new Map(Object.entries(raw.vowels)),
  vowelSigns: new Map(Object.entries(raw.vowelSigns)),
  marks: new Map(Object.entries(raw.marks)),
});

const TABLES: Record<ScriptName, ScriptTable> = {
  devanagari: buildTable(languageData.scripts.devanagari),
  gujarati: buildTable(languageData.scripts.gujarati),
};

const ENGLISH_TOKENS = new Set(languageData.tokens.english);
const ROMANIZED_HINDI_TOKENS = new Set(languageData.tokens.romanizedHindi);
const FOREIGN_TOKENS = new Set(languageData.tokens.foreign);

const scriptOf = (ch: string): ScriptName | null => {
  const code = ch.codePointAt(0) ?? 0;
  if (code >= 0x0900 && code <= 0x097f) return 'devanagari';
  if (code >= 0x0a80 && code <= 0x0aff) return 'gujarati';
  return null;
};

const LATIN_LETTER = /[A-Za-zÀ-ɏ]/;
const ANY_LETTER = /\p{L}/u;

interface ScriptCounts {
  latin: number;
  devanagari: number;
  gujarati: number;
  other: number;
}

const countScripts = (text: string): ScriptCounts => {
  const counts: ScriptCounts = { latin: 0, devanagari: 0, gujarati: 0, other: 0 };
  for (const ch of text) {
    const script = scriptOf(ch);
    if (script) {
      // Vowel signs and viramas are not letters but still belong to the script.
      counts[script] += 1;
    } else if (LATIN_LETTER.test(ch)) {
      counts.latin += 1;
    } else if (ANY_LETTER.test(ch)) {
      counts.other += 1;
    }
  }
  return counts;
};

const countHits = (tokens: string[], set: Set<string>): number =>
  tokens.reduce((sum, token) => (set.has(token) ? sum + 1 : sum), 0);

const detectLatin = (text: string): LanguageCode => {
  const tokens = text.toLowerCase().match(/[a-zÀ-ɏ']+/g) ?? [];
  const english = countHits(tokens, ENGLISH_TOKENS);
  const hinglish = countHits(tokens, ROMANIZED_HINDI_TOKENS);
  const foreign = countHits(tokens, FOREIGN_TOKENS);
  if (hinglish >= 2 && hinglish > english) return 'hi';
  if (english >= 1 && english >= foreign) return 'en';
  return 'unknown';
};

/**
 * Script-range detection over a closed language set. The dominant script wins; on an exact
 * tie the Indic script is preferred (Gujarati, then Devanagari) since the model cannot read it.
 */
export const detectLanguage = (text: string): LanguageCode => {
  const counts = countScripts(text);
  const ranked: Array<[keyof ScriptCounts, number]> = [
    ['gujarati', counts.gujarati],
    ['devanagari', counts.devanagari],
    ['latin', counts.latin],
    ['other', counts.other],
  ];
  let best = ranked[0];
  for (const entry of ranked) {
    if (entry[1] > best[1]) best = entry;
  }
  if (best[1] === 0) return 'unknown';
  switch (best[0]) {
    case 'gujarati':
      return 'gu';
    case 'devanagari':
      return 'hi';
    case 'latin':
      return detectLatin(text);
    default:
      return 'unknown';
  }
};

const INDIC_CHAR = /[\u0900-\u097f\u0a80-\u0aff]/gu;

/** NFC overall; only Indic characters are decomposed so nukta forms reach the tables as base + mark. */
const decomposeIndic = (text: string): string =>
  text.normalize('NFC').replace(INDIC_CHAR, (ch) => ch.normalize('NFD'));

/**
 * Table-driven romanization of Devanagari and Gujarati. Consonants carry an inherent "a" that
 * a vowel sign or virama replaces; the inherent vowel is dropped at the end of a multi-letter word.
 * Characters outside the tables are dropped and lower the returned coverage.
 */
export const transliterate = (text: string): { text: string; coverage: number } => {
  let out = '';
  let pendingInherent = false;
  let wordLength = 0;
  let scriptChars = 0;
  let mapped = 0;

  const flush = (wordEnd: boolean) => {
    if (pendingInherent && !(wordEnd && wordLength > 1)) {
      out += 'a';
    }
    pendingInherent = false;
  };

  for (const ch of decomposeIndic(text)) {
    const script = scriptOf(ch);
    if (!script) {
      flush(true);
      wordLength = 0;
      out += ch;
      continue;
    }

    const table = TABLES[script];
    scriptChars += 1;

    if (table.silent.has(ch)) {
      mapped += 1;
      continue;
    }
    if (ch === table.virama) {
      pendingInherent = false;
      mapped += 1;
      continue;
    }

    const sign = table.vowelSigns.get(ch);
    if (sign !== undefined) {
      pendingInherent = false;
      out += sign;
      wordLength += 1;
      mapped += 1;
      continue;
    }

    const consonant = table.consonants.get(ch);
    if (consonant !== undefined) {
      flush(false);
      out += consonant;
      pendingInherent = true;
      wordLength += 1;
      mapped += 1;
      continue;
    }

    const vowel = table.vowels.get(ch);
    if (vowel !== undefined) {
      flush(false);
      out += vowel;
      wordLength += 1;
      mapped += 1;
      continue;
    }

    const mark = table.marks.get(ch);
    if (mark !== undefined) {
      const isLetter = /[a-z]/.test(mark);
      flush(!isLetter);
      if (!isLetter) wordLength = 0;
      out += mark;
      mapped += 1;
      continue;
    }

    flush(false);
  }
  flush(true);

  return { text: out, coverage: scriptChars === 0 ? 1 : mapped / scriptChars };
};

export const normalizeLanguage = (text: string): NormalizedText => {
  const detectedLanguage = detectLanguage(text);
  const { text: workingText, coverage } = transliterate(text);
  return {
    workingText,
    detectedLanguage,
    mappingCoverage: Number(coverage.toFixed(4)),
  };
};

/** Languages the statistical model is not trained on go through the rules-only regime. */
export const isModelLanguage = (language: LanguageCode): boolean =>
  language === WORKING_LANGUAGE || language === 'unknown';

export const languageName = (language: LanguageCode): string => languageData.names[language];

type LocalizableKey = VerdictLabel | Reliability;

export const localize = (key: LocalizableKey, language: LanguageCode): string => {
  const entry = languageData.labels[key];
  if (language === 'hi' || language === 'gu') {
    return entry[language];
  }
  return entry.en;
};
