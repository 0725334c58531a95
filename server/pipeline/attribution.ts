import type { Article, SourceAttribution } from '../../shared/types';
import type { SourceCredentials } from '../retrieval/aggregator';
import { createNewsApiAdapter } from '../retrieval/connectors/newsapi';
import type { PipelineContext } from './context';

const URL_PATTERN = /https?:\/\/\S+|www\.\S+/i;
const TRAILING_PUNCTUATION = /[.,;:!?)\]}'"]+$/;
const WORD = /[\p{L}\p{N}_]+/gu;

const LOOKUP_WORDS = 16;
const LOOKUP_MAX_CHARS = 200;
const LOOKUP_PAGE_SIZE = 5;
const MIN_OVERLAP = 0.25;

export const UNKNOWN_SOURCE: SourceAttribution = { label: 'Unknown', url: null, method: 'none' };

export interface AttributionOptions {
  credentials?: SourceCredentials;
  signal?: AbortSignal;
}

/** First link written in the text, without the punctuation that closes the sentence around it. */
export const extractUrl = (text: string): string | null => {
  const match = text.match(URL_PATTERN);
  if (!match) return null;
  const url = match[0].replace(TRAILING_PUNCTUATION, '');
  return url.length > 0 ? url : null;
};

export const lookupQuery = (text: string): string =>
  text.split(/\s+/).filter(Boolean).slice(0, LOOKUP_WORDS).join(' ').slice(0, LOOKUP_MAX_CHARS);

const significantWords = (text: string): Set<string> =>
  new Set((text.toLowerCase().match(WORD) ?? []).filter((word) => word.length > 3));

/** Share of the text's significant words that also appear in the candidate. */
export const overlapScore = (text: string, candidate: string): number => {
  const words = significantWords(text);
  if (words.size === 0) return 0;
  const other = significantWords(candidate);
  let shared = 0;
  for (const word of words) {
    if (other.has(word)) shared += 1;
  }
  return shared / words.size;
};

const bestMatch = (text: string, articles: readonly Article[]): { article: Article; score: number } | null => {
  let best: { article: Article; score: number } | null = null;
  for (const article of articles) {
    const score = overlapScore(text, article.text);
    if (!best || score > best.score) {
      best = { article, score };
    }
  }
  return best;
};

/**
 * Names where the text came from: a link in the text itself, else the closest NewsAPI match.
 * Never fails; anything short of a confident match is `Unknown`.
 */
export const attributeSource = async (
  text: string,
  context: PipelineContext,
  options: AttributionOptions = {},
): Promise<SourceAttribution> => {
  const url = extractUrl(text);
  if (url) {
    return { label: url, url, method: 'text' };
  }

  const { config } = context;
  if (!config.attribution.lookupEnabled || !config.sources.newsApi.enabled) {
    return UNKNOWN_SOURCE;
  }

  const logger = context.logger.child({ component: 'attribution' });
  const adapter = createNewsApiAdapter(config, { apiKey: options.credentials?.newsApiKey, logger });
  const query = lookupQuery(text);
  try {
    const result = await adapter.fetch(query, LOOKUP_PAGE_SIZE, options.signal);
    if (result.error) {
      logger.debug('Source lookup returned nothing usable', { kind: result.error.kind });
      return UNKNOWN_SOURCE;
    }
    const match = bestMatch(text, result.articles);
    if (!match || match.score < MIN_OVERLAP) {
      logger.debug('No lookup result overlaps the text enough', { best: match?.score ?? 0 });
      return UNKNOWN_SOURCE;
    }
    const publisher = match.article.publisher ?? match.article.sourceName;
    return { label: `${publisher} (auto-detected)`, url: match.article.url ?? null, method: 'lookup' };
  } catch (error) {
    logger.warn('Source lookup failed', { message: error instanceof Error ? error.message : String(error) });
    return UNKNOWN_SOURCE;
  }
};
