import { normalizeQuery } from '../../shared/config';
import type { Article, ExplainedVerdict, FetchAndClassifyResult, LanguageCode } from '../../shared/types';
import { AggregationError, aggregate, createSourceAdapters, type SourceCredentials } from '../retrieval/aggregator';
import type { Region } from '../retrieval/catalog';
import type { AggregationResult } from '../retrieval/types';
import { evaluateText } from './classifier';
import type { PipelineContext } from './context';
import { ClassificationError } from './errors';

export interface FetchOptions {
  region?: Region;
  language?: LanguageCode;
  /** Per-request API keys. Results fetched with them bypass the shared cache. */
  credentials?: SourceCredentials;
  signal?: AbortSignal;
}

export const fetchCacheKey = (query: string, options: Pick<FetchOptions, 'region' | 'language'>): string =>
  `fetch:${normalizeQuery(query)}|${options.region ?? ''}|${options.language ?? 'en'}`;

const hasCredentialOverride = (options: FetchOptions): boolean =>
  Boolean(options.credentials?.newsApiKey || options.credentials?.newsDataKey);

export const gatherArticles = async (
  query: string,
  options: FetchOptions,
  context: PipelineContext,
): Promise<AggregationResult> => {
  const logger = context.logger.child({ component: 'aggregator' });
  const adapters = createSourceAdapters(context.config, context.catalog, options, logger);
  try {
    return await aggregate(query, {
      adapters,
      deadlineMs: context.config.aggregation.deadlineMs,
      maxArticles: context.config.aggregation.maxArticles,
      logger,
      signal: options.signal,
    });
  } catch (error) {
    if (error instanceof AggregationError) {
      throw new ClassificationError('NoResults', `No news sources responded for "${query}"`);
    }
    throw error;
  }
};

export const classifyArticles = (articles: readonly Article[], context: PipelineContext): ExplainedVerdict[] => {
  if (!context.scorer) {
    context.logger.warn('Model unavailable; classifying fetched articles with rules only', {
      articles: articles.length,
    });
  }
  return articles.map((article) => evaluateText(article.text, context, context.scorer));
};

const runFetchAndClassify = async (
  query: string,
  options: FetchOptions,
  context: PipelineContext,
): Promise<FetchAndClassifyResult> => {
  const aggregation = await gatherArticles(query, options, context);
  if (aggregation.articles.length === 0) {
    throw new ClassificationError('NoResults', `No articles found for "${query}"`);
  }
  return {
    query,
    articles: aggregation.articles.map((article) => article.text),
    verdicts: classifyArticles(aggregation.articles, context),
    sources: aggregation.sources,
  };
};

export const fetchAndClassify = async (
  rawQuery: string | null | undefined,
  options: FetchOptions,
  context: PipelineContext,
): Promise<FetchAndClassifyResult> => {
  const query = normalizeQuery(rawQuery);
  if (hasCredentialOverride(options)) {
    return runFetchAndClassify(query, options, context);
  }
  return context.fetchCache.getOrCompute(fetchCacheKey(query, options), () =>
    runFetchAndClassify(query, options, context),
  );
};
