import { z } from 'zod';
import type { AppConfig } from '../../../shared/config';
import { isGenericQuery } from '../../../shared/config';
import type { SourceError } from '../../../shared/types';
import type { Logger } from '../../obs/logger';
import { createSilentLogger } from '../../obs/logger';
import { createArticle, failedResult } from '../article';
import type { FetchResult, SourceAdapter } from '../types';
import { composeArticleText, errorForStatus, parseJson, requestUpstream } from './http';

const NEWSDATA_ENDPOINT = 'https://newsdata.io/api/1/news';
const SOURCE_NAME = 'newsdata';

const NewsDataItemSchema = z.object({
  source_id: z.string().nullish(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  content: z.string().nullish(),
  link: z.string().nullish(),
});

// On failure `results` carries the error object instead of the item list.
const NewsDataResponseSchema = z.object({
  status: z.string(),
  results: z
    .union([
      z.array(NewsDataItemSchema),
      z.object({ message: z.string().nullish(), code: z.string().nullish() }),
    ])
    .nullish(),
});

const errorFromPayload = (status: number, code: string | null | undefined, message: string): SourceError => {
  if (code === 'Unauthorized' || code === 'apiKeyInvalid' || code === 'apiKeyMissing') {
    return { kind: 'unauthorized', message, status };
  }
  if (code === 'RateLimitExceeded' || code === 'rateLimited') {
    return { kind: 'rate-limited', message, status };
  }
  return errorForStatus(status, message);
};

export interface NewsDataAdapterOptions {
  /** Per-request credential; takes precedence over the configured key. */
  apiKey?: string;
  logger?: Logger;
}

export const createNewsDataAdapter = (config: AppConfig, options: NewsDataAdapterOptions = {}): SourceAdapter => {
  const settings = config.sources.newsData;
  const logger = options.logger ?? createSilentLogger();

  const fetchArticles = async (query: string, limit: number, signal?: AbortSignal): Promise<FetchResult> => {
    const apiKey = options.apiKey || settings.apiKey;
    if (!apiKey) {
      return failedResult(SOURCE_NAME, 'api', { kind: 'unauthorized', message: 'NewsData.io key is not configured' });
    }

    const searchQuery = isGenericQuery(query) ? settings.fallbackQuery : query;
    const params = new URLSearchParams({
      apikey: apiKey,
      q: searchQuery,
      language: 'en',
      country: settings.country,
    });

    const upstream = await requestUpstream(`${NEWSDATA_ENDPOINT}?${params.toString()}`, {
      timeoutMs: config.aggregation.sourceTimeoutMs,
      signal,
      headers: { 'User-Agent': config.aggregation.userAgent },
    });
    if (!upstream.ok) {
      logger.warn('NewsData.io request failed', { kind: upstream.error.kind, message: upstream.error.message });
      return failedResult(SOURCE_NAME, 'api', upstream.error);
    }

    const parsed = NewsDataResponseSchema.safeParse(parseJson(upstream.body));
    if (!parsed.success) {
      const error: SourceError =
        upstream.status >= 400
          ? errorForStatus(upstream.status)
          : { kind: 'network', message: 'NewsData.io returned an unreadable payload', status: upstream.status };
      return failedResult(SOURCE_NAME, 'api', error);
    }

    const { status, results } = parsed.data;
    if (upstream.status >= 400 || status !== 'success' || !Array.isArray(results)) {
      const detail = results && !Array.isArray(results) ? results : null;
      const error = errorFromPayload(upstream.status, detail?.code, detail?.message ?? 'NewsData.io error');
      logger.warn('NewsData.io returned an error', { status: upstream.status, code: detail?.code, kind: error.kind });
      return failedResult(SOURCE_NAME, 'api', error);
    }

    const fetchedAt = new Date().toISOString();
    const articles = results
      .flatMap((item) => {
        const publisher = item.source_id ?? '';
        const text = composeArticleText(publisher, item.title, item.description, item.content);
        return text ? [createArticle(text, SOURCE_NAME, 'api', fetchedAt, { url: item.link, publisher })] : [];
      })
      .slice(0, limit);

    if (articles.length === 0) {
      return failedResult(SOURCE_NAME, 'api', {
        kind: 'empty-result',
        message: `No usable NewsData.io articles for "${searchQuery}"`,
      });
    }

    logger.info('Fetched NewsData.io articles', { query: searchQuery, count: articles.length });
    return { sourceName: SOURCE_NAME, sourceKind: 'api', articles };
  };

  return { name: SOURCE_NAME, kind: 'api', fetch: fetchArticles };
};
