import { z } from 'zod';
import type { AppConfig } from '../../../shared/config';
import { isGenericQuery } from '../../../shared/config';
import type { SourceError } from '../../../shared/types';
import type { Logger } from '../../obs/logger';
import { createSilentLogger } from '../../obs/logger';
import { createArticle, failedResult } from '../article';
import type { FetchResult, SourceAdapter } from '../types';
import { composeArticleText, errorForStatus, parseJson, requestUpstream } from './http';

const NEWS_API_ENDPOINT = 'https://newsapi.org/v2/everything';
const SOURCE_NAME = 'newsapi';

const NewsApiResponseSchema = z.object({
  status: z.string(),
  code: z.string().nullish(),
  message: z.string().nullish(),
  articles: z
    .array(
      z.object({
        source: z.object({ name: z.string().nullish() }).nullish(),
        title: z.string().nullish(),
        description: z.string().nullish(),
        content: z.string().nullish(),
        url: z.string().nullish(),
      }),
    )
    .nullish(),
});

const UNAUTHORIZED_CODES = new Set(['apiKeyInvalid', 'apiKeyMissing', 'apiKeyDisabled', 'Unauthorized']);
const RATE_LIMIT_CODES = new Set(['rateLimited', 'apiKeyExhausted', 'RateLimitExceeded']);

const errorForCode = (code: string | null | undefined, message: string, status: number): SourceError => {
  if (code && UNAUTHORIZED_CODES.has(code)) return { kind: 'unauthorized', message, status };
  if (code && RATE_LIMIT_CODES.has(code)) return { kind: 'rate-limited', message, status };
  return errorForStatus(status, message);
};

export interface NewsApiAdapterOptions {
  /** Per-request credential; takes precedence over the configured key. */
  apiKey?: string;
  logger?: Logger;
}

export const createNewsApiAdapter = (config: AppConfig, options: NewsApiAdapterOptions = {}): SourceAdapter => {
  const settings = config.sources.newsApi;
  const logger = options.logger ?? createSilentLogger();

  const fetchArticles = async (query: string, limit: number, signal?: AbortSignal): Promise<FetchResult> => {
    const apiKey = options.apiKey || settings.apiKey;
    if (!apiKey) {
      return failedResult(SOURCE_NAME, 'api', { kind: 'unauthorized', message: 'NewsAPI key is not configured' });
    }

    const searchQuery = isGenericQuery(query) ? settings.fallbackQuery : query;
    const pageSize = Math.min(Math.max(limit, 1), settings.pageSize);
    const params = new URLSearchParams({
      q: searchQuery,
      language: 'en',
      sortBy: 'publishedAt',
      pageSize: pageSize.toString(),
    });

    const upstream = await requestUpstream(`${NEWS_API_ENDPOINT}?${params.toString()}`, {
      timeoutMs: config.aggregation.sourceTimeoutMs,
      signal,
      headers: {
        'X-Api-Key': apiKey,
        // NewsAPI rejects anonymous requests without a User-Agent.
        'User-Agent': config.aggregation.userAgent,
      },
    });
    if (!upstream.ok) {
      logger.warn('NewsAPI request failed', { kind: upstream.error.kind, message: upstream.error.message });
      return failedResult(SOURCE_NAME, 'api', upstream.error);
    }

    const parsed = NewsApiResponseSchema.safeParse(parseJson(upstream.body));
    if (!parsed.success) {
      const error: SourceError =
        upstream.status >= 400
          ? errorForStatus(upstream.status)
          : { kind: 'network', message: 'NewsAPI returned an unreadable payload', status: upstream.status };
      return failedResult(SOURCE_NAME, 'api', error);
    }

    const data = parsed.data;
    if (upstream.status >= 400 || data.status !== 'ok') {
      const error = errorForCode(data.code, data.message ?? 'NewsAPI error', upstream.status);
      logger.warn('NewsAPI returned an error', { status: upstream.status, code: data.code, kind: error.kind });
      return failedResult(SOURCE_NAME, 'api', error);
    }

    const fetchedAt = new Date().toISOString();
    const articles = (data.articles ?? [])
      .flatMap((item) => {
        const publisher = item.source?.name ?? '';
        const text = composeArticleText(publisher, item.title, item.description, item.content);
        return text ? [createArticle(text, SOURCE_NAME, 'api', fetchedAt, { url: item.url, publisher })] : [];
      })
      .slice(0, limit);

    if (articles.length === 0) {
      return failedResult(SOURCE_NAME, 'api', {
        kind: 'empty-result',
        message: `No usable NewsAPI articles for "${searchQuery}"`,
      });
    }

    logger.info('Fetched NewsAPI articles', { query: searchQuery, count: articles.length });
    return { sourceName: SOURCE_NAME, sourceKind: 'api', articles };
  };

  return { name: SOURCE_NAME, kind: 'api', fetch: fetchArticles };
};
