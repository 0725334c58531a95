import type { AppConfig } from '../../shared/config';
import type { SourceReport } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { createSilentLogger } from '../obs/logger';
import { createDeadline } from '../utils/async';
import { failedResult } from './article';
import { selectPages, type CatalogSelection, type ScrapeCatalog } from './catalog';
import { createNewsApiAdapter } from './connectors/newsapi';
import { createNewsDataAdapter } from './connectors/newsdata';
import { createScrapeAdapter } from './connectors/scrape';
import { deduplicateArticles } from './dedup';
import type { AggregationResult, FetchResult, SourceAdapter } from './types';

export class AggregationError extends Error {
  constructor(readonly code: 'AllSourcesFailed', readonly sources: SourceReport[]) {
    super(`All ${sources.length} news sources failed`);
    this.name = 'AggregationError';
  }
}

export interface AggregateOptions {
  adapters: SourceAdapter[];
  deadlineMs: number;
  maxArticles: number;
  logger?: Logger;
  signal?: AbortSignal;
}

const runAdapter = async (
  adapter: SourceAdapter,
  query: string,
  limit: number,
  signal: AbortSignal,
  logger: Logger,
): Promise<FetchResult> => {
  try {
    return await adapter.fetch(query, limit, signal);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Source adapter threw', { source: adapter.name, message });
    return failedResult(adapter.name, adapter.kind, { kind: 'network', message });
  }
};

/**
 * Fetches every adapter concurrently under one deadline. Adapters still pending when it fires are
 * aborted and reported as timeouts. Output order depends only on adapter order, never on timing:
 * API sources first, then scrape sources, each group in configured order.
 */
export const aggregate = async (query: string, options: AggregateOptions): Promise<AggregationResult> => {
  const logger = options.logger ?? createSilentLogger();
  const { adapters, deadlineMs, maxArticles } = options;
  const deadline = createDeadline(deadlineMs, options.signal);
  const settled: Array<FetchResult | undefined> = new Array(adapters.length).fill(undefined);

  const deadlineReached = new Promise<void>((resolve) => {
    if (deadline.signal.aborted) {
      resolve();
      return;
    }
    deadline.signal.addEventListener('abort', () => resolve(), { once: true });
  });

  const allSettled = Promise.all(
    adapters.map(async (adapter, index) => {
      const result = await runAdapter(adapter, query, maxArticles, deadline.signal, logger);
      if (!deadline.signal.aborted) {
        settled[index] = result;
      }
    }),
  );

  try {
    await Promise.race([allSettled, deadlineReached]);
  } finally {
    deadline.dispose();
  }

  const results = adapters.map(
    (adapter, index): FetchResult =>
      settled[index] ??
      failedResult(adapter.name, adapter.kind, {
        kind: 'timeout',
        message: `No result within the ${deadlineMs} ms deadline`,
      }),
  );

  const sources: SourceReport[] = results.map((result) => ({
    sourceName: result.sourceName,
    sourceKind: result.sourceKind,
    returned: result.articles.length,
    error: result.error ?? null,
  }));

  if (results.every((result) => result.error)) {
    logger.warn('All sources failed', { query, sources: sources.map((s) => `${s.sourceName}:${s.error?.kind}`) });
    throw new AggregationError('AllSourcesFailed', sources);
  }

  const merged = [
    ...results.filter((result) => result.sourceKind === 'api'),
    ...results.filter((result) => result.sourceKind === 'scrape'),
  ].flatMap((result) => result.articles);

  const { unique, duplicates } = deduplicateArticles(merged);
  const articles = unique.slice(0, maxArticles);

  logger.info('Aggregation complete', {
    query,
    sources: sources.length,
    failed: sources.filter((s) => s.error).length,
    merged: merged.length,
    duplicatesRemoved: duplicates.length,
    returned: articles.length,
  });

  return { articles, sources, duplicatesRemoved: duplicates.length };
};

export interface SourceCredentials {
  newsApiKey?: string;
  newsDataKey?: string;
}

export interface AdapterSelection extends CatalogSelection {
  credentials?: SourceCredentials;
}

/**
 * Adapters for one request, in merge order. Disabled sources are left out entirely.
 */
export const createSourceAdapters = (
  config: AppConfig,
  catalog: ScrapeCatalog,
  selection: AdapterSelection = {},
  logger?: Logger,
): SourceAdapter[] => {
  const adapters: SourceAdapter[] = [];
  if (config.sources.newsApi.enabled) {
    adapters.push(createNewsApiAdapter(config, { apiKey: selection.credentials?.newsApiKey, logger }));
  }
  if (config.sources.newsData.enabled) {
    adapters.push(createNewsDataAdapter(config, { apiKey: selection.credentials?.newsDataKey, logger }));
  }
  if (config.sources.scrape.enabled) {
    for (const page of selectPages(catalog, selection)) {
      adapters.push(createScrapeAdapter(page, config, { logger }));
    }
  }
  return adapters;
};
