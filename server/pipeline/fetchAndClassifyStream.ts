import { randomId } from '../../shared/crypto';
import { normalizeQuery } from '../../shared/config';
import type { SseStream } from '../../shared/sse';
import type { FetchAndClassifyResult } from '../../shared/types';
import type { PipelineContext } from './context';
import { isClassificationError } from './errors';
import { classifyArticles, fetchCacheKey, gatherArticles, type FetchOptions } from './fetchAndClassify';
import { makeStageEmitter } from './stageEmitter';

export interface FetchAndClassifyStreamArgs {
  query: string | null | undefined;
  options: FetchOptions;
  context: PipelineContext;
  stream: SseStream;
}

export const handleFetchAndClassifyStream = async ({
  query: rawQuery,
  options,
  context,
  stream,
}: FetchAndClassifyStreamArgs): Promise<void> => {
  const runId = randomId();
  const query = normalizeQuery(rawQuery);
  const { logger } = context;
  const sender = stream.send;
  const aggregationStage = makeStageEmitter(runId, 'aggregation', sender);
  const classificationStage = makeStageEmitter(runId, 'classification', sender);
  let currentStage = aggregationStage;

  try {
    const cacheable = !options.credentials?.newsApiKey && !options.credentials?.newsDataKey;
    const cacheKey = fetchCacheKey(query, options);
    const cached = cacheable ? context.fetchCache.get(cacheKey) : undefined;
    if (cached) {
      aggregationStage.success(`Served ${cached.articles.length} cached articles`, { sources: cached.sources });
      classificationStage.success('Served cached verdicts');
      stream.sendJson('fetch-result', { runId, ...cached });
      stream.close();
      return;
    }

    aggregationStage.start(`Fetching news for "${query}"`);
    const aggregation = await gatherArticles(query, { ...options, signal: stream.controller.signal }, context);
    aggregationStage.success(`Collected ${aggregation.articles.length} articles`, {
      sources: aggregation.sources,
      duplicatesRemoved: aggregation.duplicatesRemoved,
    });
    if (aggregation.articles.length === 0) {
      aggregationStage.failure(new Error(`No articles found for "${query}"`));
      stream.sendJson('fatal', { error: `No articles found for "${query}"`, code: 'NoResults' });
      stream.close();
      return;
    }

    currentStage = classificationStage;
    classificationStage.start(`Classifying ${aggregation.articles.length} articles`);
    const verdicts = classifyArticles(aggregation.articles, context);
    const fakeCount = verdicts.filter((verdict) => verdict.label === 'Fake').length;
    classificationStage.success(`${fakeCount} of ${verdicts.length} flagged as fake`);

    const result: FetchAndClassifyResult = {
      query,
      articles: aggregation.articles.map((article) => article.text),
      verdicts,
      sources: aggregation.sources,
    };
    if (cacheable) {
      context.fetchCache.put(cacheKey, result);
    }
    stream.sendJson('fetch-result', { runId, ...result });
    stream.close();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const code = isClassificationError(error) ? error.code : 'Internal';
    if (code === 'Internal') {
      logger.error('Fetch stream failed', { runId, error: message });
    } else {
      logger.warn('Fetch stream ended without results', { runId, code });
    }
    currentStage.failure(error);
    stream.sendJson('fatal', { error: code === 'Internal' ? 'Internal error' : message, code });
    stream.close();
  }
};
