import type { Article, SourceError, SourceKind, SourceReport } from '../../shared/types';

export interface FetchResult {
  sourceName: string;
  sourceKind: SourceKind;
  /** Empty whenever `error` is set. */
  articles: Article[];
  error?: SourceError;
}

/**
 * One upstream news source. Expected failures come back as `error`, never as a rejection.
 */
export interface SourceAdapter {
  readonly name: string;
  readonly kind: SourceKind;
  fetch: (query: string, limit: number, signal?: AbortSignal) => Promise<FetchResult>;
}

export interface AggregationResult {
  articles: Article[];
  sources: SourceReport[];
  duplicatesRemoved: number;
}
