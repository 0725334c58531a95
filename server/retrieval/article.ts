import { contentId } from '../../shared/crypto';
import type { Article, SourceError, SourceKind } from '../../shared/types';
import { detectLanguage } from '../classification/language';
import type { FetchResult } from './types';

export interface ArticleOrigin {
  url?: string | null;
  publisher?: string | null;
}

export const createArticle = (
  text: string,
  sourceName: string,
  sourceKind: SourceKind,
  fetchedAt: string = new Date().toISOString(),
  origin: ArticleOrigin = {},
): Article =>
  Object.freeze({
    id: contentId(text),
    text,
    sourceName,
    sourceKind,
    fetchedAt,
    detectedLanguage: detectLanguage(text),
    ...(origin.url ? { url: origin.url } : {}),
    ...(origin.publisher ? { publisher: origin.publisher } : {}),
  });

export const failedResult = (sourceName: string, sourceKind: SourceKind, error: SourceError): FetchResult => ({
  sourceName,
  sourceKind,
  articles: [],
  error,
});
