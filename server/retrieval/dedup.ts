import type { Article } from '../../shared/types';

export interface DeduplicationResult {
  unique: Article[];
  duplicates: {
    article: Article;
    duplicateOf: string;
  }[];
}

/**
 * Keeps the first article per content id, preserving input order. Running it on its own
 * `unique` output returns that list unchanged.
 */
export const deduplicateArticles = (articles: readonly Article[]): DeduplicationResult => {
  const unique: Article[] = [];
  const duplicates: DeduplicationResult['duplicates'] = [];
  const byId = new Map<string, Article>();

  for (const article of articles) {
    const first = byId.get(article.id);
    if (first) {
      duplicates.push({ article, duplicateOf: first.sourceName });
      continue;
    }
    byId.set(article.id, article);
    unique.push(article);
  }

  return { unique, duplicates };
};
