import fs from 'node:fs';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import type { SourceErrorKind, SourceKind } from '../../shared/types';
import { buildModelBundle, type ModelBundle } from '../classification/model';
import { parseLexicon, type Lexicon } from '../classification/rules';
import { buildConfig } from '../config/config';
import { createPipelineContext, type PipelineContext } from '../pipeline/context';
import { createArticle, failedResult } from '../retrieval/article';
import { ScrapeCatalogSchema, type ScrapeCatalog } from '../retrieval/catalog';
import type { FetchResult, SourceAdapter } from '../retrieval/types';

export const testConfig = (env: Record<string, string> = {}): AppConfig =>
  buildConfig({ NODE_ENV: 'test', LOG_LEVEL: 'error', ...env });

export const loadTestLexicon = (): Lexicon =>
  parseLexicon(fs.readFileSync(path.resolve(process.cwd(), 'data/lexicon.json5'), 'utf-8'));

export const loadTestCatalog = (): ScrapeCatalog =>
  ScrapeCatalogSchema.parse(
    JSON.parse(fs.readFileSync(path.resolve(process.cwd(), 'data/scrape-sources.json'), 'utf-8')),
  );

/** A bundle whose article model returns `probability` for every input. */
export const constantBundle = (probability: number): ModelBundle =>
  buildModelBundle({
    format: 'tfidf-logistic',
    version: 1,
    article: {
      vocabulary: { placeholder: 0 },
      idf: [1],
      coefficients: [0],
      intercept: Math.log(probability / (1 - probability)),
      ngramRange: [1, 1],
      sublinearTf: false,
    },
  });

export const testContext = (
  options: { bundle?: ModelBundle | null; env?: Record<string, string>; catalog?: ScrapeCatalog } = {},
): PipelineContext =>
  createPipelineContext(testConfig(options.env), {
    bundle: options.bundle === undefined ? constantBundle(0.5) : options.bundle,
    lexicon: loadTestLexicon(),
    catalog: options.catalog ?? { pages: [] },
  });

export const articlesFrom = (sourceName: string, kind: SourceKind, texts: string[]): FetchResult => ({
  sourceName,
  sourceKind: kind,
  articles: texts.map((text) => createArticle(text, sourceName, kind, '2026-01-01T00:00:00.000Z')),
});

export const stubAdapter = (
  name: string,
  kind: SourceKind,
  behaviour: { texts?: string[]; error?: SourceErrorKind; delayMs?: number; hang?: boolean },
): SourceAdapter => ({
  name,
  kind,
  fetch: (_query, _limit, signal) =>
    new Promise<FetchResult>((resolve) => {
      const result = behaviour.error
        ? failedResult(name, kind, { kind: behaviour.error, message: `${name} failed` })
        : articlesFrom(name, kind, behaviour.texts ?? []);
      if (behaviour.hang) {
        signal?.addEventListener('abort', () =>
          resolve(failedResult(name, kind, { kind: 'timeout', message: 'aborted' })),
        );
        return;
      }
      if (behaviour.delayMs) {
        setTimeout(() => resolve(result), behaviour.delayMs);
        return;
      }
      resolve(result);
    }),
});
