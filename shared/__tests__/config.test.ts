import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { buildConfig } from '../../server/config/config';
import { getPublicConfig, isGenericQuery, normalizeQuery } from '../config';

describe('buildConfig', () => {
  it('applies defaults', () => {
    const config = buildConfig({});
    expect(config.environment).toBe('development');
    expect(config.server.port).toBe(5000);
    expect(config.aggregation).toMatchObject({ deadlineMs: 5000, maxArticles: 20, defaultQuery: 'latest' });
    expect(config.classification).toMatchObject({
      minTextLength: 10,
      maxTextLength: 10000,
      ruleWeight: 0.5,
      styleWeight: 0.2,
      ruleOnlyConfidenceCap: 80,
    });
    expect(config.classification.modelPath).toBe(path.resolve(process.cwd(), 'models/news-model.json'));
    expect(config.sources.newsApi.apiKey).toBeUndefined();
    expect(config.attribution.lookupEnabled).toBe(true);
  });

  it('reads overrides and ignores malformed numbers', () => {
    const config = buildConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      MAX_ARTICLES: 'many',
      NEWS_API_KEY: 'test-secret',
      SCRAPE_ENABLED: 'no',
      SOURCE_LOOKUP_ENABLED: 'false',
      LOG_LEVEL: 'WARN',
    });
    expect(config.environment).toBe('production');
    expect(config.server.port).toBe(8080);
    expect(config.aggregation.maxArticles).toBe(20);
    expect(config.sources.newsApi.apiKey).toBe('test-secret');
    expect(config.sources.scrape.enabled).toBe(false);
    expect(config.attribution.lookupEnabled).toBe(false);
    expect(config.observability.logLevel).toBe('warn');
  });

  it('rejects values outside their bounds', () => {
    expect(() => buildConfig({ RULE_ONLY_CONFIDENCE_CAP: '120' })).toThrow();
  });
});

describe('getPublicConfig', () => {
  it('reports an API source as available only with a key', () => {
    expect(getPublicConfig(buildConfig({ NEWSDATA_API_KEY: 'test-secret' })).sources).toEqual({
      newsApi: false,
      newsData: true,
      scrape: true,
    });
  });

  it('leaves secrets out', () => {
    const serialized = JSON.stringify(getPublicConfig(buildConfig({ NEWS_API_KEY: 'test-secret' })));
    expect(serialized.includes('test-secret')).toBe(false);
  });
});

describe('normalizeQuery', () => {
  it('trims, collapses and lower-cases', () => {
    expect(normalizeQuery('  Monsoon \t Session ')).toBe('monsoon session');
  });

  it('falls back for empty input', () => {
    expect(normalizeQuery(undefined)).toBe('latest');
    expect(normalizeQuery('   ', 'india')).toBe('india');
  });
});

describe('isGenericQuery', () => {
  it('recognizes placeholder queries', () => {
    expect(isGenericQuery('Latest')).toBe(true);
    expect(isGenericQuery(' news ')).toBe(true);
    expect(isGenericQuery('')).toBe(true);
    expect(isGenericQuery('monsoon')).toBe(false);
  });
});
