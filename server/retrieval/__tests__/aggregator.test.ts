import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadTestCatalog, stubAdapter, testConfig } from '../../__tests__/fixtures';
import { AggregationError, aggregate, createSourceAdapters } from '../aggregator';

const options = { deadlineMs: 5_000, maxArticles: 20 };

describe('aggregate', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the healthy source when two of three fail', async () => {
    const result = await aggregate('latest', {
      ...options,
      adapters: [
        stubAdapter('newsapi', 'api', { error: 'unauthorized' }),
        stubAdapter('newsdata', 'api', { error: 'rate-limited' }),
        stubAdapter('ndtv-india', 'scrape', { texts: ['Parliament passes the new data protection bill'] }),
      ],
    });
    expect(result.articles.map((article) => article.text)).toEqual(['Parliament passes the new data protection bill']);
    expect(result.sources.map((source) => [source.sourceName, source.returned, source.error?.kind ?? null])).toEqual([
      ['newsapi', 0, 'unauthorized'],
      ['newsdata', 0, 'rate-limited'],
      ['ndtv-india', 1, null],
    ]);
  });

  it('throws when every source fails', async () => {
    const run = aggregate('latest', {
      ...options,
      adapters: [
        stubAdapter('newsapi', 'api', { error: 'network' }),
        stubAdapter('ndtv-india', 'scrape', { error: 'timeout' }),
      ],
    });
    await expect(run).rejects.toBeInstanceOf(AggregationError);
  });

  it('succeeds with an empty list when healthy sources have nothing', async () => {
    const result = await aggregate('latest', {
      ...options,
      adapters: [stubAdapter('ndtv-india', 'scrape', { texts: [] })],
    });
    expect(result.articles).toEqual([]);
  });

  it('orders API sources before scrape sources regardless of completion order', async () => {
    vi.useFakeTimers();
    const run = aggregate('latest', {
      ...options,
      adapters: [
        stubAdapter('bbc-world', 'scrape', { texts: ['Scraped headline about the summit talks'] }),
        stubAdapter('newsdata', 'api', { texts: ['NewsData story about the summit talks'], delayMs: 200 }),
        stubAdapter('newsapi', 'api', { texts: ['NewsAPI story about the summit talks'], delayMs: 100 }),
      ],
    });
    await vi.advanceTimersByTimeAsync(200);
    const result = await run;
    expect(result.articles.map((article) => article.sourceName)).toEqual(['newsdata', 'newsapi', 'bbc-world']);
  });

  it('records sources still pending at the deadline as timeouts', async () => {
    vi.useFakeTimers();
    const run = aggregate('latest', {
      ...options,
      deadlineMs: 1_000,
      adapters: [
        stubAdapter('newsapi', 'api', { texts: ['Budget session begins with opposition walkout'] }),
        stubAdapter('reuters-world', 'scrape', { hang: true }),
      ],
    });
    await vi.advanceTimersByTimeAsync(1_000);
    const result = await run;
    expect(result.articles).toHaveLength(1);
    expect(result.sources[1]).toMatchObject({ sourceName: 'reuters-world', returned: 0, error: { kind: 'timeout' } });
  });

  it('deduplicates across sources and then truncates', async () => {
    const result = await aggregate('latest', {
      ...options,
      maxArticles: 2,
      adapters: [
        stubAdapter('newsapi', 'api', { texts: ['Rupee gains against the dollar', 'Rail fares revised from April'] }),
        stubAdapter('ndtv-india', 'scrape', { texts: ['rupee gains against the  dollar', 'Heatwave alert for Gujarat'] }),
      ],
    });
    expect(result.duplicatesRemoved).toBe(1);
    expect(result.articles.map((article) => article.text)).toEqual([
      'Rupee gains against the dollar',
      'Rail fares revised from April',
    ]);
  });
});

describe('createSourceAdapters', () => {
  const catalog = loadTestCatalog();
  const names = (env: Record<string, string>, region?: 'international') =>
    createSourceAdapters(testConfig(env), catalog, { region }).map((adapter) => adapter.name);

  it('builds no adapter for a disabled source', () => {
    expect(names({ NEWSDATA_ENABLED: 'false' }, 'international')).toEqual([
      'newsapi',
      'bbc-world',
      'reuters-world',
      'aljazeera-news',
    ]);
    expect(names({ SCRAPE_ENABLED: 'false' })).toEqual(['newsapi', 'newsdata']);
    expect(names({ NEWS_API_ENABLED: 'false', NEWSDATA_ENABLED: 'false', SCRAPE_ENABLED: 'false' })).toEqual([]);
  });
});
