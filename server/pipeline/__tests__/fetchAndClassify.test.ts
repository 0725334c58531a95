import { describe, expect, it, vi } from 'vitest';
import { testContext } from '../../__tests__/fixtures';
import { fetchAndClassify, fetchCacheKey } from '../fetchAndClassify';

const NEWSAPI_ONLY = { NEWS_API_KEY: 'test-secret', NEWSDATA_ENABLED: 'false', SCRAPE_ENABLED: 'false' };

const STORY_TEXT =
  'The Hindu: Monsoon session of Parliament to begin next week. The session will run for three weeks with 20 sittings planned';

const stubNewsApi = () => {
  const fetchMock = vi.fn(
    async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> =>
      new Response(
        JSON.stringify({
          status: 'ok',
          articles: [
            {
              source: { name: 'The Hindu' },
              title: 'Monsoon session of Parliament to begin next week',
              description: 'The session will run for three weeks with 20 sittings planned',
            },
          ],
        }),
        { status: 200 },
      ),
  );
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
};

describe('fetchAndClassify', () => {
  it('pairs every fetched article with a verdict', async () => {
    stubNewsApi();
    const result = await fetchAndClassify('  LATEST ', {}, testContext({ env: NEWSAPI_ONLY }));

    expect(result.query).toBe('latest');
    expect(result.articles).toEqual([STORY_TEXT]);
    expect(result.verdicts).toHaveLength(1);
    expect(result.verdicts[0].regime).toBe('model');
    expect(result.sources).toEqual([{ sourceName: 'newsapi', sourceKind: 'api', returned: 1, error: null }]);
  });

  it('treats an empty query as the default one', async () => {
    stubNewsApi();
    const result = await fetchAndClassify(undefined, {}, testContext({ env: NEWSAPI_ONLY }));
    expect(result.query).toBe('latest');
  });

  it('serves repeated queries from the cache', async () => {
    const fetchMock = stubNewsApi();
    const context = testContext({ env: NEWSAPI_ONLY });
    const first = await fetchAndClassify('monsoon', {}, context);
    const second = await fetchAndClassify('Monsoon', {}, context);
    expect(second).toEqual(first);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('bypasses the cache for per-request credentials', async () => {
    const fetchMock = stubNewsApi();
    const context = testContext({ env: NEWSAPI_ONLY });
    const options = { credentials: { newsApiKey: 'request-secret' } };
    await fetchAndClassify('monsoon', options, context);
    await fetchAndClassify('monsoon', options, context);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(context.fetchCache.size).toBe(0);
  });

  it('classifies with rules only when the model is missing', async () => {
    stubNewsApi();
    const result = await fetchAndClassify('monsoon', {}, testContext({ env: NEWSAPI_ONLY, bundle: null }));
    expect(result.verdicts.map((verdict) => verdict.regime)).toEqual(['rules-only']);
  });

  it('reports NoResults when every source fails', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response(JSON.stringify({ status: 'ok', articles: [] }), { status: 200 })),
    );
    await expect(fetchAndClassify('monsoon', {}, testContext({ env: NEWSAPI_ONLY }))).rejects.toMatchObject({
      code: 'NoResults',
    });
  });

  it('reports NoResults when no source is enabled', async () => {
    const context = testContext({
      env: { NEWS_API_ENABLED: 'false', NEWSDATA_ENABLED: 'false', SCRAPE_ENABLED: 'false' },
    });
    await expect(fetchAndClassify('monsoon', {}, context)).rejects.toMatchObject({ code: 'NoResults' });
  });
});

describe('fetchCacheKey', () => {
  it('separates regions and languages', () => {
    expect(fetchCacheKey(' Monsoon ', {})).toBe('fetch:monsoon||en');
    expect(fetchCacheKey('monsoon', { region: 'gujarat', language: 'gu' })).toBe('fetch:monsoon|gujarat|gu');
  });
});
