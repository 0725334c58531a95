import { describe, expect, it, vi } from 'vitest';
import { testContext } from '../../__tests__/fixtures';
import { analyzeText } from '../analyze';

const stubFetch = () => {
  const fetchMock = vi.fn(
    async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> =>
      new Response(JSON.stringify({ status: 'ok', articles: [] }), { status: 200 }),
  );
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
};

describe('analyzeText', () => {
  it('returns the explained verdict with the source named in the text', async () => {
    const result = await analyzeText(
      '  India and EU sign trade agreement worth $100 billion, see https://example.com/trade ',
      {},
      testContext(),
    );
    expect(result).toMatchObject({
      label: 'Real',
      regime: 'model',
      signals: [{ check: 'quantitative', weight: 0.25, detail: 'specific quantity' }],
      source: { label: 'https://example.com/trade', url: 'https://example.com/trade', method: 'text' },
    });
    expect(result.reason).toContain('Signals: specific figures (specific quantity).');
  });

  it('does not look up a source for rejected text', async () => {
    const fetchMock = stubFetch();
    await expect(analyzeText('too short', {}, testContext({ env: { NEWS_API_KEY: 'test-secret' } }))).rejects.toMatchObject({
      code: 'TooShort',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('does not look up a source when the model is missing', async () => {
    const fetchMock = stubFetch();
    const context = testContext({ bundle: null, env: { NEWS_API_KEY: 'test-secret' } });
    await expect(analyzeText('Parliament passes the annual budget bill', {}, context)).rejects.toMatchObject({
      code: 'ScorerUnavailable',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
