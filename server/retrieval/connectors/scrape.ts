import { JSDOM, VirtualConsole } from 'jsdom';
import type { AppConfig } from '../../../shared/config';
import type { SourceError } from '../../../shared/types';
import type { Logger } from '../../obs/logger';
import { createSilentLogger } from '../../obs/logger';
import { createArticle, failedResult } from '../article';
import type { ScrapePage } from '../catalog';
import type { FetchResult, SourceAdapter } from '../types';
import { requestUpstream } from './http';

const MIN_HEADLINE_CHARS = 20;
const MAX_HEADLINE_CHARS = 500;

const collapse = (value: string): string => value.replace(/\s+/g, ' ').trim();

/**
 * Headline texts matched by `selector`, or null when the markup cannot be queried at all.
 */
export const extractHeadlines = (html: string, url: string, selector: string): string[] | null => {
  let dom: JSDOM;
  try {
    dom = new JSDOM(html, { url, virtualConsole: new VirtualConsole() });
  } catch {
    return null;
  }
  try {
    const nodes = Array.from(dom.window.document.querySelectorAll(selector));
    return nodes
      .map((node) => collapse(node.textContent ?? ''))
      .filter((text) => text.length > MIN_HEADLINE_CHARS && text.length < MAX_HEADLINE_CHARS);
  } catch {
    // Invalid selector.
    return null;
  } finally {
    dom.window.close();
  }
};

const scrapeStatusError = (status: number): SourceError =>
  status === 429
    ? { kind: 'rate-limited', message: 'Page rate limit reached', status }
    : { kind: 'network', message: `Page responded ${status}`, status };

export interface ScrapeAdapterOptions {
  logger?: Logger;
}

export const createScrapeAdapter = (
  page: ScrapePage,
  config: AppConfig,
  options: ScrapeAdapterOptions = {},
): SourceAdapter => {
  const logger = options.logger ?? createSilentLogger();

  const fetchArticles = async (_query: string, limit: number, signal?: AbortSignal): Promise<FetchResult> => {
    const upstream = await requestUpstream(page.url, {
      timeoutMs: config.aggregation.sourceTimeoutMs,
      signal,
      headers: {
        'User-Agent': config.aggregation.userAgent,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5',
      },
    });
    if (!upstream.ok) {
      logger.warn('Page fetch failed', { source: page.name, kind: upstream.error.kind, message: upstream.error.message });
      return failedResult(page.name, 'scrape', upstream.error);
    }
    if (upstream.status >= 400) {
      const error = scrapeStatusError(upstream.status);
      logger.warn('Page fetch failed', { source: page.name, kind: error.kind, status: upstream.status });
      return failedResult(page.name, 'scrape', error);
    }

    const headlines = extractHeadlines(upstream.body, page.url, page.selector);
    if (!headlines || headlines.length === 0) {
      logger.warn('No headlines matched; page markup may have changed', {
        source: page.name,
        selector: page.selector,
        parsed: headlines !== null,
      });
      return { sourceName: page.name, sourceKind: 'scrape', articles: [] };
    }

    const fetchedAt = new Date().toISOString();
    const cap = Math.min(limit, config.sources.scrape.perPageLimit);
    const articles = headlines
      .slice(0, cap)
      .map((text) => createArticle(text, page.name, 'scrape', fetchedAt, { url: page.url, publisher: page.label }));
    logger.debug('Scraped headlines', { source: page.name, count: articles.length });
    return { sourceName: page.name, sourceKind: 'scrape', articles };
  };

  return { name: page.name, kind: 'scrape', fetch: fetchArticles };
};
