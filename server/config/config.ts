import path from 'node:path';
import { ConfigSchema, type AppConfig, type PublicConfig, getPublicConfig as getPublicConfigShared } from '../../shared/config';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

const pathFromEnv = (value: string | undefined, fallback: string): string =>
  path.resolve(value?.trim() || path.join(process.cwd(), fallback));

export type { AppConfig, PublicConfig };

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 5000),
      heartbeatIntervalMs: numberFromEnv(env.HEARTBEAT_INTERVAL_MS, 15_000),
    },
    aggregation: {
      deadlineMs: numberFromEnv(env.AGGREGATE_DEADLINE_MS, 5_000),
      sourceTimeoutMs: numberFromEnv(env.SOURCE_TIMEOUT_MS, 4_000),
      maxArticles: numberFromEnv(env.MAX_ARTICLES, 20),
      defaultQuery: env.DEFAULT_QUERY?.trim() || 'latest',
      userAgent:
        env.RETRIEVAL_USER_AGENT?.trim() ||
        // Several publishers answer 403 to non-browser agents
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36',
    },
    sources: {
      newsApi: {
        apiKey: env.NEWS_API_KEY || env.NEWSAPI_KEY || undefined,
        enabled: booleanFromEnv(env.NEWS_API_ENABLED, true),
        pageSize: numberFromEnv(env.NEWSAPI_PAGE_SIZE, 15),
        fallbackQuery: env.NEWSAPI_FALLBACK_QUERY?.trim() || 'India',
      },
      newsData: {
        apiKey: env.NEWSDATA_API_KEY || env.NEWSDATA_KEY || undefined,
        enabled: booleanFromEnv(env.NEWSDATA_ENABLED, true),
        country: env.NEWSDATA_COUNTRY?.trim() || 'in',
        fallbackQuery: env.NEWSDATA_FALLBACK_QUERY?.trim() || 'India',
      },
      scrape: {
        enabled: booleanFromEnv(env.SCRAPE_ENABLED, true),
        catalogPath: pathFromEnv(env.SCRAPE_CATALOG_PATH, 'data/scrape-sources.json'),
        perPageLimit: numberFromEnv(env.SCRAPE_PER_PAGE_LIMIT, 5),
      },
    },
    classification: {
      modelPath: pathFromEnv(env.MODEL_PATH, 'models/news-model.json'),
      lexiconPath: pathFromEnv(env.LEXICON_PATH, 'data/lexicon.json5'),
      minTextLength: numberFromEnv(env.MIN_TEXT_LENGTH, 10),
      maxTextLength: numberFromEnv(env.MAX_TEXT_LENGTH, 10_000),
      headlineMaxChars: numberFromEnv(env.HEADLINE_MAX_CHARS, 300),
      ruleWeight: numberFromEnv(env.RULE_WEIGHT, 0.5),
      styleWeight: numberFromEnv(env.STYLE_WEIGHT, 0.2),
      ruleOnlyConfidenceCap: numberFromEnv(env.RULE_ONLY_CONFIDENCE_CAP, 80),
    },
    attribution: {
      lookupEnabled: booleanFromEnv(env.SOURCE_LOOKUP_ENABLED, true),
    },
    cache: {
      ttlMs: numberFromEnv(env.CACHE_TTL_MS, 5 * 60 * 1000),
      maxEntries: numberFromEnv(env.CACHE_MAX_ENTRIES, 1000),
    },
    observability: {
      logLevel: (env.LOG_LEVEL || 'info').trim().toLowerCase(),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (env?: NodeJS.ProcessEnv): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig(env);
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);
