import { z } from 'zod';

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
    heartbeatIntervalMs: z.number().int().positive(),
  }),
  aggregation: z.object({
    deadlineMs: z.number().int().positive(),
    sourceTimeoutMs: z.number().int().positive(),
    maxArticles: z.number().int().positive(),
    defaultQuery: z.string().min(1),
    userAgent: z.string().min(1),
  }),
  sources: z.object({
    newsApi: z.object({
      apiKey: z.string().optional(),
      enabled: z.boolean(),
      pageSize: z.number().int().positive().max(100),
      fallbackQuery: z.string().min(1),
    }),
    newsData: z.object({
      apiKey: z.string().optional(),
      enabled: z.boolean(),
      country: z.string().min(2),
      fallbackQuery: z.string().min(1),
    }),
    scrape: z.object({
      enabled: z.boolean(),
      catalogPath: z.string().min(1),
      perPageLimit: z.number().int().positive(),
    }),
  }),
  classification: z.object({
    modelPath: z.string().min(1),
    lexiconPath: z.string().min(1),
    minTextLength: z.number().int().positive(),
    maxTextLength: z.number().int().positive(),
    headlineMaxChars: z.number().int().positive(),
    ruleWeight: z.number().min(0).max(2),
    styleWeight: z.number().min(0).max(2),
    ruleOnlyConfidenceCap: z.number().min(50).max(100),
  }),
  attribution: z.object({
    lookupEnabled: z.boolean(),
  }),
  cache: z.object({
    ttlMs: z.number().int().nonnegative(),
    maxEntries: z.number().int().positive(),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface PublicConfig {
  aggregation: {
    deadlineMs: number;
    sourceTimeoutMs: number;
    maxArticles: number;
  };
  sources: {
    newsApi: boolean;
    newsData: boolean;
    scrape: boolean;
  };
  classification: {
    minTextLength: number;
    maxTextLength: number;
  };
  cacheTtlMs: number;
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  aggregation: {
    deadlineMs: config.aggregation.deadlineMs,
    sourceTimeoutMs: config.aggregation.sourceTimeoutMs,
    maxArticles: config.aggregation.maxArticles,
  },
  sources: {
    newsApi: config.sources.newsApi.enabled && Boolean(config.sources.newsApi.apiKey),
    newsData: config.sources.newsData.enabled && Boolean(config.sources.newsData.apiKey),
    scrape: config.sources.scrape.enabled,
  },
  classification: {
    minTextLength: config.classification.minTextLength,
    maxTextLength: config.classification.maxTextLength,
  },
  cacheTtlMs: config.cache.ttlMs,
});

const GENERIC_QUERIES = new Set(['latest', 'news', '']);

export const normalizeQuery = (value: string | null | undefined, fallback = 'latest'): string => {
  const normalized = String(value ?? '')
    .normalize('NFKC')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
  return normalized || fallback;
};

export const isGenericQuery = (value: string): boolean => GENERIC_QUERIES.has(normalizeQuery(value, ''));
