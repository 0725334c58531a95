import type { AppConfig } from '../../shared/config';
import type { ExplainedVerdict, FetchAndClassifyResult } from '../../shared/types';
import { ResponseCache } from '../cache/responseCache';
import { loadModelBundle, type ModelBundle } from '../classification/model';
import { createRuleEngine, loadLexicon, type Lexicon, type RuleEngine } from '../classification/rules';
import { createFeatureScorer, type FeatureScorer } from '../classification/scorer';
import type { Logger } from '../obs/logger';
import { createSilentLogger } from '../obs/logger';
import { loadScrapeCatalog, type ScrapeCatalog } from '../retrieval/catalog';

/**
 * Everything the public operations share for the life of the process. The scorer is null when the
 * model bundle could not be loaded.
 */
export interface PipelineContext {
  config: AppConfig;
  scorer: FeatureScorer | null;
  rules: RuleEngine;
  catalog: ScrapeCatalog;
  classifyCache: ResponseCache<ExplainedVerdict>;
  fetchCache: ResponseCache<FetchAndClassifyResult>;
  logger: Logger;
}

export interface PipelineResources {
  bundle: ModelBundle | null;
  lexicon: Lexicon;
  catalog: ScrapeCatalog;
  logger?: Logger;
}

export const createPipelineContext = (config: AppConfig, resources: PipelineResources): PipelineContext => {
  const logger = resources.logger ?? createSilentLogger();
  const cacheOptions = {
    ttlMs: config.cache.ttlMs,
    maxEntries: config.cache.maxEntries,
    logger: logger.child({ component: 'cache' }),
  };
  return {
    config,
    scorer: resources.bundle ? createFeatureScorer(resources.bundle, config.classification) : null,
    rules: createRuleEngine(resources.lexicon),
    catalog: resources.catalog,
    classifyCache: new ResponseCache<ExplainedVerdict>(cacheOptions),
    fetchCache: new ResponseCache<FetchAndClassifyResult>(cacheOptions),
    logger,
  };
};

/**
 * Loads the data files named in the configuration. A model that fails to load leaves the scorer
 * unavailable; a missing lexicon or catalog is fatal.
 */
export const loadPipelineContext = async (config: AppConfig, logger: Logger): Promise<PipelineContext> => {
  let bundle: ModelBundle | null = null;
  try {
    bundle = await loadModelBundle(config.classification.modelPath);
    logger.info('Model bundle loaded', {
      path: config.classification.modelPath,
      headlineModel: Boolean(bundle.headline),
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Model bundle unavailable; classification requests will be rejected', { message });
  }

  const [lexicon, catalog] = await Promise.all([
    loadLexicon(config.classification.lexiconPath),
    loadScrapeCatalog(config.sources.scrape.catalogPath),
  ]);
  logger.info('Lexicon and source catalog loaded', { scrapePages: catalog.pages.length });

  return createPipelineContext(config, { bundle, lexicon, catalog, logger });
};
