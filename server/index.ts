import 'dotenv/config';
import { loadConfig } from './config/config';
import { createApp } from './http/app';
import { createLogger } from './obs/logger';
import { loadPipelineContext } from './pipeline/context';

const config = loadConfig();
const logger = createLogger(config);
logger.info('Config loaded', {
  environment: config.environment,
  sources: {
    newsApi: {
      enabled: config.sources.newsApi.enabled,
      hasApiKey: Boolean(config.sources.newsApi.apiKey),
    },
    newsData: {
      enabled: config.sources.newsData.enabled,
      hasApiKey: Boolean(config.sources.newsData.apiKey),
    },
    scrape: { enabled: config.sources.scrape.enabled },
  },
});

const start = async () => {
  const context = await loadPipelineContext(config, logger);
  const app = createApp(context);
  const port = config.server.port;
  app.listen(port, () => {
    logger.info('Server listening', { url: `http://localhost:${port}`, modelLoaded: context.scorer !== null });
  });
};

start().catch((error: unknown) => {
  logger.error('Server failed to start', { error: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
});
