import cors from 'cors';
import express from 'express';
import type { Express, Request, Response } from 'express';
import type { ApiHealthResponse } from '../../shared/types';
import { getPublicConfig } from '../config/config';
import { analyzeText } from '../pipeline/analyze';
import type { PipelineContext } from '../pipeline/context';
import { fetchAndClassify } from '../pipeline/fetchAndClassify';
import { handleFetchAndClassifyStream } from '../pipeline/fetchAndClassifyStream';
import { credentialsFromHeaders, localizeVerdict, parseFetchParams, toHttpError } from './handlers';
import { createSseStream } from './sse';

export const createApp = (context: PipelineContext): Express => {
  const { config, logger } = context;
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
      let finished = false;
      res.on('finish', () => {
        finished = true;
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      res.on('close', () => {
        if (finished) return;
        logger.debug('HTTP closed early', {
          method: req.method,
          path: req.originalUrl,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  const sendError = (res: Response, error: unknown, route: string) => {
    const httpError = toHttpError(error);
    if (httpError.status >= 500 && httpError.body.code === 'Internal') {
      logger.error('Request failed', { route, error: error instanceof Error ? error.message : String(error) });
    }
    res.status(httpError.status).json(httpError.body);
  };

  app.get('/api/healthz', (_req: Request, res: Response) => {
    const body: ApiHealthResponse = {
      ok: true,
      modelLoaded: context.scorer !== null,
      ts: new Date().toISOString(),
    };
    res.json(body);
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  app.post('/api/classify', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const text = typeof body === 'object' && body !== null && 'text' in body ? body.text : undefined;
    try {
      const credentials = credentialsFromHeaders((name) => req.get(name));
      const result = await analyzeText(text, { credentials }, context);
      res.json(localizeVerdict(result));
    } catch (error) {
      sendError(res, error, 'classify');
    }
  });

  app.get('/api/fetch-news', async (req: Request, res: Response) => {
    const params = parseFetchParams(req.query);
    try {
      const result = await fetchAndClassify(params.query, {
        region: params.region,
        language: params.language,
        credentials: credentialsFromHeaders((name) => req.get(name)),
      }, context);
      res.json({ ...result, verdicts: result.verdicts.map(localizeVerdict) });
    } catch (error) {
      sendError(res, error, 'fetch-news');
    }
  });

  app.get('/api/fetch-news-stream', async (req: Request, res: Response) => {
    const params = parseFetchParams(req.query);
    const stream = createSseStream(
      res,
      {
        heartbeatMs: config.server.heartbeatIntervalMs,
        onClose: () => logger.debug('Fetch stream closed', { query: params.query ?? null }),
      },
      logger,
    );
    await handleFetchAndClassifyStream({
      query: params.query,
      options: {
        region: params.region,
        language: params.language,
        credentials: credentialsFromHeaders((name) => req.get(name)),
      },
      context,
      stream,
    });
  });

  return app;
};
