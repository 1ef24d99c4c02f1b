import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { ServerConfig } from './config';
import { fetchHtml as defaultFetchHtml, type FetchHtml } from './fetchService';
import type { Logger } from './utils/logger';
import { createDesignSpecsRouter } from './routes/design-specs';
import { errorMessage } from './errors';

export type AppDeps = {
  logger: Logger;
  fetchHtml?: FetchHtml;
};

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export function createApp(config: ServerConfig, deps: AppDeps): express.Express {
  const { logger } = deps;
  const app = express();

  const corsOptions: cors.CorsOptions = {
    origin: config.corsOrigins === '*' ? true : config.corsOrigins,
    credentials: false,
  };
  app.use(cors(corsOptions));

  // Ahead of the body parser so its 4xx answers carry a request id too
  app.use((req, res, next) => {
    const rid = Math.random().toString(36).slice(2, 8);
    res.locals.rid = rid;
    res.setHeader('X-Request-Id', rid);
    logger.debug('request', { rid, method: req.method, path: req.path });
    next();
  });

  app.use(express.json({ limit: config.bodyLimit }));

  app.get('/health', (_req, res) => {
    res.status(200).send('ok');
  });

  app.use(createDesignSpecsRouter(config, { logger, fetchHtml: deps.fetchHtml || defaultFetchHtml }));

  // Body parser failures (malformed JSON, payload too large) carry their own 4xx status
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    logger.error('request failed', { rid: res.locals.rid, status, error: errorMessage(err) });
    res.status(status).json({ error: errorMessage(err) });
  });

  return app;
}
