/**
 * POST /getDesignSpecs: HTML (inline or fetched from a URL) in, design node tree out.
 */

import { Router, type Request, type Response } from 'express';
import { parseHtml, toDesignJson, type DesignNodeJson } from 'design-spec-pipeline';
import type { ServerConfig } from '../config';
import type { FetchHtml } from '../fetchService';
import type { Logger } from '../utils/logger';
import { DesignSpecError, RequestError, errorMessage } from '../errors';
import { writeDesignSpecs } from '../outputService';

export type DesignSpecsDeps = {
  logger: Logger;
  fetchHtml: FetchHtml;
};

type SpecsRequest = { source: 'url'; url: string } | { source: 'html'; html: string };

function readSpecsRequest(body: unknown): SpecsRequest {
  const payload: object = typeof body === 'object' && body !== null ? body : {};
  if ('url' in payload) {
    if (typeof payload.url !== 'string') throw new RequestError('url must be a string');
    return { source: 'url', url: payload.url };
  }
  if ('html' in payload) {
    if (typeof payload.html !== 'string') throw new RequestError('html must be a string');
    return { source: 'html', html: payload.html };
  }
  throw new RequestError('Either URL or HTML content must be provided');
}

function countNodes(node: DesignNodeJson): number {
  return node.children.reduce((n, child) => n + countNodes(child), 1);
}

export function createDesignSpecsRouter(config: ServerConfig, deps: DesignSpecsDeps): Router {
  const router = Router();
  const { logger } = deps;

  router.post('/getDesignSpecs', async (req: Request, res: Response) => {
    const rid = String(res.locals.rid || '');
    try {
      const input = readSpecsRequest(req.body);
      const html = input.source === 'url'
        ? await deps.fetchHtml(input.url, { timeoutMs: config.fetchTimeoutMs })
        : input.html;

      const tree = parseHtml(html, {
        warn: (message, meta) => logger.warn(message, { rid, ...meta }),
      });
      const json = toDesignJson(tree);

      if (config.outputDir) {
        try {
          writeDesignSpecs(config.outputDir, json);
        } catch (e) {
          logger.warn('failed to write design specs', { rid, dir: config.outputDir, error: errorMessage(e) });
        }
      }

      logger.info('design specs generated', {
        rid,
        source: input.source,
        framework: tree.framework,
        nodes: countNodes(json),
      });
      res.json(json);
    } catch (e) {
      const status = e instanceof DesignSpecError ? e.status : 500;
      logger.error('design specs failed', { rid, status, error: errorMessage(e) });
      res.status(status).json({ error: errorMessage(e) });
    }
  });

  return router;
}
