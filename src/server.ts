/**
 * Express server
 *
 * GET /animelist?username=<name>&status=<status> returns the user's MAL list
 * enriched with TVDB and IMDb ids.
 */

import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import { getAnimeList, parseAnimeListRequest, type AnimeListDeps } from './handlers/index.js';
import { ServiceError, errorMessage } from './errors.js';
import type { ErrorBody } from './types.js';

/**
 * Helper to safely get a query parameter as string
 * Express parses repeated or bracketed keys into arrays and objects
 */
function getQuery(query: Request['query'], key: string): string | undefined {
  const value = query[key];
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    if (typeof first === 'string') {
      return first;
    }
  }
  return undefined;
}

/**
 * Map a failure to its status code and error body
 */
function sendError(res: Response, error: unknown): void {
  if (error instanceof ServiceError) {
    const body: ErrorBody = { error: error.message, stage: error.stage };
    res.status(error.statusCode).json(body);
    return;
  }

  const body: ErrorBody = { error: errorMessage(error), stage: 'internal' };
  res.status(500).json(body);
}

export function createServer(deps: AnimeListDeps): Express {
  const app = express();

  app.use(cors());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/animelist', async (req: Request, res: Response) => {
    try {
      const request = await parseAnimeListRequest(
        {
          username: getQuery(req.query, 'username'),
          status: getQuery(req.query, 'status'),
        },
        deps.store
      );
      const records = await getAnimeList(deps, request);
      res.json(records);
    } catch (error) {
      if (error instanceof ServiceError && error.statusCode < 500) {
        console.warn(`[Server] /animelist ${error.statusCode} (${error.stage}): ${error.message}`);
      } else {
        console.error('[Server] /animelist failed:', error);
      }
      sendError(res, error);
    }
  });

  app.use((_req: Request, res: Response) => {
    const body: ErrorBody = { error: 'Not found', stage: 'request' };
    res.status(404).json(body);
  });

  return app;
}

/**
 * Listen and resolve once bound; rejects when the port cannot be taken
 */
export function startServer(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(server);
    });
  });
}
