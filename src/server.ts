/**
 * HTTP Server
 * Layer: serving
 *
 * Hono application exposing the cache:
 * - GET /healthcheck
 * - GET /orgs/:org, /orgs/:org/members, /orgs/:org/repos (configured org only)
 * - GET /view/bottom/:n/:kind for kind in forks, open_issues, stars, last_updated
 * - anything else is forwarded to the GitHub API
 *
 * Reads that find the cache empty trigger one hydration before giving up.
 */

import type { Server } from 'net';
import { Hono } from 'hono';
import type { Context } from 'hono';
import { serve } from '@hono/node-server';
import type { ServerType } from '@hono/node-server';
import type { CacheEngine } from './cache';
import type { UpstreamClient } from './github';
import type { Logger } from './logger';
import { describeError } from './logger';
import { isViewKind, toRankPair } from './ranking';
import { parseInteger } from './utils';

export interface AppDeps {
  cache: CacheEngine;
  client: Pick<UpstreamClient, 'forward'>;
  /** Organization login served from cache */
  org: string;
  logger: Logger;
}

function jsonResponse(value: unknown): Response {
  return new Response(JSON.stringify(value), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Create and configure the Hono application
 */
export const createApp = (deps: AppDeps): Hono => {
  const { cache, client, logger } = deps;
  const app = new Hono();

  const isServedOrg = (org: string): boolean => org.toLowerCase() === deps.org.toLowerCase();

  /**
   * Returns an error response if the cache is still empty after a forced
   * hydration, or null when there is data to serve.
   */
  const ensureHydrated = async (c: Context): Promise<Response | null> => {
    if (cache.hasData()) {
      return null;
    }

    logger.info('Cache empty on read, hydrating now');
    const outcome = await cache.hydrateNow();
    if (outcome.success) {
      return null;
    }

    return c.json(
      { error: `Previous data sync failed with status code: ${outcome.status}` },
      500,
    );
  };

  app.get('/healthcheck', () => new Response(null, { status: 200 }));

  app.get('/orgs/:org', async (c) => {
    if (!isServedOrg(c.req.param('org'))) {
      return client.forward(c.req.raw);
    }
    const failure = await ensureHydrated(c);
    return failure ?? jsonResponse(cache.getOrganization());
  });

  app.get('/orgs/:org/members', async (c) => {
    if (!isServedOrg(c.req.param('org'))) {
      return client.forward(c.req.raw);
    }
    const failure = await ensureHydrated(c);
    return failure ?? jsonResponse(cache.getMembers());
  });

  app.get('/orgs/:org/repos', async (c) => {
    if (!isServedOrg(c.req.param('org'))) {
      return client.forward(c.req.raw);
    }
    const failure = await ensureHydrated(c);
    return failure ?? jsonResponse(cache.getRepos());
  });

  app.get('/view/bottom/:n/:kind', async (c) => {
    const kind = c.req.param('kind');
    if (!isViewKind(kind)) {
      return client.forward(c.req.raw);
    }

    const n = parseInteger(c.req.param('n'));
    if (n === null) {
      return c.json({ error: 'n must be an integer' }, 400);
    }

    const failure = await ensureHydrated(c);
    if (failure) {
      return failure;
    }

    const result = cache.getBottomN(kind, n);
    if (!result.success) {
      return c.json({ error: result.error }, 400);
    }

    return jsonResponse(result.entries.map(toRankPair));
  });

  // Catch-all: proxy to the GitHub API
  app.all('*', (c) => client.forward(c.req.raw));

  app.onError((err, c) => {
    logger.error(`${c.req.method} ${c.req.path} - Unexpected error: ${describeError(err)}`);
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
};

/**
 * Serves the app on `port`. Server errors after `serve` returns, such as a
 * failed bind, go to `onError` instead of surfacing as uncaught exceptions.
 */
export const listen = (
  app: Hono,
  port: number,
  logger: Logger,
  onError: (err: Error) => void,
): ServerType => {
  const server = serve({ fetch: app.fetch, port }, (info) => {
    logger.info(`Server is ready to handle requests on port ${info.port}`);
  });
  const netServer: Server = server;
  netServer.on('error', onError);
  return server;
};
