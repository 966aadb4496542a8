/**
 * Main Entry
 * Layer: service
 *
 * Wires configuration, the GitHub client, the cache and the HTTP server,
 * then serves until SIGINT/SIGTERM.
 *
 * Required ports:
 *   - config.load
 *   - github.*
 *   - cache.startSyncLoop
 */

import * as core from '@actions/core';
import { loadConfig } from './config';
import { GitHubClient } from './github';
import { CacheEngine } from './cache';
import { createApp, listen } from './server';
import { createLogger, describeError } from './logger';

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

async function run(): Promise<void> {
  try {
    const log = createLogger('server');

    const loaded = loadConfig(process.env, process.argv.slice(2));
    if (!loaded.success) {
      throw new Error(`Invalid configuration: ${loaded.error}`);
    }
    const { config } = loaded;
    for (const warning of loaded.warnings) {
      log.warning(warning);
    }

    if (config.token) {
      // Mask token to prevent accidental exposure
      core.setSecret(config.token);
    }

    const client = new GitHubClient({
      org: config.org,
      token: config.token,
      baseUrl: config.api_base_url,
      logger: createLogger('github'),
    });

    const cache = new CacheEngine(client, {
      org: config.org,
      cacheTtlMs: config.cache_ttl_seconds * 1000,
      logger: createLogger('cache'),
    });

    const app = createApp({ cache, client, org: config.org, logger: log });

    // The sync loop and the HTTP server both stop on SIGINT/SIGTERM
    const controller = new AbortController();
    const server = listen(app, config.port, log, (err) => {
      core.setFailed(`Server failed: ${describeError(err)}`);
      controller.abort();
    });

    const shutdown = (signal: string): void => {
      if (controller.signal.aborted) return;
      log.info(`Received ${signal}, shutting down server...`);
      controller.abort();
      server.close((err) => {
        if (err) {
          log.error(`Server forced to shutdown: ${err.message}`);
        }
      });
    };
    for (const signal of SHUTDOWN_SIGNALS) {
      process.on(signal, () => shutdown(signal));
    }

    await cache.startSyncLoop(controller.signal);
  } catch (error) {
    core.setFailed(describeError(error));
  }
}

void run();
