/**
 * Configuration
 * Layer: infra
 *
 * Provided ports:
 *   - config.load
 *
 * Reads service configuration from the command line and environment:
 *   --port / PORT          HTTP port (required)
 *   GITHUB_API_TOKEN       bearer token (optional, lower rate limits without it)
 *   GITHUB_ORG             organization to cache
 *   CACHE_TTL_SECONDS      refresh interval
 *   GITHUB_API_URL         API base URL
 */

import { parseArgs } from 'util';
import type { Config } from './types';
import {
  DEFAULT_CACHE_TTL_SECONDS,
  DEFAULT_ORG,
  GITHUB_API_URL,
  MAX_TIMER_DELAY_MS,
} from './types';
import { parseInteger } from './utils';

const MAX_PORT = 65535;
const MAX_CACHE_TTL_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);

export interface LoadConfigResult {
  success: true;
  config: Config;
  warnings: string[];
}

export interface LoadConfigError {
  success: false;
  error: string;
}

export type LoadConfigOutcome = LoadConfigResult | LoadConfigError;

export const USAGE = 'Usage: github-org-read-cache --port <port>';

/**
 * Parses and validates configuration.
 *
 * @param env - Environment variables (usually process.env)
 * @param argv - Command-line arguments after the script path
 */
export function loadConfig(env: NodeJS.ProcessEnv, argv: string[]): LoadConfigOutcome {
  let portFlag: string | undefined;
  try {
    const { values } = parseArgs({
      args: argv,
      options: { port: { type: 'string' } },
      strict: true,
    });
    portFlag = values.port;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: `${message}\n${USAGE}` };
  }

  const warnings: string[] = [];

  const rawPort = portFlag ?? env['PORT'];
  if (!rawPort) {
    return { success: false, error: `--port is required\n${USAGE}` };
  }
  const port = parseInteger(rawPort);
  if (port === null || port < 1 || port > MAX_PORT) {
    return {
      success: false,
      error: `port must be in valid range (1 to ${MAX_PORT}) inclusive, got "${rawPort}"`,
    };
  }

  const token = env['GITHUB_API_TOKEN']?.trim() || null;
  if (!token) {
    warnings.push('No GITHUB_API_TOKEN environment variable found, may be subject to rate limits');
  }

  const org = env['GITHUB_ORG']?.trim() || DEFAULT_ORG;

  let cacheTtlSeconds = DEFAULT_CACHE_TTL_SECONDS;
  const rawTtl = env['CACHE_TTL_SECONDS'];
  if (rawTtl) {
    const parsed = parseInteger(rawTtl);
    if (parsed === null || parsed <= 0) {
      return {
        success: false,
        error: `CACHE_TTL_SECONDS must be a positive integer, got "${rawTtl}"`,
      };
    }
    if (parsed > MAX_CACHE_TTL_SECONDS) {
      return {
        success: false,
        error: `CACHE_TTL_SECONDS must be at most ${MAX_CACHE_TTL_SECONDS}, got "${rawTtl}"`,
      };
    }
    cacheTtlSeconds = parsed;
  }

  const apiBaseUrl = env['GITHUB_API_URL']?.trim() || GITHUB_API_URL;
  if (!isHttpUrl(apiBaseUrl)) {
    return { success: false, error: `GITHUB_API_URL is not a valid http(s) URL: "${apiBaseUrl}"` };
  }

  return {
    success: true,
    config: {
      port,
      token,
      org,
      cache_ttl_seconds: cacheTtlSeconds,
      api_base_url: apiBaseUrl,
    },
    warnings,
  };
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
