/**
 * GitHub API Client
 * Layer: infra
 *
 * Provided ports:
 *   - github.fetchOrganization
 *   - github.fetchMembers
 *   - github.fetchRepos
 *   - github.forward
 *
 * Fetches organization data from the GitHub REST API, flattens pagination,
 * and fails fast while the API has told us to back off.
 */

import type { JsonObject } from './types';
import { FETCH_TIMEOUT_MS, GITHUB_API_URL, PAGE_SIZE } from './types';
import type { Logger } from './logger';
import { describeError } from './logger';
import type { BackoffState } from './rate-limit-backoff';
import {
  checkBackoff,
  createBackoffState,
  observeRateLimit,
  readRateLimitHeaders,
} from './rate-limit-backoff';
import { isARealObject } from './utils';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

const USER_AGENT = 'github-org-read-cache';

export const STATUS_RATE_LIMITED = 429;
export const STATUS_DECODE_FAILED = 500;
export const STATUS_TRANSPORT_FAILED = 502;
export const STATUS_TIMEOUT = 504;

const RATE_LIMITED_MESSAGE = 'Rate limited, in backoff, try again later';

// -----------------------------------------------------------------------------
// Outcomes
// -----------------------------------------------------------------------------

export type UpstreamErrorKind = 'transport' | 'timeout' | 'status' | 'decode' | 'rate_limited';

export interface UpstreamError {
  kind: UpstreamErrorKind;
  message: string;
  /** Observed status, or a synthesized one for local failures */
  status: number;
}

export interface FetchSuccess<T> {
  success: true;
  data: T;
  status: number;
}

export interface FetchFailure {
  success: false;
  error: UpstreamError;
  status: number;
}

export type FetchOutcome<T> = FetchSuccess<T> | FetchFailure;

// -----------------------------------------------------------------------------
// Port: UpstreamClient
// -----------------------------------------------------------------------------

export interface UpstreamClient {
  fetchOrganization(): Promise<FetchOutcome<JsonObject>>;
  fetchMembers(): Promise<FetchOutcome<JsonObject[]>>;
  fetchRepos(): Promise<FetchOutcome<JsonObject[]>>;
  /** Passes a request through to the API with authorization injected */
  forward(request: Request): Promise<Response>;
}

export interface GitHubClientOptions {
  org: string;
  token: string | null;
  logger: Logger;
  baseUrl?: string;
  timeoutMs?: number;
  now?: () => number;
}

export class GitHubClient implements UpstreamClient {
  private readonly org: string;
  private readonly token: string | null;
  private readonly logger: Logger;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private backoff: BackoffState = createBackoffState();

  constructor(options: GitHubClientOptions) {
    this.org = options.org;
    this.token = options.token;
    this.logger = options.logger;
    this.baseUrl = (options.baseUrl ?? GITHUB_API_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? FETCH_TIMEOUT_MS;
    this.now = options.now ?? (() => Date.now());
  }

  getBackoffState(): BackoffState {
    return this.backoff;
  }

  fetchOrganization(): Promise<FetchOutcome<JsonObject>> {
    return this.fetchSingle(`/orgs/${encodeURIComponent(this.org)}`);
  }

  // Public members only
  fetchMembers(): Promise<FetchOutcome<JsonObject[]>> {
    return this.fetchPaginated(`/orgs/${encodeURIComponent(this.org)}/public_members`);
  }

  // Public repositories only
  fetchRepos(): Promise<FetchOutcome<JsonObject[]>> {
    return this.fetchPaginated(`/orgs/${encodeURIComponent(this.org)}/repos`, { type: 'public' });
  }

  /**
   * Fetches a single JSON object.
   */
  fetchSingle(path: string, query: Record<string, string> = {}): Promise<FetchOutcome<JsonObject>> {
    return this.request(this.buildUrl(path, query), decodeObject);
  }

  /**
   * Requests pages of PAGE_SIZE starting at page 1 until a page comes back
   * empty, and concatenates them. Any failed page fails the whole call.
   */
  async fetchPaginated(
    path: string,
    query: Record<string, string> = {},
  ): Promise<FetchOutcome<JsonObject[]>> {
    const items: JsonObject[] = [];

    for (let page = 1; ; page++) {
      const url = this.buildUrl(path, {
        ...query,
        per_page: String(PAGE_SIZE),
        page: String(page),
      });
      const result = await this.request(url, decodeObjectArray);

      if (!result.success) {
        return result;
      }

      if (result.data.length === 0) {
        break;
      }

      items.push(...result.data);
    }

    return { success: true, data: items, status: 200 };
  }

  async forward(request: Request): Promise<Response> {
    if (this.isBackingOff()) {
      return jsonResponse({ error: RATE_LIMITED_MESSAGE }, STATUS_RATE_LIMITED);
    }

    const incoming = new URL(request.url);
    const targetUrl = `${this.baseUrl}${incoming.pathname}${incoming.search}`;

    const headers = new Headers(request.headers);
    headers.delete('host');
    if (this.token) {
      headers.set('Authorization', `Bearer ${this.token}`);
    }

    const hasBody = request.method !== 'GET' && request.method !== 'HEAD';
    const body = hasBody ? await request.arrayBuffer() : undefined;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const upstream = await fetch(targetUrl, {
        method: request.method,
        headers,
        body,
        signal: controller.signal,
      });
      this.observe(upstream.headers);

      const payload = await upstream.arrayBuffer();
      const responseHeaders = new Headers(upstream.headers);
      // fetch has already decoded the body
      responseHeaders.delete('content-encoding');
      responseHeaders.delete('content-length');

      return new Response(payload, {
        status: upstream.status,
        statusText: upstream.statusText,
        headers: responseHeaders,
      });
    } catch (err) {
      const error = classifyFetchError(err, this.timeoutMs);
      this.logger.error(`Failed to forward ${request.method} ${incoming.pathname}: ${error.message}`);
      return jsonResponse({ error: 'Failed to forward request' }, error.status);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private buildUrl(path: string, query: Record<string, string>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private async request<T>(
    url: string,
    decode: (raw: unknown) => T | null,
  ): Promise<FetchOutcome<T>> {
    if (this.isBackingOff()) {
      return failure('rate_limited', RATE_LIMITED_MESSAGE, STATUS_RATE_LIMITED);
    }

    // Set up abort controller with timeout to prevent indefinite hangs
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        method: 'GET',
        headers: this.buildHeaders(),
      });

      this.observe(response.headers);

      if (response.status !== 200) {
        const message = await readErrorMessage(response);
        const statusText = response.statusText || 'Request failed';
        const error = message
          ? `HTTP ${response.status}: ${statusText} - ${message}`
          : `HTTP ${response.status}: ${statusText}`;
        return failure('status', error, response.status);
      }

      let raw: unknown;
      try {
        raw = await response.json();
      } catch (err) {
        return failure('decode', `Invalid JSON from ${url}: ${describeError(err)}`, STATUS_DECODE_FAILED);
      }

      const decoded = decode(raw);
      if (decoded === null) {
        return failure('decode', `Unexpected payload shape from ${url}`, STATUS_DECODE_FAILED);
      }

      return { success: true, data: decoded, status: response.status };
    } catch (err) {
      const error = classifyFetchError(err, this.timeoutMs);
      return failure(error.kind, error.message, error.status);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'User-Agent': USER_AGENT,
      'X-GitHub-Api-Version': '2022-11-28',
    };
    // Unauthenticated access is allowed, with a lower rate limit
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }
    return headers;
  }

  private isBackingOff(): boolean {
    const check = checkBackoff(this.backoff, this.now());
    this.backoff = check.state;
    if (check.cleared) {
      this.logger.info('Rate limit backoff period over, resuming requests');
    }
    return check.blocked;
  }

  private observe(headers: Headers): void {
    const rateLimit = readRateLimitHeaders(headers);
    if (rateLimit.remaining === null) {
      this.logger.debug('Response carried no parseable x-ratelimit-remaining header');
      return;
    }

    const observation = observeRateLimit(this.backoff, rateLimit);
    this.backoff = observation.state;
    if (observation.entered && observation.state.active) {
      const until = new Date(observation.state.reset_at_ms).toISOString();
      this.logger.warning(`Rate limited by GitHub API, backing off until ${until}`);
    }
  }
}

// -----------------------------------------------------------------------------
// Decoders
// -----------------------------------------------------------------------------

export function decodeObject(raw: unknown): JsonObject | null {
  return isARealObject(raw) ? raw : null;
}

export function decodeObjectArray(raw: unknown): JsonObject[] | null {
  if (!Array.isArray(raw)) return null;
  const items: JsonObject[] = [];
  for (const item of raw) {
    if (!isARealObject(item)) return null;
    items.push(item);
  }
  return items;
}

// -----------------------------------------------------------------------------
// Error helpers
// -----------------------------------------------------------------------------

function failure(kind: UpstreamErrorKind, message: string, status: number): FetchFailure {
  return { success: false, error: { kind, message, status }, status };
}

function classifyFetchError(err: unknown, timeoutMs: number): UpstreamError {
  if (err instanceof Error && err.name === 'AbortError') {
    return {
      kind: 'timeout',
      message: `Request timeout: GitHub API did not respond within ${timeoutMs}ms`,
      status: STATUS_TIMEOUT,
    };
  }
  return {
    kind: 'transport',
    message: `Network error: ${describeError(err)}`,
    status: STATUS_TRANSPORT_FAILED,
  };
}

async function readErrorMessage(response: Response): Promise<string | null> {
  let text: string;
  try {
    text = (await response.text()).trim();
  } catch {
    return null;
  }
  return text ? extractMessage(text) : null;
}

// GitHub error bodies look like { "message": "..." }; anything else is kept verbatim
function extractMessage(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    return isARealObject(parsed) && typeof parsed['message'] === 'string'
      ? parsed['message']
      : text;
  } catch {
    return text;
  }
}

function jsonResponse(body: JsonObject, status: number): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}
