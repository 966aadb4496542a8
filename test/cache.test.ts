/**
 * Tests for CacheEngine: hydration, reads, the startup retry phase,
 * the periodic refresh loop and shutdown.
 *
 * The upstream is a FakeUpstreamClient; timers are faked.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CacheEngine } from '../src/cache';
import type { CacheEngineOptions } from '../src/cache';
import type { FetchOutcome } from '../src/github';
import type { JsonObject } from '../src/types';
import { FakeUpstreamClient, ORG, fail, makeLogger, makeRepo, ok } from './helpers';

const TTL_MS = 60_000;
const RETRY_DELAY_MS = 5_000;

function makeCache(
  client: FakeUpstreamClient,
  overrides: Partial<CacheEngineOptions> = {},
): CacheEngine {
  return new CacheEngine(client, {
    org: ORG,
    cacheTtlMs: TTL_MS,
    startupRetryDelayMs: RETRY_DELAY_MS,
    logger: makeLogger(),
    now: () => Date.UTC(2024, 0, 1),
    ...overrides,
  });
}

const EIGHT_REPOS = [
  makeRepo({ name: 'h', stargazers_count: 80, forks_count: 1 }),
  makeRepo({ name: 'g', stargazers_count: 70, forks_count: 1 }),
  makeRepo({ name: 'f', stargazers_count: 60, forks_count: 1 }),
  makeRepo({ name: 'e', stargazers_count: 50, forks_count: 1 }),
  makeRepo({ name: 'd', stargazers_count: 40, forks_count: 1 }),
  makeRepo({ name: 'c', stargazers_count: 30, forks_count: 1 }),
  makeRepo({ name: 'b', stargazers_count: 20, forks_count: 1 }),
  makeRepo({ name: 'a', stargazers_count: 10, forks_count: 1 }),
];

describe('constructor', () => {
  it.each([0, -1, 1.5, 2_147_483_648, 3_000_000_000])('rejects cacheTtlMs %d', (cacheTtlMs) => {
    expect(() => makeCache(new FakeUpstreamClient(), { cacheTtlMs })).toThrow(
      `cacheTtlMs must be an integer between 1 and 2147483647, got ${cacheTtlMs}`,
    );
  });

  it('accepts the largest timer delay', () => {
    expect(() => makeCache(new FakeUpstreamClient(), { cacheTtlMs: 2_147_483_647 })).not.toThrow();
  });
});

// -----------------------------------------------------------------------------
// hydrateNow
// -----------------------------------------------------------------------------

describe('hydrateNow', () => {
  it('installs organization, members, repos and views together', async () => {
    const client = new FakeUpstreamClient();
    const members = [{ login: 'octocat' }];
    const repos = [
      makeRepo({ name: 'a', forks_count: 5 }),
      makeRepo({ name: 'b', forks_count: 5 }),
      makeRepo({ name: 'c', forks_count: 2 }),
    ];
    client.fetchMembers.mockResolvedValue(ok(members));
    client.fetchRepos.mockResolvedValue(ok(repos));
    const cache = makeCache(client);

    const outcome = await cache.hydrateNow();

    expect(outcome).toEqual({ success: true, status: 200 });
    expect(cache.hasData()).toBe(true);
    expect(cache.getOrganization()).toEqual({ login: ORG });
    expect(cache.getMembers()).toEqual(members);
    expect(cache.getRepos()).toEqual(repos);
    expect(cache.getView('forks')).toEqual([
      { kind: 'forks', name: 'acme/c', count: 2 },
      { kind: 'forks', name: 'acme/a', count: 5 },
      { kind: 'forks', name: 'acme/b', count: 5 },
    ]);
    expect(cache.getLastSyncStatus()).toEqual({
      status_code: 200,
      error: null,
      attempted_at_ts: '2024-01-01T00:00:00.000Z',
      last_success_ts: '2024-01-01T00:00:00.000Z',
    });
  });

  it('fetches members, then repos, then the organization', async () => {
    const client = new FakeUpstreamClient();
    const cache = makeCache(client);

    await cache.hydrateNow();

    const [members] = client.fetchMembers.mock.invocationCallOrder;
    const [repos] = client.fetchRepos.mock.invocationCallOrder;
    const [org] = client.fetchOrganization.mock.invocationCallOrder;
    expect(members).toBeLessThan(repos ?? 0);
    expect(repos).toBeLessThan(org ?? 0);
  });

  it('keeps the previous snapshot when the members fetch fails', async () => {
    const client = new FakeUpstreamClient();
    client.fetchRepos.mockResolvedValue(ok([makeRepo({ name: 'kept' })]));
    const cache = makeCache(client);
    await cache.hydrateNow();
    const before = cache.getSnapshot();

    client.fetchMembers.mockResolvedValue(fail(503));
    client.fetchRepos.mockClear();
    client.fetchOrganization.mockClear();
    const outcome = await cache.hydrateNow();

    expect(outcome).toEqual({
      success: false,
      status: 503,
      kind: 'status',
      error: 'Failed to fetch acme members: upstream said 503',
    });
    expect(client.fetchRepos).not.toHaveBeenCalled();
    expect(client.fetchOrganization).not.toHaveBeenCalled();
    expect(cache.getSnapshot()).toBe(before);
    expect(cache.getOrganization()).toEqual({ login: ORG });
    expect(cache.getView('stars').map((e) => e.name)).toEqual(['acme/kept']);
    expect(cache.getLastSyncStatus()).toEqual({
      status_code: 503,
      error: 'Failed to fetch acme members: upstream said 503',
      attempted_at_ts: '2024-01-01T00:00:00.000Z',
      last_success_ts: '2024-01-01T00:00:00.000Z',
    });
  });

  it('reports the stage that failed', async () => {
    const client = new FakeUpstreamClient();
    client.fetchOrganization.mockResolvedValue(fail(429, 'rate_limited'));
    const cache = makeCache(client);

    const outcome = await cache.hydrateNow();

    expect(outcome).toEqual({
      success: false,
      status: 429,
      kind: 'rate_limited',
      error: 'Failed to fetch acme organization: upstream said 429',
    });
    expect(cache.hasData()).toBe(false);
  });

  it('aborts with a decode error when any repository is malformed', async () => {
    const client = new FakeUpstreamClient();
    client.fetchRepos.mockResolvedValue(
      ok([makeRepo({ name: 'fine' }), makeRepo({ name: 'bad', updated_at: 'not-a-date' })]),
    );
    const cache = makeCache(client);

    const outcome = await cache.hydrateNow();

    expect(outcome).toEqual({
      success: false,
      status: 500,
      kind: 'decode',
      error: 'Failed to fetch acme repos: Repository "bad" has missing or malformed fields: updated_at',
    });
    expect(cache.hasData()).toBe(false);
    expect(cache.getView('last_updated')).toEqual([]);
    expect(cache.getLastSyncStatus().status_code).toBe(500);
  });

  it('shares one attempt between concurrent callers', async () => {
    const client = new FakeUpstreamClient();
    const cache = makeCache(client);

    const [first, second] = await Promise.all([cache.hydrateNow(), cache.hydrateNow()]);

    expect(first).toBe(second);
    expect(client.fetchMembers).toHaveBeenCalledTimes(1);

    await cache.hydrateNow();
    expect(client.fetchMembers).toHaveBeenCalledTimes(2);
  });

  it('never exposes a half-built snapshot to readers', async () => {
    const client = new FakeUpstreamClient();
    client.fetchOrganization.mockResolvedValue(ok({ login: ORG, generation: 1 }));
    client.fetchRepos.mockResolvedValue(ok([makeRepo({ name: 'old' })]));
    const cache = makeCache(client);
    await cache.hydrateNow();

    let releaseOrg: (value: FetchOutcome<JsonObject>) => void = () => undefined;
    client.fetchOrganization.mockReturnValue(
      new Promise((resolve) => {
        releaseOrg = resolve;
      }),
    );
    client.fetchRepos.mockResolvedValue(ok([makeRepo({ name: 'new' })]));
    const pending = cache.hydrateNow();

    // Members and repos have arrived; the organization has not
    await vi.waitFor(() => expect(client.fetchOrganization).toHaveBeenCalledTimes(2));
    expect(cache.getOrganization()).toEqual({ login: ORG, generation: 1 });
    expect(cache.getView('forks').map((e) => e.name)).toEqual(['acme/old']);

    releaseOrg(ok({ login: ORG, generation: 2 }));
    await pending;

    const snapshot = cache.getSnapshot();
    expect(snapshot?.organization).toEqual({ login: ORG, generation: 2 });
    expect(snapshot?.views.forks.map((e) => e.name)).toEqual(['acme/new']);
    expect(Object.isFrozen(snapshot)).toBe(true);
  });
});

// -----------------------------------------------------------------------------
// Reads
// -----------------------------------------------------------------------------

describe('reads on an empty cache', () => {
  it('return empty values without touching the upstream', () => {
    const client = new FakeUpstreamClient();
    const cache = makeCache(client);

    expect(cache.hasData()).toBe(false);
    expect(cache.getSnapshot()).toBeNull();
    expect(cache.getOrganization()).toBeNull();
    expect(cache.getMembers()).toEqual([]);
    expect(cache.getRepos()).toEqual([]);
    expect(cache.getView('stars')).toEqual([]);
    expect(cache.getBottomN('stars', 3)).toEqual({ success: true, entries: [] });
    expect(cache.getLastSyncStatus()).toEqual({
      status_code: null,
      error: null,
      attempted_at_ts: null,
      last_success_ts: null,
    });
    expect(client.fetchMembers).not.toHaveBeenCalled();
  });
});

describe('getBottomN', () => {
  let cache: CacheEngine;

  beforeEach(async () => {
    const client = new FakeUpstreamClient();
    client.fetchRepos.mockResolvedValue(ok(EIGHT_REPOS));
    cache = makeCache(client);
    await cache.hydrateNow();
  });

  it('returns all repositories ascending when n exceeds the view', () => {
    const result = cache.getBottomN('stars', 1000);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.entries.map((e) => [e.name, e.count])).toEqual([
        ['acme/a', 10],
        ['acme/b', 20],
        ['acme/c', 30],
        ['acme/d', 40],
        ['acme/e', 50],
        ['acme/f', 60],
        ['acme/g', 70],
        ['acme/h', 80],
      ]);
    }
  });

  it('returns a prefix of the full view', () => {
    const full = cache.getView('forks');

    for (const n of [1, 3, 8]) {
      const result = cache.getBottomN('forks', n);
      expect(result).toEqual({ success: true, entries: full.slice(0, n) });
    }
  });

  it('rejects n that is not a positive integer', () => {
    for (const n of [0, -1, 2.5, Number.NaN]) {
      expect(cache.getBottomN('stars', n)).toEqual({
        success: false,
        error: 'n must be a positive integer',
      });
    }
  });
});

// -----------------------------------------------------------------------------
// startSyncLoop
// -----------------------------------------------------------------------------

describe('startSyncLoop', () => {
  let client: FakeUpstreamClient;
  let controller: AbortController;

  beforeEach(() => {
    vi.useFakeTimers();
    client = new FakeUpstreamClient();
    controller = new AbortController();
  });

  afterEach(() => {
    controller.abort();
    vi.useRealTimers();
  });

  it('stops retrying after the first successful startup hydration', async () => {
    client.fetchMembers
      .mockResolvedValueOnce(fail(500))
      .mockResolvedValueOnce(fail(500))
      .mockResolvedValue(ok([]));
    const cache = makeCache(client);

    const started = cache.startSyncLoop(controller.signal);
    expect(cache.getSyncState()).toBe('starting');
    await vi.advanceTimersByTimeAsync(2 * RETRY_DELAY_MS);
    await started;

    expect(client.fetchMembers).toHaveBeenCalledTimes(3);
    expect(cache.getSyncState()).toBe('running');
    expect(cache.hasData()).toBe(true);
  });

  it('starts the periodic loop in degraded mode when every startup attempt fails', async () => {
    client.fetchMembers.mockResolvedValue(fail(500));
    const logger = makeLogger();
    const cache = makeCache(client, { logger });

    const started = cache.startSyncLoop(controller.signal);
    await vi.advanceTimersByTimeAsync(4 * RETRY_DELAY_MS);
    await started;

    expect(client.fetchMembers).toHaveBeenCalledTimes(5);
    expect(cache.getSyncState()).toBe('running');
    expect(cache.hasData()).toBe(false);
    expect(cache.getLastSyncStatus().status_code).toBe(500);
    expect(logger.warning).toHaveBeenLastCalledWith(
      'Startup hydration gave up after 5 attempts; serving degraded until the next refresh',
    );

    // Upstream recovers: a forced hydration fills the cache before the next tick
    client.fetchMembers.mockResolvedValue(ok([{ login: 'octocat' }]));
    const outcome = await cache.hydrateNow();

    expect(outcome).toEqual({ success: true, status: 200 });
    expect(cache.getMembers()).toEqual([{ login: 'octocat' }]);
    expect(cache.getLastSyncStatus().status_code).toBe(200);
  });

  it('hydrates once per tick and keeps going after failures', async () => {
    const cache = makeCache(client);
    await cache.startSyncLoop(controller.signal);
    expect(client.fetchMembers).toHaveBeenCalledTimes(1);

    client.fetchMembers.mockResolvedValueOnce(fail(502)).mockResolvedValueOnce(fail(502));
    await vi.advanceTimersByTimeAsync(TTL_MS);
    expect(client.fetchMembers).toHaveBeenCalledTimes(2);
    expect(cache.getLastSyncStatus().status_code).toBe(502);

    await vi.advanceTimersByTimeAsync(TTL_MS);
    await vi.advanceTimersByTimeAsync(TTL_MS);

    expect(client.fetchMembers).toHaveBeenCalledTimes(4);
    expect(cache.getLastSyncStatus().status_code).toBe(200);
    expect(cache.getSyncState()).toBe('running');
  });

  it('stops ticking once the signal aborts', async () => {
    const cache = makeCache(client);
    await cache.startSyncLoop(controller.signal);

    controller.abort();
    await vi.advanceTimersByTimeAsync(5 * TTL_MS);

    expect(cache.getSyncState()).toBe('stopped');
    expect(client.fetchMembers).toHaveBeenCalledTimes(1);
  });

  it('cuts a startup pause short on abort', async () => {
    client.fetchMembers.mockResolvedValue(fail(500));
    const cache = makeCache(client);

    const started = cache.startSyncLoop(controller.signal);
    await vi.advanceTimersByTimeAsync(1_000);
    controller.abort();
    await started;

    expect(client.fetchMembers).toHaveBeenCalledTimes(1);
    expect(cache.getSyncState()).toBe('stopped');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('does nothing when the signal is already aborted', async () => {
    const cache = makeCache(client);
    controller.abort();

    await cache.startSyncLoop(controller.signal);

    expect(client.fetchMembers).not.toHaveBeenCalled();
    expect(cache.getSyncState()).toBe('stopped');
  });

  it('refuses to start twice', async () => {
    const cache = makeCache(client);
    await cache.startSyncLoop(controller.signal);

    await expect(cache.startSyncLoop(controller.signal)).rejects.toThrow(
      'Sync loop already started (state: running)',
    );
  });
});
