/**
 * Shared test helpers.
 */

import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { FetchFailure, FetchOutcome, UpstreamClient, UpstreamErrorKind } from '../src/github';
import type { Logger } from '../src/logger';
import type { JsonObject } from '../src/types';

export const ORG = 'acme';

export type MockLogger = { [K in keyof Logger]: Mock<Logger[K]> };

export function makeLogger(): MockLogger {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warning: vi.fn<Logger['warning']>(),
    error: vi.fn<Logger['error']>(),
  };
}

export function makeRepo(overrides: JsonObject = {}): JsonObject {
  return {
    name: 'widget',
    forks_count: 0,
    open_issues_count: 0,
    stargazers_count: 0,
    updated_at: '2024-01-01T00:00:00Z',
    private: false,
    ...overrides,
  };
}

/** Items with sequential ids, for pagination tests. */
export function makeItems(count: number, offset = 0): JsonObject[] {
  return Array.from({ length: count }, (_, i) => ({ id: offset + i }));
}

export function ok<T>(data: T): FetchOutcome<T> {
  return { success: true, data, status: 200 };
}

export function fail(status: number, kind: UpstreamErrorKind = 'status'): FetchFailure {
  return { success: false, error: { kind, message: `upstream said ${status}`, status }, status };
}

export function jsonResponse(
  body: unknown,
  init: { status?: number; statusText?: string; headers?: Record<string, string> } = {},
): Response {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    statusText: init.statusText ?? 'OK',
    headers: { 'content-type': 'application/json', ...init.headers },
  });
}

/**
 * UpstreamClient stand-in whose fetches are vi.fn mocks.
 * Defaults to an organization with no members and no repositories.
 */
export class FakeUpstreamClient implements UpstreamClient {
  fetchOrganization = vi.fn<() => Promise<FetchOutcome<JsonObject>>>(() =>
    Promise.resolve(ok({ login: ORG })),
  );
  fetchMembers = vi.fn<() => Promise<FetchOutcome<JsonObject[]>>>(() => Promise.resolve(ok([])));
  fetchRepos = vi.fn<() => Promise<FetchOutcome<JsonObject[]>>>(() => Promise.resolve(ok([])));
  forward = vi.fn<(request: Request) => Promise<Response>>(() =>
    Promise.resolve(jsonResponse({ forwarded: true })),
  );
}
