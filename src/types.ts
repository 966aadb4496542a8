/**
 * Boundary types for the organization read cache
 *
 * These types define the contracts between the upstream client,
 * the cache engine and the serving layer.
 */

// -----------------------------------------------------------------------------
// Raw upstream payloads
// -----------------------------------------------------------------------------

/** A decoded JSON object as returned by the GitHub REST API. */
export type JsonObject = Record<string, unknown>;

// -----------------------------------------------------------------------------
// RepoMetrics
// Normalized repository record the ranked views are built from
// -----------------------------------------------------------------------------

export interface RepoMetrics {
  /** `<org>/<repo>` */
  name: string;
  forks_count: number;
  open_issues_count: number;
  stargazers_count: number;
  /** ISO-8601 timestamp of the last update */
  updated_at: string;
}

// -----------------------------------------------------------------------------
// Ranked views
// -----------------------------------------------------------------------------

export const VIEW_KINDS = ['forks', 'open_issues', 'stars', 'last_updated'] as const;

export type ViewKind = (typeof VIEW_KINDS)[number];

export type CountViewKind = Exclude<ViewKind, 'last_updated'>;

export interface CountRankEntry<K extends CountViewKind = CountViewKind> {
  kind: K;
  name: string;
  count: number;
}

export interface LastUpdatedRankEntry {
  kind: 'last_updated';
  name: string;
  /** Timestamp as reported upstream */
  updated_at: string;
  /** Parsed epoch milliseconds, used for ordering */
  timestamp_ms: number;
}

export type RankEntry<K extends ViewKind = ViewKind> = K extends 'last_updated'
  ? LastUpdatedRankEntry
  : K extends CountViewKind
    ? CountRankEntry<K>
    : never;

export type RankedList<K extends ViewKind> = readonly RankEntry<K>[];

export type RankedViews = { readonly [K in ViewKind]: RankedList<K> };

// -----------------------------------------------------------------------------
// Snapshot
// Everything one successful hydration produced, installed as a unit
// -----------------------------------------------------------------------------

export interface Snapshot {
  organization: JsonObject;
  members: readonly JsonObject[];
  repos: readonly JsonObject[];
  views: RankedViews;
  /** ISO timestamp when this snapshot was built */
  hydrated_at_ts: string;
}

// -----------------------------------------------------------------------------
// SyncStatus
// -----------------------------------------------------------------------------

export interface SyncStatus {
  /** HTTP-equivalent status of the most recent hydration (null before the first) */
  status_code: number | null;
  /** Error message of the most recent hydration (null on success) */
  error: string | null;
  /** ISO timestamp of the most recent hydration attempt */
  attempted_at_ts: string | null;
  /** ISO timestamp of the most recent successful hydration */
  last_success_ts: string | null;
}

export type SyncLoopState = 'idle' | 'starting' | 'running' | 'stopped';

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export interface Config {
  /** Port for the HTTP server */
  port: number;
  /** GitHub token; null means unauthenticated access */
  token: string | null;
  /** Organization login to cache */
  org: string;
  /** Refresh interval in seconds */
  cache_ttl_seconds: number;
  /** Base URL of the GitHub REST API */
  api_base_url: string;
}

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

export const GITHUB_API_URL = 'https://api.github.com';
export const DEFAULT_ORG = 'Netflix';
export const PAGE_SIZE = 100;

/** Timeout for fetch requests to GitHub API (milliseconds) */
export const FETCH_TIMEOUT_MS = 10000;

export const DEFAULT_CACHE_TTL_SECONDS = 10 * 60;

/** Largest delay Node timers honor; longer ones fire after 1 ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
export const STARTUP_HYDRATION_ATTEMPTS = 5;
export const STARTUP_RETRY_DELAY_MS = 5000;
