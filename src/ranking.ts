/**
 * Ranked Views
 * Layer: core
 *
 * Pure functions that turn repository metrics into the four
 * ascending "bottom" rankings, and slice them.
 */

import type {
  CountRankEntry,
  CountViewKind,
  LastUpdatedRankEntry,
  RankEntry,
  RankedList,
  RankedViews,
  RepoMetrics,
  ViewKind,
} from './types';

const COUNT_FIELD: Record<CountViewKind, keyof RepoMetrics & `${string}_count`> = {
  forks: 'forks_count',
  open_issues: 'open_issues_count',
  stars: 'stargazers_count',
};

// Plain code-unit ordering, independent of locale
function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function compareCountEntries(a: CountRankEntry, b: CountRankEntry): number {
  return a.count - b.count || compareNames(a.name, b.name);
}

/**
 * Orders chronologically. Repositories updated at the same instant
 * fall back to name order so the view is deterministic.
 */
export function compareLastUpdatedEntries(a: LastUpdatedRankEntry, b: LastUpdatedRankEntry): number {
  return a.timestamp_ms - b.timestamp_ms || compareNames(a.name, b.name);
}

export function buildCountView<K extends CountViewKind>(
  kind: K,
  repos: readonly RepoMetrics[],
): CountRankEntry<K>[] {
  const field = COUNT_FIELD[kind];
  return repos
    .map((repo): CountRankEntry<K> => ({ kind, name: repo.name, count: repo[field] }))
    .sort(compareCountEntries);
}

export function buildLastUpdatedView(repos: readonly RepoMetrics[]): LastUpdatedRankEntry[] {
  return repos
    .map(
      (repo): LastUpdatedRankEntry => ({
        kind: 'last_updated',
        name: repo.name,
        updated_at: repo.updated_at,
        timestamp_ms: Date.parse(repo.updated_at),
      }),
    )
    .sort(compareLastUpdatedEntries);
}

export function buildRankedViews(repos: readonly RepoMetrics[]): RankedViews {
  return {
    forks: buildCountView('forks', repos),
    open_issues: buildCountView('open_issues', repos),
    stars: buildCountView('stars', repos),
    last_updated: buildLastUpdatedView(repos),
  };
}

/**
 * Returns the n lowest-ranked entries, clamped to the view length.
 * Callers validate n.
 */
export function takeBottom<K extends ViewKind>(view: RankedList<K>, n: number): RankEntry<K>[] {
  return view.slice(0, Math.min(n, view.length));
}

/** Wire form of an entry: `[name, value]`. */
export type RankPair = [name: string, value: number | string];

export function toRankPair(entry: RankEntry): RankPair {
  return entry.kind === 'last_updated' ? [entry.name, entry.updated_at] : [entry.name, entry.count];
}

export function isViewKind(value: string): value is ViewKind {
  return value === 'forks' || value === 'open_issues' || value === 'stars' || value === 'last_updated';
}
