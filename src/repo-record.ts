/**
 * Repository Record
 * Layer: core
 *
 * Extracts the ranking fields from raw repository payloads.
 * The cache builds its views from RepoMetrics only, so it does not
 * depend on how the client decoded the payload.
 */

import type { JsonObject, RepoMetrics } from './types';
import { isCount } from './utils';

export interface DecodeReposResult {
  success: true;
  repos: RepoMetrics[];
}

export interface DecodeReposError {
  success: false;
  error: string;
}

export type DecodeReposOutcome = DecodeReposResult | DecodeReposError;

const COUNT_FIELDS = ['forks_count', 'open_issues_count', 'stargazers_count'] as const;

// Full date-time with an explicit offset; Date.parse alone accepts far looser input
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

function isIsoTimestamp(value: unknown): value is string {
  return typeof value === 'string' && ISO_DATE_TIME.test(value) && !Number.isNaN(Date.parse(value));
}

/**
 * Returns the names of fields that are missing or malformed on a raw repository.
 */
export function findInvalidRepoFields(raw: JsonObject): string[] {
  const invalid: string[] = [];

  const name = raw['name'];
  if (typeof name !== 'string' || name.length === 0) {
    invalid.push('name');
  }

  for (const field of COUNT_FIELDS) {
    if (!isCount(raw[field])) {
      invalid.push(field);
    }
  }

  const updatedAt = raw['updated_at'];
  if (!isIsoTimestamp(updatedAt)) {
    invalid.push('updated_at');
  }

  return invalid;
}

/**
 * Decodes a single raw repository. Returns null if any field is invalid.
 */
export function toRepoMetrics(raw: JsonObject, org: string): RepoMetrics | null {
  const name = raw['name'];
  const forks = raw['forks_count'];
  const openIssues = raw['open_issues_count'];
  const stars = raw['stargazers_count'];
  const updatedAt = raw['updated_at'];

  if (
    typeof name !== 'string' ||
    name.length === 0 ||
    !isCount(forks) ||
    !isCount(openIssues) ||
    !isCount(stars) ||
    !isIsoTimestamp(updatedAt)
  ) {
    return null;
  }

  return {
    name: `${org}/${name}`,
    forks_count: forks,
    open_issues_count: openIssues,
    stargazers_count: stars,
    updated_at: updatedAt,
  };
}

/**
 * Decodes every repository. A single bad record fails the whole batch;
 * no partial list is returned.
 */
export function decodeRepos(raw: readonly JsonObject[], org: string): DecodeReposOutcome {
  const repos: RepoMetrics[] = [];

  for (const [index, item] of raw.entries()) {
    const repo = toRepoMetrics(item, org);
    if (!repo) {
      const label = typeof item['name'] === 'string' ? `"${item['name']}"` : `#${index}`;
      const fields = findInvalidRepoFields(item).join(', ');
      return {
        success: false,
        error: `Repository ${label} has missing or malformed fields: ${fields}`,
      };
    }
    repos.push(repo);
  }

  return { success: true, repos };
}
