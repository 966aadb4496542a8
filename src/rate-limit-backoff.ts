/**
 * Rate Limit Backoff
 * Layer: infra
 *
 * Pure logic for the client-side backoff state machine (Active / InBackoff).
 *
 * Based on guidance in current docs at time of writing:
 * https://docs.github.com/en/rest/using-the-rest-api/rate-limits-for-the-rest-api?apiVersion=2022-11-28#exceeding-the-rate-limit
 */

import { parseInteger } from './utils';

export type BackoffState = { active: false; reset_at_ms: null } | { active: true; reset_at_ms: number };

export interface RateLimitHeaders {
  /** x-ratelimit-remaining, null if absent or unparseable */
  remaining: number | null;
  /** x-ratelimit-reset (epoch seconds), null if absent or unparseable */
  reset: number | null;
}

export interface BackoffCheck {
  state: BackoffState;
  /** True when the call must fail fast without touching the network */
  blocked: boolean;
  /** True when this check ended a backoff period */
  cleared: boolean;
}

export interface BackoffObservation {
  state: BackoffState;
  /** True when this response put the client into backoff (or extended it) */
  entered: boolean;
}

export function createBackoffState(): BackoffState {
  return { active: false, reset_at_ms: null };
}

export function readRateLimitHeaders(headers: Pick<Headers, 'get'>): RateLimitHeaders {
  return {
    remaining: parseInteger(headers.get('x-ratelimit-remaining')),
    reset: parseInteger(headers.get('x-ratelimit-reset')),
  };
}

/**
 * Updates backoff state from a response's rate-limit headers.
 *
 * "If the x-ratelimit-remaining header is 0 ... you should not retry your
 * request until after the time specified by the x-ratelimit-reset header."
 *
 * While already in backoff the reset time never moves earlier.
 */
export function observeRateLimit(
  state: BackoffState,
  headers: RateLimitHeaders,
): BackoffObservation {
  if (headers.remaining !== 0 || headers.reset === null) {
    return { state, entered: false };
  }

  const resetAtMs = headers.reset * 1000;
  if (state.active && state.reset_at_ms >= resetAtMs) {
    return { state, entered: false };
  }

  return { state: { active: true, reset_at_ms: resetAtMs }, entered: true };
}

/**
 * Decides whether an outbound call may proceed.
 * Ends backoff lazily once `nowMs` reaches the reset time; there is no timer.
 */
export function checkBackoff(state: BackoffState, nowMs: number): BackoffCheck {
  if (!state.active) {
    return { state, blocked: false, cleared: false };
  }

  if (nowMs < state.reset_at_ms) {
    return { state, blocked: true, cleared: false };
  }

  return { state: createBackoffState(), blocked: false, cleared: true };
}
