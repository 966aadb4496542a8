/**
 * Cache Engine
 * Layer: core
 *
 * Provided ports:
 *   - cache.startSyncLoop
 *   - cache.hydrateNow
 *   - cache.read (organization, members, repos, views, bottom-N)
 *   - cache.syncStatus
 *
 * Holds the latest snapshot of the organization, its members and its
 * repositories, refreshed on a fixed interval.
 *
 * Startup sequence:
 *   1. Up to `startupAttempts` hydrations, pausing between failures
 *   2. Running: one hydration per `cacheTtlMs` tick, whether or not startup succeeded
 *
 * Shutdown: aborting the signal cuts any startup pause short, clears the
 * timer and moves the loop to its terminal `stopped` state.
 *
 * A snapshot is installed with a single assignment once every fetch and
 * decode step has succeeded, so readers see either the previous snapshot
 * or the new one.
 */

import type {
  JsonObject,
  RankEntry,
  RankedList,
  Snapshot,
  SyncLoopState,
  SyncStatus,
  ViewKind,
} from './types';
import { MAX_TIMER_DELAY_MS, STARTUP_HYDRATION_ATTEMPTS, STARTUP_RETRY_DELAY_MS } from './types';
import type { UpstreamClient, UpstreamErrorKind } from './github';
import { STATUS_DECODE_FAILED } from './github';
import type { Logger } from './logger';
import { describeError } from './logger';
import { decodeRepos } from './repo-record';
import { buildRankedViews, takeBottom } from './ranking';
import { sleep } from './utils';

// -----------------------------------------------------------------------------
// Outcomes
// -----------------------------------------------------------------------------

export type HydrationStage = 'members' | 'repos' | 'organization';

export interface HydrateResult {
  success: true;
  status: number;
}

export interface HydrateError {
  success: false;
  status: number;
  kind: UpstreamErrorKind;
  error: string;
}

export type HydrateOutcome = HydrateResult | HydrateError;

export interface BottomNResult<K extends ViewKind> {
  success: true;
  entries: RankEntry<K>[];
}

export interface BottomNError {
  success: false;
  error: string;
}

export type BottomNOutcome<K extends ViewKind> = BottomNResult<K> | BottomNError;

// -----------------------------------------------------------------------------
// CacheEngine
// -----------------------------------------------------------------------------

export interface CacheEngineOptions {
  /** Organization login, used to qualify repository names */
  org: string;
  /** Interval between scheduled hydrations */
  cacheTtlMs: number;
  logger: Logger;
  startupAttempts?: number;
  startupRetryDelayMs?: number;
  now?: () => number;
}

export class CacheEngine {
  private readonly client: UpstreamClient;
  private readonly org: string;
  private readonly cacheTtlMs: number;
  private readonly logger: Logger;
  private readonly startupAttempts: number;
  private readonly startupRetryDelayMs: number;
  private readonly now: () => number;

  private snapshot: Snapshot | null = null;
  private syncStatus: SyncStatus = {
    status_code: null,
    error: null,
    attempted_at_ts: null,
    last_success_ts: null,
  };
  private loopState: SyncLoopState = 'idle';
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<HydrateOutcome> | null = null;

  /**
   * @throws Error if `cacheTtlMs` is not a whole number of milliseconds a timer can hold
   */
  constructor(client: UpstreamClient, options: CacheEngineOptions) {
    if (
      !Number.isInteger(options.cacheTtlMs) ||
      options.cacheTtlMs <= 0 ||
      options.cacheTtlMs > MAX_TIMER_DELAY_MS
    ) {
      throw new Error(
        `cacheTtlMs must be an integer between 1 and ${MAX_TIMER_DELAY_MS}, got ${options.cacheTtlMs}`,
      );
    }

    this.client = client;
    this.org = options.org;
    this.cacheTtlMs = options.cacheTtlMs;
    this.logger = options.logger;
    this.startupAttempts = options.startupAttempts ?? STARTUP_HYDRATION_ATTEMPTS;
    this.startupRetryDelayMs = options.startupRetryDelayMs ?? STARTUP_RETRY_DELAY_MS;
    this.now = options.now ?? (() => Date.now());
  }

  // ---------------------------------------------------------------------------
  // Sync loop
  // ---------------------------------------------------------------------------

  /**
   * Runs the startup hydration attempts, then schedules periodic hydration.
   * Resolves when the startup phase is over; the periodic loop keeps running
   * until `signal` aborts.
   *
   * @throws Error if the loop was already started
   */
  async startSyncLoop(signal: AbortSignal): Promise<void> {
    if (this.loopState !== 'idle') {
      throw new Error(`Sync loop already started (state: ${this.loopState})`);
    }

    if (signal.aborted) {
      this.stop();
      return;
    }

    this.loopState = 'starting';
    signal.addEventListener('abort', () => this.stop(), { once: true });

    for (let attempt = 1; attempt <= this.startupAttempts; attempt++) {
      this.logger.info(`Hydrating cache for startup (attempt ${attempt}/${this.startupAttempts})`);
      const outcome = await this.hydrateNow();

      if (outcome.success) {
        this.logger.info('Successfully hydrated cache');
        break;
      }

      this.logger.warning(
        `Startup hydration attempt ${attempt} failed (HTTP ${outcome.status}): ${outcome.error}`,
      );

      if (attempt < this.startupAttempts) {
        await sleep(this.startupRetryDelayMs, signal);
      }

      if (signal.aborted) {
        return;
      }
    }

    if (signal.aborted) {
      return;
    }

    if (!this.snapshot) {
      this.logger.warning(
        `Startup hydration gave up after ${this.startupAttempts} attempts; serving degraded until the next refresh`,
      );
    }

    this.loopState = 'running';
    this.timer = setInterval(() => {
      void this.tick();
    }, this.cacheTtlMs);
  }

  getSyncState(): SyncLoopState {
    return this.loopState;
  }

  private stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.loopState !== 'stopped') {
      this.loopState = 'stopped';
      this.logger.info('Cache sync loop stopped');
    }
  }

  private async tick(): Promise<void> {
    this.logger.info('Attempting to re-hydrate cache');
    try {
      const outcome = await this.hydrateNow();
      if (outcome.success) {
        this.logger.info('Successfully re-hydrated cache');
      } else {
        this.logger.error(`Failed to hydrate cache (HTTP ${outcome.status}): ${outcome.error}`);
      }
    } catch (err) {
      this.logger.error(`Cache refresh crashed: ${describeError(err)}`);
    }
  }

  // ---------------------------------------------------------------------------
  // Hydration
  // ---------------------------------------------------------------------------

  /**
   * Runs one hydration attempt now. A call made while another attempt is in
   * flight shares that attempt's outcome.
   */
  hydrateNow(): Promise<HydrateOutcome> {
    if (!this.inFlight) {
      this.inFlight = this.hydrate().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async hydrate(): Promise<HydrateOutcome> {
    const attemptedAt = new Date(this.now()).toISOString();

    const members = await this.client.fetchMembers();
    if (!members.success) {
      return this.recordFailure(attemptedAt, 'members', members.error);
    }

    const repos = await this.client.fetchRepos();
    if (!repos.success) {
      return this.recordFailure(attemptedAt, 'repos', repos.error);
    }

    const organization = await this.client.fetchOrganization();
    if (!organization.success) {
      return this.recordFailure(attemptedAt, 'organization', organization.error);
    }

    const decoded = decodeRepos(repos.data, this.org);
    if (!decoded.success) {
      return this.recordFailure(attemptedAt, 'repos', {
        kind: 'decode',
        message: decoded.error,
        status: STATUS_DECODE_FAILED,
      });
    }

    this.snapshot = Object.freeze({
      organization: organization.data,
      members: Object.freeze(members.data),
      repos: Object.freeze(repos.data),
      views: Object.freeze(buildRankedViews(decoded.repos)),
      hydrated_at_ts: attemptedAt,
    });

    this.syncStatus = {
      status_code: 200,
      error: null,
      attempted_at_ts: attemptedAt,
      last_success_ts: attemptedAt,
    };

    return { success: true, status: 200 };
  }

  private recordFailure(
    attemptedAt: string,
    stage: HydrationStage,
    error: { kind: UpstreamErrorKind; message: string; status: number },
  ): HydrateError {
    const message = `Failed to fetch ${this.org} ${stage}: ${error.message}`;

    this.syncStatus = {
      ...this.syncStatus,
      status_code: error.status,
      error: message,
      attempted_at_ts: attemptedAt,
    };

    return { success: false, status: error.status, kind: error.kind, error: message };
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  hasData(): boolean {
    return this.snapshot !== null;
  }

  /** The whole current snapshot, for callers that need fields from one hydration. */
  getSnapshot(): Snapshot | null {
    return this.snapshot;
  }

  getOrganization(): JsonObject | null {
    return this.snapshot?.organization ?? null;
  }

  getMembers(): readonly JsonObject[] {
    return this.snapshot?.members ?? [];
  }

  getRepos(): readonly JsonObject[] {
    return this.snapshot?.repos ?? [];
  }

  getView<K extends ViewKind>(kind: K): RankedList<K> {
    return this.snapshot?.views[kind] ?? [];
  }

  /**
   * The n lowest-ranked entries of a view, in ascending order.
   * n must be a positive integer; larger values are clamped to the view length.
   */
  getBottomN<K extends ViewKind>(kind: K, n: number): BottomNOutcome<K> {
    if (!Number.isInteger(n) || n <= 0) {
      return { success: false, error: 'n must be a positive integer' };
    }
    return { success: true, entries: takeBottom(this.getView(kind), n) };
  }

  getLastSyncStatus(): SyncStatus {
    return { ...this.syncStatus };
  }
}
