import { Injectable, Logger } from '@nestjs/common';
import { ClockService } from '../../common/clock/clock.service';
import { getIntegerHeader, HttpHeaders } from '../../common/http/headers';
import { GitHubApiException } from '../errors/github.exception';
import { GitHubErrorKind } from '../errors/github-error.types';
import {
  RateLimitCallbacks,
  RateLimitConfig,
  RateLimitEvent,
  RateLimitInfo,
  RateLimitResource,
  RateLimitStatistics,
  RateLimitStatus,
} from './types';

/**
 * GitHub API Rate Limit Tracking Service
 *
 * Features:
 * - Per-resource quota snapshots (core, search, graphql, ...) from response headers
 * - Optimistic local decrement between header refreshes
 * - Preemptive waiting when remaining quota falls to the reserve buffer
 * - Warning / exceeded / reset callbacks
 *
 * State is only mutated synchronously, so concurrent callers on the event loop
 * never observe a half-written snapshot.
 */
@Injectable()
export class RateLimitService {
  private readonly logger = new Logger(RateLimitService.name);

  private snapshots = new Map<string, RateLimitInfo>();

  private callbacks: { [E in RateLimitEvent]: Array<RateLimitCallbacks[E]> } = {
    warning: [],
    exceeded: [],
    reset: [],
  };

  private stats = this.emptyStats();

  // Configuration with defaults
  private config: RateLimitConfig = {
    bufferRequests: 10,
    autoWait: true,
    resetBufferSeconds: 10,
    warningThresholds: [0.9, 0.8, 0.5],
  };

  constructor(private readonly clock: ClockService) {}

  /**
   * Update configuration
   */
  configure(config: Partial<RateLimitConfig>): void {
    this.config = { ...this.config, ...config };
    this.logger.log(`Rate limit config updated: ${JSON.stringify(this.config)}`);
  }

  getConfig(): RateLimitConfig {
    return { ...this.config };
  }

  /**
   * Replace the snapshot for a resource from GitHub response headers
   *
   * @param headers - Response headers (any casing)
   * @param resource - Quota bucket the request counted against
   */
  observe(headers: HttpHeaders, resource: string = RateLimitResource.CORE): void {
    const limit = getIntegerHeader(headers, 'x-ratelimit-limit');
    const remaining = getIntegerHeader(headers, 'x-ratelimit-remaining');
    const resetAt = getIntegerHeader(headers, 'x-ratelimit-reset');

    if (limit === undefined || remaining === undefined || resetAt === undefined) {
      this.logger.debug(`No usable rate limit headers for ${resource}`);
      return;
    }

    const used = getIntegerHeader(headers, 'x-ratelimit-used') ?? limit - remaining;
    const previous = this.snapshots.get(resource);
    const snapshot: RateLimitInfo = { limit, remaining, resetAt, used, resource };
    this.snapshots.set(resource, snapshot);

    const status = this.toStatus(snapshot);

    if (previous && previous.resetAt !== resetAt) {
      this.stats.lastResetTimes[resource] = this.clock.now();
      this.logger.log(`Rate limit reset for ${resource}: ${limit} requests available`);
      this.emit('reset', (callback) => callback(resource, status));
    }

    const line = `Rate limit ${resource}: ${remaining}/${limit} remaining (resets at ${new Date(
      resetAt * 1000,
    ).toISOString()})`;
    if (remaining < 100) {
      this.logger.warn(line);
    } else {
      this.logger.debug(line);
    }

    this.checkWarnings(status);
  }

  getStatus(resource: string = RateLimitResource.CORE): RateLimitStatus | undefined {
    const snapshot = this.snapshots.get(resource);
    return snapshot ? this.toStatus(snapshot) : undefined;
  }

  getAllStatuses(): Record<string, RateLimitStatus> {
    const result: Record<string, RateLimitStatus> = {};
    for (const [resource, snapshot] of this.snapshots.entries()) {
      result[resource] = this.toStatus(snapshot);
    }
    return result;
  }

  /**
   * True when the remaining quota is at or below the reserve buffer
   */
  shouldWait(
    resource: string = RateLimitResource.CORE,
    bufferRequests: number = this.config.bufferRequests,
  ): boolean {
    const snapshot = this.snapshots.get(resource);
    if (!snapshot) {
      return false;
    }
    return snapshot.remaining <= bufferRequests;
  }

  /**
   * Seconds until the window resets plus the reset buffer, 0 when unknown
   */
  calculateWaitTime(resource: string = RateLimitResource.CORE): number {
    const snapshot = this.snapshots.get(resource);
    if (!snapshot) {
      return 0;
    }
    return this.secondsUntil(snapshot.resetAt) + this.config.resetBufferSeconds;
  }

  /**
   * Sleep until the window resets when the quota is exhausted and auto-wait is on
   *
   * @returns Whether a wait happened
   */
  async waitIfNeeded(resource: string = RateLimitResource.CORE): Promise<boolean> {
    if (!this.config.autoWait || !this.shouldWait(resource)) {
      return false;
    }

    // A window whose reset has passed no longer limits anything
    const snapshot = this.snapshots.get(resource);
    if (snapshot && this.secondsUntil(snapshot.resetAt) === 0) {
      return false;
    }

    const waitSeconds = this.calculateWaitTime(resource);
    if (waitSeconds <= 0) {
      return false;
    }

    this.logger.warn(
      `Waiting ${waitSeconds.toFixed(1)}s for ${resource} rate limit reset (remaining: ${snapshot?.remaining ?? 'unknown'})`,
    );
    this.stats.autoWaits++;
    this.stats.totalWaitSeconds += waitSeconds;
    await this.clock.sleep(waitSeconds * 1000);
    return true;
  }

  /**
   * Count a request and optimistically spend one unit of the local quota
   */
  recordRequest(resource: string = RateLimitResource.CORE): void {
    this.stats.totalRequests++;
    const snapshot = this.snapshots.get(resource);
    if (snapshot && snapshot.remaining > 0) {
      this.snapshots.set(resource, {
        ...snapshot,
        remaining: snapshot.remaining - 1,
        used: snapshot.used + 1,
      });
    }
  }

  /**
   * React to an explicit rate-limit failure
   *
   * Overwrites the snapshot from the error's rate-limit fields, notifies
   * listeners and, with auto-wait on, sleeps for the error's recommended delay.
   * Callers that wait through a retry engine pass `wait: false`.
   */
  async handleRateLimitError(
    error: GitHubApiException,
    resource: string = RateLimitResource.CORE,
    options: { wait?: boolean } = {},
  ): Promise<void> {
    this.stats.rateLimitedRequests++;

    const { rateLimitRemaining, rateLimitReset } = error.details;
    if (rateLimitRemaining !== undefined && rateLimitReset !== undefined) {
      const previous = this.snapshots.get(resource);
      const limit = previous?.limit ?? rateLimitRemaining;
      this.snapshots.set(resource, {
        limit,
        remaining: rateLimitRemaining,
        resetAt: rateLimitReset,
        used: Math.max(0, limit - rateLimitRemaining),
        resource,
      });
    }

    this.logger.error(`Rate limit exceeded for ${resource}: ${error.message}`);
    this.emit('exceeded', (callback) => callback(resource, error));

    if (
      options.wait === false ||
      !this.config.autoWait ||
      error.kind !== GitHubErrorKind.RATE_LIMIT_EXCEEDED
    ) {
      return;
    }

    const waitSeconds = error.getRetryDelay(0, 1, this.clock.now());
    if (waitSeconds > 0) {
      this.logger.warn(`Rate limit exceeded, waiting ${waitSeconds.toFixed(1)}s`);
      this.stats.autoWaits++;
      this.stats.totalWaitSeconds += waitSeconds;
      await this.clock.sleep(waitSeconds * 1000);
    }
  }

  /**
   * Register a listener for a rate-limit event
   */
  registerCallback<E extends RateLimitEvent>(event: E, callback: RateLimitCallbacks[E]): void {
    const listeners: Array<RateLimitCallbacks[E]> | undefined = this.callbacks[event];
    if (!listeners) {
      throw GitHubApiException.create(
        GitHubErrorKind.INVALID_CONFIGURATION,
        `Unknown rate limit event: ${String(event)}`,
      );
    }
    listeners.push(callback);
  }

  getStatistics(): RateLimitStatistics {
    const currentLimits: RateLimitStatistics['currentLimits'] = {};
    for (const [resource, snapshot] of this.snapshots.entries()) {
      const status = this.toStatus(snapshot);
      currentLimits[resource] = {
        ...snapshot,
        resetInSeconds: status.resetInSeconds,
        usagePercentage: status.usagePercentage,
      };
    }

    return {
      ...this.stats,
      lastResetTimes: { ...this.stats.lastResetTimes },
      rateLimitPercentage:
        this.stats.totalRequests > 0
          ? (this.stats.rateLimitedRequests / this.stats.totalRequests) * 100
          : 0,
      averageWaitSeconds:
        this.stats.autoWaits > 0 ? this.stats.totalWaitSeconds / this.stats.autoWaits : 0,
      currentLimits,
    };
  }

  /**
   * Forget all snapshots, listeners and counters (for testing)
   */
  reset(): void {
    this.snapshots.clear();
    this.callbacks = { warning: [], exceeded: [], reset: [] };
    this.stats = this.emptyStats();
  }

  private checkWarnings(status: RateLimitStatus): void {
    const thresholds = [...this.config.warningThresholds].sort((a, b) => b - a);
    const crossed = thresholds.find((threshold) => status.usagePercentage >= threshold * 100);
    if (crossed === undefined) {
      return;
    }

    this.logger.warn(
      `Rate limit warning for ${status.resource}: ${status.usagePercentage.toFixed(1)}% used ` +
        `(${status.remaining} remaining, resets in ${status.resetInMinutes.toFixed(1)} min)`,
    );
    this.emit('warning', (callback) => callback(status.resource, status, crossed));
  }

  /**
   * Invoke listeners synchronously; a throwing listener is logged, never rethrown
   */
  private emit<E extends RateLimitEvent>(
    event: E,
    invoke: (callback: RateLimitCallbacks[E]) => void,
  ): void {
    const listeners: Array<RateLimitCallbacks[E]> = this.callbacks[event];
    for (const callback of listeners) {
      try {
        invoke(callback);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Error in rate limit ${event} callback: ${message}`);
      }
    }
  }

  private toStatus(snapshot: RateLimitInfo): RateLimitStatus {
    const resetInSeconds = this.secondsUntil(snapshot.resetAt);
    return {
      ...snapshot,
      resetInSeconds,
      resetInMinutes: resetInSeconds / 60,
      usagePercentage: snapshot.limit > 0 ? (snapshot.used / snapshot.limit) * 100 : 0,
      isExhausted: (buffer = 0) => snapshot.remaining <= buffer,
    };
  }

  private secondsUntil(epochSeconds: number): number {
    return Math.max(0, epochSeconds - this.clock.now() / 1000);
  }

  private emptyStats(): Omit<
    RateLimitStatistics,
    'rateLimitPercentage' | 'averageWaitSeconds' | 'currentLimits'
  > {
    return {
      totalRequests: 0,
      rateLimitedRequests: 0,
      autoWaits: 0,
      totalWaitSeconds: 0,
      lastResetTimes: {},
    };
  }
}
