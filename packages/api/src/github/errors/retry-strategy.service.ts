import { Injectable, Logger } from '@nestjs/common';
import { ClockService } from '../../common/clock/clock.service';
import { RateLimitService } from '../rate-limit/rate-limit.service';
import { ErrorCategorizationService } from './error-categorization.service';
import { GitHubApiException } from './github.exception';
import {
  GitHubErrorContextInput,
  GitHubErrorKind,
  RETRYABLE_ERROR_KINDS,
  RETRYABLE_STATUS_CODES,
  RetryHistoryEntry,
} from './github-error.types';

/**
 * Immutable retry policy; delays are in seconds
 */
export interface RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelay: number;
  readonly maxDelay: number;
  readonly exponentialBase: number;
  readonly jitter: boolean;
  readonly jitterRange: readonly [number, number];
  readonly retryableKinds: ReadonlySet<GitHubErrorKind>;
  readonly retryableStatusCodes: ReadonlySet<number>;
  readonly respectRetryAfter: boolean;
  readonly maxRetryAfter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxRetries: 3,
  baseDelay: 1,
  maxDelay: 60,
  exponentialBase: 2,
  jitter: true,
  jitterRange: [0.1, 0.3] as const,
  retryableKinds: RETRYABLE_ERROR_KINDS,
  retryableStatusCodes: RETRYABLE_STATUS_CODES,
  respectRetryAfter: true,
  maxRetryAfter: 300,
});

/** Seconds added to a rate-limit reset before retrying */
const RATE_LIMIT_RESET_BUFFER_SECONDS = 10;

/**
 * A retry about to be scheduled
 */
export interface RetryAttemptEvent {
  /** 1-based number of the retry */
  attempt: number;
  delaySeconds: number;
  error: GitHubApiException;
}

export interface RetryOptions {
  policy?: Partial<RetryPolicy>;
  /** Context stamped onto errors converted from raw exceptions */
  context?: GitHubErrorContextInput;
  /** Rate-limit resource to wait on before each attempt */
  resource?: string;
  onRetry?: (event: RetryAttemptEvent) => void;
  /** Veto for errors the policy would otherwise retry */
  retryIf?: (error: GitHubApiException) => boolean;
}

export interface RetryStats {
  totalAttempts: number;
  totalRetries: number;
  /** Operations that succeeded after at least one retry */
  successfulRetries: number;
  /** Operations that gave up after at least one retry */
  failedRetries: number;
  totalDelaySeconds: number;
  errorKindCounts: Partial<Record<GitHubErrorKind, number>>;
}

export interface RetryStatsReport extends RetryStats {
  successRate: number;
  averageDelayPerRetry: number;
}

/**
 * Retry Strategy Service
 *
 * Executes GitHub operations with classified, backoff-based retries:
 * - Converts any thrown value into a GitHubApiException before deciding
 * - Honours Retry-After and rate-limit reset times
 * - Optionally pauses on the rate-limit tracker before each attempt
 * - Tracks aggregate retry statistics
 */
@Injectable()
export class RetryStrategyService {
  private readonly logger = new Logger(RetryStrategyService.name);

  private defaultPolicy: RetryPolicy = DEFAULT_RETRY_POLICY;

  private stats: RetryStats = this.emptyStats();

  constructor(
    private readonly errorCategorization: ErrorCategorizationService,
    private readonly rateLimit: RateLimitService,
    private readonly clock: ClockService,
  ) {}

  /**
   * Override the policy used when a call passes none
   */
  configure(policy: Partial<RetryPolicy>): void {
    this.defaultPolicy = { ...this.defaultPolicy, ...policy };
  }

  getPolicy(): RetryPolicy {
    return this.defaultPolicy;
  }

  /**
   * Execute operation with automatic retry logic
   *
   * @param operation - Async function to execute, given the zero-based attempt
   * @param options - Policy overrides, error context, rate-limit resource
   * @returns Operation result
   * @throws GitHubApiException - Last error once retries are exhausted or on a non-retryable error
   */
  async executeWithRetry<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions = {},
  ): Promise<T> {
    const policy: RetryPolicy = { ...this.defaultPolicy, ...options.policy };
    const history: RetryHistoryEntry[] = [];
    let totalDelay = 0;

    for (let attempt = 0; ; attempt++) {
      this.stats.totalAttempts++;

      if (options.resource) {
        await this.rateLimit.waitIfNeeded(options.resource);
      }

      try {
        const result = await operation(attempt);

        if (attempt > 0) {
          this.stats.successfulRetries++;
          this.logger.log(
            `Operation succeeded after ${attempt} retries (total delay: ${totalDelay.toFixed(1)}s)`,
          );
        }

        return result;
      } catch (caught) {
        const error = this.errorCategorization.categorize(caught, options.context);
        this.stats.errorKindCounts[error.kind] = (this.stats.errorKindCounts[error.kind] ?? 0) + 1;

        const retry =
          this.shouldRetry(error, attempt, policy) && (options.retryIf?.(error) ?? true);
        if (!retry) {
          history.push(this.historyEntry(attempt, error, 0));
          error.details.retryHistory = history;

          if (attempt === 0) {
            this.errorCategorization.logError(error);
          } else {
            this.stats.failedRetries++;
            this.logger.error(
              `All retry attempts exhausted after ${attempt} retries (total delay: ${totalDelay.toFixed(1)}s): ${error.message}`,
            );
          }
          throw error;
        }

        const delay = this.calculateDelay(error, attempt, policy, options.resource);
        history.push(this.historyEntry(attempt, error, delay));
        totalDelay += delay;
        this.stats.totalRetries++;
        this.stats.totalDelaySeconds += delay;

        this.logger.warn(
          `Retrying after ${error.kind} (retry ${attempt + 1}/${policy.maxRetries}) in ${delay.toFixed(2)}s: ${error.message}`,
        );
        options.onRetry?.({ attempt: attempt + 1, delaySeconds: delay, error });

        if (delay > 0) {
          await this.clock.sleep(delay * 1000);
        }
      }
    }
  }

  /**
   * Decide whether a failed attempt should be retried
   *
   * @param attempt - Zero-based attempt that just failed
   */
  shouldRetry(
    error: GitHubApiException,
    attempt: number,
    policy: RetryPolicy = this.defaultPolicy,
  ): boolean {
    if (attempt >= policy.maxRetries) {
      return false;
    }

    if (!policy.retryableKinds.has(error.kind)) {
      return false;
    }

    const status = error.statusCode;
    if (
      status !== undefined &&
      !policy.retryableStatusCodes.has(status) &&
      status < 500 &&
      error.kind !== GitHubErrorKind.RATE_LIMIT_EXCEEDED &&
      error.kind !== GitHubErrorKind.TOKEN_EXPIRED
    ) {
      return false;
    }

    return error.kind !== GitHubErrorKind.AUTHENTICATION_FAILED;
  }

  /**
   * Delay in seconds before the next attempt
   */
  calculateDelay(
    error: GitHubApiException,
    attempt: number,
    policy: RetryPolicy = this.defaultPolicy,
    resource?: string,
  ): number {
    const { retryAfter } = error.details;
    if (policy.respectRetryAfter && retryAfter !== undefined) {
      return Math.min(retryAfter, policy.maxRetryAfter);
    }

    if (error.kind === GitHubErrorKind.RATE_LIMIT_EXCEEDED) {
      const reset =
        error.details.rateLimitReset ??
        (resource !== undefined ? this.rateLimit.getStatus(resource)?.resetAt : undefined);
      if (reset !== undefined) {
        const untilReset = reset - this.clock.now() / 1000;
        if (untilReset > 0) {
          return Math.min(untilReset + RATE_LIMIT_RESET_BUFFER_SECONDS, policy.maxRetryAfter);
        }
      }
    }

    let delay = policy.baseDelay * Math.pow(policy.exponentialBase, attempt);

    if (policy.jitter) {
      const [low, high] = policy.jitterRange;
      delay += delay * (low + Math.random() * (high - low));
    }

    return Math.min(delay, policy.maxDelay);
  }

  getRetryStats(): RetryStatsReport {
    const finished = this.stats.successfulRetries + this.stats.failedRetries;
    return {
      ...this.stats,
      errorKindCounts: { ...this.stats.errorKindCounts },
      successRate: finished > 0 ? this.stats.successfulRetries / finished : 0,
      averageDelayPerRetry:
        this.stats.totalRetries > 0 ? this.stats.totalDelaySeconds / this.stats.totalRetries : 0,
    };
  }

  resetStats(): void {
    this.stats = this.emptyStats();
  }

  private historyEntry(
    attempt: number,
    error: GitHubApiException,
    delaySeconds: number,
  ): RetryHistoryEntry {
    return {
      attempt,
      timestamp: new Date(this.clock.now()).toISOString(),
      kind: error.kind,
      message: error.message,
      delaySeconds,
    };
  }

  private emptyStats(): RetryStats {
    return {
      totalAttempts: 0,
      totalRetries: 0,
      successfulRetries: 0,
      failedRetries: 0,
      totalDelaySeconds: 0,
      errorKindCounts: {},
    };
  }
}
