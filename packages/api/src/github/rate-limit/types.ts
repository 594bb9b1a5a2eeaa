import { GitHubApiException } from '../errors/github.exception';

/**
 * Types for GitHub API rate-limit tracking
 */

/**
 * Quota buckets GitHub reports separately
 */
export enum RateLimitResource {
  CORE = 'core',
  SEARCH = 'search',
  GRAPHQL = 'graphql',
  INTEGRATION_MANIFEST = 'integration_manifest',
  SOURCE_IMPORT = 'source_import',
  CODE_SCANNING_UPLOAD = 'code_scanning_upload',
}

/**
 * Rate limit snapshot parsed from GitHub API response headers
 */
export interface RateLimitInfo {
  /** Total request limit per window */
  limit: number;
  /** Remaining requests in current window */
  remaining: number;
  /** Timestamp when rate limit resets (Unix epoch seconds) */
  resetAt: number;
  /** Requests used in current window */
  used: number;
  /** Resource name (core, search, graphql, ...) */
  resource: string;
}

/**
 * Snapshot plus values derived from the current time
 */
export interface RateLimitStatus extends RateLimitInfo {
  resetInSeconds: number;
  resetInMinutes: number;
  /** used / limit * 100, 0 when the limit is unknown */
  usagePercentage: number;
  isExhausted: (buffer?: number) => boolean;
}

export type RateLimitWarningCallback = (
  resource: string,
  status: RateLimitStatus,
  threshold: number,
) => void;
export type RateLimitExceededCallback = (resource: string, error: GitHubApiException) => void;
export type RateLimitResetCallback = (resource: string, status: RateLimitStatus) => void;

/**
 * Callback signature per event name
 */
export interface RateLimitCallbacks {
  warning: RateLimitWarningCallback;
  exceeded: RateLimitExceededCallback;
  reset: RateLimitResetCallback;
}

export type RateLimitEvent = keyof RateLimitCallbacks;

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  /** Requests kept in reserve before callers are told to wait */
  bufferRequests: number;
  /** Sleep automatically when the quota is exhausted */
  autoWait: boolean;
  /** Seconds added after the reset time before resuming */
  resetBufferSeconds: number;
  /** Usage fractions that trigger a warning, checked highest first */
  warningThresholds: number[];
}

export interface RateLimitStatistics {
  totalRequests: number;
  rateLimitedRequests: number;
  autoWaits: number;
  totalWaitSeconds: number;
  /** Epoch milliseconds of the last observed window reset, per resource */
  lastResetTimes: Record<string, number>;
  rateLimitPercentage: number;
  averageWaitSeconds: number;
  currentLimits: Record<string, RateLimitInfo & { resetInSeconds: number; usagePercentage: number }>;
}
