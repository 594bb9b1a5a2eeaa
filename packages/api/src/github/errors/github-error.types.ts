/**
 * GitHub API Error Types
 * Closed set of failure kinds produced at the network boundary
 */
export enum GitHubErrorKind {
  /** Credentials were rejected (401 without a token hint) */
  AUTHENTICATION_FAILED = 'authentication_failed',

  /** Credentials accepted but lacking permission (403) */
  AUTHORIZATION_FAILED = 'authorization_failed',

  /**
   * Installation token or App assertion no longer valid (401 mentioning token/jwt)
   * Retried after forcing a new token
   */
  TOKEN_EXPIRED = 'token_expired',

  /** App id or private key is malformed */
  INVALID_CREDENTIALS = 'invalid_credentials',

  /**
   * Quota exhausted (429, or 403 mentioning rate limit)
   * Retry after reset time from headers
   */
  RATE_LIMIT_EXCEEDED = 'rate_limit_exceeded',

  /** Any other non-2xx response, including 5xx */
  API_ERROR = 'api_error',

  NETWORK_ERROR = 'network_error',
  TIMEOUT_ERROR = 'timeout_error',

  REPOSITORY_NOT_FOUND = 'repository_not_found',

  /** The App is not installed on the repository */
  INSTALLATION_NOT_FOUND = 'installation_not_found',

  COMMIT_NOT_FOUND = 'commit_not_found',
  FILE_NOT_FOUND = 'file_not_found',

  INVALID_CONFIGURATION = 'invalid_configuration',
  MISSING_CREDENTIALS = 'missing_credentials',
  INVALID_PRIVATE_KEY = 'invalid_private_key',

  /** Response body could not be parsed or had an unexpected shape */
  INVALID_RESPONSE = 'invalid_response',

  /** Caller supplied data that cannot be sent (bad state, directory path, ...) */
  MALFORMED_DATA = 'malformed_data',

  /** Resource exceeds what the API will return inline */
  LARGE_RESPONSE = 'large_response',

  UNKNOWN = 'unknown_error',
}

export const RETRYABLE_ERROR_KINDS: ReadonlySet<GitHubErrorKind> = new Set([
  GitHubErrorKind.RATE_LIMIT_EXCEEDED,
  GitHubErrorKind.NETWORK_ERROR,
  GitHubErrorKind.TIMEOUT_ERROR,
  GitHubErrorKind.API_ERROR,
  GitHubErrorKind.TOKEN_EXPIRED,
]);

export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([
  429, 500, 502, 503, 504,
]);

/**
 * Where a failure happened
 */
export interface GitHubErrorContext {
  /** owner/repo */
  repository?: string;
  commitSha?: string;
  filePath?: string;
  apiEndpoint?: string;
  requestId?: string;
  userAgent?: string;
  /** ISO-8601, stamped when the error is built */
  timestamp: string;
}

export type GitHubErrorContextInput = Partial<GitHubErrorContext>;

/**
 * One failed attempt inside a retry sequence
 */
export interface RetryHistoryEntry {
  attempt: number;
  timestamp: string;
  kind: GitHubErrorKind;
  message: string;
  /** Delay scheduled before the next attempt, 0 for the final one */
  delaySeconds: number;
}

/**
 * GitHub API error details
 */
export interface GitHubErrorDetails {
  kind: GitHubErrorKind;

  message: string;

  /** HTTP status code (if a response was received) */
  statusCode?: number;

  /** Seconds from a Retry-After header */
  retryAfter?: number;

  rateLimitRemaining?: number;

  /** Unix timestamp (seconds) when the quota window resets */
  rateLimitReset?: number;

  context: GitHubErrorContext;

  /** Cause as thrown by the transport or runtime */
  originalError?: unknown;

  responseHeaders?: Record<string, string>;

  retryHistory?: RetryHistoryEntry[];
}

/**
 * Construction options for GitHubApiException.create
 */
export interface GitHubErrorOptions {
  statusCode?: number;
  retryAfter?: number;
  rateLimitRemaining?: number;
  rateLimitReset?: number;
  context?: GitHubErrorContextInput;
  originalError?: unknown;
  responseHeaders?: Record<string, string>;
}
