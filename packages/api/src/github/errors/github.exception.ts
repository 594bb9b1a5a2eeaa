import { HttpException, HttpStatus } from '@nestjs/common';
import {
  GitHubErrorContext,
  GitHubErrorContextInput,
  GitHubErrorDetails,
  GitHubErrorKind,
  GitHubErrorOptions,
  RETRYABLE_ERROR_KINDS,
  RETRYABLE_STATUS_CODES,
} from './github-error.types';

/** Shortest wait after a rate-limit error when the reset time is near or unknown */
const MIN_RATE_LIMIT_WAIT_SECONDS = 60;

/**
 * Structured GitHub API failure
 * Extends NestJS HttpException so callers can surface it directly as an HTTP error
 */
export class GitHubApiException extends HttpException {
  constructor(
    public readonly details: GitHubErrorDetails,
    status?: HttpStatus,
  ) {
    super(details.message, status ?? GitHubApiException.mapKindToStatus(details.kind), {
      cause: details.originalError,
    });

    // Maintain proper stack trace for debugging
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Build an exception, stamping the context timestamp
   */
  static create(
    kind: GitHubErrorKind,
    message: string,
    options: GitHubErrorOptions = {},
  ): GitHubApiException {
    return new GitHubApiException({
      kind,
      message,
      statusCode: options.statusCode,
      retryAfter: options.retryAfter,
      rateLimitRemaining: options.rateLimitRemaining,
      rateLimitReset: options.rateLimitReset,
      context: buildErrorContext(options.context),
      originalError: options.originalError,
      responseHeaders: options.responseHeaders,
    });
  }

  /**
   * Map error kind to the HTTP status reported to our own callers
   */
  private static mapKindToStatus(kind: GitHubErrorKind): HttpStatus {
    switch (kind) {
      case GitHubErrorKind.RATE_LIMIT_EXCEEDED:
        return HttpStatus.TOO_MANY_REQUESTS;
      case GitHubErrorKind.AUTHENTICATION_FAILED:
      case GitHubErrorKind.TOKEN_EXPIRED:
        return HttpStatus.UNAUTHORIZED;
      case GitHubErrorKind.AUTHORIZATION_FAILED:
        return HttpStatus.FORBIDDEN;
      case GitHubErrorKind.REPOSITORY_NOT_FOUND:
      case GitHubErrorKind.INSTALLATION_NOT_FOUND:
      case GitHubErrorKind.COMMIT_NOT_FOUND:
      case GitHubErrorKind.FILE_NOT_FOUND:
        return HttpStatus.NOT_FOUND;
      case GitHubErrorKind.MALFORMED_DATA:
        return HttpStatus.BAD_REQUEST;
      case GitHubErrorKind.INVALID_CONFIGURATION:
      case GitHubErrorKind.INVALID_CREDENTIALS:
      case GitHubErrorKind.MISSING_CREDENTIALS:
      case GitHubErrorKind.INVALID_PRIVATE_KEY:
        return HttpStatus.INTERNAL_SERVER_ERROR;
      default:
        return HttpStatus.BAD_GATEWAY;
    }
  }

  get kind(): GitHubErrorKind {
    return this.details.kind;
  }

  /** Status of the GitHub response, not of this exception */
  get statusCode(): number | undefined {
    return this.details.statusCode;
  }

  getDetails(): GitHubErrorDetails {
    return this.details;
  }

  isRetryable(): boolean {
    if (RETRYABLE_ERROR_KINDS.has(this.details.kind)) {
      return true;
    }
    return (
      this.details.statusCode !== undefined &&
      RETRYABLE_STATUS_CODES.has(this.details.statusCode)
    );
  }

  /**
   * Recommended wait in seconds before the next attempt
   *
   * @param attempt - Zero-based attempt that just failed
   * @param baseDelaySeconds - Backoff base
   * @param nowMs - Current time, for reset-relative waits
   */
  getRetryDelay(attempt = 0, baseDelaySeconds = 1, nowMs = Date.now()): number {
    if (this.details.retryAfter !== undefined) {
      return this.details.retryAfter;
    }

    if (
      this.details.kind === GitHubErrorKind.RATE_LIMIT_EXCEEDED &&
      this.details.rateLimitReset !== undefined
    ) {
      const untilReset = this.details.rateLimitReset - nowMs / 1000;
      return Math.max(untilReset, MIN_RATE_LIMIT_WAIT_SECONDS);
    }

    const delay = baseDelaySeconds * Math.pow(2, attempt);
    const jitter = 0.1 + Math.random() * 0.2;
    return delay + delay * jitter;
  }

  /**
   * Plain serialisable form for logs and API payloads
   */
  toRecord(): Record<string, unknown> {
    return {
      error_type: this.details.kind,
      message: this.details.message,
      status_code: this.details.statusCode ?? null,
      retry_after: this.details.retryAfter ?? null,
      rate_limit_remaining: this.details.rateLimitRemaining ?? null,
      rate_limit_reset: this.details.rateLimitReset ?? null,
      is_retryable: this.isRetryable(),
      context: { ...this.details.context },
    };
  }
}

export function buildErrorContext(input?: GitHubErrorContextInput): GitHubErrorContext {
  return {
    ...input,
    timestamp: input?.timestamp ?? new Date().toISOString(),
  };
}

export function createAuthenticationError(
  message: string,
  context?: GitHubErrorContextInput,
): GitHubApiException {
  return GitHubApiException.create(GitHubErrorKind.AUTHENTICATION_FAILED, message, {
    statusCode: 401,
    context,
  });
}

export function createRateLimitError(
  message: string,
  resetTime?: number,
  remaining?: number,
  context?: GitHubErrorContextInput,
): GitHubApiException {
  return GitHubApiException.create(GitHubErrorKind.RATE_LIMIT_EXCEEDED, message, {
    statusCode: 429,
    rateLimitReset: resetTime,
    rateLimitRemaining: remaining,
    context,
  });
}

export function createNetworkError(
  message: string,
  cause?: unknown,
  context?: GitHubErrorContextInput,
): GitHubApiException {
  return GitHubApiException.create(GitHubErrorKind.NETWORK_ERROR, message, {
    originalError: cause,
    context,
  });
}

export function createRepositoryNotFoundError(owner: string, repo: string): GitHubApiException {
  return GitHubApiException.create(
    GitHubErrorKind.REPOSITORY_NOT_FOUND,
    `Repository ${owner}/${repo} not found or not accessible`,
    {
      statusCode: 404,
      context: { repository: `${owner}/${repo}` },
    },
  );
}

export function createValidationError(
  message: string,
  context?: GitHubErrorContextInput,
): GitHubApiException {
  return GitHubApiException.create(GitHubErrorKind.MALFORMED_DATA, message, { context });
}
