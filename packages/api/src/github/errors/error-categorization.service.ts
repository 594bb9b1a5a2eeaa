import { Injectable, Logger } from '@nestjs/common';
import { getIntegerHeader, HttpHeaders } from '../../common/http/headers';
import { isRecord, messageOf, readString } from '../../common/utils/json-readers';
import { GitHubApiException } from './github.exception';
import { GitHubErrorContextInput, GitHubErrorKind } from './github-error.types';

/**
 * HTTP response as seen by the classifier
 */
export interface ClassifiableResponse {
  status: number;
  headers?: HttpHeaders;
  data?: unknown;
}

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
]);

const CREDENTIAL_TERMS = ['private key', 'jwt', 'token', 'app id'];

/**
 * Error Categorization Service
 *
 * Turns raw GitHub responses and thrown runtime errors into GitHubApiException
 * instances with a kind from the closed GitHubErrorKind set.
 */
@Injectable()
export class ErrorCategorizationService {
  private readonly logger = new Logger(ErrorCategorizationService.name);

  /**
   * Categorize any thrown value
   *
   * Already-structured errors pass through unchanged.
   */
  categorize(error: unknown, context?: GitHubErrorContextInput): GitHubApiException {
    if (error instanceof GitHubApiException) {
      return error;
    }

    const response = this.extractResponse(error);
    if (response) {
      return this.classifyHttpError(response, context, error);
    }

    return this.classifyException(error, context);
  }

  /**
   * Build a structured error from a non-2xx response
   */
  classifyHttpError(
    response: ClassifiableResponse,
    context?: GitHubErrorContextInput,
    originalError?: unknown,
  ): GitHubApiException {
    const bodyText = this.bodyText(response.data);
    const kind = this.kindForStatus(response.status, bodyText);
    const apiMessage = this.extractApiMessage(response.data) ?? `HTTP ${response.status}`;

    return GitHubApiException.create(
      kind,
      `GitHub API request failed with status ${response.status}: ${apiMessage}`,
      {
        statusCode: response.status,
        retryAfter: getIntegerHeader(response.headers, 'retry-after'),
        rateLimitRemaining: getIntegerHeader(response.headers, 'x-ratelimit-remaining'),
        rateLimitReset: getIntegerHeader(response.headers, 'x-ratelimit-reset'),
        responseHeaders: response.headers,
        context,
        originalError,
      },
    );
  }

  /**
   * Build a structured error from a thrown value that carries no HTTP response
   */
  classifyException(error: unknown, context?: GitHubErrorContextInput): GitHubApiException {
    const kind = this.kindForException(error);
    const prefix =
      kind === GitHubErrorKind.UNKNOWN ? 'Unexpected error' : this.describeKind(kind);

    return GitHubApiException.create(kind, `${prefix}: ${messageOf(error)}`, {
      context,
      originalError: error,
    });
  }

  /**
   * Status-code classification, refined by the lower-cased response body
   */
  kindForStatus(status: number, body = ''): GitHubErrorKind {
    const text = body.toLowerCase();

    if (status === 401) {
      return text.includes('token') || text.includes('jwt')
        ? GitHubErrorKind.TOKEN_EXPIRED
        : GitHubErrorKind.AUTHENTICATION_FAILED;
    }

    if (status === 403) {
      return text.includes('rate limit')
        ? GitHubErrorKind.RATE_LIMIT_EXCEEDED
        : GitHubErrorKind.AUTHORIZATION_FAILED;
    }

    if (status === 404) {
      if (text.includes('repository')) return GitHubErrorKind.REPOSITORY_NOT_FOUND;
      if (text.includes('installation')) return GitHubErrorKind.INSTALLATION_NOT_FOUND;
      if (text.includes('commit')) return GitHubErrorKind.COMMIT_NOT_FOUND;
      return GitHubErrorKind.FILE_NOT_FOUND;
    }

    if (status === 429) {
      return GitHubErrorKind.RATE_LIMIT_EXCEEDED;
    }

    if (status >= 400) {
      return GitHubErrorKind.API_ERROR;
    }

    return GitHubErrorKind.UNKNOWN;
  }

  /**
   * Runtime-error classification by name, code and message
   */
  kindForException(error: unknown): GitHubErrorKind {
    const name = error instanceof Error ? error.name : '';
    const code = this.extractCode(error);
    const message = messageOf(error).toLowerCase();

    if (
      name === 'TimeoutError' ||
      (code !== undefined && TIMEOUT_CODES.has(code)) ||
      message.includes('timed out') ||
      message.includes('timeout')
    ) {
      return GitHubErrorKind.TIMEOUT_ERROR;
    }

    if (
      name === 'NetworkError' ||
      (code !== undefined && CONNECTION_CODES.has(code)) ||
      Array.from(CONNECTION_CODES).some((c) => message.includes(c.toLowerCase())) ||
      message.includes('fetch failed') ||
      message.includes('socket hang up') ||
      message.includes('network') ||
      message.includes('connection')
    ) {
      return GitHubErrorKind.NETWORK_ERROR;
    }

    if (code === 'ENOENT') {
      return message.includes('private key')
        ? GitHubErrorKind.INVALID_PRIVATE_KEY
        : GitHubErrorKind.MISSING_CREDENTIALS;
    }

    if (error instanceof SyntaxError || message.includes('json')) {
      return GitHubErrorKind.INVALID_RESPONSE;
    }

    if (this.isMalformedValue(error, code)) {
      return CREDENTIAL_TERMS.some((term) => message.includes(term))
        ? GitHubErrorKind.INVALID_CREDENTIALS
        : GitHubErrorKind.INVALID_CONFIGURATION;
    }

    return GitHubErrorKind.UNKNOWN;
  }

  /**
   * Log a structured error with its context
   *
   * Retryable failures are warnings; terminal ones are errors.
   */
  logError(error: GitHubApiException): void {
    const { context, statusCode } = error.details;
    const parts: string[] = [];
    if (context.repository) parts.push(`repo=${context.repository}`);
    if (context.commitSha) parts.push(`commit=${context.commitSha.slice(0, 8)}`);
    if (context.apiEndpoint) parts.push(`endpoint=${context.apiEndpoint}`);
    if (statusCode !== undefined) parts.push(`status=${statusCode}`);

    const suffix = parts.length > 0 ? ` [${parts.join(', ')}]` : '';
    const line = `GitHub API Error: ${error.details.message}${suffix}`;

    if (error.isRetryable()) {
      this.logger.warn(line);
    } else {
      this.logger.error(line);
    }
  }

  private extractResponse(error: unknown): ClassifiableResponse | undefined {
    if (!isRecord(error)) {
      return undefined;
    }

    const response = error.response;
    if (isRecord(response) && typeof response.status === 'number') {
      return {
        status: response.status,
        headers: this.toHeaders(response.headers),
        data: response.data,
      };
    }

    // Errors that carry a status but no response came from the runtime, not from GitHub
    return undefined;
  }

  private toHeaders(value: unknown): HttpHeaders | undefined {
    if (!isRecord(value)) {
      return undefined;
    }
    const headers: HttpHeaders = {};
    for (const [name, raw] of Object.entries(value)) {
      if (typeof raw === 'string' || typeof raw === 'number') {
        headers[name.toLowerCase()] = String(raw);
      }
    }
    return headers;
  }

  private extractCode(error: unknown): string | undefined {
    if (!isRecord(error)) {
      return undefined;
    }
    if (typeof error.code === 'string') {
      return error.code;
    }
    const cause = error.cause;
    if (isRecord(cause) && typeof cause.code === 'string') {
      return cause.code;
    }
    return undefined;
  }

  private isMalformedValue(error: unknown, code: string | undefined): boolean {
    if (error instanceof RangeError) {
      return true;
    }
    return (
      code !== undefined && (code.startsWith('ERR_OSSL') || code.startsWith('ERR_INVALID_ARG'))
    );
  }

  private extractApiMessage(data: unknown): string | undefined {
    if (typeof data === 'string' && data.length > 0) {
      return data;
    }
    if (isRecord(data)) {
      return readString(data, 'message');
    }
    return undefined;
  }

  private bodyText(data: unknown): string {
    if (data === undefined || data === null) {
      return '';
    }
    if (typeof data === 'string') {
      return data;
    }
    try {
      return JSON.stringify(data);
    } catch {
      return '';
    }
  }

  private describeKind(kind: GitHubErrorKind): string {
    switch (kind) {
      case GitHubErrorKind.TIMEOUT_ERROR:
        return 'Request timed out';
      case GitHubErrorKind.NETWORK_ERROR:
        return 'Network failure';
      case GitHubErrorKind.INVALID_RESPONSE:
        return 'Invalid response';
      case GitHubErrorKind.MISSING_CREDENTIALS:
        return 'Missing credentials';
      case GitHubErrorKind.INVALID_PRIVATE_KEY:
        return 'Invalid private key';
      case GitHubErrorKind.INVALID_CREDENTIALS:
        return 'Invalid credentials';
      case GitHubErrorKind.INVALID_CONFIGURATION:
        return 'Invalid configuration';
      default:
        return 'GitHub error';
    }
  }
}
