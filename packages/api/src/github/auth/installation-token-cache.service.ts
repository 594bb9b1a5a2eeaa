import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { ClockService } from '../../common/clock/clock.service';
import { getIntegerHeader } from '../../common/http/headers';
import { isRecord, readNumber, readString } from '../../common/utils/json-readers';
import {
  GITHUB_HTTP_TRANSPORT,
  GitHubHttpRequest,
  GitHubHttpResponse,
  GitHubHttpTransport,
} from '../client/github-transport';
import { GITHUB_APP_CONFIG, GitHubAppConfig } from '../config/github-app.config';
import { ErrorCategorizationService } from '../errors/error-categorization.service';
import { GitHubApiException } from '../errors/github.exception';
import { GitHubErrorContextInput, GitHubErrorKind } from '../errors/github-error.types';
import { GitHubLoggerService, GitHubOperation } from '../logging/github-logger.service';
import { RateLimitService } from '../rate-limit/rate-limit.service';
import { RateLimitResource } from '../rate-limit/types';
import { CredentialIssuerService } from './credential-issuer.service';
import {
  CachedInstallationToken,
  CLEANUP_INTERVAL_MS,
  DEFAULT_TOKEN_LIFETIME_MS,
  InstallationTokenGrant,
  InstallationTokenInfo,
  MAX_TOKEN_ATTEMPTS,
  MOCK_INSTALLATION_ID,
  TOKEN_EXPIRY_BUFFER_MS,
  TokenManagementStats,
  TokenState,
} from './types';

/**
 * Outcome of one token creation attempt that reached GitHub
 */
type TokenAttempt =
  | { issued: true; grant: InstallationTokenGrant; installationId: number }
  | { issued: false; response: GitHubHttpResponse; installationId: number };

/**
 * Installation Token Cache
 *
 * Maps owner/repo to a repository-scoped installation token:
 * - Serves cached tokens until they are within 5 minutes of expiry
 * - Resolves and caches installation ids (404 there means the App is not installed)
 * - Exchanges a fresh App assertion for a token, retrying within a 3-attempt budget
 * - Shares one in-flight refresh between concurrent callers for the same key
 * - Sweeps expired entries lazily, at most every 10 minutes
 */
@Injectable()
export class InstallationTokenCacheService {
  private readonly logger = new Logger(InstallationTokenCacheService.name);

  private readonly tokenCache = new Map<string, CachedInstallationToken>();
  private readonly installationIds = new Map<string, number>();
  private readonly lastErrors = new Map<string, string>();
  private readonly inFlight = new Map<string, Promise<string>>();
  private lastCleanup: number;

  constructor(
    @Inject(GITHUB_APP_CONFIG) private readonly config: GitHubAppConfig,
    @Inject(GITHUB_HTTP_TRANSPORT) private readonly transport: GitHubHttpTransport,
    private readonly credentialIssuer: CredentialIssuerService,
    private readonly rateLimit: RateLimitService,
    private readonly errorCategorization: ErrorCategorizationService,
    private readonly githubLogger: GitHubLoggerService,
    private readonly clock: ClockService,
  ) {
    this.lastCleanup = clock.now();
  }

  /**
   * Get a valid installation token for a repository
   *
   * @param owner - Repository owner
   * @param repo - Repository name
   * @param forceRefresh - Skip the cache and mint a new token
   * @returns Installation token
   * @throws GitHubApiException - When no token could be obtained
   */
  async getToken(owner: string, repo: string, forceRefresh = false): Promise<string> {
    this.cleanupIfDue();

    const key = this.cacheKey(owner, repo);

    if (!forceRefresh) {
      const cached = this.tokenCache.get(key);
      if (cached && !this.isExpired(cached, TOKEN_EXPIRY_BUFFER_MS)) {
        this.logger.debug(`Using cached installation token for ${key}`);
        return cached.token;
      }
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.logger.debug(`Joining in-flight token refresh for ${key}`);
      return pending;
    }

    const refresh = this.createToken(owner, repo).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, refresh);
    return refresh;
  }

  /**
   * Force a new token for a repository
   */
  refreshToken(owner: string, repo: string): Promise<string> {
    return this.getToken(owner, repo, true);
  }

  /**
   * Clear one repository (owner and repo), one owner, or everything
   */
  clearCache(owner?: string, repo?: string): void {
    if (owner && repo) {
      this.clear(owner, repo);
      return;
    }

    if (owner) {
      const prefix = `${owner}/`;
      for (const key of Array.from(this.tokenCache.keys())) {
        if (key.startsWith(prefix)) {
          this.forget(key);
        }
      }
      for (const key of Array.from(this.installationIds.keys())) {
        if (key.startsWith(prefix)) {
          this.forget(key);
        }
      }
      return;
    }

    this.clearAll();
  }

  clear(owner: string, repo: string): void {
    this.forget(this.cacheKey(owner, repo));
  }

  clearAll(): void {
    const count = this.tokenCache.size;
    this.tokenCache.clear();
    this.installationIds.clear();
    this.lastErrors.clear();
    this.logger.log(`Cleared ${count} cached installation tokens`);
  }

  /**
   * Evict every entry whose expiry (no buffer) has passed
   *
   * @returns Number of evicted entries
   */
  cleanupExpired(): number {
    let removed = 0;
    for (const [key, entry] of Array.from(this.tokenCache.entries())) {
      if (this.isExpired(entry, 0)) {
        this.tokenCache.delete(key);
        removed++;
      }
    }

    this.lastCleanup = this.clock.now();
    if (removed > 0) {
      this.logger.log(`Removed ${removed} expired installation tokens`);
    }
    return removed;
  }

  getCachedTokenInfo(owner: string, repo: string): InstallationTokenInfo | null {
    const key = this.cacheKey(owner, repo);
    const entry = this.tokenCache.get(key);
    return entry ? this.describe(key, entry) : null;
  }

  getAllCachedTokensInfo(): Record<string, InstallationTokenInfo> {
    const result: Record<string, InstallationTokenInfo> = {};
    for (const [key, entry] of this.tokenCache.entries()) {
      result[key] = this.describe(key, entry);
    }
    return result;
  }

  getTokenManagementStats(): TokenManagementStats {
    let healthy = 0;
    let expiringSoon = 0;
    let expired = 0;
    let refreshes = 0;

    for (const entry of this.tokenCache.values()) {
      refreshes += entry.refreshCount;
      switch (this.stateOf(entry)) {
        case TokenState.VALID:
          healthy++;
          break;
        case TokenState.EXPIRING_SOON:
          expiringSoon++;
          break;
        default:
          expired++;
      }
    }

    return {
      totalCachedTokens: this.tokenCache.size,
      healthyTokens: healthy,
      expiringSoonTokens: expiringSoon,
      expiredTokens: expired,
      totalRefreshes: refreshes,
      cachedInstallationIds: this.installationIds.size,
      timeSinceLastCleanupMinutes: (this.clock.now() - this.lastCleanup) / 60000,
    };
  }

  /**
   * Last terminal failure recorded for a repository, if any
   */
  getLastError(owner: string, repo: string): string | null {
    return this.lastErrors.get(this.cacheKey(owner, repo)) ?? null;
  }

  /**
   * Resolve the installation and mint a token within the attempt budget
   */
  private async createToken(owner: string, repo: string): Promise<string> {
    const key = this.cacheKey(owner, repo);
    const context: GitHubErrorContextInput = { repository: key };
    let authRetried = false;
    let installationRetried = false;
    let lastError: GitHubApiException | undefined;

    for (let attempt = 0; attempt < MAX_TOKEN_ATTEMPTS; attempt++) {
      const hasAttemptsLeft = attempt < MAX_TOKEN_ATTEMPTS - 1;
      let outcome: TokenAttempt;

      try {
        outcome = await this.attemptTokenCreation(owner, repo);
      } catch (caught) {
        const error = this.errorCategorization.categorize(caught, context);
        lastError = error;

        const transient =
          error.kind === GitHubErrorKind.NETWORK_ERROR ||
          error.kind === GitHubErrorKind.TIMEOUT_ERROR;
        if (!transient || !hasAttemptsLeft) {
          break;
        }

        const backoffMs = Math.pow(2, attempt) * 1000;
        this.logger.warn(
          `Token request for ${key} failed (${error.kind}), retrying in ${backoffMs}ms`,
        );
        await this.clock.sleep(backoffMs);
        continue;
      }

      if (outcome.issued) {
        return this.store(key, outcome.grant, outcome.installationId);
      }

      const { response } = outcome;
      const endpoint = `POST /app/installations/${outcome.installationId}/access_tokens`;
      const responseContext = { ...context, apiEndpoint: endpoint };

      if (response.status === 401) {
        lastError = this.errorCategorization.classifyHttpError(response, responseContext);
        if (authRetried || !hasAttemptsLeft) {
          break;
        }
        // Next attempt signs a fresh assertion
        authRetried = true;
        this.logger.warn(`App assertion rejected for ${key}, retrying with a new one`);
        continue;
      }

      if (response.status === 404) {
        lastError = GitHubApiException.create(
          GitHubErrorKind.INSTALLATION_NOT_FOUND,
          `Installation ${outcome.installationId} for ${key} no longer exists`,
          { statusCode: 404, context: responseContext },
        );
        if (installationRetried || !hasAttemptsLeft) {
          break;
        }
        installationRetried = true;
        this.installationIds.delete(key);
        this.logger.warn(`Installation for ${key} vanished, resolving it again`);
        continue;
      }

      if (response.status === 403) {
        lastError = this.forbiddenError(response, key, responseContext);
        break;
      }

      // 422 and any other unexpected status
      lastError = this.errorCategorization.classifyHttpError(response, responseContext);
      if (!hasAttemptsLeft) {
        break;
      }
      this.logger.warn(`Token request for ${key} returned ${response.status}, retrying in 1s`);
      await this.clock.sleep(1000);
    }

    const failure =
      lastError ??
      GitHubApiException.create(
        GitHubErrorKind.UNKNOWN,
        `Failed to obtain installation token for ${key}`,
        { context },
      );
    this.recordFailure(key, failure);
    throw failure;
  }

  /**
   * One pass of installation lookup plus token exchange
   *
   * Throws for lookup failures and transport errors; returns rejected
   * exchange responses so the caller can apply the retry rules.
   */
  private async attemptTokenCreation(owner: string, repo: string): Promise<TokenAttempt> {
    const installationId = await this.resolveInstallationId(owner, repo);

    if (this.config.mockMode) {
      return {
        issued: true,
        installationId,
        grant: {
          token: `mock_installation_token_${uuidv4()}`,
          expiresAt: this.clock.now() + DEFAULT_TOKEN_LIFETIME_MS,
        },
      };
    }

    const assertion = await this.credentialIssuer.issueAssertion();
    const operation = this.githubLogger.startOperation(GitHubOperation.CREATE_INSTALLATION_TOKEN, {
      repository: this.cacheKey(owner, repo),
      installationId,
    });

    const response = await this.send({
      method: 'POST',
      path: `/app/installations/${installationId}/access_tokens`,
      token: assertion,
      scheme: 'Bearer',
    });

    if (response.status !== 201) {
      operation.endOperation('error', new Error(`Token exchange returned ${response.status}`));
      return { issued: false, response, installationId };
    }

    const body = isRecord(response.data) ? response.data : {};
    const token = readString(body, 'token');
    if (!token) {
      operation.endOperation('error', new Error('Token missing from response'));
      throw GitHubApiException.create(
        GitHubErrorKind.INVALID_RESPONSE,
        'Installation token response did not contain a token',
        { statusCode: 201, context: { repository: this.cacheKey(owner, repo) } },
      );
    }

    operation.endOperation('success');
    return {
      issued: true,
      installationId,
      grant: { token, expiresAt: this.parseExpiry(readString(body, 'expires_at')) },
    };
  }

  private async resolveInstallationId(owner: string, repo: string): Promise<number> {
    const key = this.cacheKey(owner, repo);
    const cached = this.installationIds.get(key);
    if (cached !== undefined) {
      return cached;
    }

    if (this.config.mockMode) {
      this.installationIds.set(key, MOCK_INSTALLATION_ID);
      return MOCK_INSTALLATION_ID;
    }

    const endpoint = `GET /repos/${owner}/${repo}/installation`;
    const context: GitHubErrorContextInput = { repository: key, apiEndpoint: endpoint };
    const assertion = await this.credentialIssuer.issueAssertion();
    const operation = this.githubLogger.startOperation(GitHubOperation.GET_INSTALLATION, {
      repository: key,
    });

    const response = await this.send({
      method: 'GET',
      path: `/repos/${owner}/${repo}/installation`,
      token: assertion,
      scheme: 'Bearer',
    });

    if (response.status === 404) {
      const error = GitHubApiException.create(
        GitHubErrorKind.INSTALLATION_NOT_FOUND,
        `GitHub App is not installed on ${key}`,
        { statusCode: 404, context },
      );
      operation.endOperation('error', error);
      throw error;
    }

    if (response.status !== 200) {
      const error = this.errorCategorization.classifyHttpError(response, context);
      operation.endOperation('error', error);
      throw error;
    }

    const installationId = isRecord(response.data) ? readNumber(response.data, 'id') : undefined;
    if (installationId === undefined) {
      const error = GitHubApiException.create(
        GitHubErrorKind.INVALID_RESPONSE,
        `Installation lookup for ${key} returned no id`,
        { statusCode: response.status, context },
      );
      operation.endOperation('error', error);
      throw error;
    }

    operation.endOperation('success');
    this.installationIds.set(key, installationId);
    return installationId;
  }

  private async send(request: GitHubHttpRequest): Promise<GitHubHttpResponse> {
    this.rateLimit.recordRequest(RateLimitResource.CORE);
    const response = await this.transport.request(request);
    this.rateLimit.observe(response.headers, RateLimitResource.CORE);
    return response;
  }

  private forbiddenError(
    response: GitHubHttpResponse,
    key: string,
    context: GitHubErrorContextInput,
  ): GitHubApiException {
    if (getIntegerHeader(response.headers, 'x-ratelimit-remaining') === 0) {
      const reset = getIntegerHeader(response.headers, 'x-ratelimit-reset');
      const resetText = reset !== undefined ? new Date(reset * 1000).toISOString() : 'unknown';
      return GitHubApiException.create(
        GitHubErrorKind.RATE_LIMIT_EXCEEDED,
        `Rate limit exhausted while creating a token for ${key}; resets at ${resetText}`,
        {
          statusCode: 403,
          rateLimitRemaining: 0,
          rateLimitReset: reset,
          context,
          responseHeaders: response.headers,
        },
      );
    }

    return GitHubApiException.create(
      GitHubErrorKind.AUTHORIZATION_FAILED,
      `GitHub App lacks permission to create an installation token for ${key}`,
      { statusCode: 403, context, responseHeaders: response.headers },
    );
  }

  private store(key: string, grant: InstallationTokenGrant, installationId: number): string {
    const existing = this.tokenCache.get(key);

    if (existing) {
      existing.token = grant.token;
      existing.expiresAt = grant.expiresAt;
      existing.installationId = installationId;
      existing.refreshCount++;
      existing.lastError = null;
    } else {
      this.tokenCache.set(key, {
        token: grant.token,
        expiresAt: grant.expiresAt,
        installationId,
        createdAt: this.clock.now(),
        refreshCount: 0,
        lastError: null,
      });
    }

    this.lastErrors.delete(key);
    this.logger.log(
      `Installation token for ${key} cached until ${new Date(grant.expiresAt).toISOString()}`,
    );
    return grant.token;
  }

  private recordFailure(key: string, error: GitHubApiException): void {
    this.lastErrors.set(key, error.message);
    const entry = this.tokenCache.get(key);
    if (entry) {
      entry.lastError = error.message;
    }
    this.errorCategorization.logError(error);
  }

  private parseExpiry(expiresAt: string | undefined): number {
    const parsed = expiresAt ? Date.parse(expiresAt) : NaN;
    if (isNaN(parsed)) {
      this.logger.warn('Token response had no usable expires_at, assuming one hour');
      return this.clock.now() + DEFAULT_TOKEN_LIFETIME_MS;
    }
    return parsed;
  }

  private cleanupIfDue(): void {
    if (this.clock.now() - this.lastCleanup > CLEANUP_INTERVAL_MS) {
      this.cleanupExpired();
    }
  }

  private isExpired(entry: CachedInstallationToken, bufferMs: number): boolean {
    return this.clock.now() + bufferMs >= entry.expiresAt;
  }

  private stateOf(entry: CachedInstallationToken): TokenState {
    if (this.isExpired(entry, 0)) {
      return TokenState.EXPIRED;
    }
    if (this.isExpired(entry, TOKEN_EXPIRY_BUFFER_MS)) {
      return TokenState.EXPIRING_SOON;
    }
    return TokenState.VALID;
  }

  private describe(key: string, entry: CachedInstallationToken): InstallationTokenInfo {
    const now = this.clock.now();
    return {
      repository: key,
      installationId: entry.installationId,
      state: this.stateOf(entry),
      expiresAt: new Date(entry.expiresAt).toISOString(),
      expiresInMinutes: (entry.expiresAt - now) / 60000,
      isExpired: this.isExpired(entry, TOKEN_EXPIRY_BUFFER_MS),
      isExpiredNoBuffer: this.isExpired(entry, 0),
      createdAt: new Date(entry.createdAt).toISOString(),
      ageInMinutes: (now - entry.createdAt) / 60000,
      refreshCount: entry.refreshCount,
      lastError: entry.lastError,
      tokenLength: entry.token.length,
    };
  }

  private forget(key: string): void {
    this.tokenCache.delete(key);
    this.installationIds.delete(key);
    this.lastErrors.delete(key);
  }

  private cacheKey(owner: string, repo: string): string {
    return `${owner}/${repo}`;
  }
}
