import { Inject, Injectable, Logger } from '@nestjs/common';
import { RequestError } from '@octokit/request-error';
import { Octokit } from '@octokit/rest';
import { normalizeHeaders } from '../../common/http/headers';
import { GITHUB_APP_CONFIG, GitHubAppConfig } from '../config/github-app.config';
import { ErrorCategorizationService } from '../errors/error-categorization.service';
import { GitHubHttpRequest, GitHubHttpResponse, GitHubHttpTransport } from './github-transport';

const GITHUB_V3_MEDIA_TYPE = 'application/vnd.github.v3+json';

/**
 * GitHub HTTP transport on Octokit's request layer
 *
 * Non-2xx responses come back as values so callers can classify them;
 * failures without a response (timeouts, refused connections) are converted
 * to structured errors here.
 */
@Injectable()
export class OctokitTransport implements GitHubHttpTransport {
  private readonly logger = new Logger(OctokitTransport.name);
  private readonly octokit: Octokit;

  constructor(
    @Inject(GITHUB_APP_CONFIG) private readonly config: GitHubAppConfig,
    private readonly errorCategorization: ErrorCategorizationService,
  ) {
    this.octokit = new Octokit({
      baseUrl: config.apiBaseUrl,
      userAgent: 'commit-review-api',
    });

    this.logger.log(`GitHub transport initialized for ${config.apiBaseUrl}`);
  }

  async request(request: GitHubHttpRequest): Promise<GitHubHttpResponse> {
    const route: string = `${request.method} ${request.path}`;
    const headers: Record<string, string> = { accept: GITHUB_V3_MEDIA_TYPE };
    if (request.token) {
      headers.authorization = `${request.scheme ?? 'token'} ${request.token}`;
    }

    try {
      const response = await this.octokit.request(route, {
        ...request.query,
        ...request.body,
        headers,
        request: { signal: AbortSignal.timeout(this.config.requestTimeoutMs) },
      });

      return {
        status: response.status,
        headers: normalizeHeaders(response.headers),
        data: response.data,
      };
    } catch (error) {
      if (error instanceof RequestError && error.response) {
        return {
          status: error.status,
          headers: normalizeHeaders(error.response.headers),
          data: error.response.data,
        };
      }

      this.logger.warn(`No response for ${route}`);
      throw this.errorCategorization.classifyException(error, { apiEndpoint: route });
    }
  }
}
