import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ErrorCategorizationService } from './error-categorization.service';
import { createNetworkError, GitHubApiException } from './github.exception';
import { GitHubErrorKind } from './github-error.types';

describe('ErrorCategorizationService', () => {
  let service: ErrorCategorizationService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [ErrorCategorizationService],
    }).compile();

    service = module.get<ErrorCategorizationService>(ErrorCategorizationService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('kindForStatus', () => {
    it.each([
      [401, 'Bad credentials', GitHubErrorKind.AUTHENTICATION_FAILED],
      [401, 'A JSON web token could not be decoded', GitHubErrorKind.TOKEN_EXPIRED],
      [401, 'Token expired', GitHubErrorKind.TOKEN_EXPIRED],
      [403, 'API rate limit exceeded for installation', GitHubErrorKind.RATE_LIMIT_EXCEEDED],
      [403, 'Resource not accessible by integration', GitHubErrorKind.AUTHORIZATION_FAILED],
      [404, 'Repository not found', GitHubErrorKind.REPOSITORY_NOT_FOUND],
      [404, 'Installation not found', GitHubErrorKind.INSTALLATION_NOT_FOUND],
      [404, 'No commit found for SHA', GitHubErrorKind.COMMIT_NOT_FOUND],
      [404, 'Not Found', GitHubErrorKind.FILE_NOT_FOUND],
      [429, '', GitHubErrorKind.RATE_LIMIT_EXCEEDED],
      [422, 'Validation Failed', GitHubErrorKind.API_ERROR],
      [500, '', GitHubErrorKind.API_ERROR],
      [503, '', GitHubErrorKind.API_ERROR],
      [302, '', GitHubErrorKind.UNKNOWN],
    ])('should classify %d "%s" as %s', (status, body, kind) => {
      expect(service.kindForStatus(status, body)).toBe(kind);
    });
  });

  describe('kindForException', () => {
    it('should detect timeouts by name', () => {
      const error = new Error('The operation was aborted due to timeout');
      error.name = 'TimeoutError';

      expect(service.kindForException(error)).toBe(GitHubErrorKind.TIMEOUT_ERROR);
    });

    it('should detect timeouts by code', () => {
      const error = Object.assign(new Error('connect failed'), { code: 'ETIMEDOUT' });

      expect(service.kindForException(error)).toBe(GitHubErrorKind.TIMEOUT_ERROR);
    });

    it('should detect connection failures from a nested cause', () => {
      const error = Object.assign(new Error('request failed'), {
        cause: { code: 'ECONNREFUSED' },
      });

      expect(service.kindForException(error)).toBe(GitHubErrorKind.NETWORK_ERROR);
    });

    it('should detect connection failures from the message', () => {
      expect(service.kindForException(new Error('connect ECONNRESET 140.82.112.6:443'))).toBe(
        GitHubErrorKind.NETWORK_ERROR,
      );
    });

    it('should separate missing key files from other missing files', () => {
      const keyFile = Object.assign(new Error('private key file missing'), { code: 'ENOENT' });
      const otherFile = Object.assign(new Error('no such file'), { code: 'ENOENT' });

      expect(service.kindForException(keyFile)).toBe(GitHubErrorKind.INVALID_PRIVATE_KEY);
      expect(service.kindForException(otherFile)).toBe(GitHubErrorKind.MISSING_CREDENTIALS);
    });

    it('should classify JSON decode failures as invalid responses', () => {
      expect(service.kindForException(new SyntaxError('Unexpected end of input'))).toBe(
        GitHubErrorKind.INVALID_RESPONSE,
      );
    });

    it('should split malformed values by whether they concern credentials', () => {
      const keyError = Object.assign(new Error('unsupported private key'), {
        code: 'ERR_OSSL_UNSUPPORTED',
      });
      const valueError = new RangeError('maxRetries out of range');

      expect(service.kindForException(keyError)).toBe(GitHubErrorKind.INVALID_CREDENTIALS);
      expect(service.kindForException(valueError)).toBe(GitHubErrorKind.INVALID_CONFIGURATION);
    });

    it('should fall back to unknown', () => {
      expect(service.kindForException(new Error('something odd'))).toBe(GitHubErrorKind.UNKNOWN);
    });
  });

  describe('classifyHttpError', () => {
    it('should capture status, message and rate limit headers', () => {
      const error = service.classifyHttpError(
        {
          status: 403,
          headers: {
            'x-ratelimit-remaining': '0',
            'x-ratelimit-reset': '1705323600',
            'retry-after': '120',
          },
          data: { message: 'API rate limit exceeded' },
        },
        { repository: 'octocat/Hello-World', apiEndpoint: 'GET /repos/octocat/Hello-World' },
      );

      expect(error.kind).toBe(GitHubErrorKind.RATE_LIMIT_EXCEEDED);
      expect(error.message).toBe(
        'GitHub API request failed with status 403: API rate limit exceeded',
      );
      expect(error.statusCode).toBe(403);
      expect(error.details.rateLimitRemaining).toBe(0);
      expect(error.details.rateLimitReset).toBe(1705323600);
      expect(error.details.retryAfter).toBe(120);
      expect(error.details.context.repository).toBe('octocat/Hello-World');
    });

    it('should fall back to the status when the body has no message', () => {
      const error = service.classifyHttpError({ status: 502, data: '' });

      expect(error.message).toBe('GitHub API request failed with status 502: HTTP 502');
      expect(error.kind).toBe(GitHubErrorKind.API_ERROR);
    });
  });

  describe('categorize', () => {
    it('should pass structured errors through unchanged', () => {
      const original = createNetworkError('Network failure');

      expect(service.categorize(original)).toBe(original);
    });

    it('should classify thrown values carrying a response', () => {
      const thrown = { message: 'Not Found', response: { status: 404, data: 'Not Found' } };

      const error = service.categorize(thrown, { filePath: 'README.md' });

      expect(error).toBeInstanceOf(GitHubApiException);
      expect(error.kind).toBe(GitHubErrorKind.FILE_NOT_FOUND);
      expect(error.details.originalError).toBe(thrown);
      expect(error.details.context.filePath).toBe('README.md');
    });

    it('should classify runtime errors with a kind prefix', () => {
      const error = service.categorize(new Error('fetch failed'));

      expect(error.kind).toBe(GitHubErrorKind.NETWORK_ERROR);
      expect(error.message).toBe('Network failure: fetch failed');
    });

    it('should prefix unknown failures', () => {
      expect(service.categorize('boom').message).toBe('Unexpected error: boom');
    });
  });

  describe('logError', () => {
    it('should log retryable errors as warnings with context', () => {
      const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
      const error = GitHubApiException.create(GitHubErrorKind.API_ERROR, 'Server error', {
        statusCode: 502,
        context: {
          repository: 'octocat/Hello-World',
          commitSha: '0123456789abcdef',
          apiEndpoint: 'GET /repos/octocat/Hello-World/commits/0123456789abcdef',
        },
      });

      service.logError(error);

      expect(warn).toHaveBeenCalledWith(
        'GitHub API Error: Server error [repo=octocat/Hello-World, commit=01234567, endpoint=GET /repos/octocat/Hello-World/commits/0123456789abcdef, status=502]',
      );
    });

    it('should log terminal errors as errors', () => {
      const logged = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

      service.logError(GitHubApiException.create(GitHubErrorKind.FILE_NOT_FOUND, 'Missing'));

      expect(logged).toHaveBeenCalledWith('GitHub API Error: Missing');
    });
  });
});
