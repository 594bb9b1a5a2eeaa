import { TextDecoder } from 'util';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import {
  isRecord,
  JsonRecord,
  messageOf,
  readBoolean,
  readNumber,
  readRecord,
  readRecords,
  readString,
} from '../../common/utils/json-readers';
import { InstallationTokenCacheService } from '../auth/installation-token-cache.service';
import { GITHUB_APP_CONFIG, GitHubAppConfig } from '../config/github-app.config';
import { ErrorCategorizationService } from '../errors/error-categorization.service';
import {
  createAuthenticationError,
  createRepositoryNotFoundError,
  createValidationError,
  GitHubApiException,
} from '../errors/github.exception';
import { GitHubErrorContextInput, GitHubErrorKind } from '../errors/github-error.types';
import { RetryStrategyService } from '../errors/retry-strategy.service';
import { GitHubLoggerService, GitHubOperation } from '../logging/github-logger.service';
import { RateLimitService } from '../rate-limit/rate-limit.service';
import { RateLimitResource } from '../rate-limit/types';
import { CreateCommitStatusDto } from './dto/create-commit-status.dto';
import {
  GITHUB_HTTP_TRANSPORT,
  GitHubHttpRequest,
  GitHubHttpResponse,
  GitHubHttpTransport,
  isSuccessStatus,
} from './github-transport';
import {
  mockCommitPatchSet,
  mockCommitStatuses,
  mockCreatedStatus,
  mockDirectoryListing,
  mockFileContent,
  mockRepositoryDetails,
  mockRepositoryMetadata,
} from './mock-responses';
import {
  analyzeRootStructure,
  fileStem,
  isTestDirectoryName,
  isTestFileName,
  isTestPath,
  parentDirectory,
} from './repository-structure';
import {
  CommitData,
  CommitFile,
  CommitIdentity,
  CommitPatchSet,
  CommitStats,
  CommitStatus,
  DirectoryEntry,
  FileContent,
  FileContentResult,
  MergeComparison,
  RepositoryDetails,
  RepositoryLicense,
  RepositoryMetadata,
  TestFileReport,
} from './types';

/** GitHub stops listing files on a single commit at this count */
export const COMMIT_FILE_LIST_LIMIT = 300;

/**
 * One live API call: what to send and how to name its failures
 */
interface ApiCall {
  operation: GitHubOperation;
  request: Omit<GitHubHttpRequest, 'token' | 'scheme'>;
  context: GitHubErrorContextInput;
  /** Operation-specific error for a non-2xx response; undefined falls back to status classification */
  describeFailure?: (response: GitHubHttpResponse) => GitHubApiException | undefined;
}

/**
 * GitHub Data Client
 *
 * Repository reads and commit status writes on top of the installation token
 * cache, retry engine and rate-limit tracker. Every live call:
 * - authenticates with the cached installation token
 * - on 401 refreshes the token and retries exactly once
 * - turns any other non-2xx response into an operation-specific error
 *
 * In mock mode each operation returns a deterministic, structurally complete result.
 */
@Injectable()
export class GitHubDataClientService {
  private readonly logger = new Logger(GitHubDataClientService.name);
  private readonly utf8 = new TextDecoder('utf-8', { fatal: true });

  constructor(
    @Inject(GITHUB_APP_CONFIG) private readonly config: GitHubAppConfig,
    @Inject(GITHUB_HTTP_TRANSPORT) private readonly transport: GitHubHttpTransport,
    private readonly tokenCache: InstallationTokenCacheService,
    private readonly retryStrategy: RetryStrategyService,
    private readonly rateLimit: RateLimitService,
    private readonly errorCategorization: ErrorCategorizationService,
    private readonly githubLogger: GitHubLoggerService,
  ) {}

  /**
   * Commit metadata, per-file patches and stats; merges are compared against their first parent
   *
   * @throws GitHubApiException - COMMIT_NOT_FOUND when GitHub has no such commit
   */
  async fetchCommitPatches(owner: string, repo: string, sha: string): Promise<CommitPatchSet> {
    if (this.config.mockMode) {
      return mockCommitPatchSet(owner, repo, sha);
    }

    const path = `/repos/${owner}/${repo}/commits/${sha}`;
    const context = { repository: `${owner}/${repo}`, commitSha: sha, apiEndpoint: `GET ${path}` };

    const response = await this.call(owner, repo, {
      operation: GitHubOperation.GET_COMMIT,
      request: { method: 'GET', path },
      context,
      describeFailure: (failed) =>
        failed.status === 404 || failed.status === 422
          ? GitHubApiException.create(
              GitHubErrorKind.COMMIT_NOT_FOUND,
              `Commit ${sha} not found in ${owner}/${repo}`,
              { statusCode: failed.status, context },
            )
          : undefined,
    });

    const body = this.requireRecord(response, context);
    const files = readRecords(body, 'files').map((file) => this.toCommitFile(file));
    const parents = readRecords(body, 'parents')
      .map((parent) => readString(parent, 'sha'))
      .filter((parentSha): parentSha is string => parentSha !== undefined);

    const patches: Record<string, string> = {};
    for (const file of files) {
      if (file.patch !== undefined) {
        patches[file.filename] = file.patch;
      }
    }

    const withoutPatch = files.length - Object.keys(patches).length;
    if (withoutPatch > 0) {
      this.logger.debug(`${withoutPatch} files in ${sha} have no patch (binary or oversized diff)`);
    }

    const filesTruncated = files.length >= COMMIT_FILE_LIST_LIMIT;
    if (filesTruncated) {
      this.logger.warn(
        `Commit ${sha} in ${owner}/${repo} lists ${files.length} files; GitHub truncates at ${COMMIT_FILE_LIST_LIMIT}, continuing with the partial list`,
      );
    }

    const result: CommitPatchSet = {
      commit_data: this.toCommitData(body, sha),
      patches,
      files,
      stats: this.toCommitStats(readRecord(body, 'stats'), files),
      is_merge_commit: parents.length > 1,
      parent_commits: parents,
      files_truncated: filesTruncated,
    };

    if (result.is_merge_commit) {
      const comparison = await this.compareWithFirstParent(owner, repo, parents[0], sha);
      if (comparison) {
        result.merge_comparison = comparison;
      }
    }

    return result;
  }

  /**
   * Fetch and decode one file; binary files keep their base64 payload
   *
   * @throws GitHubApiException - MALFORMED_DATA for directories, LARGE_RESPONSE for files
   * GitHub will not return inline, FILE_NOT_FOUND, AUTHORIZATION_FAILED
   */
  async fetchFileContent(
    owner: string,
    repo: string,
    path: string,
    ref?: string,
  ): Promise<FileContent> {
    const context: GitHubErrorContextInput = { repository: `${owner}/${repo}`, filePath: path };

    if (path.trim().length === 0 || path.endsWith('/')) {
      throw createValidationError(`${path || '(root)'} is a directory, not a file`, context);
    }

    if (this.config.mockMode) {
      return mockFileContent(path);
    }

    const apiPath = this.contentsPath(owner, repo, path);
    const fileContext = { ...context, apiEndpoint: `GET ${apiPath}` };
    const location = ref ? `${owner}/${repo}@${ref}` : `${owner}/${repo}`;

    const response = await this.call(owner, repo, {
      operation: GitHubOperation.GET_CONTENT,
      request: { method: 'GET', path: apiPath, query: { ref } },
      context: fileContext,
      describeFailure: (failed) => {
        if (failed.status === 404) {
          return GitHubApiException.create(
            GitHubErrorKind.FILE_NOT_FOUND,
            `File ${path} not found in ${location}`,
            { statusCode: 404, context: fileContext },
          );
        }
        if (failed.status !== 403) {
          return undefined;
        }

        const bodyText = this.failureText(failed.data);
        if (bodyText.includes('too large') || bodyText.includes('too_large')) {
          return GitHubApiException.create(
            GitHubErrorKind.LARGE_RESPONSE,
            `File ${path} in ${location} is too large to fetch through the contents API`,
            { statusCode: 403, context: fileContext },
          );
        }
        if (bodyText.includes('rate limit')) {
          return undefined;
        }
        return GitHubApiException.create(
          GitHubErrorKind.AUTHORIZATION_FAILED,
          `Access to ${path} in ${location} was denied`,
          { statusCode: 403, context: fileContext },
        );
      },
    });

    if (Array.isArray(response.data)) {
      throw createValidationError(`${path} is a directory, not a file`, fileContext);
    }

    const body = this.requireRecord(response, fileContext);
    const type = readString(body, 'type') ?? 'file';
    if (type === 'dir') {
      throw createValidationError(`${path} is a directory, not a file`, fileContext);
    }

    const rawContent = readString(body, 'content');
    const encoding = readString(body, 'encoding');
    const size = readNumber(body, 'size');

    // Files over 1 MB come back with encoding "none" and no content
    if (rawContent === undefined || encoding === 'none') {
      throw GitHubApiException.create(
        GitHubErrorKind.LARGE_RESPONSE,
        `File ${path} in ${location} is too large to return inline (${size ?? 'unknown'} bytes)`,
        { statusCode: response.status, context: fileContext },
      );
    }

    const { byteLength, ...decoded } = this.decodeContent(rawContent, encoding);
    if (decoded.is_binary) {
      this.logger.debug(`${path} in ${location} is binary`);
    }

    return {
      ...decoded,
      size: size ?? byteLength,
      sha: readString(body, 'sha') ?? '',
      type,
      download_url: readString(body, 'download_url') ?? null,
      path: readString(body, 'path') ?? path,
    };
  }

  /**
   * Fetch several files one after another; a failing file yields an inline error entry
   */
  async fetchMultipleFileContents(
    owner: string,
    repo: string,
    paths: string[],
    ref?: string,
  ): Promise<Record<string, FileContentResult>> {
    const results: Record<string, FileContentResult> = {};

    for (const path of paths) {
      try {
        results[path] = await this.fetchFileContent(owner, repo, path, ref);
      } catch (caught) {
        const error = this.errorCategorization.categorize(caught, {
          repository: `${owner}/${repo}`,
          filePath: path,
        });
        this.logger.warn(`Skipping ${path} in ${owner}/${repo}: ${error.message}`);
        results[path] = { error: error.message, error_type: error.kind };
      }
    }

    const failed = Object.values(results).filter((result) => 'error' in result).length;
    this.logger.log(`Fetched ${paths.length - failed}/${paths.length} files from ${owner}/${repo}`);
    return results;
  }

  /**
   * Repository info, language breakdown, topics, license and root structure
   *
   * Only the repository itself is required; the rest is best effort.
   */
  async fetchRepositoryMetadata(owner: string, repo: string): Promise<RepositoryMetadata> {
    if (this.config.mockMode) {
      return mockRepositoryMetadata(owner, repo);
    }

    const details = await this.getRepoDetails(owner, repo);
    const defaultBranch = readString(details, 'default_branch') ?? 'main';

    const languages = await this.bestEffort<Record<string, number>>(
      `Languages for ${owner}/${repo}`,
      {},
      () => this.fetchLanguages(owner, repo),
    );
    const topics = await this.bestEffort<string[]>(`Topics for ${owner}/${repo}`, [], () =>
      this.fetchTopics(owner, repo),
    );
    const rootEntries = await this.bestEffort<DirectoryEntry[]>(
      `Root listing for ${owner}/${repo}`,
      [],
      () => this.listDirectory(owner, repo, '', defaultBranch),
    );

    return {
      basic_info: {
        name: readString(details, 'name') ?? repo,
        full_name: readString(details, 'full_name') ?? `${owner}/${repo}`,
        description: readString(details, 'description') ?? null,
        language: readString(details, 'language') ?? null,
        size: readNumber(details, 'size') ?? 0,
        default_branch: defaultBranch,
        created_at: readString(details, 'created_at') ?? null,
        updated_at: readString(details, 'updated_at') ?? null,
        stargazers_count: readNumber(details, 'stargazers_count') ?? 0,
        forks_count: readNumber(details, 'forks_count') ?? 0,
        open_issues_count: readNumber(details, 'open_issues_count') ?? 0,
        is_private: readBoolean(details, 'private') ?? false,
      },
      languages,
      topics,
      license: this.toLicense(readRecord(details, 'license')),
      structure: analyzeRootStructure(rootEntries),
    };
  }

  /**
   * Locate tests related to a change set
   *
   * Changed files that are tests themselves are direct. Files in root test
   * directories (and in test-named directories one level below them) or
   * test-named files beside a changed source file are related when their
   * stem matches that source.
   */
  async identifyTestFiles(
    owner: string,
    repo: string,
    changedFiles: string[],
    ref?: string,
  ): Promise<TestFileReport> {
    const direct = changedFiles.filter((file) => isTestPath(file));
    const sourceStems = new Set(
      changedFiles.filter((file) => !isTestPath(file)).map((file) => fileStem(file)),
    );

    const listings = new Map<string, DirectoryEntry[]>();
    const list = async (directory: string): Promise<DirectoryEntry[]> => {
      const cached = listings.get(directory);
      if (cached) {
        return cached;
      }
      const entries = await this.bestEffort<DirectoryEntry[]>(
        `Listing of ${directory || '/'} in ${owner}/${repo}`,
        [],
        () => this.listDirectory(owner, repo, directory, ref),
      );
      listings.set(directory, entries);
      return entries;
    };

    const structure = analyzeRootStructure(await list(''));
    const testDirectories: string[] = [];
    const candidates: string[] = [];

    for (const directory of structure.test_directories) {
      testDirectories.push(directory);
      for (const entry of await list(directory)) {
        if (entry.type === 'file') {
          candidates.push(entry.path);
        } else if (entry.type === 'dir' && isTestDirectoryName(entry.name)) {
          testDirectories.push(entry.path);
          const nested = await list(entry.path);
          candidates.push(
            ...nested.filter((child) => child.type === 'file').map((child) => child.path),
          );
        }
      }
    }

    const sourceDirectories = new Set(
      changedFiles.filter((file) => !isTestPath(file)).map((file) => parentDirectory(file)),
    );
    for (const directory of sourceDirectories) {
      const siblings = await list(directory);
      candidates.push(
        ...siblings
          .filter((entry) => entry.type === 'file' && isTestFileName(entry.name))
          .map((entry) => entry.path),
      );
    }

    const directSet = new Set(direct);
    const related = Array.from(new Set(candidates)).filter(
      (candidate) => !directSet.has(candidate) && sourceStems.has(fileStem(candidate)),
    );

    return {
      direct_test_files: direct,
      related_test_files: related,
      test_directories: testDirectories,
    };
  }

  /**
   * Statuses reported on a commit, newest first
   */
  async getCommitStatus(owner: string, repo: string, sha: string): Promise<CommitStatus[]> {
    if (this.config.mockMode) {
      return mockCommitStatuses(this.config.statusContext);
    }

    const path = `/repos/${owner}/${repo}/commits/${sha}/statuses`;
    const context = { repository: `${owner}/${repo}`, commitSha: sha, apiEndpoint: `GET ${path}` };

    const response = await this.call(owner, repo, {
      operation: GitHubOperation.LIST_COMMIT_STATUSES,
      request: { method: 'GET', path },
      context,
      describeFailure: (failed) =>
        failed.status === 404
          ? GitHubApiException.create(
              GitHubErrorKind.COMMIT_NOT_FOUND,
              `Commit ${sha} not found in ${owner}/${repo}`,
              { statusCode: 404, context },
            )
          : undefined,
    });

    if (!Array.isArray(response.data)) {
      throw this.invalidResponse(response, context);
    }
    return response.data.filter(isRecord).map((status) => this.toCommitStatus(status));
  }

  /**
   * Post a commit status; input is validated before anything is sent
   *
   * @throws GitHubApiException - MALFORMED_DATA for an unknown state, overlong description,
   * empty context or malformed target URL
   */
  async createCommitStatus(
    owner: string,
    repo: string,
    sha: string,
    state: string,
    description: string,
    context: string = this.config.statusContext,
    targetUrl?: string,
  ): Promise<CommitStatus> {
    const errorContext = { repository: `${owner}/${repo}`, commitSha: sha };
    const dto = this.validateStatus(
      { state, description, context, target_url: targetUrl },
      errorContext,
    );

    if (this.config.mockMode) {
      return mockCreatedStatus(dto.state, dto.description, dto.context, dto.target_url);
    }

    const path = `/repos/${owner}/${repo}/statuses/${sha}`;
    const body: Record<string, unknown> = {
      state: dto.state,
      description: dto.description,
      context: dto.context,
    };
    if (dto.target_url !== undefined) {
      body.target_url = dto.target_url;
    }

    const response = await this.call(owner, repo, {
      operation: GitHubOperation.CREATE_COMMIT_STATUS,
      request: { method: 'POST', path, body },
      context: { ...errorContext, apiEndpoint: `POST ${path}` },
    });

    const created = this.toCommitStatus(this.requireRecord(response, errorContext));
    this.logger.log(`Set ${dto.context} status on ${sha} in ${owner}/${repo} to ${dto.state}`);
    return created;
  }

  /**
   * Raw repository JSON
   *
   * @throws GitHubApiException - REPOSITORY_NOT_FOUND on 404
   */
  async getRepoDetails(owner: string, repo: string): Promise<RepositoryDetails> {
    if (this.config.mockMode) {
      return mockRepositoryDetails(owner, repo);
    }

    const path = `/repos/${owner}/${repo}`;
    const context = { repository: `${owner}/${repo}`, apiEndpoint: `GET ${path}` };

    const response = await this.call(owner, repo, {
      operation: GitHubOperation.GET_REPOSITORY,
      request: { method: 'GET', path },
      context,
      describeFailure: (failed) =>
        failed.status === 404 ? createRepositoryNotFoundError(owner, repo) : undefined,
    });

    return this.requireRecord(response, context);
  }

  /**
   * Entries of a repository directory ('' for the root)
   */
  async listDirectory(
    owner: string,
    repo: string,
    directory: string,
    ref?: string,
  ): Promise<DirectoryEntry[]> {
    if (this.config.mockMode) {
      return mockDirectoryListing(directory);
    }

    const path = directory
      ? this.contentsPath(owner, repo, directory)
      : `/repos/${owner}/${repo}/contents`;
    const context = {
      repository: `${owner}/${repo}`,
      filePath: directory || '/',
      apiEndpoint: `GET ${path}`,
    };

    const response = await this.call(owner, repo, {
      operation: GitHubOperation.GET_CONTENT,
      request: { method: 'GET', path, query: { ref } },
      context,
      describeFailure: (failed) =>
        failed.status === 404
          ? GitHubApiException.create(
              GitHubErrorKind.FILE_NOT_FOUND,
              `Directory ${directory || '/'} not found in ${owner}/${repo}`,
              { statusCode: 404, context },
            )
          : undefined,
    });

    if (!Array.isArray(response.data)) {
      throw createValidationError(`${directory || '/'} is not a directory`, context);
    }

    return response.data.filter(isRecord).map((entry) => ({
      name: readString(entry, 'name') ?? '',
      path: readString(entry, 'path') ?? '',
      type: readString(entry, 'type') ?? 'file',
    }));
  }

  /**
   * Run one live call under the retry engine
   */
  private call(owner: string, repo: string, call: ApiCall): Promise<GitHubHttpResponse> {
    // The token cache runs its own attempt budget
    const tokenFailures = new WeakSet<GitHubApiException>();

    return this.retryStrategy.executeWithRetry(
      () => this.attempt(owner, repo, call, tokenFailures),
      {
        context: call.context,
        resource: RateLimitResource.CORE,
        retryIf: (error) => !tokenFailures.has(error),
      },
    );
  }

  /**
   * One attempt: cached token first, a single forced refresh on 401
   */
  private async attempt(
    owner: string,
    repo: string,
    call: ApiCall,
    tokenFailures: WeakSet<GitHubApiException>,
  ): Promise<GitHubHttpResponse> {
    const operation = this.githubLogger.startOperation(call.operation, {
      repository: `${owner}/${repo}`,
      endpoint: call.context.apiEndpoint,
    });

    const token = async (refresh: boolean): Promise<string> => {
      try {
        return refresh
          ? await this.tokenCache.refreshToken(owner, repo)
          : await this.tokenCache.getToken(owner, repo);
      } catch (caught) {
        const error = this.errorCategorization.categorize(caught, call.context);
        tokenFailures.add(error);
        throw error;
      }
    };

    try {
      let response = await this.send(call.request, await token(false));

      if (response.status === 401) {
        this.logger.warn(
          `Installation token rejected for ${call.context.apiEndpoint}, refreshing and retrying once`,
        );
        response = await this.send(call.request, await token(true));

        if (response.status === 401) {
          throw createAuthenticationError(
            `Installation token for ${owner}/${repo} was rejected after a refresh`,
            call.context,
          );
        }
      }

      if (!isSuccessStatus(response.status)) {
        throw await this.failureFor(response, call);
      }

      operation.endOperation('success');
      return response;
    } catch (caught) {
      const error = this.errorCategorization.categorize(caught, call.context);
      operation.endOperation('error', error);
      throw error;
    }
  }

  private async send(
    request: Omit<GitHubHttpRequest, 'token' | 'scheme'>,
    token: string,
  ): Promise<GitHubHttpResponse> {
    this.rateLimit.recordRequest(RateLimitResource.CORE);
    const response = await this.transport.request({ ...request, token, scheme: 'token' });
    this.rateLimit.observe(response.headers, RateLimitResource.CORE);
    return response;
  }

  private async failureFor(
    response: GitHubHttpResponse,
    call: ApiCall,
  ): Promise<GitHubApiException> {
    const error =
      call.describeFailure?.(response) ??
      this.errorCategorization.classifyHttpError(response, call.context);

    if (error.kind === GitHubErrorKind.RATE_LIMIT_EXCEEDED) {
      await this.rateLimit.handleRateLimitError(error, RateLimitResource.CORE, { wait: false });
    }

    return error;
  }

  private async compareWithFirstParent(
    owner: string,
    repo: string,
    base: string,
    sha: string,
  ): Promise<MergeComparison | undefined> {
    const path = `/repos/${owner}/${repo}/compare/${base}...${sha}`;
    const context = { repository: `${owner}/${repo}`, commitSha: sha, apiEndpoint: `GET ${path}` };

    return this.bestEffort<MergeComparison | undefined>(
      `Merge comparison of ${sha} against ${base}`,
      undefined,
      async () => {
        const response = await this.call(owner, repo, {
          operation: GitHubOperation.COMPARE_COMMITS,
          request: { method: 'GET', path },
          context,
        });
        const body = this.requireRecord(response, context);
        return {
          base,
          ahead_by: readNumber(body, 'ahead_by') ?? 0,
          behind_by: readNumber(body, 'behind_by') ?? 0,
          total_commits: readNumber(body, 'total_commits') ?? 0,
          files: readRecords(body, 'files').map((file) => this.toCommitFile(file)),
        };
      },
    );
  }

  private async fetchLanguages(owner: string, repo: string): Promise<Record<string, number>> {
    const path = `/repos/${owner}/${repo}/languages`;
    const response = await this.call(owner, repo, {
      operation: GitHubOperation.LIST_LANGUAGES,
      request: { method: 'GET', path },
      context: { repository: `${owner}/${repo}`, apiEndpoint: `GET ${path}` },
    });

    const bytes = isRecord(response.data) ? response.data : {};
    const counts = Object.entries(bytes).filter(
      (entry): entry is [string, number] => typeof entry[1] === 'number',
    );
    const total = counts.reduce((sum, [, count]) => sum + count, 0);

    const percentages: Record<string, number> = {};
    if (total === 0) {
      return percentages;
    }
    for (const [language, count] of counts) {
      percentages[language] = Math.round((count / total) * 10000) / 100;
    }
    return percentages;
  }

  private async fetchTopics(owner: string, repo: string): Promise<string[]> {
    const path = `/repos/${owner}/${repo}/topics`;
    const response = await this.call(owner, repo, {
      operation: GitHubOperation.LIST_TOPICS,
      request: { method: 'GET', path },
      context: { repository: `${owner}/${repo}`, apiEndpoint: `GET ${path}` },
    });

    if (!isRecord(response.data)) {
      return [];
    }
    const names = response.data.names;
    if (!Array.isArray(names)) {
      return [];
    }
    return names.filter((name): name is string => typeof name === 'string');
  }

  /**
   * Run a secondary lookup whose failure only degrades the result
   */
  private async bestEffort<T>(label: string, fallback: T, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      this.logger.warn(`${label} unavailable: ${messageOf(error)}`);
      return fallback;
    }
  }

  private validateStatus(
    input: Record<string, string | undefined>,
    context: GitHubErrorContextInput,
  ): CreateCommitStatusDto {
    const dto = plainToInstance(CreateCommitStatusDto, input);
    const errors = validateSync(dto);

    if (errors.length > 0) {
      const problems = errors.flatMap((error) => Object.values(error.constraints ?? {}));
      throw createValidationError(`Invalid commit status: ${problems.join('; ')}`, context);
    }

    return dto;
  }

  private decodeContent(
    raw: string,
    encoding: string | undefined,
  ): Pick<FileContent, 'content' | 'encoding' | 'is_binary'> & { byteLength: number } {
    if (encoding !== 'base64') {
      return {
        content: raw,
        encoding: 'utf-8',
        is_binary: false,
        byteLength: Buffer.byteLength(raw, 'utf8'),
      };
    }

    const payload = raw.replace(/\s/g, '');
    const bytes = Buffer.from(payload, 'base64');

    try {
      return {
        content: this.utf8.decode(bytes),
        encoding: 'utf-8',
        is_binary: false,
        byteLength: bytes.length,
      };
    } catch {
      return { content: payload, encoding: 'base64', is_binary: true, byteLength: bytes.length };
    }
  }

  private contentsPath(owner: string, repo: string, path: string): string {
    const encoded = path
      .split('/')
      .filter((segment) => segment.length > 0)
      .map((segment) => encodeURIComponent(segment))
      .join('/');
    return `/repos/${owner}/${repo}/contents/${encoded}`;
  }

  private requireRecord(
    response: GitHubHttpResponse,
    context: GitHubErrorContextInput,
  ): JsonRecord {
    if (!isRecord(response.data)) {
      throw this.invalidResponse(response, context);
    }
    return response.data;
  }

  private invalidResponse(
    response: GitHubHttpResponse,
    context: GitHubErrorContextInput,
  ): GitHubApiException {
    return GitHubApiException.create(
      GitHubErrorKind.INVALID_RESPONSE,
      `Unexpected response shape from ${context.apiEndpoint ?? 'GitHub'}`,
      { statusCode: response.status, context },
    );
  }

  private failureText(data: unknown): string {
    if (typeof data === 'string') {
      return data.toLowerCase();
    }
    if (isRecord(data)) {
      const message = readString(data, 'message') ?? '';
      const errors = readRecords(data, 'errors')
        .map((error) => readString(error, 'code') ?? '')
        .join(' ');
      return `${message} ${errors}`.toLowerCase();
    }
    return '';
  }

  private toCommitData(body: JsonRecord, sha: string): CommitData {
    const commit = readRecord(body, 'commit') ?? {};
    return {
      sha: readString(body, 'sha') ?? sha,
      message: readString(commit, 'message') ?? '',
      author: this.toIdentity(readRecord(commit, 'author')),
      committer: this.toIdentity(readRecord(commit, 'committer')),
      url: readString(body, 'url') ?? '',
      html_url: readString(body, 'html_url') ?? '',
    };
  }

  private toIdentity(source: JsonRecord | undefined): CommitIdentity | null {
    if (!source) {
      return null;
    }
    return {
      name: readString(source, 'name') ?? '',
      email: readString(source, 'email') ?? '',
      date: readString(source, 'date') ?? '',
    };
  }

  private toCommitFile(source: JsonRecord): CommitFile {
    const file: CommitFile = {
      filename: readString(source, 'filename') ?? '',
      status: readString(source, 'status') ?? 'modified',
      additions: readNumber(source, 'additions') ?? 0,
      deletions: readNumber(source, 'deletions') ?? 0,
      changes: readNumber(source, 'changes') ?? 0,
    };

    const patch = readString(source, 'patch');
    if (patch !== undefined) {
      file.patch = patch;
    }
    const previous = readString(source, 'previous_filename');
    if (previous !== undefined) {
      file.previous_filename = previous;
    }
    const blobUrl = readString(source, 'blob_url');
    if (blobUrl !== undefined) {
      file.blob_url = blobUrl;
    }

    return file;
  }

  private toCommitStats(source: JsonRecord | undefined, files: CommitFile[]): CommitStats {
    const stats = source ?? {};
    const additions =
      readNumber(stats, 'additions') ?? files.reduce((sum, file) => sum + file.additions, 0);
    const deletions =
      readNumber(stats, 'deletions') ?? files.reduce((sum, file) => sum + file.deletions, 0);
    return {
      additions,
      deletions,
      total: readNumber(stats, 'total') ?? additions + deletions,
    };
  }

  private toLicense(source: JsonRecord | undefined): RepositoryLicense | null {
    if (!source) {
      return null;
    }
    return {
      key: readString(source, 'key') ?? '',
      name: readString(source, 'name') ?? '',
      spdx_id: readString(source, 'spdx_id') ?? null,
    };
  }

  private toCommitStatus(source: JsonRecord): CommitStatus {
    return {
      id: readNumber(source, 'id') ?? null,
      state: readString(source, 'state') ?? '',
      description: readString(source, 'description') ?? null,
      context: readString(source, 'context') ?? '',
      target_url: readString(source, 'target_url') ?? null,
      created_at: readString(source, 'created_at') ?? null,
      updated_at: readString(source, 'updated_at') ?? null,
    };
  }
}
