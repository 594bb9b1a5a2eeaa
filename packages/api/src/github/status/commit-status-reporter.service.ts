import { Inject, Injectable, Logger } from '@nestjs/common';
import { GitHubDataClientService } from '../client/github-data-client.service';
import { GITHUB_APP_CONFIG, GitHubAppConfig } from '../config/github-app.config';
import { ErrorCategorizationService } from '../errors/error-categorization.service';
import { CommitStatusState } from '../client/dto/create-commit-status.dto';

export const COMPLETE_THRESHOLD = 90;
export const PARTIAL_THRESHOLD = 50;

export interface StatusVerdict {
  state: CommitStatusState;
  description: string;
}

/**
 * Map a completion percentage to the status posted on the commit
 */
export function verdictFor(completionPercentage: number): StatusVerdict {
  if (completionPercentage >= COMPLETE_THRESHOLD) {
    return { state: 'success', description: 'Commit analysis completed successfully' };
  }
  if (completionPercentage >= PARTIAL_THRESHOLD) {
    return { state: 'success', description: 'Commit analysis partially completed' };
  }
  return { state: 'failure', description: 'Commit analysis failed or incomplete' };
}

/**
 * Commit Status Reporter
 *
 * Posts analysis progress as commit statuses under the configured context.
 * Reporting never throws; a failed post is logged and returned as false.
 */
@Injectable()
export class CommitStatusReporterService {
  private readonly logger = new Logger(CommitStatusReporterService.name);

  constructor(
    @Inject(GITHUB_APP_CONFIG) private readonly config: GitHubAppConfig,
    private readonly dataClient: GitHubDataClientService,
    private readonly errorCategorization: ErrorCategorizationService,
  ) {}

  markPending(owner: string, repo: string, sha: string): Promise<boolean> {
    return this.post(owner, repo, sha, {
      state: 'pending',
      description: 'Commit analysis in progress',
    });
  }

  reportCompletion(
    owner: string,
    repo: string,
    sha: string,
    completionPercentage: number,
    targetUrl?: string,
  ): Promise<boolean> {
    return this.post(owner, repo, sha, verdictFor(completionPercentage), targetUrl);
  }

  private async post(
    owner: string,
    repo: string,
    sha: string,
    verdict: StatusVerdict,
    targetUrl?: string,
  ): Promise<boolean> {
    try {
      await this.dataClient.createCommitStatus(
        owner,
        repo,
        sha,
        verdict.state,
        verdict.description,
        this.config.statusContext,
        targetUrl,
      );
      return true;
    } catch (caught) {
      const error = this.errorCategorization.categorize(caught, {
        repository: `${owner}/${repo}`,
        commitSha: sha,
      });
      this.logger.error(
        `Could not set ${verdict.state} status on ${sha.slice(0, 8)} in ${owner}/${repo}: ${error.message}`,
      );
      return false;
    }
  }
}
