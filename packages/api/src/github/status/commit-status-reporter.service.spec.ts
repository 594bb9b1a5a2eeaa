import { Test } from '@nestjs/testing';
import { GitHubDataClientService } from '../client/github-data-client.service';
import { createTestGitHubAppConfig, GITHUB_APP_CONFIG } from '../config/github-app.config';
import { ErrorCategorizationService } from '../errors/error-categorization.service';
import { createValidationError } from '../errors/github.exception';
import { CommitStatusReporterService, verdictFor } from './commit-status-reporter.service';

describe('CommitStatusReporterService', () => {
  let reporter: CommitStatusReporterService;
  let dataClient: { createCommitStatus: jest.Mock };

  beforeEach(async () => {
    dataClient = { createCommitStatus: jest.fn().mockResolvedValue({ id: 1 }) };

    const module = await Test.createTestingModule({
      providers: [
        CommitStatusReporterService,
        ErrorCategorizationService,
        {
          provide: GITHUB_APP_CONFIG,
          useValue: createTestGitHubAppConfig({ statusContext: 'quality-gate' }),
        },
        { provide: GitHubDataClientService, useValue: dataClient },
      ],
    }).compile();

    reporter = module.get<CommitStatusReporterService>(CommitStatusReporterService);
  });

  describe('verdictFor', () => {
    it.each([
      [100, 'success', 'Commit analysis completed successfully'],
      [90, 'success', 'Commit analysis completed successfully'],
      [89.9, 'success', 'Commit analysis partially completed'],
      [50, 'success', 'Commit analysis partially completed'],
      [49.9, 'failure', 'Commit analysis failed or incomplete'],
      [0, 'failure', 'Commit analysis failed or incomplete'],
    ])('should map %s%% to %s', (percentage, state, description) => {
      expect(verdictFor(percentage)).toEqual({ state, description });
    });
  });

  it('should mark a commit as pending', async () => {
    await expect(reporter.markPending('octocat', 'Hello-World', 'abc123')).resolves.toBe(true);

    expect(dataClient.createCommitStatus).toHaveBeenCalledWith(
      'octocat',
      'Hello-World',
      'abc123',
      'pending',
      'Commit analysis in progress',
      'quality-gate',
      undefined,
    );
  });

  it('should report completion with a target URL', async () => {
    await reporter.reportCompletion(
      'octocat',
      'Hello-World',
      'abc123',
      72,
      'https://reports.example.com/abc123',
    );

    expect(dataClient.createCommitStatus).toHaveBeenCalledWith(
      'octocat',
      'Hello-World',
      'abc123',
      'success',
      'Commit analysis partially completed',
      'quality-gate',
      'https://reports.example.com/abc123',
    );
  });

  it('should return false when the status cannot be posted', async () => {
    dataClient.createCommitStatus.mockRejectedValue(createValidationError('Invalid commit status'));

    await expect(reporter.reportCompletion('octocat', 'Hello-World', 'abc123', 10)).resolves.toBe(
      false,
    );
  });
});
