import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { GitHubLoggerService, GitHubOperation } from './github-logger.service';

describe('GitHubLoggerService', () => {
  let service: GitHubLoggerService;

  beforeEach(async () => {
    const module = await Test.createTestingModule({
      providers: [
        GitHubLoggerService,
        {
          provide: ConfigService,
          useValue: new ConfigService({
            app: { environment: 'test' },
            logging: { toFile: false, level: 'debug' },
          }),
        },
      ],
    }).compile();

    service = module.get<GitHubLoggerService>(GitHubLoggerService);
  });

  afterEach(() => {
    service.onModuleDestroy();
  });

  it('should log the start and outcome of an operation under one request id', () => {
    const log = jest.spyOn(service, 'log');
    const metadata = { repository: 'octocat/Hello-World' };

    const operation = service.startOperation(GitHubOperation.GET_COMMIT, metadata);
    operation.endOperation('success');

    expect(operation.requestId).toMatch(/^[0-9a-f-]{36}$/);
    expect(log).toHaveBeenNthCalledWith(1, GitHubOperation.GET_COMMIT, 'pending', {
      requestId: operation.requestId,
      metadata,
    });
    expect(log).toHaveBeenNthCalledWith(2, GitHubOperation.GET_COMMIT, 'success', {
      requestId: operation.requestId,
      duration: expect.any(Number),
      error: undefined,
      metadata,
    });
  });

  it('should pass the failure to the outcome entry', () => {
    const log = jest.spyOn(service, 'log');
    const failure = new Error('Bad credentials');

    service.startOperation(GitHubOperation.CREATE_COMMIT_STATUS).endOperation('error', failure);

    expect(log).toHaveBeenLastCalledWith(
      GitHubOperation.CREATE_COMMIT_STATUS,
      'error',
      expect.objectContaining({ error: failure }),
    );
  });

  it('should write entries without throwing', () => {
    const stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

    expect(() =>
      service.log(GitHubOperation.CREATE_INSTALLATION_TOKEN, 'error', {
        error: new Error('token test-token was rejected'),
        metadata: { token: 'test-token', repository: 'octocat/Hello-World' },
      }),
    ).not.toThrow();
    expect(stderr).not.toHaveBeenCalled();

    stderr.mockRestore();
  });
});
