import { OperationHandle } from '../github-logger.service';

/**
 * Drop-in for GitHubLoggerService that records calls instead of writing files
 */
export function createGitHubLoggerStub() {
  return {
    log: jest.fn(),
    startOperation: jest.fn(
      (): OperationHandle => ({ requestId: 'test-request-id', endOperation: jest.fn() }),
    ),
    onModuleDestroy: jest.fn(),
  };
}
