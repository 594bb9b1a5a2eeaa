import { Test } from '@nestjs/testing';
import { RequestError } from '@octokit/request-error';
import { createTestGitHubAppConfig, GITHUB_APP_CONFIG } from '../config/github-app.config';
import { ErrorCategorizationService } from '../errors/error-categorization.service';
import { GitHubApiException } from '../errors/github.exception';
import { GitHubErrorKind } from '../errors/github-error.types';
import { OctokitTransport } from './octokit-transport.service';

const mockRequest = jest.fn();

jest.mock('@octokit/rest', () => ({
  Octokit: jest.fn().mockImplementation(() => ({ request: mockRequest })),
}));

describe('OctokitTransport', () => {
  let transport: OctokitTransport;

  beforeEach(async () => {
    mockRequest.mockReset();

    const module = await Test.createTestingModule({
      providers: [
        OctokitTransport,
        ErrorCategorizationService,
        {
          provide: GITHUB_APP_CONFIG,
          useValue: createTestGitHubAppConfig({ requestTimeoutMs: 5000 }),
        },
      ],
    }).compile();

    transport = module.get<OctokitTransport>(OctokitTransport);
  });

  it('should send installation token requests with the token scheme', async () => {
    mockRequest.mockResolvedValue({
      status: 200,
      headers: { 'X-RateLimit-Remaining': '4999', etag: 'W/"abc"' },
      data: { name: 'README.md' },
    });

    const response = await transport.request({
      method: 'GET',
      path: '/repos/octocat/Hello-World/contents/README.md',
      token: 'test-token',
      query: { ref: 'main' },
    });

    expect(mockRequest).toHaveBeenCalledWith('GET /repos/octocat/Hello-World/contents/README.md', {
      ref: 'main',
      headers: {
        accept: 'application/vnd.github.v3+json',
        authorization: 'token test-token',
      },
      request: { signal: expect.any(AbortSignal) },
    });
    expect(response).toEqual({
      status: 200,
      headers: { 'x-ratelimit-remaining': '4999', etag: 'W/"abc"' },
      data: { name: 'README.md' },
    });
  });

  it('should send App assertions with the Bearer scheme and a JSON body', async () => {
    mockRequest.mockResolvedValue({ status: 201, headers: {}, data: {} });

    await transport.request({
      method: 'POST',
      path: '/repos/octocat/Hello-World/statuses/abc123',
      token: 'test-assertion',
      scheme: 'Bearer',
      body: { state: 'success', context: 'ci' },
    });

    expect(mockRequest).toHaveBeenCalledWith(
      'POST /repos/octocat/Hello-World/statuses/abc123',
      expect.objectContaining({
        state: 'success',
        context: 'ci',
        headers: expect.objectContaining({ authorization: 'Bearer test-assertion' }),
      }),
    );
  });

  it('should return error responses as values', async () => {
    mockRequest.mockRejectedValue(
      new RequestError('Not Found', 404, {
        request: { method: 'GET', url: 'https://api.github.com/repos/octocat/missing', headers: {} },
        response: {
          status: 404,
          url: 'https://api.github.com/repos/octocat/missing',
          headers: { 'x-ratelimit-remaining': '4998' },
          data: { message: 'Not Found' },
        },
      }),
    );

    const response = await transport.request({ method: 'GET', path: '/repos/octocat/missing' });

    expect(response).toEqual({
      status: 404,
      headers: { 'x-ratelimit-remaining': '4998' },
      data: { message: 'Not Found' },
    });
  });

  it('should raise a structured error when no response arrives', async () => {
    mockRequest.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:443'));

    const error = await transport
      .request({ method: 'GET', path: '/rate_limit' })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GitHubApiException);
    expect(error).toMatchObject({
      kind: GitHubErrorKind.NETWORK_ERROR,
      details: { context: { apiEndpoint: 'GET /rate_limit' } },
    });
  });
});
