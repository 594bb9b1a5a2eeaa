import { HttpHeaders } from '../../common/http/headers';

/**
 * Injection token for the HTTP transport used by every live GitHub call
 */
export const GITHUB_HTTP_TRANSPORT = 'GITHUB_HTTP_TRANSPORT';

export type HttpMethod = 'GET' | 'POST';

/**
 * Authorization scheme: `Bearer` for App assertions, `token` for installation tokens
 */
export type AuthScheme = 'Bearer' | 'token';

export interface GitHubHttpRequest {
  method: HttpMethod;
  /** Path below the API base URL, already expanded (e.g. /repos/octocat/Hello-World) */
  path: string;
  token?: string;
  scheme?: AuthScheme;
  query?: Record<string, string | number | undefined>;
  body?: Record<string, unknown>;
}

export interface GitHubHttpResponse {
  status: number;
  headers: HttpHeaders;
  data: unknown;
}

/**
 * Minimal HTTP surface the access layer needs.
 *
 * Implementations return every HTTP response, including 4xx/5xx, and throw a
 * structured GitHubApiException only when no response was received.
 */
export interface GitHubHttpTransport {
  request(request: GitHubHttpRequest): Promise<GitHubHttpResponse>;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
