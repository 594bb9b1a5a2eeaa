/**
 * Sensitive Data Filter
 *
 * Redacts credentials from anything headed for the logs:
 * - GitHub installation, personal and OAuth tokens
 * - Authorization header values and App assertions (JWTs)
 * - PEM private keys
 */
export class SensitiveDataFilter {
  static readonly REDACTED = '[REDACTED]';

  private static readonly SENSITIVE_PATTERNS: ReadonlyArray<{ pattern: RegExp; name: string }> = [
    // GitHub tokens
    { pattern: /ghs_[a-zA-Z0-9]{20,}/g, name: 'GitHub Installation Token' },
    { pattern: /ghp_[a-zA-Z0-9]{20,}/g, name: 'GitHub Personal Access Token' },
    { pattern: /gho_[a-zA-Z0-9]{20,}/g, name: 'GitHub OAuth Token' },
    { pattern: /ghu_[a-zA-Z0-9]{20,}/g, name: 'GitHub User Token' },
    { pattern: /github_pat_[a-zA-Z0-9_]{20,}/g, name: 'GitHub Fine-Grained Token' },

    // Authorization header values
    { pattern: /\b(Bearer|token)\s+[a-zA-Z0-9\-._~+/]{8,}=*/g, name: 'Authorization Credential' },

    // App assertions
    { pattern: /eyJ[a-zA-Z0-9_-]+\.eyJ[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/g, name: 'JWT' },

    // Private keys
    {
      pattern: /-----BEGIN\s+(?:RSA\s+|EC\s+)?PRIVATE\s+KEY-----[\s\S]*?-----END\s+(?:RSA\s+|EC\s+)?PRIVATE\s+KEY-----/g,
      name: 'Private Key',
    },
  ];

  // Header names that contain sensitive data
  private static readonly SENSITIVE_HEADERS = ['authorization', 'cookie', 'set-cookie', 'x-hub-signature-256'];

  // Object keys that likely contain sensitive data
  private static readonly SENSITIVE_KEYS = [
    'token',
    'secret',
    'password',
    'privatekey',
    'private_key',
    'assertion',
    'authorization',
  ];

  /**
   * Filter sensitive data from any value
   */
  static filter(data: unknown): unknown {
    if (typeof data === 'string') {
      return this.filterString(data);
    }

    if (Array.isArray(data)) {
      return data.map((item) => this.filter(item));
    }

    if (typeof data === 'object' && data !== null) {
      return this.filterObject(Object.fromEntries(Object.entries(data)));
    }

    return data;
  }

  /**
   * Filter sensitive data from strings
   */
  static filterString(str: string): string {
    let filtered = str;
    for (const { pattern } of this.SENSITIVE_PATTERNS) {
      filtered = filtered.replace(pattern, this.REDACTED);
    }
    return filtered;
  }

  /**
   * Filter sensitive data from objects, recursing into values
   */
  static filterObject(obj: Record<string, unknown>): Record<string, unknown> {
    const filtered: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(obj)) {
      filtered[key] = this.isSensitiveKey(key) ? this.REDACTED : this.filter(value);
    }

    return filtered;
  }

  /**
   * Filter HTTP headers object
   */
  static filterHeaders(headers: Record<string, string>): Record<string, string> {
    const filtered: Record<string, string> = {};

    for (const [key, value] of Object.entries(headers)) {
      filtered[key] = this.SENSITIVE_HEADERS.includes(key.toLowerCase()) ? this.REDACTED : value;
    }

    return filtered;
  }

  /**
   * Check if a string contains sensitive data
   */
  static containsSensitiveData(str: string): boolean {
    return this.SENSITIVE_PATTERNS.some(({ pattern }) => new RegExp(pattern.source).test(str));
  }

  private static isSensitiveKey(key: string): boolean {
    const lowerKey = key.toLowerCase();
    return (
      this.SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey)) ||
      this.SENSITIVE_HEADERS.includes(lowerKey)
    );
  }
}
