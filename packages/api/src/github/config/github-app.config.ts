import * as fs from 'fs';
import { ConfigService } from '@nestjs/config';
import { GitHubApiException } from '../errors/github.exception';
import { GitHubErrorKind } from '../errors/github-error.types';

/**
 * Injection token for the validated GitHub App configuration
 */
export const GITHUB_APP_CONFIG = 'GITHUB_APP_CONFIG';

/** Decimal App id used when mock mode runs without one */
export const MOCK_APP_ID = '123456';
export const MOCK_PRIVATE_KEY_PATH = 'mock_private_key.pem';

const PEM_MARKERS = ['BEGIN PRIVATE KEY', 'BEGIN RSA PRIVATE KEY'];

/**
 * GitHub App settings, validated once at startup
 */
export interface GitHubAppConfig {
  appId: string;
  /** Inline PEM; takes precedence over privateKeyPath */
  privateKey?: string;
  privateKeyPath?: string;
  webhookSecret?: string;
  clientId?: string;
  apiBaseUrl: string;
  /** Serve deterministic fake data instead of calling GitHub */
  mockMode: boolean;
  maxRetries: number;
  rateLimitBuffer: number;
  requestTimeoutMs: number;
  autoWait: boolean;
  /** Commit status context name */
  statusContext: string;
}

export const DEFAULT_GITHUB_APP_CONFIG: Omit<GitHubAppConfig, 'appId'> = {
  apiBaseUrl: 'https://api.github.com',
  mockMode: false,
  maxRetries: 3,
  rateLimitBuffer: 10,
  requestTimeoutMs: 30000,
  autoWait: true,
  statusContext: 'commit-quality-analysis',
};

export function hasPemMarker(pem: string): boolean {
  return PEM_MARKERS.some((marker) => pem.includes(marker));
}

/**
 * Collect every configuration problem; an empty list means the config is usable
 */
export function validateGitHubAppConfig(config: GitHubAppConfig): string[] {
  const errors: string[] = [];

  if (!config.appId) {
    errors.push('GITHUB_APP_ID is required');
  } else if (!/^\d+$/.test(config.appId)) {
    errors.push(`GITHUB_APP_ID must be numeric, got "${config.appId}"`);
  }

  if (!/^https?:\/\//.test(config.apiBaseUrl)) {
    errors.push(`GITHUB_API_BASE_URL must be an http(s) URL, got "${config.apiBaseUrl}"`);
  }

  if (config.mockMode) {
    return errors;
  }

  if (config.privateKey) {
    if (!hasPemMarker(config.privateKey)) {
      errors.push('GITHUB_PRIVATE_KEY does not contain a PEM private key');
    }
    return errors;
  }

  if (!config.privateKeyPath) {
    errors.push('GITHUB_PRIVATE_KEY_PATH is required when GITHUB_PRIVATE_KEY is not set');
    return errors;
  }

  if (!fs.existsSync(config.privateKeyPath)) {
    errors.push(`Private key file not found: ${config.privateKeyPath}`);
    return errors;
  }

  const content = fs.readFileSync(config.privateKeyPath, 'utf8');
  if (content.trim().length === 0) {
    errors.push(`Private key file is empty: ${config.privateKeyPath}`);
  } else if (!hasPemMarker(content)) {
    errors.push(`Private key file is not a PEM private key: ${config.privateKeyPath}`);
  }

  return errors;
}

/**
 * Build the App configuration from ConfigService, applying mock fallbacks
 *
 * @throws GitHubApiException - INVALID_CONFIGURATION listing every problem found
 */
export function resolveGitHubAppConfig(configService: ConfigService): GitHubAppConfig {
  const mockMode = configService.get<boolean>('github.mockMode', false);
  const inlineKey = configService.get<string>('github.privateKey');

  const config: GitHubAppConfig = {
    appId: configService.get<string>('github.appId') || (mockMode ? MOCK_APP_ID : ''),
    privateKey: inlineKey ? inlineKey.replace(/\\n/g, '\n') : undefined,
    privateKeyPath:
      configService.get<string>('github.privateKeyPath') ||
      (mockMode ? MOCK_PRIVATE_KEY_PATH : undefined),
    webhookSecret: configService.get<string>('github.webhookSecret'),
    clientId: configService.get<string>('github.clientId'),
    apiBaseUrl: configService.get<string>('github.apiBaseUrl', DEFAULT_GITHUB_APP_CONFIG.apiBaseUrl),
    mockMode,
    maxRetries: configService.get<number>('github.maxRetries', DEFAULT_GITHUB_APP_CONFIG.maxRetries),
    rateLimitBuffer: configService.get<number>(
      'github.rateLimitBuffer',
      DEFAULT_GITHUB_APP_CONFIG.rateLimitBuffer,
    ),
    requestTimeoutMs: configService.get<number>(
      'github.requestTimeoutMs',
      DEFAULT_GITHUB_APP_CONFIG.requestTimeoutMs,
    ),
    autoWait: configService.get<boolean>('github.autoWait', DEFAULT_GITHUB_APP_CONFIG.autoWait),
    statusContext: configService.get<string>(
      'github.statusContext',
      DEFAULT_GITHUB_APP_CONFIG.statusContext,
    ),
  };

  const errors = validateGitHubAppConfig(config);
  if (errors.length > 0) {
    throw GitHubApiException.create(
      GitHubErrorKind.INVALID_CONFIGURATION,
      `Invalid GitHub App configuration: ${errors.join('; ')}`,
    );
  }

  return config;
}

/**
 * Mock-mode configuration for specs and offline runs
 */
export function createTestGitHubAppConfig(overrides: Partial<GitHubAppConfig> = {}): GitHubAppConfig {
  return {
    ...DEFAULT_GITHUB_APP_CONFIG,
    appId: MOCK_APP_ID,
    privateKeyPath: MOCK_PRIVATE_KEY_PATH,
    mockMode: true,
    ...overrides,
  };
}
