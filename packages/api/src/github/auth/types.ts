/**
 * Installation token cache types
 */

/** A cached token is treated as expired this long before GitHub's expiry */
export const TOKEN_EXPIRY_BUFFER_MS = 5 * 60 * 1000;

/** Minimum spacing between lazy expiry sweeps */
export const CLEANUP_INTERVAL_MS = 10 * 60 * 1000;

/** Assumed lifetime when GitHub omits or garbles expires_at */
export const DEFAULT_TOKEN_LIFETIME_MS = 60 * 60 * 1000;

/** Token creation attempts per refresh */
export const MAX_TOKEN_ATTEMPTS = 3;

/** Installation id served in mock mode */
export const MOCK_INSTALLATION_ID = 12345;

/**
 * One repository-scoped grant; owned exclusively by the cache
 */
export interface CachedInstallationToken {
  token: string;
  /** Epoch milliseconds */
  expiresAt: number;
  installationId: number;
  /** Epoch milliseconds */
  createdAt: number;
  refreshCount: number;
  lastError: string | null;
}

export enum TokenState {
  VALID = 'valid',
  /** Inside the expiry buffer but not yet past GitHub's expiry */
  EXPIRING_SOON = 'expiring_soon',
  EXPIRED = 'expired',
}

/**
 * Token freshly issued by GitHub
 */
export interface InstallationTokenGrant {
  token: string;
  expiresAt: number;
}

/**
 * Introspection view of a cache entry; never includes the token itself
 */
export interface InstallationTokenInfo {
  repository: string;
  installationId: number;
  state: TokenState;
  expiresAt: string;
  expiresInMinutes: number;
  isExpired: boolean;
  isExpiredNoBuffer: boolean;
  createdAt: string;
  ageInMinutes: number;
  refreshCount: number;
  lastError: string | null;
  tokenLength: number;
}

export interface TokenManagementStats {
  totalCachedTokens: number;
  healthyTokens: number;
  expiringSoonTokens: number;
  expiredTokens: number;
  totalRefreshes: number;
  cachedInstallationIds: number;
  timeSinceLastCleanupMinutes: number;
}
