import * as fs from 'fs';
import { createPrivateKey, KeyObject } from 'crypto';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { SignJWT } from 'jose';
import { ClockService } from '../../common/clock/clock.service';
import { messageOf } from '../../common/utils/json-readers';
import { GITHUB_APP_CONFIG, GitHubAppConfig, hasPemMarker } from '../config/github-app.config';
import { GitHubApiException } from '../errors/github.exception';
import { GitHubErrorKind } from '../errors/github-error.types';

/** Assertion returned in mock mode */
export const MOCK_APP_ASSERTION = 'mock_app_assertion';

/** GitHub rejects App JWTs valid for longer than 10 minutes */
export const ASSERTION_LIFETIME_SECONDS = 600;

/** Issued-at backdating for clock skew */
export const ASSERTION_BACKDATE_SECONDS = 60;

/**
 * Issues short-lived RS256 App assertions (JWTs) used only against App-level
 * endpoints: installation lookup and installation token creation.
 */
@Injectable()
export class CredentialIssuerService {
  private readonly logger = new Logger(CredentialIssuerService.name);
  private signingKey: KeyObject | null = null;

  constructor(
    @Inject(GITHUB_APP_CONFIG) private readonly config: GitHubAppConfig,
    private readonly clock: ClockService,
  ) {}

  /**
   * Sign a fresh App assertion
   *
   * @throws GitHubApiException - INVALID_CREDENTIALS for a malformed App id, empty or non-PEM key, or signing failure;
   * MISSING_CREDENTIALS when no key material is configured
   */
  async issueAssertion(): Promise<string> {
    this.assertAppId();

    if (this.config.mockMode) {
      return MOCK_APP_ASSERTION;
    }

    const key = this.loadSigningKey();
    const now = this.clock.nowSeconds();

    try {
      const assertion = await new SignJWT({})
        .setProtectedHeader({ alg: 'RS256', typ: 'JWT' })
        .setIssuedAt(now - ASSERTION_BACKDATE_SECONDS)
        .setExpirationTime(now + ASSERTION_LIFETIME_SECONDS)
        .setIssuer(this.config.appId)
        .sign(key);

      this.logger.debug(`Issued App assertion for app ${this.config.appId}`);
      return assertion;
    } catch (error) {
      throw GitHubApiException.create(
        GitHubErrorKind.INVALID_CREDENTIALS,
        `Failed to sign App assertion: ${messageOf(error)}`,
        { originalError: error },
      );
    }
  }

  private assertAppId(): void {
    if (!/^\d+$/.test(this.config.appId)) {
      throw GitHubApiException.create(
        GitHubErrorKind.INVALID_CREDENTIALS,
        `GitHub App id must be a decimal number, got "${this.config.appId}"`,
      );
    }
  }

  private loadSigningKey(): KeyObject {
    if (this.signingKey) {
      return this.signingKey;
    }

    const pem = this.readKeyMaterial();

    if (pem.trim().length === 0) {
      throw GitHubApiException.create(GitHubErrorKind.INVALID_CREDENTIALS, 'Private key is empty');
    }

    if (!pem.trimStart().startsWith('-----BEGIN') || !hasPemMarker(pem)) {
      throw GitHubApiException.create(
        GitHubErrorKind.INVALID_CREDENTIALS,
        'Private key is not a PEM-encoded RSA private key',
      );
    }

    try {
      // createPrivateKey accepts both PKCS#1 and PKCS#8 PEM
      this.signingKey = createPrivateKey(pem);
    } catch (error) {
      throw GitHubApiException.create(
        GitHubErrorKind.INVALID_CREDENTIALS,
        `Private key could not be parsed: ${messageOf(error)}`,
        { originalError: error },
      );
    }

    return this.signingKey;
  }

  private readKeyMaterial(): string {
    if (this.config.privateKey !== undefined) {
      return this.config.privateKey;
    }

    const path = this.config.privateKeyPath;
    if (!path) {
      throw GitHubApiException.create(
        GitHubErrorKind.MISSING_CREDENTIALS,
        'No GitHub App private key configured',
      );
    }

    try {
      return fs.readFileSync(path, 'utf8');
    } catch (error) {
      throw GitHubApiException.create(
        GitHubErrorKind.MISSING_CREDENTIALS,
        `Private key file could not be read: ${path}`,
        { originalError: error },
      );
    }
  }
}
