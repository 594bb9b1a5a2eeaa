import {
  DynamicModule,
  FactoryProvider,
  Global,
  Module,
  ModuleMetadata,
  Provider,
} from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ClockService } from '../common/clock/clock.service';
import { CredentialIssuerService } from './auth/credential-issuer.service';
import { InstallationTokenCacheService } from './auth/installation-token-cache.service';
import { GitHubDataClientService } from './client/github-data-client.service';
import { GITHUB_HTTP_TRANSPORT } from './client/github-transport';
import { OctokitTransport } from './client/octokit-transport.service';
import {
  GITHUB_APP_CONFIG,
  GitHubAppConfig,
  resolveGitHubAppConfig,
} from './config/github-app.config';
import { ErrorCategorizationService } from './errors/error-categorization.service';
import { RetryStrategyService } from './errors/retry-strategy.service';
import { GitHubLoggerService } from './logging/github-logger.service';
import { RateLimitService } from './rate-limit/rate-limit.service';
import { CommitStatusReporterService } from './status/commit-status-reporter.service';

export interface GitHubAccessModuleAsyncOptions {
  imports?: ModuleMetadata['imports'];
  useFactory: FactoryProvider<GitHubAppConfig | Promise<GitHubAppConfig>>['useFactory'];
  inject?: FactoryProvider['inject'];
}

/**
 * GitHub Access Module
 *
 * Provides the GitHub App access layer: credential issuing, installation
 * token caching, rate-limit tracking, retries and the repository data client.
 */
@Global()
@Module({})
export class GitHubAccessModule {
  /**
   * Register with an explicit configuration, or resolve it from ConfigService
   */
  static forRoot(config?: GitHubAppConfig): DynamicModule {
    const configProvider: Provider = config
      ? { provide: GITHUB_APP_CONFIG, useValue: config }
      : {
          provide: GITHUB_APP_CONFIG,
          useFactory: (configService: ConfigService) => resolveGitHubAppConfig(configService),
          inject: [ConfigService],
        };

    return this.build(configProvider);
  }

  /**
   * Register asynchronously (for configuration loaded from elsewhere)
   */
  static forRootAsync(options: GitHubAccessModuleAsyncOptions): DynamicModule {
    return this.build(
      {
        provide: GITHUB_APP_CONFIG,
        useFactory: options.useFactory,
        inject: options.inject || [],
      },
      options.imports,
    );
  }

  private static build(
    configProvider: Provider,
    imports: ModuleMetadata['imports'] = [],
  ): DynamicModule {
    return {
      module: GitHubAccessModule,
      imports: [ConfigModule, ...imports],
      providers: [
        configProvider,
        ClockService,
        ErrorCategorizationService,
        GitHubLoggerService,
        {
          provide: RateLimitService,
          useFactory: (clock: ClockService, config: GitHubAppConfig) => {
            const rateLimit = new RateLimitService(clock);
            rateLimit.configure({
              bufferRequests: config.rateLimitBuffer,
              autoWait: config.autoWait,
            });
            return rateLimit;
          },
          inject: [ClockService, GITHUB_APP_CONFIG],
        },
        {
          provide: RetryStrategyService,
          useFactory: (
            errorCategorization: ErrorCategorizationService,
            rateLimit: RateLimitService,
            clock: ClockService,
            config: GitHubAppConfig,
          ) => {
            const retryStrategy = new RetryStrategyService(errorCategorization, rateLimit, clock);
            retryStrategy.configure({ maxRetries: config.maxRetries });
            return retryStrategy;
          },
          inject: [ErrorCategorizationService, RateLimitService, ClockService, GITHUB_APP_CONFIG],
        },
        CredentialIssuerService,
        { provide: GITHUB_HTTP_TRANSPORT, useClass: OctokitTransport },
        InstallationTokenCacheService,
        GitHubDataClientService,
        CommitStatusReporterService,
      ],
      exports: [
        GITHUB_APP_CONFIG,
        ClockService,
        ErrorCategorizationService,
        RateLimitService,
        RetryStrategyService,
        CredentialIssuerService,
        InstallationTokenCacheService,
        GitHubDataClientService,
        CommitStatusReporterService,
      ],
    };
  }
}
