export * from './common/clock/clock.service';
export { default as configuration } from './config/configuration';
export * from './github/auth/credential-issuer.service';
export * from './github/auth/installation-token-cache.service';
export * from './github/auth/types';
export * from './github/client/dto/create-commit-status.dto';
export * from './github/client/github-data-client.service';
export * from './github/client/github-transport';
export * from './github/client/octokit-transport.service';
export * from './github/client/types';
export * from './github/config/github-app.config';
export * from './github/errors';
export * from './github/github-access.module';
export * from './github/logging/github-logger.service';
export * from './github/logging/sensitive-data.filter';
export * from './github/rate-limit/rate-limit.service';
export * from './github/rate-limit/types';
export * from './github/status/commit-status-reporter.service';
export { AppModule } from './app.module';
