/**
 * GitHub error model: kinds, the structured exception, classification and retries
 */

export * from './github-error.types';
export * from './github.exception';
export * from './error-categorization.service';
export * from './retry-strategy.service';
