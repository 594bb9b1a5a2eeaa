import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { GitHubDataClientService } from './github/client/github-data-client.service';
import { GitHubApiException } from './github/errors/github.exception';

/**
 * Fetch one commit's patch set and print it as JSON
 *
 * Usage: node dist/api/src/main.js <owner> <repo> <sha>
 */
async function bootstrap(): Promise<void> {
  const [owner, repo, sha] = process.argv.slice(2);
  if (!owner || !repo || !sha) {
    console.error('Usage: main <owner> <repo> <sha>');
    process.exitCode = 2;
    return;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });

  try {
    const client = app.get(GitHubDataClientService);
    const patchSet = await client.fetchCommitPatches(owner, repo, sha);
    process.stdout.write(JSON.stringify(patchSet, null, 2) + '\n');
  } catch (error) {
    if (!(error instanceof GitHubApiException)) {
      throw error;
    }
    process.stderr.write(JSON.stringify(error.toRecord(), null, 2) + '\n');
    process.exitCode = 1;
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
