import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './config/configuration';
import { GitHubAccessModule } from './github/github-access.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    GitHubAccessModule.forRoot(),
  ],
})
export class AppModule {}
