/**
 * GSC Sync API
 * Pulls Google Search Console performance data into PostgreSQL on demand
 */

import 'reflect-metadata';
import * as dotenv from 'dotenv';
dotenv.config(); // Load .env file

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app/app.module';
import { environment } from './environments/environment';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  const port = environment.port;

  await app.listen(port);

  Logger.log(`🚀 GSC Sync API is running on: http://localhost:${port}`);
  Logger.log(`📊 Environment: ${environment.production ? 'production' : 'development'}`);
  Logger.log(`🎯 Target site: ${environment.google.siteUrl}`);
  if (!environment.databaseUrl) {
    Logger.warn('DATABASE_URL is not set - sync triggers will fail');
  }
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start GSC Sync API', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
