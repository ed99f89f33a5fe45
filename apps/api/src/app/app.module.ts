import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { SYNC_CONFIG, createSyncConfig } from '../config/sync-config';

// Services
import {
  SearchConsoleAuthService,
  SearchConsoleService,
  PerformanceLoaderService,
  SyncPipelineService,
  STORE_CONNECTION_FACTORY,
  connectPostgres,
} from '../services';

// Controllers
import { SyncController } from '../controllers';

@Module({
  imports: [],
  controllers: [AppController, SyncController],
  providers: [
    AppService,
    { provide: SYNC_CONFIG, useFactory: createSyncConfig },
    { provide: STORE_CONNECTION_FACTORY, useValue: connectPostgres },
    SearchConsoleAuthService,
    SearchConsoleService,
    PerformanceLoaderService,
    SyncPipelineService,
  ],
})
export class AppModule {}
