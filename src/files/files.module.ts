import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AnalyticsModule } from '../analytics/analytics.module';
import { BasicAuthGuard } from '../auth/guards/basic-auth.guard';
import type { AppConfig } from '../config/env.validation';
import { StorageModule } from '../storage/storage.module';
import { BACKING_STORE } from '../storage/storage.types';
import type { BackingStore } from '../storage/storage.types';
import { FileErrorFilter } from './file-error.filter';
import { FilesController } from './files.controller';
import { ObjectDirectory } from './object-directory.service';

@Module({
  imports: [StorageModule, AnalyticsModule],
  controllers: [FilesController],
  providers: [
    {
      provide: ObjectDirectory,
      inject: [BACKING_STORE, ConfigService],
      useFactory: (store: BackingStore, config: ConfigService<AppConfig, true>) =>
        new ObjectDirectory(store, {
          tokenLength: config.get('TOKEN_LENGTH', { infer: true }),
          cdnBase: config.get('CDN_URL', { infer: true }) || undefined,
          cacheSize: config.get('CACHE_SIZE', { infer: true }),
          signedUrlTtlSeconds: config.get('SIGNED_URL_TTL_SECONDS', { infer: true }),
          storeTimeoutMs: config.get('STORE_TIMEOUT_MS', { infer: true })
        })
    },
    BasicAuthGuard,
    FileErrorFilter
  ],
  exports: [ObjectDirectory]
})
export class FilesModule {}
