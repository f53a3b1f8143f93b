import { Logger, Module, OnApplicationBootstrap, Inject } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { StorageService } from './storage.service';
import { BACKING_STORE } from './storage.types';
import type { AppConfig } from '../config/env.validation';

export function resolveStorageEndpoint(config: ConfigService<AppConfig, true>) {
  const url = config.get('STORAGE_URL', { infer: true });
  let endPoint = config.get('STORAGE_ENDPOINT', { infer: true });
  let port = config.get('STORAGE_PORT', { infer: true });
  let useSSL = config.get('STORAGE_USE_SSL', { infer: true });

  if (url) {
    const parsed = new URL(url);
    endPoint = parsed.hostname;
    port = parsed.port ? parseInt(parsed.port, 10) : parsed.protocol === 'https:' ? 443 : 80;
    useSSL = parsed.protocol === 'https:';
  }

  return { endPoint, port, useSSL };
}

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: StorageService,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) =>
        new StorageService({
          ...resolveStorageEndpoint(config),
          region: config.get('STORAGE_REGION', { infer: true }),
          accessKey: config.get('STORAGE_ACCESS_KEY', { infer: true }),
          secretKey: config.get('STORAGE_SECRET_KEY', { infer: true }),
          bucket: config.get('STORAGE_BUCKET', { infer: true })
        })
    },
    { provide: BACKING_STORE, useExisting: StorageService }
  ],
  exports: [StorageService, BACKING_STORE]
})
export class StorageModule implements OnApplicationBootstrap {
  private readonly logger = new Logger(StorageModule.name);

  constructor(
    @Inject(StorageService) private readonly storage: StorageService,
    private readonly config: ConfigService<AppConfig, true>
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (!this.config.get('STORAGE_CREATE_BUCKET', { infer: true })) return;
    await this.storage.ensureBucket();
    this.logger.log(`Bucket ${this.storage.bucketName} ready`);
  }
}
