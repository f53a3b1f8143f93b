import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AnalyticsService } from './analytics.service';
import type { AppConfig } from '../config/env.validation';

@Module({
  providers: [
    {
      provide: AnalyticsService,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) =>
        new AnalyticsService({ domain: config.get('PLAUSIBLE_DOMAIN', { infer: true }) })
    }
  ],
  exports: [AnalyticsService]
})
export class AnalyticsModule {}
