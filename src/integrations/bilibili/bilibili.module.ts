import { Global, Module } from '@nestjs/common';
import { UPSTREAM_FEEDS } from '@/types/bilibili';
import { HARVEST_CONFIG, HarvestConfig } from '@/config/harvest.config';
import { SLEEPER, Sleeper } from '@/common/time.util';
import { BilibiliClient } from './bilibili.client';

@Global()
@Module({
  providers: [
    {
      provide: BilibiliClient,
      useFactory: (cfg: HarvestConfig, sleeper: Sleeper) =>
        new BilibiliClient(cfg.http, sleeper),
      inject: [HARVEST_CONFIG, SLEEPER],
    },
    { provide: UPSTREAM_FEEDS, useExisting: BilibiliClient },
  ],
  exports: [BilibiliClient, UPSTREAM_FEEDS],
})
export class BilibiliModule {}
