import { Module } from '@nestjs/common';
import { HARVEST_CONFIG, HarvestConfig } from '@/config/harvest.config';
import { DatasetModule } from '@/dataset/dataset.module';
import {
  SNAPSHOT_POLICY,
  createSnapshotPolicy,
} from '@/snapshot/snapshot.policy';
import { NegativeHarvester } from './negative.harvester';
import { SnapshotBackfiller } from './snapshot.backfiller';
import { TrendingHarvester } from './trending.harvester';

@Module({
  imports: [DatasetModule],
  providers: [
    {
      provide: SNAPSHOT_POLICY,
      useFactory: (cfg: HarvestConfig) =>
        createSnapshotPolicy(cfg.snapshotPolicy, cfg.snapshotBuckets),
      inject: [HARVEST_CONFIG],
    },
    TrendingHarvester,
    NegativeHarvester,
    SnapshotBackfiller,
  ],
  exports: [TrendingHarvester, NegativeHarvester, SnapshotBackfiller],
})
export class HarvestModule {}
