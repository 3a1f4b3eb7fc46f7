import { Inject, Injectable, Logger } from '@nestjs/common';
import { UPSTREAM_FEEDS, UpstreamFeeds } from '@/types/bilibili';
import { BackfillSummary } from '@/types/harvest';
import { HARVEST_CONFIG, HarvestConfig } from '@/config/harvest.config';
import { CLOCK, Clock, SLEEPER, Sleeper, dayString } from '@/common/time.util';
import { DatasetService } from '@/dataset/dataset.service';
import { buildSnapshot } from '@/dataset/video.record';
import {
  SNAPSHOT_POLICY,
  SnapshotPolicy,
  fillBucket,
} from '@/snapshot/snapshot.policy';
import { RunOptions } from './dto/run-options.dto';

@Injectable()
export class SnapshotBackfiller {
  private readonly logger = new Logger(SnapshotBackfiller.name);

  constructor(
    @Inject(UPSTREAM_FEEDS) private readonly feeds: UpstreamFeeds,
    private readonly datasets: DatasetService,
    @Inject(SNAPSHOT_POLICY) private readonly policy: SnapshotPolicy,
    @Inject(HARVEST_CONFIG) private readonly config: HarvestConfig,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(SLEEPER) private readonly sleeper: Sleeper,
  ) {}

  /**
   * Fills at most one snapshot bucket per video per run: the oldest bucket
   * the active policy allows. A failed stat fetch writes nothing, so the
   * bucket stays open for the next run.
   */
  async run(opts: RunOptions = {}): Promise<BackfillSummary> {
    const started = this.clock.now();
    const day = opts.day ?? dayString(started, this.config.timeZone);
    const delayMs = opts.delayMs ?? this.config.requestDelayMs;

    const dataset = await this.datasets.load(day);

    let updated = 0;
    let skippedEarly = 0;
    let skippedComplete = 0;
    let failed = 0;
    let requests = 0;

    for (const record of dataset.records()) {
      const now = this.clock.now();
      const bucket = this.policy.eligibleBucket(record, now);
      if (bucket === null) {
        if (this.policy.isComplete(record)) skippedComplete++;
        else skippedEarly++;
        continue;
      }

      if (requests++ > 0) await this.sleeper.sleep(delayMs);
      const res = await this.feeds.statsByExternalId({
        aid: record.aid,
        bvid: record.bvid,
      });
      if (!res.ok) {
        failed++;
        this.logger.warn(
          `Stats for ${record.bvid} skipped (${res.reason}): ${res.detail}`,
        );
        continue;
      }

      const capturedAt = this.clock.now();
      const result = fillBucket(
        this.policy,
        record,
        bucket,
        buildSnapshot(res.data, capturedAt),
        capturedAt,
      );
      if (result.status === 'rejected') {
        // only reachable if the clock moved backwards between the two reads
        skippedEarly++;
        continue;
      }
      dataset.upsert(result.observation);
      updated++;
    }

    const file = await this.datasets.save(dataset, this.clock.now());
    const summary: BackfillSummary = {
      day,
      policy: this.policy.kind,
      updated,
      skippedEarly,
      skippedComplete,
      failed,
      total: dataset.size,
      path: file,
      tookSec: this.clock.now() - started,
    };
    this.logger.log(`Snapshot backfill summary: ${JSON.stringify(summary)}`);
    return summary;
  }
}
