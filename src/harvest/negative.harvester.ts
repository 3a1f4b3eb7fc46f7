import { Inject, Injectable, Logger } from '@nestjs/common';
import { UPSTREAM_FEEDS, UpstreamFeeds } from '@/types/bilibili';
import { VideoRecord } from '@/types/dataset';
import { NegativeSummary } from '@/types/harvest';
import { HARVEST_CONFIG, HarvestConfig } from '@/config/harvest.config';
import { CLOCK, Clock, SLEEPER, Sleeper, dayString } from '@/common/time.util';
import { createRandom, sampleWithoutReplacement } from '@/common/random.util';
import { DatasetService } from '@/dataset/dataset.service';
import { negativeRecord } from './item.normalizer';
import { RunOptions } from './dto/run-options.dto';

@Injectable()
export class NegativeHarvester {
  private readonly logger = new Logger(NegativeHarvester.name);

  constructor(
    @Inject(UPSTREAM_FEEDS) private readonly feeds: UpstreamFeeds,
    private readonly datasets: DatasetService,
    @Inject(HARVEST_CONFIG) private readonly config: HarvestConfig,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(SLEEPER) private readonly sleeper: Sleeper,
  ) {}

  /**
   * For every category holding trending records, samples as many recent
   * uploads that are not yet in the dataset and stores them as label=0.
   * A category that yields fewer candidates than needed just adds fewer.
   */
  async run(opts: RunOptions = {}): Promise<NegativeSummary> {
    const started = this.clock.now();
    const captureTs = started;
    const day = opts.day ?? dayString(captureTs, this.config.timeZone);
    const pageSize = opts.pageSize ?? this.config.pageSize;
    const delayMs = opts.delayMs ?? this.config.requestDelayMs;
    const random = createRandom(opts.seed);

    const dataset = await this.datasets.load(day);
    const positives = dataset.positivesByCategory();

    let needed = 0;
    let added = 0;
    let shortfall = 0;
    let skipped = 0;
    let failed = 0;
    let requests = 0;

    if (!positives.size) {
      this.logger.log(
        `No trending records in ${day}; nothing to sample against`,
      );
    }

    for (const [tid, need] of positives) {
      needed += need;
      if (requests++ > 0) await this.sleeper.sleep(delayMs);

      const res = await this.feeds.recentByCategory(tid, 1, pageSize);
      if (!res.ok) {
        failed++;
        shortfall += need;
        this.logger.warn(
          `Recent uploads for category ${tid} skipped (${res.reason}): ${res.detail}`,
        );
        continue;
      }

      const candidates: VideoRecord[] = [];
      const seen = new Set<string>();
      for (const item of res.data) {
        const rec = negativeRecord(item, captureTs);
        if (!rec) {
          skipped++;
          this.logger.debug(`Recent upload without bvid in category ${tid}`);
          continue;
        }
        if (dataset.has(rec.bvid) || seen.has(rec.bvid)) continue;
        seen.add(rec.bvid);
        candidates.push(rec);
      }

      const picked = sampleWithoutReplacement(candidates, need, random);
      for (const rec of picked) dataset.upsert(rec);
      added += picked.length;
      if (picked.length < need) {
        shortfall += need - picked.length;
        this.logger.debug(
          `Category ${tid}: wanted ${need}, only ${picked.length} eligible candidates`,
        );
      }
    }

    const file = await this.datasets.save(dataset, this.clock.now());
    const summary: NegativeSummary = {
      day,
      categories: positives.size,
      needed,
      added,
      shortfall,
      skipped,
      failed,
      total: dataset.size,
      path: file,
      tookSec: this.clock.now() - started,
    };
    this.logger.log(`Negative-sample summary: ${JSON.stringify(summary)}`);
    return summary;
  }
}
