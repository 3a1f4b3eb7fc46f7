import { Inject, Injectable, Logger } from '@nestjs/common';
import * as path from 'path';
import { UPSTREAM_FEEDS, UpstreamFeeds } from '@/types/bilibili';
import { TrendingSummary } from '@/types/harvest';
import { HARVEST_CONFIG, HarvestConfig } from '@/config/harvest.config';
import {
  CLOCK,
  Clock,
  SLEEPER,
  Sleeper,
  compactTimestamp,
  dayString,
} from '@/common/time.util';
import { writeJsonAtomic } from '@/common/fs.util';
import { DatasetService } from '@/dataset/dataset.service';
import { trendingRecord } from './item.normalizer';
import { RunOptions } from './dto/run-options.dto';

@Injectable()
export class TrendingHarvester {
  private readonly logger = new Logger(TrendingHarvester.name);

  constructor(
    @Inject(UPSTREAM_FEEDS) private readonly feeds: UpstreamFeeds,
    private readonly datasets: DatasetService,
    @Inject(HARVEST_CONFIG) private readonly config: HarvestConfig,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(SLEEPER) private readonly sleeper: Sleeper,
  ) {}

  private rawDir() {
    return path.resolve(this.config.dataDir, 'raw', 'popular');
  }

  /**
   * Pages the trending feed until an empty page (or `maxPages`), folding every
   * item into the day's dataset as a label=1 record with a "0h" snapshot.
   */
  async run(opts: RunOptions = {}): Promise<TrendingSummary> {
    const started = this.clock.now();
    const captureTs = started;
    const day = opts.day ?? dayString(captureTs, this.config.timeZone);
    const pageSize = opts.pageSize ?? this.config.pageSize;
    const maxPages = opts.maxPages ?? this.config.maxPages;
    const delayMs = opts.delayMs ?? this.config.requestDelayMs;

    const { dataset } = await this.datasets.loadOrCreate(day, captureTs);

    let pagesFetched = 0;
    let added = 0;
    let merged = 0;
    let skipped = 0;
    let failed = 0;

    for (let page = 1; page <= maxPages; page++) {
      if (page > 1) await this.sleeper.sleep(delayMs);

      const res = await this.feeds.trending(page, pageSize);
      if (!res.ok) {
        failed++;
        this.logger.warn(
          `Trending page ${page} skipped (${res.reason}): ${res.detail}`,
        );
        continue;
      }
      pagesFetched++;

      if (this.config.rawArchive) {
        const stamp = compactTimestamp(captureTs, this.config.timeZone);
        const name = `${stamp}_pn${page}.json`;
        await writeJsonAtomic(path.join(this.rawDir(), name), res.data);
      }

      if (!res.data.length) {
        this.logger.log(`Trending page ${page} is empty, stopping`);
        break;
      }

      for (const item of res.data) {
        const rec = trendingRecord(item, captureTs);
        if (!rec) {
          skipped++;
          this.logger.debug(`Trending item without bvid on page ${page}`);
          continue;
        }
        if (dataset.upsert(rec) === 'added') added++;
        else merged++;
      }
    }

    const file = await this.datasets.save(dataset, this.clock.now());
    const summary: TrendingSummary = {
      day,
      pagesFetched,
      added,
      merged,
      skipped,
      failed,
      total: dataset.size,
      path: file,
      tookSec: this.clock.now() - started,
    };
    this.logger.log(`Trending summary: ${JSON.stringify(summary)}`);
    return summary;
  }
}
