import * as fs from 'fs';
import * as path from 'path';
import { BilibiliVideoItem } from '@/types/bilibili';
import { HarvestConfig } from '@/config/harvest.config';
import { DatasetService } from '@/dataset/dataset.service';
import {
  FakeFeeds,
  ManualClock,
  RecordingSleeper,
  failure,
  makeItem,
  makeTempDir,
  ok,
  removeDir,
  testConfig,
} from '@/testing/fixtures';
import { TrendingHarvester } from './trending.harvester';

// 2024-05-01T00:00:00Z, 08:00 in Asia/Shanghai
const T0 = 1_714_521_600;
const DAY = '2024-05-01';

describe('TrendingHarvester', () => {
  let dir: string;
  let feeds: FakeFeeds;
  let clock: ManualClock;
  let sleeper: RecordingSleeper;
  let datasets: DatasetService;

  const harvester = (overrides: Partial<HarvestConfig> = {}) => {
    const config = testConfig(dir, overrides);
    datasets = new DatasetService(config);
    return new TrendingHarvester(feeds, datasets, config, clock, sleeper);
  };

  const pages = (...content: BilibiliVideoItem[][]) => {
    feeds.onTrending = (page) => ok(content[page - 1] ?? []);
  };

  beforeEach(() => {
    dir = makeTempDir();
    feeds = new FakeFeeds();
    clock = new ManualClock(T0);
    sleeper = new RecordingSleeper();
  });

  afterEach(() => removeDir(dir));

  it('stops at the first empty page', async () => {
    pages([makeItem('BV1a'), makeItem('BV1b')], [makeItem('BV1c')], []);
    const summary = await harvester().run({ day: DAY });

    expect(feeds.trendingCalls).toEqual([
      [1, 50],
      [2, 50],
      [3, 50],
    ]);
    expect(sleeper.calls).toEqual([0, 0]);
    expect(summary).toEqual({
      day: DAY,
      pagesFetched: 3,
      added: 3,
      merged: 0,
      skipped: 0,
      failed: 0,
      total: 3,
      path: datasets.pathFor(DAY),
      tookSec: 0,
    });
  });

  it('stores a new trending video as label=1 with a 0h snapshot', async () => {
    pages([makeItem('BV1a')]);
    await harvester().run({ day: DAY });

    const rec = (await datasets.load(DAY)).get('BV1a');
    expect(rec?.label).toBe(1);
    expect(rec?.first_seen_ts).toBe(T0);
    expect(rec?.snapshots['0h']).toEqual({
      ts: T0,
      view: 1000,
      like: 50,
      coin: 10,
    });
  });

  it('keeps the first 0h snapshot when a video trends again', async () => {
    pages([makeItem('BV1a')]);
    await harvester().run({ day: DAY });

    clock.advance(3600);
    pages([
      makeItem('BV1a', { stat: { view: 9000, like: 900, coin: 90 } }),
      makeItem('BV1b'),
    ]);
    const summary = await harvester().run({ day: DAY });

    expect(summary.added).toBe(1);
    expect(summary.merged).toBe(1);
    expect(summary.total).toBe(2);
    const rec = (await datasets.load(DAY)).get('BV1a');
    expect(rec?.snapshots['0h'].view).toBe(1000);
    expect(rec?.first_seen_ts).toBe(T0);
  });

  it('skips a failed page and items without bvid', async () => {
    feeds.onTrending = (page) => {
      if (page === 1) return failure('http');
      if (page === 2) return ok([makeItem('BV1a'), { aid: 12 }]);
      return ok([]);
    };
    const summary = await harvester().run({ day: DAY, delayMs: 250 });

    expect(summary.failed).toBe(1);
    expect(summary.pagesFetched).toBe(2);
    expect(summary.added).toBe(1);
    expect(summary.skipped).toBe(1);
    expect(sleeper.calls).toEqual([250, 250]);
  });

  it('stops at maxPages even when pages keep coming', async () => {
    feeds.onTrending = (page) => ok([makeItem(`BV1p${page}`)]);
    const summary = await harvester().run({
      day: DAY,
      maxPages: 2,
      pageSize: 10,
    });

    expect(feeds.trendingCalls).toEqual([
      [1, 10],
      [2, 10],
    ]);
    expect(summary.total).toBe(2);
  });

  it('defaults the day to the configured zone', async () => {
    clock = new ManualClock(T0 - 1);
    const summary = await harvester({ timeZone: 'UTC' }).run();
    expect(summary.day).toBe('2024-04-30');
  });

  it('archives every fetched page when raw archiving is on', async () => {
    pages([makeItem('BV1a')], []);
    await harvester({ rawArchive: true }).run({ day: DAY });

    const rawDir = path.join(path.resolve(dir), 'raw', 'popular');
    expect(fs.readdirSync(rawDir).sort()).toEqual([
      '2024-05-01T080000_pn1.json',
      '2024-05-01T080000_pn2.json',
    ]);
    const first = JSON.parse(
      fs.readFileSync(path.join(rawDir, '2024-05-01T080000_pn1.json'), 'utf8'),
    );
    expect(first.map((i: BilibiliVideoItem) => i.bvid)).toEqual(['BV1a']);
  });
});
