import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  BilibiliStat,
  BilibiliVideoItem,
  UpstreamFeeds,
  UpstreamResult,
  VideoRef,
} from '@/types/bilibili';
import { VideoRecord } from '@/types/dataset';
import { HarvestConfig } from '@/config/harvest.config';
import { Clock, Sleeper } from '@/common/time.util';

export function makeVideo(overrides: Partial<VideoRecord> = {}): VideoRecord {
  return {
    bvid: 'BV1test00001',
    aid: 1001,
    label: 0,
    title: 'a video',
    url: 'https://www.bilibili.com/video/BV1test00001',
    tid: 17,
    tname: 'games',
    pubdate: 1_700_000_000,
    first_seen_ts: 1_700_003_600,
    up: { mid: 42, name: 'uploader', follower: null },
    snapshots: {},
    features: {},
    ...overrides,
  };
}

export function makeItem(
  bvid: string,
  overrides: Partial<BilibiliVideoItem> = {},
): BilibiliVideoItem {
  return {
    bvid,
    aid: 5000,
    title: `title ${bvid}`,
    tid: 17,
    tname: 'games',
    pubdate: 1_700_000_000,
    owner: { mid: 7, name: 'owner' },
    stat: { view: 1000, like: 50, coin: 10 },
    ...overrides,
  };
}

export class ManualClock implements Clock {
  constructor(public t: number) {}

  now() {
    return this.t;
  }

  advance(seconds: number) {
    this.t += seconds;
  }
}

export class RecordingSleeper implements Sleeper {
  readonly calls: number[] = [];

  async sleep(ms: number) {
    this.calls.push(ms);
  }
}

type Handler<A extends unknown[], T> = (...args: A) => UpstreamResult<T>;

export function ok<T>(data: T): UpstreamResult<T> {
  return { ok: true, data };
}

export function failure<T>(
  reason: 'network' | 'http' | 'not-found' | 'malformed' | 'status' = 'http',
): UpstreamResult<T> {
  return { ok: false, reason, detail: `simulated ${reason}` };
}

/** In-process stand-in for the upstream API; records every call. */
export class FakeFeeds implements UpstreamFeeds {
  readonly trendingCalls: Array<[number, number]> = [];
  readonly recentCalls: Array<[number, number, number]> = [];
  readonly statCalls: VideoRef[] = [];

  onTrending: Handler<[number, number], BilibiliVideoItem[]> = () => ok([]);
  onRecent: Handler<[number, number, number], BilibiliVideoItem[]> = () =>
    ok([]);
  onStats: Handler<[VideoRef], BilibiliStat> = () => failure('not-found');

  async trending(page: number, pageSize: number) {
    this.trendingCalls.push([page, pageSize]);
    return this.onTrending(page, pageSize);
  }

  async recentByCategory(categoryId: number, page: number, pageSize: number) {
    this.recentCalls.push([categoryId, page, pageSize]);
    return this.onRecent(categoryId, page, pageSize);
  }

  async statsByExternalId(ref: VideoRef) {
    this.statCalls.push(ref);
    return this.onStats(ref);
  }
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'harvest-test-'));
}

export function removeDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testConfig(
  dataDir: string,
  overrides: Partial<HarvestConfig> = {},
): HarvestConfig {
  return {
    dataDir,
    timeZone: 'Asia/Shanghai',
    source: 'bilibili',
    http: {
      baseURL: 'https://api.example.test',
      timeoutMs: 1000,
      maxAttempts: 3,
      backoffMs: 800,
      retryStatuses: [429, 500, 502, 503, 504],
      headers: { 'User-Agent': 'test-agent' },
    },
    requestDelayMs: 0,
    pageSize: 50,
    maxPages: 100,
    snapshotPolicy: 'deadline',
    snapshotBuckets: ['1h', '3h', '6h', '12h'],
    rawArchive: false,
    ...overrides,
  };
}
