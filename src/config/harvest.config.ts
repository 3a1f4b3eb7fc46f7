import { ConfigService } from '@nestjs/config';

export type SnapshotPolicyKind = 'deadline' | 'sequence';

export interface HttpConfig {
  baseURL: string;
  timeoutMs: number;
  maxAttempts: number;
  backoffMs: number;
  retryStatuses: number[];
  headers: Record<string, string>;
}

/** Everything a harvester run needs that is not per-invocation input. */
export interface HarvestConfig {
  dataDir: string;
  timeZone: string;
  source: string;
  http: HttpConfig;
  requestDelayMs: number;
  pageSize: number;
  maxPages: number;
  snapshotPolicy: SnapshotPolicyKind;
  snapshotBuckets: string[];
  rawArchive: boolean;
}

export const HARVEST_CONFIG = Symbol('HARVEST_CONFIG');

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) ' +
  'AppleWebKit/537.36 (KHTML, like Gecko) Chrome/138.0.0.0 Safari/537.36';

function toInt(raw: string | undefined, fallback: number, min = 0): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < min) return fallback;
  return Math.floor(n);
}

function toBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

export function parseBucketList(raw: string): string[] {
  const out: string[] = [];
  for (const part of raw.split(',')) {
    const b = part.trim();
    if (!/^\d+h$/.test(b)) {
      throw new Error(`invalid snapshot bucket "${b}" (expected e.g. 3h)`);
    }
    if (!out.includes(b)) out.push(b);
  }
  return out.sort((a, b) => parseInt(a, 10) - parseInt(b, 10));
}

function toPolicy(raw: string | undefined): SnapshotPolicyKind {
  const v = (raw ?? 'deadline').trim().toLowerCase();
  if (v === 'deadline' || v === 'sequence') return v;
  throw new Error(`invalid SNAPSHOT_POLICY "${raw}" (deadline|sequence)`);
}

export function loadHarvestConfig(cfg: ConfigService): HarvestConfig {
  const get = (key: string) => cfg.get<string>(key);
  return {
    dataDir: get('DATA_DIR') || './data',
    timeZone: get('DATASET_TIMEZONE') || 'Asia/Shanghai',
    source: 'bilibili',
    http: {
      baseURL: get('BILIBILI_API_BASE') || 'https://api.bilibili.com',
      timeoutMs: toInt(get('HTTP_TIMEOUT_MS'), 20_000, 1),
      maxAttempts: toInt(get('HTTP_MAX_ATTEMPTS'), 3, 1),
      backoffMs: toInt(get('HTTP_BACKOFF_MS'), 800),
      retryStatuses: [429, 500, 502, 503, 504],
      headers: {
        'User-Agent': get('HTTP_USER_AGENT') || DEFAULT_USER_AGENT,
        Accept: 'application/json, text/plain, */*',
        Referer: get('HTTP_REFERER') || 'https://www.bilibili.com/',
      },
    },
    requestDelayMs: toInt(get('REQUEST_DELAY_MS'), 200),
    pageSize: toInt(get('PAGE_SIZE'), 50, 1),
    maxPages: toInt(get('MAX_PAGES'), 100, 1),
    snapshotPolicy: toPolicy(get('SNAPSHOT_POLICY')),
    snapshotBuckets: parseBucketList(get('SNAPSHOT_BUCKETS') || '1h,3h,6h,12h'),
    rawArchive: toBool(get('RAW_ARCHIVE'), true),
  };
}
