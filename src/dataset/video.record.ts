import {
  BucketKey,
  Features,
  Label,
  Snapshot,
  Uploader,
  VideoRecord,
} from '@/types/dataset';
import { BilibiliStat } from '@/types/bilibili';

export function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function videoUrl(bvid: string) {
  return `https://www.bilibili.com/video/${bvid}`;
}

export function emptyUploader(): Uploader {
  return { mid: null, name: null, follower: null };
}

function toCount(v: unknown): number | undefined {
  if (typeof v === 'number' && Number.isFinite(v) && v >= 0)
    return Math.trunc(v);
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v);
    if (Number.isFinite(n) && n >= 0) return Math.trunc(n);
  }
  return undefined;
}

function toNullableCount(v: unknown): number | null {
  return toCount(v) ?? null;
}

function toText(v: unknown): string {
  return typeof v === 'string' ? v : '';
}

function toNullableText(v: unknown): string | null {
  return typeof v === 'string' && v !== '' ? v : null;
}

function toRatio(v: unknown): number | null {
  return typeof v === 'number' && Number.isFinite(v) ? v : null;
}

/**
 * Snapshot from an upstream stat block. Missing core counters read as 0;
 * optional counters are only written when present.
 */
export function buildSnapshot(stat: BilibiliStat, ts: number): Snapshot {
  const snap: Snapshot = {
    ts,
    view: toCount(stat.view) ?? 0,
    like: toCount(stat.like) ?? 0,
    coin: toCount(stat.coin) ?? 0,
  };
  const favorite = toCount(stat.favorite);
  const reply = toCount(stat.reply);
  const danmaku = toCount(stat.danmaku);
  const share = toCount(stat.share);
  if (favorite !== undefined) snap.favorite = favorite;
  if (reply !== undefined) snap.reply = reply;
  if (danmaku !== undefined) snap.danmaku = danmaku;
  if (share !== undefined) snap.share = share;
  return snap;
}

const REQUIRED_COUNTERS = ['view', 'like', 'coin'] as const;

function isCounterValue(v: unknown): v is number | null {
  return v === null || (typeof v === 'number' && Number.isFinite(v));
}

/**
 * A stored snapshot is kept as written: every numeric or null counter,
 * known or not. It needs a numeric `ts` and the three core counters.
 */
function normalizeSnapshot(raw: unknown): Snapshot | null {
  if (!isPlainObject(raw)) return null;
  const ts = raw.ts;
  if (typeof ts !== 'number' || !Number.isFinite(ts) || ts < 0) return null;
  const snap: Snapshot = { ts, view: null, like: null, coin: null };
  for (const key of REQUIRED_COUNTERS) {
    const v = raw[key];
    if (!isCounterValue(v)) return null;
    snap[key] = v;
  }
  for (const [key, v] of Object.entries(raw)) {
    if (isCounterValue(v)) snap[key] = v;
  }
  return snap;
}

function normalizeFeatures(raw: unknown): Features | null {
  if (!isPlainObject(raw)) return null;
  return {
    like_rate: toRatio(raw.like_rate),
    coin_rate: toRatio(raw.coin_rate),
    favorite_rate: toRatio(raw.favorite_rate),
    view_per_hour: toRatio(raw.view_per_hour),
    age_hours: toRatio(raw.age_hours),
  };
}

function normalizeBucketMap<T>(
  raw: unknown,
  each: (v: unknown) => T | null,
): Record<BucketKey, T> {
  const out: Record<BucketKey, T> = {};
  if (!isPlainObject(raw)) return out;
  for (const [key, value] of Object.entries(raw)) {
    const v = each(value);
    if (v) out[key] = v;
  }
  return out;
}

/**
 * Validates a stored (or hand-edited) record and fills defaults for every
 * optional field. Returns null when the record has no usable bvid.
 */
export function normalizeVideoRecord(raw: unknown): VideoRecord | null {
  if (!isPlainObject(raw)) return null;
  const bvid = typeof raw.bvid === 'string' ? raw.bvid.trim() : '';
  if (!bvid) return null;

  const label: Label = toCount(raw.label) === 1 ? 1 : 0;
  const up = isPlainObject(raw.up) ? raw.up : {};
  const tid = toCount(raw.tid);

  // features only exist next to their snapshot; an unusable snapshot drops
  // the whole bucket so the backfiller refills both together
  const snapshots = normalizeBucketMap(raw.snapshots, normalizeSnapshot);
  const features: Record<BucketKey, Features> = {};
  for (const [key, f] of Object.entries(
    normalizeBucketMap(raw.features, normalizeFeatures),
  )) {
    if (Object.prototype.hasOwnProperty.call(snapshots, key)) features[key] = f;
  }

  return {
    bvid,
    aid: toCount(raw.aid) ?? 0,
    label,
    title: toText(raw.title),
    url: toText(raw.url) || videoUrl(bvid),
    tid: tid ?? null,
    tname: toText(raw.tname),
    pubdate: toCount(raw.pubdate) ?? 0,
    first_seen_ts: toNullableCount(raw.first_seen_ts),
    up: {
      mid: toNullableCount(up.mid),
      name: toNullableText(up.name),
      follower: toNullableCount(up.follower),
    },
    snapshots,
    features,
  };
}

export function cloneVideo(v: VideoRecord): VideoRecord {
  const snapshots: Record<BucketKey, Snapshot> = {};
  for (const [k, s] of Object.entries(v.snapshots)) snapshots[k] = { ...s };
  const features: Record<BucketKey, Features> = {};
  for (const [k, f] of Object.entries(v.features)) features[k] = { ...f };
  return { ...v, up: { ...v.up }, snapshots, features };
}
