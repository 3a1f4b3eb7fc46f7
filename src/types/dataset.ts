/** Time-bucket key, e.g. "0h", "1h", "12h". */
export type BucketKey = string;

export type Label = 0 | 1;

/**
 * Counters captured for one bucket. A stored counter may be null (the
 * upstream reported none) and stored documents may carry counters beyond
 * the named ones; both are kept as written.
 */
export interface Snapshot {
  ts: number; // capture time, epoch seconds
  view: number | null;
  like: number | null;
  coin: number | null;
  favorite?: number | null;
  reply?: number | null;
  danmaku?: number | null;
  share?: number | null;
  [counter: string]: number | null | undefined;
}

export interface Features {
  like_rate: number | null;
  coin_rate: number | null;
  favorite_rate: number | null;
  view_per_hour: number | null;
  age_hours: number | null;
}

export interface Uploader {
  mid: number | null;
  name: string | null;
  follower: number | null;
}

export interface VideoRecord {
  bvid: string;
  aid: number;
  label: Label;
  title: string;
  url: string;
  tid: number | null;
  tname: string;
  pubdate: number; // publish time, epoch seconds; 0 = unknown
  first_seen_ts: number | null;
  up: Uploader;
  snapshots: Record<BucketKey, Snapshot>;
  features: Record<BucketKey, Features>;
}

export interface DatasetMeta {
  pos_count: number;
  neg_count: number;
  total_count: number;
}

export interface CategoryStat {
  tname: string;
  video_count: number;
  pos_count: number;
  neg_count: number;
  avg_view_0h: number | null;
  avg_like_rate_0h: number | null;
}

/** Persisted shape of one calendar day. */
export interface DailyDocument {
  date: string;
  source: string;
  capture_ts: number;
  last_capture_ts: number;
  count: number;
  meta: DatasetMeta;
  category_stats: Record<string, CategoryStat>;
  videos: Record<string, VideoRecord>;
}
