/**
 * Upstream payload shapes. Every field is optional: the web API drops and
 * renames fields between endpoints, so items are normalised before use.
 */
export interface BilibiliOwner {
  mid?: number;
  name?: string;
  follower?: number;
}

export interface BilibiliStat {
  aid?: number;
  bvid?: string;
  view?: number;
  like?: number;
  coin?: number;
  favorite?: number;
  reply?: number;
  danmaku?: number;
  share?: number;
}

export interface BilibiliVideoItem {
  bvid?: string;
  aid?: number;
  id?: number;
  title?: string;
  tid?: number;
  tname?: string;
  pubdate?: number;
  ctime?: number;
  mid?: number;
  author?: string;
  owner?: BilibiliOwner;
  stat?: BilibiliStat;
}

export type UpstreamFailureReason =
  | 'network'
  | 'http'
  | 'not-found'
  | 'malformed'
  | 'status';

export type UpstreamResult<T> =
  | { ok: true; data: T }
  | { ok: false; reason: UpstreamFailureReason; detail: string };

/** Identifies a video for the stat endpoint; aid is preferred when known. */
export type VideoRef = { aid?: number; bvid?: string };

/** The three upstream calls the harvesters depend on. */
export interface UpstreamFeeds {
  trending(
    page: number,
    pageSize: number,
  ): Promise<UpstreamResult<BilibiliVideoItem[]>>;
  recentByCategory(
    categoryId: number,
    page: number,
    pageSize: number,
  ): Promise<UpstreamResult<BilibiliVideoItem[]>>;
  statsByExternalId(ref: VideoRef): Promise<UpstreamResult<BilibiliStat>>;
}

export const UPSTREAM_FEEDS = Symbol('UPSTREAM_FEEDS');
