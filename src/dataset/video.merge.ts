import { BucketKey, Label, VideoRecord } from '@/types/dataset';
import { cloneVideo } from './video.record';

type Scalar = string | number | null | undefined;

function isEmpty(v: Scalar): boolean {
  return v === null || v === undefined || v === '' || v === 0;
}

/** Keeps the stored value unless it is empty and the incoming one is not. */
function fillIfEmpty<T extends Scalar>(stored: T, incoming: T): T {
  return isEmpty(stored) && !isEmpty(incoming) ? incoming : stored;
}

function earliest(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.min(a, b);
}

/** Key union; on a shared key the stored entry wins. */
function unionKeepStored<T extends object>(
  stored: Record<BucketKey, T>,
  incoming: Record<BucketKey, T>,
): Record<BucketKey, T> {
  const out: Record<BucketKey, T> = {};
  for (const [k, v] of Object.entries(stored)) out[k] = { ...v };
  for (const [k, v] of Object.entries(incoming)) {
    if (!Object.prototype.hasOwnProperty.call(out, k)) out[k] = { ...v };
  }
  return out;
}

/**
 * Folds a new observation of a video into the stored record.
 *
 * - label only ever moves toward 1
 * - first_seen_ts is the earliest seen on either side
 * - identity fields (and each uploader field) are filled, never replaced
 * - snapshot / feature buckets are a union where the first-recorded entry
 *   wins, since a bucket is a fixed delay after publish, not "latest value"
 *
 * Neither input is mutated, and merging a record with itself returns an
 * equal record.
 */
export function mergeVideo(
  stored: VideoRecord | undefined,
  incoming: VideoRecord,
): VideoRecord {
  if (!stored) return cloneVideo(incoming);
  if (stored.bvid !== incoming.bvid) {
    throw new Error(
      `cannot merge different videos: ${stored.bvid} <- ${incoming.bvid}`,
    );
  }

  const label: Label = stored.label === 1 || incoming.label === 1 ? 1 : 0;

  return {
    bvid: stored.bvid,
    aid: fillIfEmpty(stored.aid, incoming.aid),
    label,
    title: fillIfEmpty(stored.title, incoming.title),
    url: fillIfEmpty(stored.url, incoming.url),
    tid: fillIfEmpty(stored.tid, incoming.tid),
    tname: fillIfEmpty(stored.tname, incoming.tname),
    pubdate: fillIfEmpty(stored.pubdate, incoming.pubdate),
    first_seen_ts: earliest(stored.first_seen_ts, incoming.first_seen_ts),
    up: {
      mid: fillIfEmpty(stored.up.mid, incoming.up.mid),
      name: fillIfEmpty(stored.up.name, incoming.up.name),
      follower: fillIfEmpty(stored.up.follower, incoming.up.follower),
    },
    snapshots: unionKeepStored(stored.snapshots, incoming.snapshots),
    features: unionKeepStored(stored.features, incoming.features),
  };
}
