import { BilibiliVideoItem } from '@/types/bilibili';
import { Label, VideoRecord } from '@/types/dataset';
import { computeFeatures } from '@/dataset/feature.util';
import { buildSnapshot, videoUrl } from '@/dataset/video.record';

export const CAPTURE_BUCKET = '0h';

function positiveInt(...candidates: Array<number | undefined>): number {
  for (const c of candidates) {
    if (c !== undefined && c > 0) return Math.trunc(c);
  }
  return 0;
}

function firstText(...candidates: Array<string | undefined>): string | null {
  for (const c of candidates) {
    if (c) return c;
  }
  return null;
}

/**
 * Identity part of a feed item as a record with no snapshots. Items without
 * a bvid cannot be keyed and yield null.
 */
function baseRecord(
  item: BilibiliVideoItem,
  label: Label,
  captureTs: number,
): VideoRecord | null {
  const bvid = item.bvid?.trim();
  if (!bvid) return null;
  const owner = item.owner ?? {};
  const tid =
    item.tid !== undefined && item.tid >= 0 ? Math.trunc(item.tid) : null;
  const follower = owner.follower;

  return {
    bvid,
    aid: positiveInt(item.aid, item.id),
    label,
    title: item.title ?? '',
    url: videoUrl(bvid),
    tid,
    tname: item.tname ?? '',
    pubdate: positiveInt(item.pubdate, item.ctime),
    first_seen_ts: captureTs,
    up: {
      mid: positiveInt(owner.mid, item.mid) || null,
      name: firstText(owner.name, item.author),
      follower:
        follower !== undefined && follower >= 0 ? Math.trunc(follower) : null,
    },
    snapshots: {},
    features: {},
  };
}

/** A trending item: label=1 with its capture-time snapshot under "0h". */
export function trendingRecord(
  item: BilibiliVideoItem,
  captureTs: number,
): VideoRecord | null {
  const rec = baseRecord(item, 1, captureTs);
  if (!rec) return null;
  const snap = buildSnapshot(item.stat ?? {}, captureTs);
  rec.snapshots[CAPTURE_BUCKET] = snap;
  rec.features[CAPTURE_BUCKET] = computeFeatures(snap, rec.pubdate);
  return rec;
}

/** A recent-upload candidate: label=0, snapshots left to the backfiller. */
export function negativeRecord(
  item: BilibiliVideoItem,
  captureTs: number,
): VideoRecord | null {
  return baseRecord(item, 0, captureTs);
}
