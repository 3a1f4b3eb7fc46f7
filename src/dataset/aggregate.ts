import { CategoryStat, DatasetMeta, VideoRecord } from '@/types/dataset';
import { roundTo } from './feature.util';

export interface DatasetAggregates {
  count: number;
  meta: DatasetMeta;
  category_stats: Record<string, CategoryStat>;
}

type CategoryAcc = CategoryStat & {
  viewSum: number;
  viewCnt: number;
  likeRateSum: number;
  likeRateCnt: number;
};

/** Every derived field of a daily document, from its videos alone. */
export function recomputeAggregates(
  videos: Iterable<VideoRecord>,
): DatasetAggregates {
  let pos = 0;
  let neg = 0;
  const acc = new Map<string, CategoryAcc>();

  for (const v of videos) {
    if (v.label === 1) pos++;
    else neg++;

    if (v.tid === null) continue;
    const key = String(v.tid);
    let c = acc.get(key);
    if (!c) {
      c = {
        tname: v.tname,
        video_count: 0,
        pos_count: 0,
        neg_count: 0,
        avg_view_0h: null,
        avg_like_rate_0h: null,
        viewSum: 0,
        viewCnt: 0,
        likeRateSum: 0,
        likeRateCnt: 0,
      };
      acc.set(key, c);
    }
    if (!c.tname && v.tname) c.tname = v.tname;
    c.video_count++;
    if (v.label === 1) c.pos_count++;
    else c.neg_count++;

    const snap = v.snapshots['0h'];
    if (snap && snap.view !== null) {
      c.viewSum += snap.view;
      c.viewCnt++;
    }
    const likeRate = v.features['0h']?.like_rate;
    if (typeof likeRate === 'number') {
      c.likeRateSum += likeRate;
      c.likeRateCnt++;
    }
  }

  const category_stats: Record<string, CategoryStat> = {};
  const keys = [...acc.keys()].sort((a, b) => Number(a) - Number(b));
  for (const key of keys) {
    const c = acc.get(key);
    if (!c) continue;
    category_stats[key] = {
      tname: c.tname,
      video_count: c.video_count,
      pos_count: c.pos_count,
      neg_count: c.neg_count,
      avg_view_0h: c.viewCnt ? roundTo(c.viewSum / c.viewCnt) : null,
      avg_like_rate_0h: c.likeRateCnt
        ? roundTo(c.likeRateSum / c.likeRateCnt)
        : null,
    };
  }

  const total = pos + neg;
  return {
    count: total,
    meta: { pos_count: pos, neg_count: neg, total_count: total },
    category_stats,
  };
}
