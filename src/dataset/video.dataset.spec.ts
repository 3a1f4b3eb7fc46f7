import { makeVideo } from '@/testing/fixtures';
import { recomputeAggregates } from './aggregate';
import { VideoDataset } from './video.dataset';

const NO_FEATURES = {
  like_rate: null,
  coin_rate: null,
  favorite_rate: null,
  view_per_hour: null,
  age_hours: null,
};

describe('VideoDataset', () => {
  it('reports added then merged for the same bvid', () => {
    const ds = VideoDataset.empty('2024-05-01', 'bilibili', 100);
    expect(ds.upsert(makeVideo({ bvid: 'BV1a' }))).toBe('added');
    expect(ds.upsert(makeVideo({ bvid: 'BV1a', label: 1 }))).toBe('merged');
    expect(ds.size).toBe(1);
    expect(ds.get('BV1a')?.label).toBe(1);
  });

  it('counts positives per category in ascending id order', () => {
    const ds = VideoDataset.empty('2024-05-01', 'bilibili', 100);
    ds.upsert(makeVideo({ bvid: 'BV1', label: 1, tid: 30 }));
    ds.upsert(makeVideo({ bvid: 'BV2', label: 1, tid: 5 }));
    ds.upsert(makeVideo({ bvid: 'BV3', label: 1, tid: 30 }));
    ds.upsert(makeVideo({ bvid: 'BV4', label: 0, tid: 30 }));
    ds.upsert(makeVideo({ bvid: 'BV5', label: 1, tid: null }));
    expect([...ds.positivesByCategory().entries()]).toEqual([
      [5, 1],
      [30, 2],
    ]);
  });

  it('keeps capture_ts from the first run and moves last_capture_ts', () => {
    const ds = VideoDataset.empty('2024-05-01', 'bilibili', 100);
    ds.upsert(makeVideo());
    const doc = ds.toDocument(250);
    expect(doc.capture_ts).toBe(100);
    expect(doc.last_capture_ts).toBe(250);
    expect(doc.date).toBe('2024-05-01');
  });

  it('keeps aggregates consistent with videos after every write', () => {
    const ds = VideoDataset.empty('2024-05-01', 'bilibili', 100);
    const bvids = ['BV1', 'BV2', 'BV3', 'BV2', 'BV4'];
    bvids.forEach((bvid, i) => {
      ds.upsert(makeVideo({ bvid, label: i % 2 === 0 ? 1 : 0 }));
      const doc = ds.toDocument(100 + i);
      expect(doc.meta.total_count).toBe(Object.keys(doc.videos).length);
      expect(doc.meta.pos_count + doc.meta.neg_count).toBe(
        doc.meta.total_count,
      );
      expect(doc.count).toBe(doc.meta.total_count);
    });
  });
});

describe('recomputeAggregates', () => {
  it('builds category stats with 0h averages', () => {
    const agg = recomputeAggregates([
      makeVideo({
        bvid: 'BV1',
        label: 1,
        tid: 17,
        tname: '',
        snapshots: { '0h': { ts: 1, view: 100, like: 10, coin: 0 } },
        features: {
          '0h': { ...NO_FEATURES, like_rate: 0.1, coin_rate: 0 },
        },
      }),
      makeVideo({
        bvid: 'BV2',
        label: 1,
        tid: 17,
        tname: 'games',
        snapshots: { '0h': { ts: 1, view: 300, like: 60, coin: 0 } },
        features: {
          '0h': { ...NO_FEATURES, like_rate: 0.2, coin_rate: 0 },
        },
      }),
      makeVideo({ bvid: 'BV3', label: 0, tid: 17, tname: 'games' }),
      makeVideo({ bvid: 'BV4', label: 0, tid: 3, tname: 'music' }),
      makeVideo({ bvid: 'BV5', label: 1, tid: null }),
    ]);

    expect(agg.meta).toEqual({ pos_count: 3, neg_count: 2, total_count: 5 });
    expect(agg.count).toBe(5);
    expect(Object.keys(agg.category_stats)).toEqual(['3', '17']);
    expect(agg.category_stats['17']).toEqual({
      tname: 'games',
      video_count: 3,
      pos_count: 2,
      neg_count: 1,
      avg_view_0h: 200,
      avg_like_rate_0h: 0.15,
    });
    expect(agg.category_stats['3']).toEqual({
      tname: 'music',
      video_count: 1,
      pos_count: 0,
      neg_count: 1,
      avg_view_0h: null,
      avg_like_rate_0h: null,
    });
  });

  it('is empty for no videos', () => {
    expect(recomputeAggregates([])).toEqual({
      count: 0,
      meta: { pos_count: 0, neg_count: 0, total_count: 0 },
      category_stats: {},
    });
  });
});
