import { DailyDocument, VideoRecord } from '@/types/dataset';
import { recomputeAggregates } from './aggregate';
import { mergeVideo } from './video.merge';

export type UpsertOutcome = 'added' | 'merged';

export interface DatasetHeader {
  date: string;
  source: string;
  captureTs: number;
  lastCaptureTs: number;
}

/**
 * One calendar day of records, keyed by bvid. All writes go through the
 * merge engine, so nothing stored is ever replaced wholesale.
 */
export class VideoDataset {
  private readonly videos = new Map<string, VideoRecord>();

  constructor(readonly header: DatasetHeader) {}

  static empty(date: string, source: string, now: number): VideoDataset {
    return new VideoDataset({
      date,
      source,
      captureTs: now,
      lastCaptureTs: now,
    });
  }

  get date() {
    return this.header.date;
  }

  get size() {
    return this.videos.size;
  }

  has(bvid: string) {
    return this.videos.has(bvid);
  }

  get(bvid: string): VideoRecord | undefined {
    return this.videos.get(bvid);
  }

  records(): VideoRecord[] {
    return [...this.videos.values()];
  }

  upsert(record: VideoRecord): UpsertOutcome {
    const stored = this.videos.get(record.bvid);
    this.videos.set(record.bvid, mergeVideo(stored, record));
    return stored ? 'merged' : 'added';
  }

  /** label=1 count per category id, ascending by id. */
  positivesByCategory(): Map<number, number> {
    const counts = new Map<number, number>();
    for (const v of this.videos.values()) {
      if (v.label !== 1 || v.tid === null) continue;
      counts.set(v.tid, (counts.get(v.tid) ?? 0) + 1);
    }
    return new Map([...counts.entries()].sort((a, b) => a[0] - b[0]));
  }

  /** Serialisable document with freshly recomputed aggregates. */
  toDocument(now: number): DailyDocument {
    const videos: Record<string, VideoRecord> = {};
    for (const [bvid, v] of this.videos) videos[bvid] = v;
    const agg = recomputeAggregates(this.videos.values());
    this.header.lastCaptureTs = now;
    return {
      date: this.header.date,
      source: this.header.source,
      capture_ts: this.header.captureTs,
      last_capture_ts: now,
      count: agg.count,
      meta: agg.meta,
      category_stats: agg.category_stats,
      videos,
    };
  }
}
