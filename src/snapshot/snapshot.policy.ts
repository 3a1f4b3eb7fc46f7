import { BucketKey, Snapshot, VideoRecord } from '@/types/dataset';
import { SnapshotPolicyKind } from '@/config/harvest.config';
import { computeFeatures } from '@/dataset/feature.util';
import { cloneVideo } from '@/dataset/video.record';

export type BucketState = 'not-yet-eligible' | 'eligible-unfilled' | 'filled';

export type FillResult =
  | { status: 'filled'; bucket: BucketKey; observation: VideoRecord }
  | {
      status: 'rejected';
      bucket: BucketKey;
      reason: 'not-eligible' | 'already-filled';
    };

export const SNAPSHOT_POLICY = Symbol('SNAPSHOT_POLICY');

/** "6h" -> 6. Throws on anything that is not a whole number of hours. */
export function parseBucketHours(bucket: BucketKey): number {
  const m = /^(\d+)h$/.exec(bucket);
  if (!m) throw new Error(`invalid snapshot bucket "${bucket}"`);
  return Number(m[1]);
}

export function isFilled(record: VideoRecord, bucket: BucketKey): boolean {
  return Object.prototype.hasOwnProperty.call(record.snapshots, bucket);
}

/**
 * Decides which time bucket, if any, may be snapshotted for a video now.
 * Filled buckets are terminal under every policy.
 */
export interface SnapshotPolicy {
  readonly kind: SnapshotPolicyKind;
  readonly buckets: readonly BucketKey[];
  /** The one bucket to fill on this run, oldest due first; null if none. */
  eligibleBucket(record: VideoRecord, now: number): BucketKey | null;
  /** Whether an unfilled bucket may be filled now. */
  isEligible(record: VideoRecord, bucket: BucketKey, now: number): boolean;
  /** Every bucket already holds a snapshot. */
  isComplete(record: VideoRecord): boolean;
}

export abstract class OrderedBucketPolicy implements SnapshotPolicy {
  abstract readonly kind: SnapshotPolicyKind;
  readonly buckets: readonly BucketKey[];

  constructor(buckets: readonly BucketKey[]) {
    if (!buckets.length) {
      throw new Error('snapshot policy needs at least one bucket');
    }
    this.buckets = [...buckets].sort(
      (a, b) => parseBucketHours(a) - parseBucketHours(b),
    );
  }

  abstract isEligible(
    record: VideoRecord,
    bucket: BucketKey,
    now: number,
  ): boolean;

  eligibleBucket(record: VideoRecord, now: number): BucketKey | null {
    for (const bucket of this.buckets) {
      if (isFilled(record, bucket)) continue;
      if (this.isEligible(record, bucket, now)) return bucket;
    }
    return null;
  }

  isComplete(record: VideoRecord): boolean {
    return this.buckets.every((b) => isFilled(record, b));
  }
}

/** Bucket "Nh" opens once N hours have passed since publish. */
export class DeadlinePolicy extends OrderedBucketPolicy {
  readonly kind = 'deadline' as const;

  isEligible(record: VideoRecord, bucket: BucketKey, now: number): boolean {
    if (!(record.pubdate > 0)) return false;
    return now >= record.pubdate + parseBucketHours(bucket) * 3600;
  }
}

/**
 * The Kth successful fill goes to the Kth bucket, whatever the wall time.
 * Progress is read from the filled buckets themselves, so a failed fetch
 * never advances it.
 */
export class SequencePolicy extends OrderedBucketPolicy {
  readonly kind = 'sequence' as const;

  isEligible(
    record: VideoRecord,
    bucket: BucketKey,
    _now?: number,
  ): boolean {
    const idx = this.buckets.indexOf(bucket);
    if (idx < 0) return false;
    return this.buckets.slice(0, idx).every((b) => isFilled(record, b));
  }
}

export function createSnapshotPolicy(
  kind: SnapshotPolicyKind,
  buckets: readonly BucketKey[],
): SnapshotPolicy {
  return kind === 'sequence'
    ? new SequencePolicy(buckets)
    : new DeadlinePolicy(buckets);
}

export function bucketState(
  policy: SnapshotPolicy,
  record: VideoRecord,
  bucket: BucketKey,
  now: number,
): BucketState {
  if (isFilled(record, bucket)) return 'filled';
  return policy.isEligible(record, bucket, now)
    ? 'eligible-unfilled'
    : 'not-yet-eligible';
}

/**
 * Builds the observation that fills `bucket` with `snapshot` and its derived
 * features. The caller applies it through the merge engine. Early or
 * repeated fills are rejected, not deferred.
 */
export function fillBucket(
  policy: SnapshotPolicy,
  record: VideoRecord,
  bucket: BucketKey,
  snapshot: Snapshot,
  now: number,
): FillResult {
  const state = bucketState(policy, record, bucket, now);
  if (state === 'filled') {
    return { status: 'rejected', bucket, reason: 'already-filled' };
  }
  if (state === 'not-yet-eligible') {
    return { status: 'rejected', bucket, reason: 'not-eligible' };
  }
  const observation = cloneVideo(record);
  observation.snapshots = { [bucket]: { ...snapshot } };
  observation.features = {
    [bucket]: computeFeatures(snapshot, record.pubdate),
  };
  return { status: 'filled', bucket, observation };
}
