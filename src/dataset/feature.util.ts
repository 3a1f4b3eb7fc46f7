import { Features, Snapshot } from '@/types/dataset';

export const FEATURE_DIGITS = 6;

export function roundTo(value: number, digits = FEATURE_DIGITS): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

function isUsable(n: number | null | undefined): n is number {
  return typeof n === 'number' && Number.isFinite(n);
}

/**
 * numerator / denominator rounded to 6 digits, or null when the ratio is
 * undefined (missing numerator, missing or non-positive denominator).
 */
export function rate(
  numerator: number | null | undefined,
  denominator: number | null | undefined,
): number | null {
  if (!isUsable(numerator) || !isUsable(denominator)) return null;
  if (denominator <= 0) return null;
  return roundTo(numerator / denominator);
}

/** Hours between publish and capture; null when the publish time is unknown. */
export function ageHours(captureTs: number, pubdate: number): number | null {
  if (!(pubdate > 0) || captureTs < pubdate) return null;
  return roundTo((captureTs - pubdate) / 3600);
}

export function computeFeatures(snap: Snapshot, pubdate: number): Features {
  const age = ageHours(snap.ts, pubdate);
  return {
    like_rate: rate(snap.like, snap.view),
    coin_rate: rate(snap.coin, snap.view),
    favorite_rate: rate(snap.favorite, snap.view),
    view_per_hour: rate(snap.view, age),
    age_hours: age,
  };
}
