import {
  BilibiliOwner,
  BilibiliStat,
  BilibiliVideoItem,
} from '@/types/bilibili';
import { isPlainObject } from '@/dataset/video.record';

function num(v: unknown): number | undefined {
  if (typeof v === 'number' && Number.isFinite(v)) return v;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

function str(v: unknown): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

export function toStat(raw: Record<string, unknown>): BilibiliStat {
  return {
    aid: num(raw.aid),
    bvid: str(raw.bvid),
    view: num(raw.view),
    like: num(raw.like),
    coin: num(raw.coin),
    favorite: num(raw.favorite),
    reply: num(raw.reply),
    danmaku: num(raw.danmaku),
    share: num(raw.share),
  };
}

function toOwner(raw: Record<string, unknown>): BilibiliOwner {
  return {
    mid: num(raw.mid),
    name: str(raw.name),
    follower: num(raw.follower),
  };
}

export function toVideoItem(raw: Record<string, unknown>): BilibiliVideoItem {
  return {
    bvid: str(raw.bvid),
    aid: num(raw.aid),
    id: num(raw.id),
    title: str(raw.title),
    tid: num(raw.tid),
    tname: str(raw.tname),
    pubdate: num(raw.pubdate),
    ctime: num(raw.ctime),
    mid: num(raw.mid),
    author: str(raw.author),
    owner: isPlainObject(raw.owner) ? toOwner(raw.owner) : undefined,
    stat: isPlainObject(raw.stat) ? toStat(raw.stat) : undefined,
  };
}

/** Items of a feed page; null when the field is not a list at all. */
export function toVideoItems(v: unknown): BilibiliVideoItem[] | null {
  if (!Array.isArray(v)) return null;
  return v.filter(isPlainObject).map(toVideoItem);
}
