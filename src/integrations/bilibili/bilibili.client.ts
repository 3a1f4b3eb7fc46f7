import {
  BilibiliStat,
  BilibiliVideoItem,
  UpstreamFeeds,
  UpstreamResult,
  VideoRef,
} from '@/types/bilibili';
import { HttpConfig } from '@/config/harvest.config';
import { Sleeper } from '@/common/time.util';
import { isPlainObject } from '@/dataset/video.record';
import { Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { toStat, toVideoItems } from './bilibili.parse';

type QueryParams = Record<string, string | number>;

export const POPULAR_PATH = '/x/web-interface/popular';
export const NEWLIST_PATH = '/x/web-interface/newlist';
export const STAT_PATH = '/x/web-interface/archive/stat';

@Injectable()
export class BilibiliClient implements UpstreamFeeds {
  private readonly http: AxiosInstance;
  private readonly logger = new Logger(BilibiliClient.name);

  constructor(
    private readonly cfg: HttpConfig,
    private readonly sleeper: Sleeper,
    http?: AxiosInstance,
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: cfg.baseURL,
        timeout: cfg.timeoutMs,
        headers: cfg.headers,
      });
  }

  /**
   * GET with retries on the configured statuses (429/5xx), exponential
   * backoff from `backoffMs`. Other failures are returned on first sight.
   */
  private async send(
    url: string,
    params: QueryParams,
  ): Promise<UpstreamResult<AxiosResponse<unknown>>> {
    let attempt = 1;
    let delay = this.cfg.backoffMs;
    for (;;) {
      let res: AxiosResponse<unknown>;
      try {
        res = await this.http.get<unknown>(url, {
          params,
          validateStatus: () => true,
        });
      } catch (err) {
        return { ok: false, reason: 'network', detail: String(err) };
      }

      if (
        this.cfg.retryStatuses.includes(res.status) &&
        attempt < this.cfg.maxAttempts
      ) {
        this.logger.debug(
          `GET ${url} -> ${res.status}, retry ${attempt}/${this.cfg.maxAttempts - 1} in ${delay}ms`,
        );
        await this.sleeper.sleep(delay);
        delay *= 2;
        attempt++;
        continue;
      }
      if (res.status === 404) {
        return { ok: false, reason: 'not-found', detail: `GET ${url} -> 404` };
      }
      if (res.status < 200 || res.status >= 300) {
        return {
          ok: false,
          reason: 'http',
          detail: `GET ${url} -> ${res.status}`,
        };
      }
      return { ok: true, data: res };
    }
  }

  /** Unwraps `{ code, message, data }`; code 0 is the only success. */
  private async getData(
    url: string,
    params: QueryParams,
  ): Promise<UpstreamResult<unknown>> {
    const sent = await this.send(url, params);
    if (!sent.ok) return sent;

    let body: unknown = sent.data.data;
    if (typeof body === 'string') {
      try {
        body = JSON.parse(body);
      } catch {
        return {
          ok: false,
          reason: 'malformed',
          detail: `GET ${url}: not JSON`,
        };
      }
    }
    if (!isPlainObject(body)) {
      return {
        ok: false,
        reason: 'malformed',
        detail: `GET ${url}: not an object`,
      };
    }

    if (body.code !== 0) {
      const message = typeof body.message === 'string' ? body.message : '';
      return {
        ok: false,
        reason: 'status',
        detail: `GET ${url}: code=${String(body.code)} ${message}`.trim(),
      };
    }
    return { ok: true, data: body.data ?? null };
  }

  async trending(
    page: number,
    pageSize: number,
  ): Promise<UpstreamResult<BilibiliVideoItem[]>> {
    const res = await this.getData(POPULAR_PATH, { pn: page, ps: pageSize });
    if (!res.ok) return res;
    const data: Record<string, unknown> = isPlainObject(res.data)
      ? res.data
      : {};
    return { ok: true, data: toVideoItems(data.list) ?? [] };
  }

  async recentByCategory(
    categoryId: number,
    page: number,
    pageSize: number,
  ): Promise<UpstreamResult<BilibiliVideoItem[]>> {
    const res = await this.getData(NEWLIST_PATH, {
      rid: categoryId,
      pn: page,
      ps: pageSize,
    });
    if (!res.ok) return res;
    // the item list moved between `archives` and `list` across API versions
    const data: Record<string, unknown> = isPlainObject(res.data)
      ? res.data
      : {};
    return {
      ok: true,
      data: toVideoItems(data.archives) ?? toVideoItems(data.list) ?? [],
    };
  }

  async statsByExternalId(
    ref: VideoRef,
  ): Promise<UpstreamResult<BilibiliStat>> {
    let params: QueryParams;
    if (ref.aid && ref.aid > 0) {
      params = { aid: ref.aid };
    } else if (ref.bvid) {
      params = { bvid: ref.bvid };
    } else {
      return {
        ok: false,
        reason: 'malformed',
        detail: 'no aid or bvid to look up',
      };
    }

    const res = await this.getData(STAT_PATH, params);
    if (!res.ok) return res;
    if (!isPlainObject(res.data)) {
      return {
        ok: false,
        reason: 'malformed',
        detail: `GET ${STAT_PATH}: no stat data`,
      };
    }
    return { ok: true, data: toStat(res.data) };
  }
}
