import { Inject, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import * as path from 'path';
import { HARVEST_CONFIG, HarvestConfig } from '@/config/harvest.config';
import { fileExists, readJson, writeJsonAtomic } from '@/common/fs.util';
import { DatasetCorruptError, DatasetNotFoundError } from '@/common/errors';
import { DailyDocumentDto } from './dto/daily-document.dto';
import { VideoDataset } from './video.dataset';
import { isPlainObject, normalizeVideoRecord } from './video.record';

@Injectable()
export class DatasetService {
  private readonly logger = new Logger(DatasetService.name);

  constructor(@Inject(HARVEST_CONFIG) private readonly config: HarvestConfig) {}

  dailyDir() {
    return path.resolve(this.config.dataDir, 'daily');
  }

  pathFor(day: string) {
    return path.join(this.dailyDir(), `${day}.json`);
  }

  exists(day: string) {
    return fileExists(this.pathFor(day));
  }

  /** Loads an existing day; a missing document is fatal for the caller. */
  async load(day: string): Promise<VideoDataset> {
    const file = this.pathFor(day);
    if (!fileExists(file)) throw new DatasetNotFoundError(day, file);

    let raw: unknown;
    try {
      raw = await readJson(file);
    } catch (e) {
      throw new DatasetCorruptError(file, String(e));
    }
    if (!isPlainObject(raw)) {
      throw new DatasetCorruptError(file, 'top level is not an object');
    }

    const dto = plainToInstance(DailyDocumentDto, raw);
    const errors = validateSync(dto);
    if (errors.length) {
      const detail = errors
        .map((e) => Object.values(e.constraints ?? {}).join('; '))
        .join('; ');
      throw new DatasetCorruptError(file, detail);
    }

    const captureTs = dto.capture_ts ?? 0;
    const dataset = new VideoDataset({
      date: day,
      source: dto.source ?? this.config.source,
      captureTs,
      lastCaptureTs: dto.last_capture_ts ?? captureTs,
    });

    const entries: unknown[] = Array.isArray(dto.videos)
      ? dto.videos
      : isPlainObject(dto.videos)
        ? Object.values(dto.videos)
        : [];

    let dropped = 0;
    for (const entry of entries) {
      const rec = normalizeVideoRecord(entry);
      if (!rec) {
        dropped++;
        continue;
      }
      dataset.upsert(rec);
    }
    if (dropped) {
      this.logger.warn(
        `Dropped ${dropped} stored record(s) without bvid in ${file}`,
      );
    }
    return dataset;
  }

  /** Loads the day, or starts an empty skeleton on its first run. */
  async loadOrCreate(
    day: string,
    now: number,
  ): Promise<{ dataset: VideoDataset; created: boolean }> {
    if (this.exists(day)) {
      return { dataset: await this.load(day), created: false };
    }
    this.logger.log(`Starting new daily dataset ${day}`);
    return {
      dataset: VideoDataset.empty(day, this.config.source, now),
      created: true,
    };
  }

  /** Recomputes aggregates and replaces the day's document atomically. */
  async save(dataset: VideoDataset, now: number): Promise<string> {
    const file = this.pathFor(dataset.date);
    await writeJsonAtomic(file, dataset.toDocument(now));
    return file;
  }
}
