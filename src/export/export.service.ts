import { Inject, Injectable, Logger } from '@nestjs/common';
import { VideoRecord } from '@/types/dataset';
import { ExportSummary } from '@/types/harvest';
import { HARVEST_CONFIG, HarvestConfig } from '@/config/harvest.config';
import { CsvCell, writeCsv, writeJsonl } from '@/common/fs.util';
import { DatasetService } from '@/dataset/dataset.service';
import { CAPTURE_BUCKET } from '@/harvest/item.normalizer';

const IDENTITY_HEADERS = [
  'date',
  'bvid',
  'aid',
  'label',
  'title',
  'url',
  'tid',
  'tname',
  'pubdate',
  'first_seen_ts',
  'up_mid',
  'up_name',
  'up_follower',
];

@Injectable()
export class ExportService {
  private readonly logger = new Logger(ExportService.name);

  constructor(
    private readonly datasets: DatasetService,
    @Inject(HARVEST_CONFIG) private readonly config: HarvestConfig,
  ) {}

  /** Capture bucket first, then the backfill buckets in schedule order. */
  buckets(): string[] {
    return [
      CAPTURE_BUCKET,
      ...this.config.snapshotBuckets.filter((b) => b !== CAPTURE_BUCKET),
    ];
  }

  csvHeaders(): string[] {
    const perBucket = this.buckets().flatMap((b) => [
      `view_${b}`,
      `like_${b}`,
      `coin_${b}`,
      `like_rate_${b}`,
    ]);
    return [...IDENTITY_HEADERS, ...perBucket];
  }

  // record -> CSV row, columns in csvHeaders() order
  private toCsvRow(date: string, v: VideoRecord): CsvCell[] {
    const row: CsvCell[] = [
      date,
      v.bvid,
      v.aid,
      v.label,
      v.title,
      v.url,
      v.tid,
      v.tname,
      v.pubdate,
      v.first_seen_ts,
      v.up.mid,
      v.up.name,
      v.up.follower,
    ];
    for (const b of this.buckets()) {
      const snap = v.snapshots[b];
      row.push(snap?.view, snap?.like, snap?.coin, v.features[b]?.like_rate);
    }
    return row;
  }

  /**
   * Flattens the listed daily documents into one CSV and one JSONL file,
   * a row per (day, video). Every listed day must exist.
   */
  async exportDays(options: {
    days: string[];
    outCsvPath: string;
    outJsonlPath: string;
  }): Promise<ExportSummary> {
    const { days, outCsvPath, outJsonlPath } = options;
    if (!days.length) throw new Error('at least one day is required');

    const rows: CsvCell[][] = [];
    const records: Array<{ date: string } & VideoRecord> = [];

    for (const day of days) {
      const dataset = await this.datasets.load(day);
      for (const v of dataset.records()) {
        rows.push(this.toCsvRow(day, v));
        records.push({ date: day, ...v });
      }
    }

    await writeCsv(outCsvPath, this.csvHeaders(), rows);
    await writeJsonl(outJsonlPath, records);

    this.logger.log(
      `Exported ${rows.length} rows from ${days.length} day(s) -> ${outCsvPath} & ${outJsonlPath}`,
    );
    return {
      days,
      rows: rows.length,
      csvPath: outCsvPath,
      jsonlPath: outJsonlPath,
    };
  }
}
