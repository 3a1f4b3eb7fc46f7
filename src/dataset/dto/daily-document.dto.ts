import { IsInt, IsOptional, IsString, Matches, Min } from 'class-validator';

/** Top-level shape check for a persisted daily document. */
export class DailyDocumentDto {
  @IsOptional()
  @Matches(/^\d{4}-\d{2}-\d{2}$/)
  date?: string;

  @IsOptional()
  @IsString()
  source?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  capture_ts?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  last_capture_ts?: number;

  // object keyed by bvid, or the older plain list; checked by the loader
  @IsOptional()
  videos?: unknown;
}
