import { IsInt, IsOptional, Matches, Min } from 'class-validator';
import { Type } from 'class-transformer';

/** Per-invocation overrides; anything left out falls back to HarvestConfig. */
export interface RunOptions {
  day?: string;
  pageSize?: number;
  maxPages?: number;
  delayMs?: number;
  seed?: number;
}

export class RunOptionsDto implements RunOptions {
  @IsOptional()
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'day must be YYYY-MM-DD' })
  day?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  pageSize?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  maxPages?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  delayMs?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  seed?: number;
}
