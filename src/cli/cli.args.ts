import minimist, { ParsedArgs } from 'minimist';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { isDayString } from '@/common/time.util';
import { RunOptions, RunOptionsDto } from '@/harvest/dto/run-options.dto';

export type HarvestMode = 'trending' | 'negatives' | 'snapshots';

export type CliCommand =
  | { mode: HarvestMode; options: RunOptions; verbose: boolean }
  | {
      mode: 'export';
      days: string[];
      outCsvPath: string;
      outJsonlPath: string;
      verbose: boolean;
    }
  | { mode: 'help' };

export type CliParseResult =
  | { ok: true; command: CliCommand }
  | { ok: false; error: string };

const HARVEST_MODES: readonly string[] = ['trending', 'negatives', 'snapshots'];

export const USAGE = [
  'Usage:',
  '  harvest trending  [YYYY-MM-DD] [--page-size N] [--max-pages N] [--delay-ms N]',
  '  harvest negatives [YYYY-MM-DD] [--page-size N] [--delay-ms N] [--seed N]',
  '  harvest snapshots [YYYY-MM-DD] [--delay-ms N]',
  '  harvest export    YYYY-MM-DD [...] --out-csv PATH --out-jsonl PATH',
  '',
  'The date defaults to today in DATASET_TIMEZONE. Add --verbose for debug logs.',
].join('\n');

function flag(argv: ParsedArgs, name: string): unknown {
  const v: unknown = argv[name];
  // a repeated flag arrives as an array; the last one wins
  return Array.isArray(v) ? v[v.length - 1] : v;
}

export function parseCliArgs(args: string[]): CliParseResult {
  const argv = minimist(args, {
    string: ['out-csv', 'out-jsonl'],
    boolean: ['verbose', 'help'],
    alias: { h: 'help', v: 'verbose' },
  });
  const positional = argv._.map(String);
  const [mode, ...rest] = positional;
  const verbose = Boolean(argv.verbose);

  if (argv.help || !mode) return { ok: true, command: { mode: 'help' } };

  if (mode === 'export') {
    const outCsvPath = flag(argv, 'out-csv');
    const outJsonlPath = flag(argv, 'out-jsonl');
    if (!rest.length) {
      return { ok: false, error: 'export needs at least one date' };
    }
    const bad = rest.find((d) => !isDayString(d));
    if (bad) return { ok: false, error: `invalid date "${bad}"` };
    if (typeof outCsvPath !== 'string' || !outCsvPath) {
      return { ok: false, error: 'export needs --out-csv' };
    }
    if (typeof outJsonlPath !== 'string' || !outJsonlPath) {
      return { ok: false, error: 'export needs --out-jsonl' };
    }
    return {
      ok: true,
      command: {
        mode: 'export',
        days: rest,
        outCsvPath,
        outJsonlPath,
        verbose,
      },
    };
  }

  if (!HARVEST_MODES.includes(mode)) {
    return { ok: false, error: `unknown mode "${mode}"` };
  }
  if (rest.length > 1) {
    return { ok: false, error: `${mode} takes at most one date` };
  }

  const dto = plainToInstance(RunOptionsDto, {
    day: rest[0],
    pageSize: flag(argv, 'page-size'),
    maxPages: flag(argv, 'max-pages'),
    delayMs: flag(argv, 'delay-ms'),
    seed: flag(argv, 'seed'),
  });
  const errors = validateSync(dto);
  if (errors.length) {
    const detail = errors
      .map((e) => Object.values(e.constraints ?? {}).join('; '))
      .join('; ');
    return { ok: false, error: detail };
  }
  if (dto.day !== undefined && !isDayString(dto.day)) {
    return { ok: false, error: `invalid date "${dto.day}"` };
  }

  const options: RunOptions = {};
  if (dto.day !== undefined) options.day = dto.day;
  if (dto.pageSize !== undefined) options.pageSize = dto.pageSize;
  if (dto.maxPages !== undefined) options.maxPages = dto.maxPages;
  if (dto.delayMs !== undefined) options.delayMs = dto.delayMs;
  if (dto.seed !== undefined) options.seed = dto.seed;

  const harvestMode: HarvestMode =
    mode === 'negatives'
      ? 'negatives'
      : mode === 'snapshots'
        ? 'snapshots'
        : 'trending';
  return { ok: true, command: { mode: harvestMode, options, verbose } };
}
