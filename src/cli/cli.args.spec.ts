import { parseCliArgs } from './cli.args';

describe('parseCliArgs', () => {
  it('shows help with no mode or with --help', () => {
    expect(parseCliArgs([])).toEqual({ ok: true, command: { mode: 'help' } });
    expect(parseCliArgs(['trending', '-h'])).toEqual({
      ok: true,
      command: { mode: 'help' },
    });
  });

  it('parses a harvest run with overrides', () => {
    expect(
      parseCliArgs([
        'trending',
        '2024-05-01',
        '--page-size',
        '20',
        '--max-pages',
        '3',
      ]),
    ).toEqual({
      ok: true,
      command: {
        mode: 'trending',
        options: { day: '2024-05-01', pageSize: 20, maxPages: 3 },
        verbose: false,
      },
    });
  });

  it('defaults to no overrides', () => {
    expect(parseCliArgs(['snapshots', '--verbose'])).toEqual({
      ok: true,
      command: { mode: 'snapshots', options: {}, verbose: true },
    });
  });

  it('takes the last of a repeated flag', () => {
    const res = parseCliArgs(['negatives', '--seed', '7', '--seed', '9']);
    expect(
      res.ok && res.command.mode === 'negatives' && res.command.options,
    ).toEqual({ seed: 9 });
  });

  it('rejects bad numbers and dates', () => {
    const zero = parseCliArgs(['trending', '--page-size', '0']);
    expect(!zero.ok && zero.error).toContain(
      'pageSize must not be less than 1',
    );

    const word = parseCliArgs(['trending', '--delay-ms', 'soon']);
    expect(!word.ok && word.error).toContain(
      'delayMs must be an integer number',
    );

    expect(parseCliArgs(['trending', '2024-02-30'])).toEqual({
      ok: false,
      error: 'invalid date "2024-02-30"',
    });
  });

  it('rejects unknown modes and extra dates', () => {
    expect(parseCliArgs(['bogus'])).toEqual({
      ok: false,
      error: 'unknown mode "bogus"',
    });
    expect(parseCliArgs(['trending', '2024-05-01', '2024-05-02'])).toEqual({
      ok: false,
      error: 'trending takes at most one date',
    });
  });

  it('parses an export', () => {
    expect(
      parseCliArgs([
        'export',
        '2024-05-01',
        '2024-05-02',
        '--out-csv',
        'out/a.csv',
        '--out-jsonl',
        'out/a.jsonl',
        '-v',
      ]),
    ).toEqual({
      ok: true,
      command: {
        mode: 'export',
        days: ['2024-05-01', '2024-05-02'],
        outCsvPath: 'out/a.csv',
        outJsonlPath: 'out/a.jsonl',
        verbose: true,
      },
    });
  });

  it('requires dates and output paths for an export', () => {
    expect(
      parseCliArgs(['export', '--out-csv', 'a', '--out-jsonl', 'b']),
    ).toEqual({
      ok: false,
      error: 'export needs at least one date',
    });
    expect(parseCliArgs(['export', '2024-05-01', '--out-jsonl', 'b'])).toEqual({
      ok: false,
      error: 'export needs --out-csv',
    });
  });
});
