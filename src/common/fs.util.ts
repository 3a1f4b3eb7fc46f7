import * as fs from 'fs';
import * as path from 'path';

export function ensureDir(p: string) {
  if (!fs.existsSync(p)) fs.mkdirSync(p, { recursive: true });
}

export function fileExists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/** Reads a file and parses it as JSON; parse errors propagate. */
export async function readJson(filePath: string): Promise<unknown> {
  const text = await fs.promises.readFile(filePath, 'utf8');
  return JSON.parse(text);
}

/**
 * Replaces `destPath` with `contents` in one step: write `<dest>.tmp`, then
 * rename over the destination. Readers never see a partial file.
 */
export async function writeFileAtomic(
  destPath: string,
  contents: string,
): Promise<void> {
  ensureDir(path.dirname(destPath));
  const tmp = `${destPath}.tmp`;
  await fs.promises.writeFile(tmp, contents, 'utf8');
  await fs.promises.rename(tmp, destPath);
}

export async function writeJsonAtomic(
  destPath: string,
  value: unknown,
): Promise<void> {
  await writeFileAtomic(destPath, JSON.stringify(value, null, 2) + '\n');
}

export async function writeJsonl(
  filePath: string,
  records: unknown[],
): Promise<void> {
  const lines = records.map((r) => JSON.stringify(r));
  await writeFileAtomic(filePath, lines.length ? lines.join('\n') + '\n' : '');
}

export type CsvCell = string | number | null | undefined;

export function csvEscape(v: CsvCell): string {
  if (v === null || v === undefined) return '';
  const s = String(v);
  if (/[",\n\r]/.test(s)) return `"${s.replace(/"/g, '""')}"`;
  return s;
}

export async function writeCsv(
  filePath: string,
  headers: string[],
  rows: CsvCell[][],
): Promise<void> {
  const out =
    [headers.map(csvEscape).join(',')]
      .concat(rows.map((r) => r.map(csvEscape).join(',')))
      .join('\n') + '\n';
  await writeFileAtomic(filePath, out);
}
