export interface Clock {
  /** Current time in epoch seconds. */
  now(): number;
}

export interface Sleeper {
  sleep(ms: number): Promise<void>;
}

export const CLOCK = Symbol('CLOCK');
export const SLEEPER = Symbol('SLEEPER');

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

export const timerSleeper: Sleeper = {
  sleep: (ms) =>
    ms > 0 ? new Promise((r) => setTimeout(r, ms)) : Promise.resolve(),
};

const DAY_RE = /^\d{4}-\d{2}-\d{2}$/;

export function isDayString(s: string): boolean {
  if (!DAY_RE.test(s)) return false;
  const d = new Date(`${s}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === s;
}

function partsIn(tsSec: number, timeZone: string) {
  const fmt = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });
  const out: Record<string, string> = {};
  for (const p of fmt.formatToParts(new Date(tsSec * 1000))) {
    out[p.type] = p.value;
  }
  return out;
}

/** Calendar day (YYYY-MM-DD) of `tsSec` in the given IANA time zone. */
export function dayString(tsSec: number, timeZone: string): string {
  const p = partsIn(tsSec, timeZone);
  return `${p.year}-${p.month}-${p.day}`;
}

/** `YYYY-MM-DDTHHmmss` in the given time zone; used in archive file names. */
export function compactTimestamp(tsSec: number, timeZone: string): string {
  const p = partsIn(tsSec, timeZone);
  return `${p.year}-${p.month}-${p.day}T${p.hour}${p.minute}${p.second}`;
}
