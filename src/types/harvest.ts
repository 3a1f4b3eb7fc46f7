export interface TrendingSummary {
  day: string;
  pagesFetched: number;
  added: number;
  merged: number;
  skipped: number;
  failed: number;
  total: number;
  path: string;
  tookSec: number;
}

export interface NegativeSummary {
  day: string;
  categories: number;
  needed: number;
  added: number;
  shortfall: number;
  skipped: number;
  failed: number;
  total: number;
  path: string;
  tookSec: number;
}

export interface BackfillSummary {
  day: string;
  policy: string;
  updated: number;
  skippedEarly: number;
  skippedComplete: number;
  failed: number;
  total: number;
  path: string;
  tookSec: number;
}

export interface ExportSummary {
  days: string[];
  rows: number;
  csvPath: string;
  jsonlPath: string;
}
