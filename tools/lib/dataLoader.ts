import * as fs from 'fs';
import * as path from 'path';
import type { RawStatRecord } from '../../src/models/StatRecord';
import { seasonStatsCsvService } from '../../src/services/SeasonStatsCsvService';
import { excludePositionGroups, statDerivationService } from '../../src/services/StatDerivationService';

export const DEFAULT_PROFILES_DIR = path.join(__dirname, '..', '..', 'data', 'profiles');
export const SAMPLE_STATS_PATH = path.join(__dirname, '..', '..', 'data', 'samples', 'season_totals_sample.csv');

/**
 * Season totals CSV → per-90 stat records, in file order. Goalkeepers are
 * dropped unless keepGoalkeepers is set. Rows missing defensive columns stay;
 * their work-ethic axis falls to coverage.
 */
export function loadSeasonRecords(filePath: string, keepGoalkeepers = false): RawStatRecord[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Stats file not found: ${filePath}`);
  }

  const csv = fs.readFileSync(filePath, 'utf-8');
  const records = seasonStatsCsvService
    .parseSeasonTotalsCsv(csv)
    .map(row => statDerivationService.deriveSeasonStats(row));
  if (keepGoalkeepers) return records;

  const outfield = excludePositionGroups(records, ['GK']);
  if (outfield.length < records.length) {
    console.warn(`⚠️  Dropped ${records.length - outfield.length} goalkeeper row(s); pass --keepGoalkeepers to include them`);
  }
  return outfield;
}

export function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const arg of argv) {
    if (!arg.startsWith('--')) continue;
    const [k, ...rest] = arg.slice(2).split('=');
    out[k] = rest.join('=');
  }
  return out;
}

/** Integer flag value, or the fallback when the flag was not given */
export function parseIntegerArg(args: Record<string, string>, name: string, fallback: number, min: number): number {
  const raw = args[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`--${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

export function formatPct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}
