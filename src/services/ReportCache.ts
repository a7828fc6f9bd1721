import type { RawStatRecord } from '../models/StatRecord';
import type { ClassificationReport } from './ClassificationReportBuilder';
import { canonicalJson, sha256 } from '../utils/statMath';

/** Content fingerprint used when a record carries no recordVersion */
export function recordFingerprint(record: RawStatRecord): string {
  return sha256(canonicalJson({
    playerId: record.playerId,
    positionGroup: record.positionGroup,
    season: record.season,
    minutesPlayed: record.minutesPlayed,
    stats: record.stats,
  }));
}

/**
 * Reports keyed by (player, record version, profile version, population).
 * Reports are immutable, so a hit can be returned as-is.
 */
export class ReportCache {
  private entries = new Map<string, ClassificationReport>();

  constructor(private readonly maxEntries = 10000) {}

  keyFor(record: RawStatRecord, profileVersion: string, populationId: string): string {
    const recordVersion = record.recordVersion ?? recordFingerprint(record);
    return JSON.stringify([record.playerId, recordVersion, profileVersion, populationId]);
  }

  get(key: string): ClassificationReport | undefined {
    return this.entries.get(key);
  }

  set(key: string, report: ClassificationReport): void {
    if (!this.entries.has(key) && this.entries.size >= this.maxEntries) {
      // Oldest insertion goes first
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, report);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
