/**
 * FeatureNormalizerService
 *
 * Converts a player's raw per-90 stats into z-scores against a reference
 * population: (value - mean) / stdDev.
 *
 * - A stat that is constant across the population (stdDev 0) normalizes to 0.
 * - A stat missing from the record stays missing in the vector, so scorers can
 *   see it was not observed instead of reading it as league average.
 * - A stat the population has no parameters for is also left out.
 */

import type { FeatureVector, RawStatRecord, ReferencePopulation, StatNormalization } from '../models/StatRecord';
import { InsufficientMinutesError, InvalidStatRecordError } from './ClassificationErrors';

class FeatureNormalizerService {
  normalize(record: RawStatRecord, population: ReferencePopulation, minMinutes: number): FeatureVector {
    this.assertEligible(record, minMinutes);

    const entries: Array<[string, number]> = [];
    for (const stat of Object.keys(record.stats).sort()) {
      const params = lookupNormalization(population, stat);
      if (!params) continue;
      entries.push([stat, this.zScore(record.stats[stat], params)]);
    }
    return Object.freeze(Object.fromEntries(entries));
  }

  zScore(value: number, params: StatNormalization): number {
    if (params.stdDev === 0) return 0;
    return (value - params.mean) / params.stdDev;
  }

  /**
   * Throws InvalidStatRecord for a malformed record and InsufficientMinutes
   * when the player has not played enough to be classified.
   */
  assertEligible(record: RawStatRecord, minMinutes: number): void {
    if (typeof record.playerId !== 'string' || !record.playerId.trim()) {
      throw new InvalidStatRecordError(String(record.playerId), 'player id is blank');
    }
    if (!Number.isFinite(record.minutesPlayed)) {
      throw new InvalidStatRecordError(record.playerId, 'minutes played is not a finite number');
    }
    for (const [stat, value] of Object.entries(record.stats)) {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new InvalidStatRecordError(record.playerId, `stat "${stat}" is not a finite number`);
      }
    }
    if (record.minutesPlayed <= 0 || record.minutesPlayed < minMinutes) {
      throw new InsufficientMinutesError(record.playerId, record.minutesPlayed, minMinutes);
    }
  }
}

function lookupNormalization(population: ReferencePopulation, stat: string): StatNormalization | undefined {
  return Object.prototype.hasOwnProperty.call(population.stats, stat) ? population.stats[stat] : undefined;
}

export const featureNormalizerService = new FeatureNormalizerService();
export { FeatureNormalizerService };
