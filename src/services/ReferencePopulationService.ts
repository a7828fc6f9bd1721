/**
 * ReferencePopulationService
 *
 * Builds the comparison groups a player's raw stats are normalized against.
 * A population carries mean and population standard deviation per stat-name,
 * computed only from records that actually contain the stat.
 */

import type { CalibrationProfile } from '../models/CalibrationProfile';
import {
  POSITION_GROUPS,
  PopulationScope,
  RawStatRecord,
  ReferencePopulation,
  StatNormalization,
} from '../models/StatRecord';
import { AXIS_ORDER } from '../models/Archetype';
import { PopulationIncompleteError, PopulationMissingError } from './ClassificationErrors';
import { deepFreeze, mean, populationStdDev } from '../utils/statMath';

export interface PopulationOptions {
  /** Population identifier recorded in every report normalized against it */
  id: string;
  scope?: PopulationScope;
  /** Records below this many minutes do not contribute */
  minMinutes?: number;
}

/** Several populations, one of which must be scoped to ALL */
export type PopulationSet = ReadonlyMap<PopulationScope, ReferencePopulation>;

class ReferencePopulationService {
  buildReferencePopulation(records: readonly RawStatRecord[], options: PopulationOptions): ReferencePopulation {
    const scope = options.scope ?? 'ALL';
    const minMinutes = options.minMinutes ?? 0;

    const members = records.filter(r =>
      Number.isFinite(r.minutesPlayed)
      && r.minutesPlayed > 0
      && r.minutesPlayed >= minMinutes
      && (scope === 'ALL' || r.positionGroup === scope)
    );

    const valuesByStat = new Map<string, number[]>();
    for (const record of members) {
      for (const [stat, value] of Object.entries(record.stats)) {
        if (!Number.isFinite(value)) continue;
        const values = valuesByStat.get(stat);
        if (values) {
          values.push(value);
        } else {
          valuesByStat.set(stat, [value]);
        }
      }
    }

    // fromEntries defines own keys, so a stat named "__proto__" survives
    const stats = Object.fromEntries(
      Array.from(valuesByStat.keys()).sort().map((stat): [string, StatNormalization] => {
        const values = valuesByStat.get(stat) ?? [];
        return [stat, { mean: mean(values), stdDev: populationStdDev(values), count: values.length }];
      }),
    );

    return deepFreeze({ id: options.id, scope, size: members.length, stats });
  }

  /**
   * ALL plus one population per position group with at least minGroupSize
   * qualifying records.
   * Group population ids are suffixed with the group, e.g. "epl-2024:MID".
   */
  buildPositionPopulations(records: readonly RawStatRecord[], options: PopulationOptions, minGroupSize = 1): PopulationSet {
    const set = new Map<PopulationScope, ReferencePopulation>();
    set.set('ALL', this.buildReferencePopulation(records, { ...options, scope: 'ALL' }));

    for (const group of POSITION_GROUPS) {
      const population = this.buildReferencePopulation(records, {
        ...options,
        id: `${options.id}:${group}`,
        scope: group,
      });
      if (population.size > 0 && population.size >= minGroupSize) set.set(group, population);
    }
    return set;
  }

  /** The record's own position-group population when there is one, else ALL */
  selectPopulation(populations: ReferencePopulation | PopulationSet, record: RawStatRecord): ReferencePopulation {
    if (!isPopulationSet(populations)) return populations;

    const byGroup = record.positionGroup ? populations.get(record.positionGroup) : undefined;
    const population = byGroup ?? populations.get('ALL');
    if (!population) {
      throw new PopulationMissingError('ALL');
    }
    return population;
  }

  /** Stat-names the profile weights that the population cannot normalize */
  missingStats(population: ReferencePopulation, profile: CalibrationProfile): string[] {
    const missing = new Set<string>();
    for (const axis of AXIS_ORDER) {
      for (const { stat, weight } of profile.axisWeights[axis]) {
        if (weight !== 0 && !Object.prototype.hasOwnProperty.call(population.stats, stat)) missing.add(stat);
      }
    }
    return Array.from(missing).sort();
  }

  /**
   * Drop position-group populations that cannot normalize every weighted stat,
   * so their players fall back to ALL. ALL itself is always kept.
   */
  coveringPopulations(populations: PopulationSet, profile: CalibrationProfile): PopulationSet {
    const kept = new Map<PopulationScope, ReferencePopulation>();
    for (const [scope, population] of populations) {
      const missing = this.missingStats(population, profile);
      if (scope !== 'ALL' && missing.length > 0) {
        console.warn(`⚠️  Population ${population.id} lacks ${missing.join(', ')}; its players use ALL`);
        continue;
      }
      kept.set(scope, population);
    }
    return kept;
  }

  assertCovers(population: ReferencePopulation, profile: CalibrationProfile): void {
    const missing = this.missingStats(population, profile);
    if (missing.length > 0) {
      throw new PopulationIncompleteError(population.id, missing);
    }
  }

  /**
   * Every population covers the profile, and a set has the ALL fallback that
   * selectPopulation needs for records without a group population.
   */
  assertUsable(populations: ReferencePopulation | PopulationSet, profile: CalibrationProfile): void {
    if (isPopulationSet(populations) && !populations.has('ALL')) {
      throw new PopulationMissingError('ALL');
    }
    for (const population of populationsOf(populations)) {
      this.assertCovers(population, profile);
    }
  }
}

export function isPopulationSet(value: ReferencePopulation | PopulationSet): value is PopulationSet {
  return value instanceof Map;
}

export function populationsOf(value: ReferencePopulation | PopulationSet): ReferencePopulation[] {
  return isPopulationSet(value) ? Array.from(value.values()) : [value];
}

export const referencePopulationService = new ReferencePopulationService();
export { ReferencePopulationService };
