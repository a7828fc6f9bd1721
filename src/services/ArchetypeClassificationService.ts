/**
 * ArchetypeClassificationService
 *
 * Runs the classification pipeline:
 *   raw stats → normalize → score four axes → assign letters → report
 *
 * Terminal states per player:
 * - complete: all four axes scored
 * - partial: at least one axis fell below its coverage floor ('?' letter)
 * - ineligible: too few minutes or a malformed record
 *
 * Profile and population problems are structural: classifyBatch throws them
 * before any player is processed.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { AxisName } from '../models/Archetype';
import type { CalibrationProfile } from '../models/CalibrationProfile';
import type { FeatureVector, RawStatRecord, ReferencePopulation } from '../models/StatRecord';
import { archetypeAssignerService, AxisOutcome } from './ArchetypeAssignerService';
import { axisScorerService, AxisScorers } from './AxisScorerService';
import { calibrationStore, CalibrationStore } from './CalibrationStore';
import {
  AxisUnscoreableError,
  InsufficientMinutesError,
  InvalidStatRecordError,
} from './ClassificationErrors';
import { classificationReportBuilder, ClassificationReport } from './ClassificationReportBuilder';
import { featureNormalizerService } from './FeatureNormalizerService';
import { PopulationSet, referencePopulationService } from './ReferencePopulationService';
import type { ReportCache } from './ReportCache';

/** Parallel lanes per batch when no concurrency is given */
export const DEFAULT_BATCH_CONCURRENCY = 4;

export interface BatchOptions {
  /** Lanes to run; non-finite values use the default, anything below 1 runs one lane */
  concurrency?: number;
  /** Checked between players; an aborted batch stops dispatching */
  signal?: AbortSignal;
  cache?: ReportCache;
  onProgress?: (completed: number, total: number) => void;
}

export interface BatchResult {
  /** reports[i] belongs to records[i]; a cancelled batch holds only the finished prefix */
  reports: ClassificationReport[];
  cancelled: boolean;
  profileVersion: string;
  profileFingerprint: string;
}

class ArchetypeClassificationService {
  constructor(private readonly store: CalibrationStore = calibrationStore) {}

  /**
   * Classify one player. Per-player and per-axis shortfalls end up in the
   * report; anything else propagates.
   */
  classifyPlayer(
    record: RawStatRecord,
    population: ReferencePopulation,
    profile: CalibrationProfile,
    scorers: AxisScorers = axisScorerService.scorersForProfile(profile),
  ): ClassificationReport {
    let vector: FeatureVector;
    try {
      vector = featureNormalizerService.normalize(record, population, profile.minMinutes);
    } catch (err) {
      if (err instanceof InsufficientMinutesError || err instanceof InvalidStatRecordError) {
        return classificationReportBuilder.buildIneligible(
          record.playerId,
          { code: err.code, message: err.message },
          profile,
          population.id,
        );
      }
      throw err;
    }

    const outcomes: Record<AxisName, AxisOutcome> = {
      mentality: this.scoreOutcome('mentality', scorers, vector, profile),
      workEthic: this.scoreOutcome('workEthic', scorers, vector, profile),
      presence: this.scoreOutcome('presence', scorers, vector, profile),
      temperament: this.scoreOutcome('temperament', scorers, vector, profile),
    };

    const assignment = archetypeAssignerService.assign(outcomes, profile.axisThresholds);
    return classificationReportBuilder.build(record.playerId, assignment, profile, population.id);
  }

  /**
   * Classify a batch under one profile version. The profile is loaded and the
   * populations checked once, then shared read-only by every lane.
   */
  async classifyBatch(
    records: readonly RawStatRecord[],
    profileVersion: string,
    populations: ReferencePopulation | PopulationSet,
    options: BatchOptions = {},
  ): Promise<BatchResult> {
    const profile = this.store.loadProfile(profileVersion);
    referencePopulationService.assertUsable(populations, profile);

    const scorers = axisScorerService.scorersForProfile(profile);
    const reports: ClassificationReport[] = new Array(records.length);
    const concurrency = options.concurrency ?? DEFAULT_BATCH_CONCURRENCY;
    const requested = Number.isFinite(concurrency) ? Math.floor(concurrency) : DEFAULT_BATCH_CONCURRENCY;
    const lanes = Math.max(1, Math.min(requested, records.length));
    let dispatched = 0;
    let completed = 0;
    let cancelled = false;

    const runLane = async (): Promise<void> => {
      while (dispatched < records.length) {
        if (options.signal?.aborted) {
          cancelled = true;
          return;
        }
        const index = dispatched++;
        reports[index] = this.classifyWithCache(records[index], populations, profile, scorers, options.cache);
        completed++;
        options.onProgress?.(completed, records.length);
        await yieldToEventLoop();
      }
    };

    if (options.signal?.aborted) {
      cancelled = true;
    } else {
      await Promise.all(Array.from({ length: lanes }, () => runLane()));
    }

    return {
      reports: cancelled ? reports.slice(0, dispatched) : reports,
      cancelled,
      profileVersion: profile.version,
      profileFingerprint: profile.fingerprint,
    };
  }

  private classifyWithCache(
    record: RawStatRecord,
    populations: ReferencePopulation | PopulationSet,
    profile: CalibrationProfile,
    scorers: AxisScorers,
    cache: ReportCache | undefined,
  ): ClassificationReport {
    const population = referencePopulationService.selectPopulation(populations, record);
    if (!cache) {
      return this.classifyPlayer(record, population, profile, scorers);
    }

    const key = cache.keyFor(record, profile.version, population.id);
    const hit = cache.get(key);
    if (hit) return hit;

    const report = this.classifyPlayer(record, population, profile, scorers);
    cache.set(key, report);
    return report;
  }

  private scoreOutcome(
    axis: AxisName,
    scorers: AxisScorers,
    vector: FeatureVector,
    profile: CalibrationProfile,
  ): AxisOutcome {
    try {
      const result = axisScorerService.scoreAxis(axis, scorers[axis], vector, profile.minAxisCoverage[axis]);
      return { status: 'scored', result };
    } catch (err) {
      if (err instanceof AxisUnscoreableError) {
        return { status: 'unscoreable', error: err };
      }
      throw err;
    }
  }
}

export const archetypeClassificationService = new ArchetypeClassificationService();
export { ArchetypeClassificationService };
