/**
 * AxisScorerService
 *
 * Maps a feature vector to one scalar per axis.
 *
 * The linear scorer takes the weighted sum over stats present in both the
 * vector and the axis's weight list, then divides by the absolute weight mass
 * actually used. A player missing some stats is scored on the ones they have
 * instead of being pulled toward zero. The share of weight mass that was
 * backed by data is the axis's coverage ratio.
 *
 * Example (weights goals +0.6, keyPasses -0.4; z goals 1.2, keyPasses -0.3):
 *   (0.6 * 1.2 + -0.4 * -0.3) / (0.6 + 0.4) = 0.84, coverage 1.0
 */

import type { AxisName } from '../models/Archetype';
import type { CalibrationProfile, StatWeight } from '../models/CalibrationProfile';
import type { FeatureVector } from '../models/StatRecord';
import { AxisUnscoreableError } from './ClassificationErrors';

export interface AxisScoreResult {
  scalar: number;
  /** usedWeight / totalWeight, in [0, 1] */
  coverageRatio: number;
  /** Absolute weight mass backed by present stats */
  usedWeight: number;
  /** Absolute weight mass defined for the axis */
  totalWeight: number;
}

/**
 * Anything that turns a feature vector into an axis scalar. A learned model
 * can stand in for the linear weights as long as it reports coverage.
 */
export interface AxisScorer {
  score(vector: FeatureVector): AxisScoreResult;
}

export class LinearAxisScorer implements AxisScorer {
  private readonly totalWeight: number;

  constructor(private readonly weights: readonly StatWeight[]) {
    this.totalWeight = weights.reduce((sum, w) => sum + Math.abs(w.weight), 0);
  }

  score(vector: FeatureVector): AxisScoreResult {
    let weightedSum = 0;
    let usedWeight = 0;

    for (const { stat, weight } of this.weights) {
      // Skipped outright: 0 * Infinity would still poison the sum
      if (weight === 0) continue;
      if (!Object.prototype.hasOwnProperty.call(vector, stat)) continue;
      weightedSum += weight * vector[stat];
      usedWeight += Math.abs(weight);
    }

    return {
      scalar: usedWeight > 0 ? weightedSum / usedWeight : 0,
      coverageRatio: this.totalWeight > 0 ? usedWeight / this.totalWeight : 0,
      usedWeight,
      totalWeight: this.totalWeight,
    };
  }
}

export type AxisScorers = Readonly<Record<AxisName, AxisScorer>>;

class AxisScorerService {
  /** One linear scorer per axis, built from the profile's weights */
  scorersForProfile(profile: CalibrationProfile): AxisScorers {
    return {
      mentality: new LinearAxisScorer(profile.axisWeights.mentality),
      workEthic: new LinearAxisScorer(profile.axisWeights.workEthic),
      presence: new LinearAxisScorer(profile.axisWeights.presence),
      temperament: new LinearAxisScorer(profile.axisWeights.temperament),
    };
  }

  /** Score with explicit weights (no coverage floor applied) */
  score(vector: FeatureVector, weights: readonly StatWeight[]): AxisScoreResult {
    return new LinearAxisScorer(weights).score(vector);
  }

  /**
   * Score one axis and enforce its coverage floor.
   * Throws AxisUnscoreable when no weight was backed by data or coverage is
   * below the minimum; callers treat that as a per-axis outcome.
   */
  scoreAxis(axis: AxisName, scorer: AxisScorer, vector: FeatureVector, minCoverage: number): AxisScoreResult {
    const result = scorer.score(vector);
    if (result.usedWeight === 0 || result.coverageRatio < minCoverage) {
      throw new AxisUnscoreableError(axis, result.coverageRatio, minCoverage);
    }
    return result;
  }
}

export const axisScorerService = new AxisScorerService();
export { AxisScorerService };
