/**
 * ArchetypeAssignerService
 *
 * Thresholds each axis scalar into a letter and joins the four letters into
 * the archetype code (axis order: Mentality, Work Ethic, Presence, Temperament).
 *
 * - scalar >= threshold → high letter. Exact equality resolves to the high letter.
 * - margin = scalar - threshold. Sign picks the letter, magnitude is confidence.
 * - An axis that could not be scored is written as '?' and makes the
 *   classification partial.
 */

import {
  AXIS_DEFINITIONS,
  AXIS_ORDER,
  AxisName,
  DataSufficiency,
  INDETERMINATE_LETTER,
} from '../models/Archetype';
import type { AxisScoreResult } from './AxisScorerService';
import type { AxisUnscoreableError } from './ClassificationErrors';

export type AxisOutcome =
  | { status: 'scored'; result: AxisScoreResult }
  | { status: 'unscoreable'; error: AxisUnscoreableError };

export type AxisOutcomes = Readonly<Record<AxisName, AxisOutcome>>;

export interface ScoredAxis {
  axis: AxisName;
  status: 'scored';
  letter: string;
  score: number;
  threshold: number;
  margin: number;
  coverageRatio: number;
}

export interface IndeterminateAxis {
  axis: AxisName;
  status: 'unscoreable';
  letter: string;
  threshold: number;
  coverageRatio: number;
  minCoverage: number;
}

export type AxisAssignment = ScoredAxis | IndeterminateAxis;

export interface ArchetypeAssignment {
  /** Four letters, '?' for an indeterminate axis */
  label: string;
  axes: AxisAssignment[];
  sufficiency: DataSufficiency;
}

const CODE_PATTERN = /^[SF][WP][IC][NO]$/;

class ArchetypeAssignerService {
  assign(outcomes: AxisOutcomes, thresholds: Readonly<Record<AxisName, number>>): ArchetypeAssignment {
    const axes = AXIS_ORDER.map((axis): AxisAssignment => {
      const outcome = outcomes[axis];
      const threshold = thresholds[axis];

      if (outcome.status === 'unscoreable') {
        return {
          axis,
          status: 'unscoreable',
          letter: INDETERMINATE_LETTER,
          threshold,
          coverageRatio: outcome.error.coverageRatio,
          minCoverage: outcome.error.minCoverage,
        };
      }

      const score = outcome.result.scalar;
      return {
        axis,
        status: 'scored',
        letter: this.letterFor(axis, score, threshold),
        score,
        threshold,
        margin: score - threshold,
        coverageRatio: outcome.result.coverageRatio,
      };
    });

    return {
      label: axes.map(a => a.letter).join(''),
      axes,
      sufficiency: axes.every(a => a.status === 'scored') ? 'complete' : 'partial',
    };
  }

  letterFor(axis: AxisName, score: number, threshold: number): string {
    const def = AXIS_DEFINITIONS[axis];
    return score >= threshold ? def.highLetter : def.lowLetter;
  }
}

// ============================================================================
// Archetype codes
// ============================================================================

/** True for a fully determined four-letter code such as "SWIN" */
export function isArchetypeCode(code: string): boolean {
  return CODE_PATTERN.test(code);
}

/** All 16 codes, high letters first on every axis */
export function listArchetypeCodes(): string[] {
  let codes = [''];
  for (const axis of AXIS_ORDER) {
    const def = AXIS_DEFINITIONS[axis];
    codes = codes.flatMap(prefix => [prefix + def.highLetter, prefix + def.lowLetter]);
  }
  return codes;
}

/**
 * Split a code (possibly with '?' positions) into per-axis letters.
 * Returns null if the string is not a four-letter archetype label.
 */
export function parseArchetypeCode(code: string): Record<AxisName, string | null> | null {
  const normalized = code.trim().toUpperCase();
  if (normalized.length !== AXIS_ORDER.length) return null;

  const parsed: Record<AxisName, string | null> = { mentality: null, workEthic: null, presence: null, temperament: null };
  for (let i = 0; i < AXIS_ORDER.length; i++) {
    const axis = AXIS_ORDER[i];
    const def = AXIS_DEFINITIONS[axis];
    const letter = normalized[i];
    if (letter === INDETERMINATE_LETTER) continue;
    if (letter !== def.highLetter && letter !== def.lowLetter) return null;
    parsed[axis] = letter;
  }
  return parsed;
}

/** "SWIN" → "Scorer · Warrior · Involved · Intense" */
export function describeArchetype(code: string): string | null {
  const parsed = parseArchetypeCode(code);
  if (!parsed) return null;
  return AXIS_ORDER.map(axis => {
    const def = AXIS_DEFINITIONS[axis];
    const letter = parsed[axis];
    if (letter === null) return `${def.label} ?`;
    return letter === def.highLetter ? def.highLabel : def.lowLabel;
  }).join(' · ');
}

export const archetypeAssignerService = new ArchetypeAssignerService();
export { ArchetypeAssignerService };
