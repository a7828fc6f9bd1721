/**
 * Classification error taxonomy.
 *
 * Structural (batch-fatal): ProfileNotFound, ProfileInvalid, PopulationIncomplete,
 * PopulationMissing.
 * Per-player (captured as an ineligible report): InsufficientMinutes, InvalidStatRecord.
 * Per-axis (captured as an indeterminate letter): AxisUnscoreable.
 */

import type { AxisName } from '../models/Archetype';
import type { PopulationScope } from '../models/StatRecord';

export type ClassificationErrorCode =
  | 'PROFILE_NOT_FOUND'
  | 'PROFILE_INVALID'
  | 'POPULATION_INCOMPLETE'
  | 'POPULATION_MISSING'
  | 'INSUFFICIENT_MINUTES'
  | 'INVALID_STAT_RECORD'
  | 'AXIS_UNSCOREABLE';

export abstract class ClassificationError extends Error {
  abstract readonly code: ClassificationErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ProfileNotFoundError extends ClassificationError {
  readonly code = 'PROFILE_NOT_FOUND';

  constructor(readonly version: string) {
    super(`Calibration profile "${version}" not found`);
  }
}

export class ProfileInvalidError extends ClassificationError {
  readonly code = 'PROFILE_INVALID';

  constructor(readonly version: string, readonly problems: string[]) {
    super(`Calibration profile "${version}" is invalid: ${problems.join('; ')}`);
  }
}

export class PopulationIncompleteError extends ClassificationError {
  readonly code = 'POPULATION_INCOMPLETE';

  constructor(readonly populationId: string, readonly missingStats: string[]) {
    super(`Reference population "${populationId}" has no normalization for: ${missingStats.join(', ')}`);
  }
}

export class PopulationMissingError extends ClassificationError {
  readonly code = 'POPULATION_MISSING';

  constructor(readonly scope: PopulationScope) {
    super(`Population set has no ${scope} population`);
  }
}

export class InsufficientMinutesError extends ClassificationError {
  readonly code = 'INSUFFICIENT_MINUTES';

  constructor(readonly playerId: string, readonly minutesPlayed: number, readonly minMinutes: number) {
    super(`Player ${playerId} played ${minutesPlayed} minutes (minimum ${minMinutes})`);
  }
}

export class InvalidStatRecordError extends ClassificationError {
  readonly code = 'INVALID_STAT_RECORD';

  constructor(readonly playerId: string, readonly detail: string) {
    super(`Stat record for player "${playerId}" is invalid: ${detail}`);
  }
}

export class AxisUnscoreableError extends ClassificationError {
  readonly code = 'AXIS_UNSCOREABLE';

  constructor(readonly axis: AxisName, readonly coverageRatio: number, readonly minCoverage: number) {
    super(`Axis ${axis} coverage ${coverageRatio.toFixed(3)} is below the minimum ${minCoverage}`);
  }
}

/** Errors that abort a whole batch before any player is processed */
export function isStructuralError(err: unknown): boolean {
  return err instanceof ProfileNotFoundError
    || err instanceof ProfileInvalidError
    || err instanceof PopulationIncompleteError
    || err instanceof PopulationMissingError;
}
