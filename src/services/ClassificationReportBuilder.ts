/**
 * ClassificationReportBuilder
 *
 * Pure assembly of the per-player output record. No computation happens here:
 * every number arrives from the assigner. Reports are frozen, and
 * serializeReport writes them with sorted keys so identical inputs always
 * serialize to identical bytes.
 */

import type { CalibrationProfile } from '../models/CalibrationProfile';
import type { ArchetypeAssignment, AxisAssignment } from './ArchetypeAssignerService';
import type { ClassificationErrorCode } from './ClassificationErrors';
import { canonicalJson, deepFreeze } from '../utils/statMath';

export type ReportSufficiency = 'complete' | 'partial' | 'ineligible';

export interface IneligibleReason {
  code: ClassificationErrorCode;
  message: string;
}

export interface ClassificationReport {
  playerId: string;
  /** Four letters ('?' for indeterminate axes), or null when ineligible */
  archetype: string | null;
  sufficiency: ReportSufficiency;
  axes: readonly AxisAssignment[];
  reason?: IneligibleReason;
  profileVersion: string;
  profileFingerprint: string;
  populationId: string;
}

class ClassificationReportBuilder {
  build(
    playerId: string,
    assignment: ArchetypeAssignment,
    profile: CalibrationProfile,
    populationId: string,
  ): ClassificationReport {
    const report: ClassificationReport = {
      playerId,
      archetype: assignment.label,
      sufficiency: assignment.sufficiency,
      axes: assignment.axes.map(a => ({ ...a })),
      profileVersion: profile.version,
      profileFingerprint: profile.fingerprint,
      populationId,
    };
    return deepFreeze(report);
  }

  buildIneligible(
    playerId: string,
    reason: IneligibleReason,
    profile: CalibrationProfile,
    populationId: string,
  ): ClassificationReport {
    const report: ClassificationReport = {
      playerId,
      archetype: null,
      sufficiency: 'ineligible',
      axes: [],
      reason: { code: reason.code, message: reason.message },
      profileVersion: profile.version,
      profileFingerprint: profile.fingerprint,
      populationId,
    };
    return deepFreeze(report);
  }
}

export function serializeReport(report: ClassificationReport): string {
  return canonicalJson(report);
}

export const classificationReportBuilder = new ClassificationReportBuilder();
export { ClassificationReportBuilder };
