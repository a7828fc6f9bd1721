import type { AxisName } from './Archetype';

export interface StatWeight {
  stat: string;
  weight: number;
}

/**
 * Validated, immutable calibration bundle. Weight lists keep the order in
 * which they were authored so summation order (and thus every report) is
 * reproducible.
 */
export interface CalibrationProfile {
  version: string;
  name?: string;
  axisWeights: Readonly<Record<AxisName, readonly StatWeight[]>>;
  axisThresholds: Readonly<Record<AxisName, number>>;
  minMinutes: number;
  minAxisCoverage: Readonly<Record<AxisName, number>>;
  /** SHA-256 of the canonical profile JSON */
  fingerprint: string;
}

/**
 * Profile as authored in JSON, before validation.
 * `axisThresholds` may be omitted (every threshold defaults to 0).
 */
export interface CalibrationProfileInput {
  version: string;
  name?: string;
  axisWeights: Record<AxisName, Record<string, number> | StatWeight[]>;
  axisThresholds?: Partial<Record<AxisName, number>>;
  minMinutes: number;
  minAxisCoverage: Record<AxisName, number>;
}
