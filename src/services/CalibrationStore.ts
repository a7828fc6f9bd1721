/**
 * CalibrationStore
 *
 * Holds published calibration profiles keyed by version. A profile is
 * validated once when it is published; after that it is deep-frozen and
 * only ever read. Publishing a new calibration means publishing a new
 * version, so past reports stay resolvable to the exact parameters used.
 */

import * as fs from 'fs';
import * as path from 'path';
import { AXIS_ORDER, AxisName, isAxisName } from '../models/Archetype';
import type { CalibrationProfile, StatWeight } from '../models/CalibrationProfile';
import { ProfileInvalidError, ProfileNotFoundError } from './ClassificationErrors';
import { canonicalJson, deepFreeze, isPlainObject, sha256 } from '../utils/statMath';

const PROFILE_FIELDS = ['version', 'name', 'axisWeights', 'axisThresholds', 'minMinutes', 'minAxisCoverage'];
const WEIGHT_ITEM_FIELDS = ['stat', 'weight'];

/** Threshold used for an axis the profile leaves out of axisThresholds */
export const DEFAULT_AXIS_THRESHOLD = 0;

class CalibrationStore {
  private profiles = new Map<string, CalibrationProfile>();

  /**
   * Validate and register a profile. Re-publishing a version with identical
   * content is a no-op; different content under a known version is rejected.
   */
  publish(raw: unknown): CalibrationProfile {
    const profile = validateProfile(raw);
    const existing = this.profiles.get(profile.version);
    if (existing) {
      if (existing.fingerprint !== profile.fingerprint) {
        throw new ProfileInvalidError(profile.version, ['version already published with different parameters']);
      }
      return existing;
    }
    this.profiles.set(profile.version, profile);
    return profile;
  }

  loadProfile(version: string): CalibrationProfile {
    const profile = this.profiles.get(version);
    if (!profile) {
      throw new ProfileNotFoundError(version);
    }
    return profile;
  }

  hasProfile(version: string): boolean {
    return this.profiles.has(version);
  }

  listVersions(): string[] {
    return Array.from(this.profiles.keys()).sort();
  }

  /**
   * Publish every *.json file in a directory. Files that are not valid JSON
   * are skipped with a warning; JSON that fails validation throws.
   */
  loadFromDirectory(dir: string): CalibrationProfile[] {
    if (!fs.existsSync(dir)) {
      console.warn(`⚠️  Profile directory not found: ${dir}`);
      return [];
    }

    const loaded: CalibrationProfile[] = [];
    const files = fs.readdirSync(dir).filter(f => f.endsWith('.json')).sort();
    for (const file of files) {
      const filePath = path.join(dir, file);
      let raw: unknown;
      try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
      } catch (err) {
        console.warn(`⚠️  Skipping unreadable profile ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
        continue;
      }
      loaded.push(this.publish(raw));
    }
    return loaded;
  }
}

// ============================================================================
// Validation
// ============================================================================

export function validateProfile(raw: unknown): CalibrationProfile {
  if (!isPlainObject(raw)) {
    throw new ProfileInvalidError('(unknown)', ['profile must be a JSON object']);
  }

  const version = typeof raw.version === 'string' ? raw.version.trim() : '';
  const label = version || '(unknown)';
  const problems: string[] = [];

  if (!version) problems.push('version must be a non-empty string');
  if (raw.name !== undefined && typeof raw.name !== 'string') problems.push('name must be a string');

  for (const key of Object.keys(raw)) {
    if (!PROFILE_FIELDS.includes(key)) problems.push(`unknown field "${key}"`);
  }

  const axisWeights = readAxisWeights(raw.axisWeights, problems);
  const axisThresholds = readAxisNumbers(raw.axisThresholds, 'axisThresholds', problems, {
    optional: true,
    fallback: DEFAULT_AXIS_THRESHOLD,
    check: (v) => Number.isFinite(v) ? null : 'must be a finite number',
  });
  const minAxisCoverage = readAxisNumbers(raw.minAxisCoverage, 'minAxisCoverage', problems, {
    optional: false,
    fallback: 0,
    check: (v) => v >= 0 && v <= 1 ? null : 'must be a fraction in [0, 1]',
  });

  const minMinutes = raw.minMinutes;
  if (typeof minMinutes !== 'number' || !Number.isInteger(minMinutes) || minMinutes < 0) {
    problems.push('minMinutes must be a non-negative integer');
  }

  if (problems.length > 0 || typeof minMinutes !== 'number') {
    throw new ProfileInvalidError(label, problems);
  }

  const body = {
    version,
    ...(typeof raw.name === 'string' ? { name: raw.name } : {}),
    axisWeights,
    axisThresholds,
    minMinutes,
    minAxisCoverage,
  };

  return deepFreeze({ ...body, fingerprint: sha256(canonicalJson(body)) });
}

function readAxisWeights(value: unknown, problems: string[]): Record<AxisName, StatWeight[]> {
  const out: Record<AxisName, StatWeight[]> = { mentality: [], workEthic: [], presence: [], temperament: [] };
  if (!isPlainObject(value)) {
    problems.push('axisWeights must be an object keyed by axis');
    return out;
  }

  for (const key of Object.keys(value)) {
    if (!isAxisName(key)) problems.push(`axisWeights: unknown axis "${key}"`);
  }

  for (const axis of AXIS_ORDER) {
    const entries = weightEntries(value[axis], axis, problems);
    if (!entries) {
      problems.push(`axisWeights.${axis} must be an object of stat weights or a list of { stat, weight }`);
      continue;
    }

    const seen = new Set<string>();
    let mass = 0;
    for (const [rawStat, weight] of entries) {
      const stat = rawStat.trim();
      if (!stat) {
        problems.push(`axisWeights.${axis}: blank stat name`);
        continue;
      }
      if (seen.has(stat)) {
        problems.push(`axisWeights.${axis}: duplicate stat "${stat}"`);
        continue;
      }
      seen.add(stat);
      if (typeof weight !== 'number' || !Number.isFinite(weight)) {
        problems.push(`axisWeights.${axis}.${stat} must be a finite number`);
        continue;
      }
      mass += Math.abs(weight);
      out[axis].push({ stat, weight });
    }

    if (mass === 0) problems.push(`axisWeights.${axis} has zero weights`);
  }

  return out;
}

/**
 * Weights are authored either as { stat: weight } or as an ordered list of
 * { stat, weight } pairs. Only the list form can carry a duplicate name, since
 * JSON.parse keeps the last of two equal object keys.
 */
function weightEntries(value: unknown, axis: AxisName, problems: string[]): Array<[string, unknown]> | null {
  if (Array.isArray(value)) {
    const entries: Array<[string, unknown]> = [];
    value.forEach((item: unknown, index) => {
      if (!isPlainObject(item) || typeof item.stat !== 'string') {
        problems.push(`axisWeights.${axis}[${index}] must be { stat, weight }`);
        return;
      }
      for (const key of Object.keys(item)) {
        if (!WEIGHT_ITEM_FIELDS.includes(key)) problems.push(`axisWeights.${axis}[${index}]: unknown field "${key}"`);
      }
      entries.push([item.stat, item.weight]);
    });
    return entries;
  }
  if (isPlainObject(value)) return Object.entries(value);
  return null;
}

interface AxisNumberRule {
  optional: boolean;
  fallback: number;
  check: (value: number) => string | null;
}

function readAxisNumbers(value: unknown, field: string, problems: string[], rule: AxisNumberRule): Record<AxisName, number> {
  const out: Record<AxisName, number> = {
    mentality: rule.fallback,
    workEthic: rule.fallback,
    presence: rule.fallback,
    temperament: rule.fallback,
  };

  if (value === undefined && rule.optional) return out;
  if (!isPlainObject(value)) {
    problems.push(`${field} must be an object keyed by axis`);
    return out;
  }

  for (const key of Object.keys(value)) {
    if (!isAxisName(key)) problems.push(`${field}: unknown axis "${key}"`);
  }

  for (const axis of AXIS_ORDER) {
    const v = value[axis];
    if (v === undefined && rule.optional) continue;
    if (typeof v !== 'number') {
      problems.push(`${field}.${axis} must be a number`);
      continue;
    }
    const problem = rule.check(v);
    if (problem) {
      problems.push(`${field}.${axis} ${problem}`);
      continue;
    }
    out[axis] = v;
  }

  return out;
}

export const calibrationStore = new CalibrationStore();
export { CalibrationStore };
