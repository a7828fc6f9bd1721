export type PositionGroup = 'FWD' | 'MID' | 'DEF' | 'GK' | 'UNK';

export const POSITION_GROUPS: readonly PositionGroup[] = ['FWD', 'MID', 'DEF', 'GK', 'UNK'];

/**
 * One player's per-90 statistics over an observation window (usually a season).
 * The stat map is sparse: a missing key means "not observed", never zero.
 */
export interface RawStatRecord {
  playerId: string;
  playerName?: string;
  positionGroup?: PositionGroup;
  season?: string;
  minutesPlayed: number;
  stats: Record<string, number>;
  /** Cache-key component; defaults to a content fingerprint of the record */
  recordVersion?: string;
}

export interface StatNormalization {
  mean: number;
  /** Population standard deviation (ddof = 0) */
  stdDev: number;
  count: number;
}

export type PopulationScope = 'ALL' | PositionGroup;

export interface ReferencePopulation {
  id: string;
  scope: PopulationScope;
  /** Number of records that contributed */
  size: number;
  stats: Readonly<Record<string, StatNormalization>>;
}

/** Normalized value per stat-name. Absent stats stay absent. */
export type FeatureVector = Readonly<Record<string, number>>;
