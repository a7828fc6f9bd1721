/**
 * StatDerivationService
 *
 * Turns season totals (as exported from the merged xG + event data) into the
 * sparse per-90 stat map the classifier consumes. A total that is missing from
 * the row stays missing; it is never filled with 0.
 *
 * Derived features:
 * - <total>_p90 = total / minutes * 90 for every counting total
 * - goal_share = xg / (xg + xa), 0.5 when both are 0
 * - defensive_actions_p90 = tackles_per_90 + interceptions_per_90
 */

import type { PositionGroup, RawStatRecord } from '../models/StatRecord';

export interface SeasonTotalsRow {
  playerId: string;
  playerName?: string;
  position?: string;
  season?: string;
  minutes: number;
  xg?: number;
  xa?: number;
  npxg?: number;
  shots?: number;
  key_passes?: number;
  xg_chain?: number;
  xg_buildup?: number;
  fouls_committed?: number;
  yellow_cards?: number;
  red_cards?: number;
  /** Already per-90 in the event-data export */
  tackles_per_90?: number;
  interceptions_per_90?: number;
  clearances_per_90?: number;
}

type CountingTotal = 'xg' | 'xa' | 'npxg' | 'shots' | 'key_passes' | 'xg_chain' | 'xg_buildup'
  | 'fouls_committed' | 'yellow_cards' | 'red_cards';

/** Counting totals and the per-90 stat each one becomes */
const PER_90_STATS: ReadonlyArray<[CountingTotal, string]> = [
  ['xg', 'xg_p90'],
  ['xa', 'xa_p90'],
  ['npxg', 'npxg_p90'],
  ['shots', 'shots_p90'],
  ['key_passes', 'key_passes_p90'],
  ['xg_chain', 'xg_chain_p90'],
  ['xg_buildup', 'xg_buildup_p90'],
  ['fouls_committed', 'fouls_p90'],
  ['yellow_cards', 'yellow_cards_p90'],
  ['red_cards', 'red_cards_p90'],
];

type PerNinetyColumn = 'tackles_per_90' | 'interceptions_per_90' | 'clearances_per_90';

const PASSTHROUGH_STATS: readonly PerNinetyColumn[] = ['tackles_per_90', 'interceptions_per_90', 'clearances_per_90'];

/** goal_share when a player has neither xG nor xA */
const NEUTRAL_GOAL_SHARE = 0.5;

class StatDerivationService {
  toPer90(total: number, minutes: number): number | undefined {
    if (!Number.isFinite(total) || !Number.isFinite(minutes) || minutes <= 0) return undefined;
    return (total / minutes) * 90;
  }

  deriveSeasonStats(row: SeasonTotalsRow): RawStatRecord {
    const stats: Record<string, number> = {};

    for (const [total, stat] of PER_90_STATS) {
      const value = row[total];
      if (value === undefined) continue;
      const per90 = this.toPer90(value, row.minutes);
      if (per90 !== undefined) stats[stat] = per90;
    }

    for (const stat of PASSTHROUGH_STATS) {
      const value = row[stat];
      if (value !== undefined && Number.isFinite(value)) stats[stat] = value;
    }

    if (row.xg !== undefined && row.xa !== undefined && row.minutes > 0) {
      const created = row.xg + row.xa;
      stats.goal_share = created === 0 ? NEUTRAL_GOAL_SHARE : row.xg / created;
    }

    if (row.tackles_per_90 !== undefined && row.interceptions_per_90 !== undefined) {
      stats.defensive_actions_p90 = row.tackles_per_90 + row.interceptions_per_90;
    }

    return {
      playerId: row.playerId,
      ...(row.playerName ? { playerName: row.playerName } : {}),
      positionGroup: mapPositionGroup(row.position),
      ...(row.season ? { season: row.season } : {}),
      minutesPlayed: row.minutes,
      stats,
    };
  }
}

/**
 * Position string → group. Forwards include the "S" (striker) and "Sub"
 * codes used by the xG source; anything unrecognized is UNK.
 */
export function mapPositionGroup(position: string | undefined): PositionGroup {
  if (!position) return 'UNK';
  const pos = position.trim().toUpperCase();
  if (!pos) return 'UNK';

  if (pos.startsWith('F') || pos === 'S' || pos === 'SUB') return 'FWD';
  if (pos.startsWith('M')) return 'MID';
  if (pos.startsWith('D')) return 'DEF';
  if (pos.startsWith('G')) return 'GK';
  return 'UNK';
}

/**
 * Records outside the given position groups. The tools drop goalkeepers this
 * way: their outfield stats would skew the populations the others are
 * normalized against.
 */
export function excludePositionGroups(
  records: readonly RawStatRecord[],
  groups: readonly PositionGroup[],
): RawStatRecord[] {
  return records.filter(r => !(r.positionGroup && groups.includes(r.positionGroup)));
}

export const statDerivationService = new StatDerivationService();
export { StatDerivationService };
