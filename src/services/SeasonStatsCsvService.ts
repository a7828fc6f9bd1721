/**
 * Parses season-totals CSV exports into SeasonTotalsRow objects.
 *
 * Expected header (extra columns are ignored, any stat column may be blank):
 *   player_id,player_name,position,season,minutes,xg,xa,npxg,shots,key_passes,
 *   xg_chain,xg_buildup,fouls_committed,yellow_cards,red_cards,
 *   tackles_per_90,interceptions_per_90,clearances_per_90
 */

import Papa from 'papaparse';
import type { SeasonTotalsRow } from './StatDerivationService';

type CsvRow = Record<string, string | undefined>;

const NUMERIC_COLUMNS = [
  'xg', 'xa', 'npxg', 'shots', 'key_passes', 'xg_chain', 'xg_buildup',
  'fouls_committed', 'yellow_cards', 'red_cards',
  'tackles_per_90', 'interceptions_per_90', 'clearances_per_90',
] as const;

class SeasonStatsCsvService {
  parseSeasonTotalsCsv(csv: string): SeasonTotalsRow[] {
    const parsed = Papa.parse<CsvRow>(csv, { header: true, skipEmptyLines: true, transformHeader: h => h.trim() });

    const rows: SeasonTotalsRow[] = [];
    parsed.data.forEach((raw, index) => {
      const playerId = raw.player_id?.trim();
      if (!playerId) {
        console.warn(`⚠️  Skipping CSV row ${index + 2}: no player_id`);
        return;
      }

      const row: SeasonTotalsRow = {
        playerId,
        minutes: parseNumber(raw.minutes) ?? 0,
      };
      const playerName = raw.player_name?.trim();
      if (playerName) row.playerName = playerName;
      const position = raw.position?.trim();
      if (position) row.position = position;
      const season = raw.season?.trim();
      if (season) row.season = season;

      for (const column of NUMERIC_COLUMNS) {
        const value = parseNumber(raw[column]);
        if (value !== undefined) row[column] = value;
      }
      rows.push(row);
    });
    return rows;
  }
}

/** Blank or non-numeric cells are missing, not zero */
function parseNumber(cell: string | undefined): number | undefined {
  if (cell === undefined) return undefined;
  const trimmed = cell.trim();
  if (!trimmed) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

export const seasonStatsCsvService = new SeasonStatsCsvService();
export { SeasonStatsCsvService };
