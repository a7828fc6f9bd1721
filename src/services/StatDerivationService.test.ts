import { excludePositionGroups, mapPositionGroup, statDerivationService, SeasonTotalsRow } from './StatDerivationService';
import type { RawStatRecord } from '../models/StatRecord';

function makeRow(overrides: Partial<SeasonTotalsRow> = {}): SeasonTotalsRow {
  return { playerId: 'p1', minutes: 1800, ...overrides };
}

describe('StatDerivationService', () => {
  describe('deriveSeasonStats', () => {
    test('converts counting totals to per-90 rates', () => {
      const record = statDerivationService.deriveSeasonStats(makeRow({ xg: 9, xa: 3, fouls_committed: 40 }));

      expect(record.stats.xg_p90).toBeCloseTo(0.45, 12);
      expect(record.stats.xa_p90).toBeCloseTo(0.15, 12);
      expect(record.stats.fouls_p90).toBeCloseTo(2, 12);
      expect(record.minutesPlayed).toBe(1800);
    });

    test('goal_share is xg over xg + xa', () => {
      const record = statDerivationService.deriveSeasonStats(makeRow({ xg: 9, xa: 3 }));
      expect(record.stats.goal_share).toBe(0.75);
    });

    test('goal_share is neutral when a player created nothing', () => {
      const record = statDerivationService.deriveSeasonStats(makeRow({ xg: 0, xa: 0 }));
      expect(record.stats.goal_share).toBe(0.5);
    });

    test('missing totals stay missing', () => {
      const record = statDerivationService.deriveSeasonStats(makeRow({ xg: 4 }));
      expect(Object.keys(record.stats)).toEqual(['xg_p90']);
      expect('goal_share' in record.stats).toBe(false);
    });

    test('per-90 event columns pass through and sum into defensive actions', () => {
      const record = statDerivationService.deriveSeasonStats(makeRow({
        tackles_per_90: 1.5,
        interceptions_per_90: 0.75,
        clearances_per_90: 3,
      }));
      expect(record.stats).toEqual({
        tackles_per_90: 1.5,
        interceptions_per_90: 0.75,
        clearances_per_90: 3,
        defensive_actions_p90: 2.25,
      });
    });

    test('zero minutes yields no rate stats', () => {
      const record = statDerivationService.deriveSeasonStats(makeRow({ minutes: 0, xg: 2, xa: 1 }));
      expect(record.stats).toEqual({});
      expect(record.minutesPlayed).toBe(0);
    });

    test('carries identity fields and the position group', () => {
      const record = statDerivationService.deriveSeasonStats(makeRow({
        playerName: 'Test Player',
        position: 'M C',
        season: '2023',
      }));
      expect(record).toEqual({
        playerId: 'p1',
        playerName: 'Test Player',
        positionGroup: 'MID',
        season: '2023',
        minutesPlayed: 1800,
        stats: {},
      });
    });
  });

  describe('toPer90', () => {
    test('rejects non-positive minutes and non-finite totals', () => {
      expect(statDerivationService.toPer90(5, 0)).toBeUndefined();
      expect(statDerivationService.toPer90(5, -90)).toBeUndefined();
      expect(statDerivationService.toPer90(Number.NaN, 900)).toBeUndefined();
      expect(statDerivationService.toPer90(5, 900)).toBeCloseTo(0.5, 12);
    });
  });
});

describe('mapPositionGroup', () => {
  const cases: Array<[string | undefined, string]> = [
    ['FW', 'FWD'],
    ['F', 'FWD'],
    ['S', 'FWD'],
    ['Sub', 'FWD'],
    ['AM', 'UNK'],
    ['M', 'MID'],
    ['MC', 'MID'],
    ['DC', 'DEF'],
    ['d', 'DEF'],
    ['GK', 'GK'],
    ['', 'UNK'],
    ['  ', 'UNK'],
    [undefined, 'UNK'],
  ];

  test.each(cases)('%p maps to %s', (position, group) => {
    expect(mapPositionGroup(position)).toBe(group);
  });
});

describe('excludePositionGroups', () => {
  test('drops records in the listed groups and keeps ungrouped ones', () => {
    const records: RawStatRecord[] = [
      { playerId: 'keeper', positionGroup: 'GK', minutesPlayed: 3000, stats: {} },
      { playerId: 'mid', positionGroup: 'MID', minutesPlayed: 2000, stats: {} },
      { playerId: 'unknown', minutesPlayed: 1500, stats: {} },
    ];
    expect(excludePositionGroups(records, ['GK']).map(r => r.playerId)).toEqual(['mid', 'unknown']);
    expect(excludePositionGroups(records, [])).toHaveLength(3);
  });
});
