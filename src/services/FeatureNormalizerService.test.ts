import { featureNormalizerService } from './FeatureNormalizerService';
import { InsufficientMinutesError, InvalidStatRecordError } from './ClassificationErrors';
import type { RawStatRecord, ReferencePopulation } from '../models/StatRecord';

function makeRecord(overrides: Partial<RawStatRecord> = {}): RawStatRecord {
  return { playerId: 'p1', minutesPlayed: 2000, stats: {}, ...overrides };
}

const population: ReferencePopulation = {
  id: 'test-pop',
  scope: 'ALL',
  size: 50,
  stats: {
    goals: { mean: 2, stdDev: 0.5, count: 50 },
    keyPasses: { mean: 1, stdDev: 2, count: 50 },
    passes: { mean: 10, stdDev: 0, count: 50 },
  },
};

describe('FeatureNormalizerService', () => {
  describe('normalize', () => {
    test('computes z-scores against the population', () => {
      const vector = featureNormalizerService.normalize(
        makeRecord({ stats: { goals: 3, keyPasses: 0 } }),
        population,
        900,
      );
      // (3 - 2) / 0.5 = 2; (0 - 1) / 2 = -0.5
      expect(vector).toEqual({ goals: 2, keyPasses: -0.5 });
    });

    test('a stat with zero population stdDev normalizes to 0', () => {
      const vector = featureNormalizerService.normalize(makeRecord({ stats: { passes: 55 } }), population, 900);
      expect(vector.passes).toBe(0);
    });

    test('stats missing from the record stay missing', () => {
      const vector = featureNormalizerService.normalize(makeRecord({ stats: { goals: 2 } }), population, 900);
      expect(Object.keys(vector)).toEqual(['goals']);
      expect('keyPasses' in vector).toBe(false);
    });

    test('stats the population cannot normalize are left out', () => {
      const vector = featureNormalizerService.normalize(makeRecord({ stats: { goals: 2, tackles: 4 } }), population, 900);
      expect(vector).toEqual({ goals: 0 });
    });

    test('the vector is frozen', () => {
      const vector = featureNormalizerService.normalize(makeRecord({ stats: { goals: 2 } }), population, 900);
      expect(Object.isFrozen(vector)).toBe(true);
    });
  });

  describe('eligibility', () => {
    test('minutes below the profile minimum throw InsufficientMinutes', () => {
      const record = makeRecord({ minutesPlayed: 500 });
      expect(() => featureNormalizerService.normalize(record, population, 900)).toThrow(InsufficientMinutesError);
    });

    test('exactly the minimum is eligible', () => {
      const record = makeRecord({ minutesPlayed: 900, stats: { goals: 2 } });
      expect(featureNormalizerService.normalize(record, population, 900)).toEqual({ goals: 0 });
    });

    test('zero minutes is never eligible, even with no minimum', () => {
      const record = makeRecord({ minutesPlayed: 0 });
      expect(() => featureNormalizerService.normalize(record, population, 0)).toThrow(InsufficientMinutesError);
    });

    test('a non-finite stat value is an invalid record', () => {
      const record = makeRecord({ stats: { goals: Number.NaN } });
      expect(() => featureNormalizerService.normalize(record, population, 900)).toThrow(InvalidStatRecordError);
    });

    test('a blank player id is an invalid record', () => {
      const record = makeRecord({ playerId: '  ' });
      expect(() => featureNormalizerService.normalize(record, population, 900)).toThrow(InvalidStatRecordError);
    });

    test('the error carries the minutes and the minimum', () => {
      try {
        featureNormalizerService.normalize(makeRecord({ playerId: 'p7', minutesPlayed: 450 }), population, 900);
        throw new Error('expected InsufficientMinutesError');
      } catch (err) {
        expect(err).toBeInstanceOf(InsufficientMinutesError);
        if (err instanceof InsufficientMinutesError) {
          expect(err.code).toBe('INSUFFICIENT_MINUTES');
          expect(err.message).toBe('Player p7 played 450 minutes (minimum 900)');
        }
      }
    });
  });
});
