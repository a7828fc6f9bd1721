import { axisScorerService, AxisScorer, LinearAxisScorer } from './AxisScorerService';
import { AxisUnscoreableError } from './ClassificationErrors';
import { validateProfile } from './CalibrationStore';
import type { StatWeight } from '../models/CalibrationProfile';

const mentalityWeights: StatWeight[] = [
  { stat: 'goals', weight: 0.6 },
  { stat: 'keyPasses', weight: -0.4 },
];

describe('LinearAxisScorer', () => {
  test('weighted sum over the stats present (player A)', () => {
    const result = new LinearAxisScorer(mentalityWeights).score({ goals: 1.2, keyPasses: -0.3 });
    // 0.6 * 1.2 + -0.4 * -0.3 = 0.84, divided by used mass 1.0
    expect(result.scalar).toBeCloseTo(0.84, 12);
    expect(result.coverageRatio).toBe(1);
  });

  test('negative result for a facilitator profile (player B)', () => {
    const result = new LinearAxisScorer(mentalityWeights).score({ goals: -0.5, keyPasses: 1.0 });
    expect(result.scalar).toBeCloseTo(-0.7, 12);
  });

  test('missing stats are scored on the weight actually used', () => {
    const scorer = new LinearAxisScorer([
      { stat: 'goals', weight: 0.6 },
      { stat: 'keyPasses', weight: 0.4 },
    ]);
    const result = scorer.score({ goals: 1.0 });
    expect(result.scalar).toBe(1);
    expect(result.coverageRatio).toBe(0.6);
    expect(result.usedWeight).toBe(0.6);
    expect(result.totalWeight).toBe(1);
  });

  test('no overlapping stats gives zero coverage', () => {
    const result = new LinearAxisScorer(mentalityWeights).score({ tackles: 3 });
    expect(result).toEqual({ scalar: 0, coverageRatio: 0, usedWeight: 0, totalWeight: 1 });
  });

  describe('zero-weight immunity', () => {
    const scorer = new LinearAxisScorer([
      { stat: 'goals', weight: 1 },
      { stat: 'offsides', weight: 0 },
    ]);

    const cases: Array<[string, Record<string, number>]> = [
      ['missing', {}],
      ['zero', { offsides: 0 }],
      ['huge', { offsides: 1e300 }],
      ['infinite', { offsides: Number.NEGATIVE_INFINITY }],
    ];

    test.each(cases)('a zero-weight stat has no effect when %s', (_label, extra) => {
      const result = scorer.score({ goals: 0.5, ...extra });
      expect(result.scalar).toBe(0.5);
      expect(result.coverageRatio).toBe(1);
    });
  });

  test('removing a stat never increases coverage', () => {
    const scorer = new LinearAxisScorer([
      { stat: 'a', weight: 0.5 },
      { stat: 'b', weight: -0.25 },
      { stat: 'c', weight: 0.15 },
      { stat: 'd', weight: 0.1 },
    ]);
    const vector: Record<string, number> = { a: 1, b: -1, c: 0.5, d: 2 };
    let previous = scorer.score(vector).coverageRatio;
    expect(previous).toBe(1);

    for (const stat of ['c', 'a', 'd', 'b']) {
      delete vector[stat];
      const coverage = scorer.score(vector).coverageRatio;
      expect(coverage).toBeLessThanOrEqual(previous);
      previous = coverage;
    }
    expect(previous).toBe(0);
  });
});

describe('AxisScorerService', () => {
  test('scoreAxis throws AxisUnscoreable below the coverage floor', () => {
    const scorer = new LinearAxisScorer([
      { stat: 'goals', weight: 0.6 },
      { stat: 'keyPasses', weight: 0.4 },
    ]);
    try {
      axisScorerService.scoreAxis('mentality', scorer, { goals: 1.0 }, 0.7);
      throw new Error('expected AxisUnscoreableError');
    } catch (err) {
      expect(err).toBeInstanceOf(AxisUnscoreableError);
      if (err instanceof AxisUnscoreableError) {
        expect(err.axis).toBe('mentality');
        expect(err.coverageRatio).toBe(0.6);
        expect(err.minCoverage).toBe(0.7);
      }
    }
  });

  test('scoreAxis passes at exactly the coverage floor', () => {
    const scorer = new LinearAxisScorer([
      { stat: 'goals', weight: 0.6 },
      { stat: 'keyPasses', weight: 0.4 },
    ]);
    expect(axisScorerService.scoreAxis('mentality', scorer, { goals: 1.0 }, 0.6).scalar).toBe(1);
  });

  test('an axis with no usable data is unscoreable even with no floor', () => {
    const scorer = new LinearAxisScorer(mentalityWeights);
    expect(() => axisScorerService.scoreAxis('mentality', scorer, {}, 0)).toThrow(AxisUnscoreableError);
  });

  test('score() applies explicit weights without a floor', () => {
    expect(axisScorerService.score({ goals: 2 }, [{ stat: 'goals', weight: 3 }]).scalar).toBe(2);
  });

  test('builds one scorer per axis from a profile', () => {
    const profile = validateProfile({
      version: 'scorers',
      axisWeights: {
        mentality: { goals: 1 },
        workEthic: { tackles: 2 },
        presence: { touches: 1 },
        temperament: { fouls: -1 },
      },
      minMinutes: 0,
      minAxisCoverage: { mentality: 0, workEthic: 0, presence: 0, temperament: 0 },
    });
    const scorers = axisScorerService.scorersForProfile(profile);
    expect(scorers.workEthic.score({ tackles: 0.75 }).scalar).toBe(0.75);
    expect(scorers.temperament.score({ fouls: 0.75 }).scalar).toBe(-0.75);
  });

  test('any AxisScorer implementation can stand in for linear weights', () => {
    const model: AxisScorer = {
      score: (vector) => ({
        scalar: Math.tanh(vector.goals ?? 0),
        coverageRatio: 'goals' in vector ? 1 : 0,
        usedWeight: 'goals' in vector ? 1 : 0,
        totalWeight: 1,
      }),
    };
    expect(axisScorerService.scoreAxis('mentality', model, { goals: 0 }, 0.5).scalar).toBe(0);
    expect(() => axisScorerService.scoreAxis('mentality', model, {}, 0.5)).toThrow(AxisUnscoreableError);
  });
});
