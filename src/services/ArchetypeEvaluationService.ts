/**
 * ArchetypeEvaluationService
 *
 * Compares assigned archetype codes against reference labels (for example
 * codes agreed in expert review) so a calibration can be judged before it is
 * published. An indeterminate '?' letter never counts as a match.
 */

import { AXIS_ORDER, AxisName } from '../models/Archetype';
import { parseArchetypeCode } from './ArchetypeAssignerService';

export interface LabeledPrediction {
  playerId: string;
  predicted: string;
  actual: string;
}

export interface AxisAccuracy {
  axis: AxisName;
  correct: number;
  /** Pairs where the predicted letter was not '?' */
  determined: number;
  accuracy: number;
}

export interface EvaluationSummary {
  /** Pairs that parsed as archetype codes on both sides */
  evaluated: number;
  skipped: number;
  exactMatch: number;
  atLeastThree: number;
  atLeastTwo: number;
  avgAxesCorrect: number;
  perAxis: AxisAccuracy[];
}

class ArchetypeEvaluationService {
  evaluateAgainstLabels(pairs: readonly LabeledPrediction[]): EvaluationSummary {
    const axisCorrect: Record<AxisName, number> = { mentality: 0, workEthic: 0, presence: 0, temperament: 0 };
    const axisDetermined: Record<AxisName, number> = { mentality: 0, workEthic: 0, presence: 0, temperament: 0 };
    const correctCounts: number[] = [];
    let skipped = 0;

    for (const pair of pairs) {
      const predicted = parseArchetypeCode(pair.predicted);
      const actual = parseArchetypeCode(pair.actual);
      if (!predicted || !actual) {
        skipped++;
        continue;
      }

      let correct = 0;
      for (const axis of AXIS_ORDER) {
        const letter = predicted[axis];
        if (letter === null) continue;
        axisDetermined[axis]++;
        if (letter === actual[axis]) {
          axisCorrect[axis]++;
          correct++;
        }
      }
      correctCounts.push(correct);
    }

    const evaluated = correctCounts.length;
    const share = (predicate: (n: number) => boolean): number =>
      evaluated === 0 ? 0 : correctCounts.filter(predicate).length / evaluated;

    return {
      evaluated,
      skipped,
      exactMatch: share(n => n === 4),
      atLeastThree: share(n => n >= 3),
      atLeastTwo: share(n => n >= 2),
      avgAxesCorrect: evaluated === 0 ? 0 : correctCounts.reduce((a, b) => a + b, 0) / evaluated,
      perAxis: AXIS_ORDER.map(axis => ({
        axis,
        correct: axisCorrect[axis],
        determined: axisDetermined[axis],
        accuracy: axisDetermined[axis] === 0 ? 0 : axisCorrect[axis] / axisDetermined[axis],
      })),
    };
  }

  /** Count of each code, most common first, ties alphabetical */
  codeDistribution(codes: readonly (string | null)[]): Array<{ code: string; count: number }> {
    const counts = new Map<string, number>();
    for (const code of codes) {
      const key = code ?? 'ineligible';
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return Array.from(counts, ([code, count]) => ({ code, count }))
      .sort((a, b) => b.count - a.count || a.code.localeCompare(b.code));
  }
}

export const archetypeEvaluationService = new ArchetypeEvaluationService();
export { ArchetypeEvaluationService };
