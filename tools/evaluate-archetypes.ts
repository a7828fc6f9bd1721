/**
 * Evaluate Archetypes
 *
 * Classifies a season-totals CSV under one profile and compares the result
 * with reference codes from a labels CSV (columns: player_id, archetype).
 * Useful for checking a candidate calibration against expert-reviewed labels
 * before publishing it as a new version.
 *
 * Run with: npx tsx tools/evaluate-archetypes.ts --labels=labels.csv [--stats=...] [--profile=v1] [--keepGoalkeepers]
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { AXIS_DEFINITIONS } from '../src/models/Archetype';
import { archetypeClassificationService } from '../src/services/ArchetypeClassificationService';
import { archetypeEvaluationService, LabeledPrediction } from '../src/services/ArchetypeEvaluationService';
import { calibrationStore } from '../src/services/CalibrationStore';
import { referencePopulationService } from '../src/services/ReferencePopulationService';
import { isPlainObject } from '../src/utils/statMath';
import { DEFAULT_PROFILES_DIR, SAMPLE_STATS_PATH, formatPct, loadSeasonRecords, parseArgs } from './lib/dataLoader';

function loadLabels(filePath: string): Map<string, string> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Labels file not found: ${filePath}`);
  }

  const csvContent = fs.readFileSync(filePath, 'utf-8');
  const records: unknown = parse(csvContent, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });

  const labels = new Map<string, string>();
  if (!Array.isArray(records)) return labels;
  for (const r of records) {
    if (!isPlainObject(r)) continue;
    const playerId = r.player_id;
    const archetype = r.archetype;
    if (typeof playerId === 'string' && typeof archetype === 'string' && playerId && archetype) {
      labels.set(playerId, archetype.toUpperCase());
    }
  }
  return labels;
}

async function evaluateArchetypes(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (!args.labels) {
    throw new Error('Missing required --labels=<csv with player_id,archetype>');
  }

  const statsPath = path.resolve(args.stats || SAMPLE_STATS_PATH);
  const version = args.profile || 'v1';

  calibrationStore.loadFromDirectory(path.resolve(args.profilesDir || DEFAULT_PROFILES_DIR));
  const profile = calibrationStore.loadProfile(version);
  const records = loadSeasonRecords(statsPath, args.keepGoalkeepers !== undefined);
  const labels = loadLabels(path.resolve(args.labels));

  const population = referencePopulationService.buildReferencePopulation(records, {
    id: path.basename(statsPath, path.extname(statsPath)),
    minMinutes: profile.minMinutes,
  });
  const { reports } = await archetypeClassificationService.classifyBatch(records, version, population);

  const pairs: LabeledPrediction[] = [];
  for (const report of reports) {
    const actual = labels.get(report.playerId);
    if (!actual || report.archetype === null) continue;
    pairs.push({ playerId: report.playerId, predicted: report.archetype, actual });
  }

  const summary = archetypeEvaluationService.evaluateAgainstLabels(pairs);

  console.log('='.repeat(80));
  console.log(`ARCHETYPE EVALUATION  profile ${version}`);
  console.log('='.repeat(80));
  console.log(`Players classified:     ${reports.length}`);
  console.log(`Labeled and eligible:   ${pairs.length}`);
  console.log(`Evaluated:              ${summary.evaluated} (skipped ${summary.skipped})`);
  console.log('');
  console.log(`Exact match (4/4):      ${formatPct(summary.exactMatch)}`);
  console.log(`3/4 axes:               ${formatPct(summary.atLeastThree)}`);
  console.log(`2/4 axes:               ${formatPct(summary.atLeastTwo)}`);
  console.log(`Avg axes correct:       ${summary.avgAxesCorrect.toFixed(2)} / 4`);
  console.log('');
  console.log('Per-axis accuracy:');
  for (const axis of summary.perAxis) {
    const def = AXIS_DEFINITIONS[axis.axis];
    console.log(
      `  ${def.label.padEnd(12)} (${def.highLetter}/${def.lowLetter}): `
      + `${formatPct(axis.accuracy).padStart(6)}  (${axis.correct}/${axis.determined})`
    );
  }
}

evaluateArchetypes().catch((err) => {
  process.stderr.write(`Evaluation failed: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
