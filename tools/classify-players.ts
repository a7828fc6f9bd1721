/**
 * Classify Players Tool
 *
 * Reads a season-totals CSV, builds the reference population(s) from the same
 * file, and prints one archetype report per row in input order. Goalkeepers
 * are left out of both unless --keepGoalkeepers is passed.
 *
 * Usage examples:
 *   npx tsx tools/classify-players.ts
 *   npx tsx tools/classify-players.ts --stats=data/samples/season_totals_sample.csv --profile=v2
 *   npx tsx tools/classify-players.ts --scope=all --format=json --out=reports.json
 *   npx tsx tools/classify-players.ts --keepGoalkeepers
 *   npx tsx tools/classify-players.ts --scope=position --minGroupSize=5 --popMinMinutes=900
 *   npx tsx tools/classify-players.ts --profilesDir=./my-profiles --profile=trial-3 --format=markdown
 */

import * as fs from 'fs';
import * as path from 'path';
import { AXIS_DEFINITIONS, AXIS_ORDER } from '../src/models/Archetype';
import type { RawStatRecord } from '../src/models/StatRecord';
import { describeArchetype } from '../src/services/ArchetypeAssignerService';
import {
  archetypeClassificationService,
  BatchResult,
  DEFAULT_BATCH_CONCURRENCY,
} from '../src/services/ArchetypeClassificationService';
import { archetypeEvaluationService } from '../src/services/ArchetypeEvaluationService';
import { calibrationStore } from '../src/services/CalibrationStore';
import { isStructuralError } from '../src/services/ClassificationErrors';
import { ClassificationReport, serializeReport } from '../src/services/ClassificationReportBuilder';
import { referencePopulationService } from '../src/services/ReferencePopulationService';
import { DEFAULT_PROFILES_DIR, SAMPLE_STATS_PATH, loadSeasonRecords, parseArgs, parseIntegerArg } from './lib/dataLoader';

type OutputFormat = 'text' | 'json' | 'markdown';

function formatMargin(report: ClassificationReport, index: number): string {
  const axis = report.axes[index];
  if (!axis) return '';
  if (axis.status === 'unscoreable') return `  ? (cov ${axis.coverageRatio.toFixed(2)})`;
  const sign = axis.margin >= 0 ? '+' : '';
  return `${sign}${axis.margin.toFixed(2)}`;
}

function renderText(records: RawStatRecord[], result: BatchResult): string {
  const lines: string[] = [];
  lines.push('='.repeat(110));
  lines.push(`ARCHETYPES  profile ${result.profileVersion} (${result.profileFingerprint.slice(0, 12)})`);
  lines.push('='.repeat(110));
  lines.push(
    'Player'.padEnd(28)
    + 'Code'.padEnd(7)
    + 'Status'.padEnd(12)
    + AXIS_ORDER.map(axis => AXIS_DEFINITIONS[axis].label.padStart(14)).join('')
    + '  Population'
  );
  lines.push('-'.repeat(110));

  result.reports.forEach((report, i) => {
    const name = records[i]?.playerName ?? report.playerId;
    if (report.sufficiency === 'ineligible') {
      lines.push(`${name.padEnd(28)}${'----'.padEnd(7)}${'ineligible'.padEnd(12)}${report.reason?.message ?? ''}`);
      return;
    }
    lines.push(
      name.padEnd(28)
      + (report.archetype ?? '').padEnd(7)
      + report.sufficiency.padEnd(12)
      + [0, 1, 2, 3].map(idx => formatMargin(report, idx).padStart(14)).join('')
      + `  ${report.populationId}`
    );
  });

  lines.push('');
  lines.push('Distribution:');
  for (const { code, count } of archetypeEvaluationService.codeDistribution(result.reports.map(r => r.archetype))) {
    const description = describeArchetype(code);
    lines.push(`  ${code.padEnd(11)}${String(count).padStart(4)}  ${description ?? ''}`);
  }
  if (result.cancelled) {
    lines.push('');
    lines.push(`⚠️  Cancelled after ${result.reports.length} of ${records.length} players`);
  }
  return lines.join('\n');
}

function renderMarkdown(records: RawStatRecord[], result: BatchResult): string {
  const lines: string[] = [];
  lines.push(`# Archetypes (profile ${result.profileVersion})`);
  lines.push('');
  lines.push('| Player | Code | Sufficiency | Mentality | Work Ethic | Presence | Temperament |');
  lines.push('|---|---|---|---|---|---|---|');
  result.reports.forEach((report, i) => {
    const name = records[i]?.playerName ?? report.playerId;
    const margins = [0, 1, 2, 3].map(idx => formatMargin(report, idx).trim() || '-');
    lines.push(`| ${name} | ${report.archetype ?? '-'} | ${report.sufficiency} | ${margins.join(' | ')} |`);
  });
  return lines.join('\n');
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const statsPath = path.resolve(args.stats || SAMPLE_STATS_PATH);
  const profilesDir = path.resolve(args.profilesDir || DEFAULT_PROFILES_DIR);
  const version = args.profile || 'v1';
  const scope = args.scope === 'all' ? 'all' : 'position';
  const format: OutputFormat = args.format === 'json' || args.format === 'markdown' ? args.format : 'text';
  const concurrency = parseIntegerArg(args, 'concurrency', DEFAULT_BATCH_CONCURRENCY, 1);

  calibrationStore.loadFromDirectory(profilesDir);
  const profile = calibrationStore.loadProfile(version);

  const records = loadSeasonRecords(statsPath, args.keepGoalkeepers !== undefined);
  const populationId = args.populationId || path.basename(statsPath, path.extname(statsPath));
  const popMinMinutes = parseIntegerArg(args, 'popMinMinutes', profile.minMinutes, 0);
  const populationOptions = { id: populationId, minMinutes: popMinMinutes };
  const minGroupSize = parseIntegerArg(args, 'minGroupSize', 3, 1);
  const populations = scope === 'all'
    ? referencePopulationService.buildReferencePopulation(records, populationOptions)
    : referencePopulationService.coveringPopulations(
        referencePopulationService.buildPositionPopulations(records, populationOptions, minGroupSize),
        profile,
      );

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const result = await archetypeClassificationService.classifyBatch(records, version, populations, {
    concurrency,
    signal: controller.signal,
  });

  let output: string;
  if (format === 'json') {
    output = `[\n${result.reports.map(r => `  ${serializeReport(r)}`).join(',\n')}\n]`;
  } else if (format === 'markdown') {
    output = renderMarkdown(records, result);
  } else {
    output = renderText(records, result);
  }

  if (args.out) {
    fs.writeFileSync(args.out, `${output}\n`, 'utf-8');
    console.log(`Wrote ${result.reports.length} reports to ${args.out}`);
  } else {
    console.log(output);
  }
}

main().catch((err) => {
  const kind = isStructuralError(err) ? 'Calibration error' : 'Classify tool failed';
  process.stderr.write(`${kind}: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
