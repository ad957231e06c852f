import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { box, icons, scoreColor, style } from '../cli/theme.js';
import type { Scorecard } from '../history/scorecard-schema.js';
import { DIMENSIONS, isDimensionName, type DimensionName } from '../rubrics/types.js';
import { round2 } from '../scoring/math.js';

export const BENCHMARKS_FILE = 'benchmarks.yaml';

export interface BenchmarkStandards {
  dimensions: Record<DimensionName, number>;
  composite: number;
}

export const DEFAULT_BENCHMARKS: Readonly<BenchmarkStandards> = {
  dimensions: {
    correctness: 8.0,
    completeness: 7.5,
    adherence: 7.5,
    actionability: 7.0,
    efficiency: 7.0,
    safety: 9.0,
    consistency: 7.0,
  },
  composite: 7.5,
};

export const IMPROVEMENT_TIPS: Readonly<Record<DimensionName, string>> = {
  correctness: 'Run the tests or a build after each change and fix every failure before finishing.',
  completeness: 'Restate the requested items up front and tick each one off in the final answer.',
  adherence: 'Work through declared steps in order and call out any deliberate deviation.',
  actionability: 'Write the change to files and avoid leaving TODOs or placeholder values.',
  efficiency: 'Read the relevant files once and stop retrying a command that keeps failing.',
  safety: 'Ask before deleting or force-pushing and read credentials from the environment.',
  consistency: 'Keep the skill instructions stable so runs stay comparable over time.',
};

export type BenchmarkStatus = 'well-above' | 'above' | 'slightly-below' | 'below';

export interface Comparison {
  average: number;
  benchmark: number;
  delta: number;
  status: BenchmarkStatus;
}

export interface DimensionComparison extends Comparison {
  name: DimensionName;
}

export interface BenchmarkComparison {
  subject: string;
  runs: number;
  composite: Comparison;
  dimensions: DimensionComparison[];
  strongest: DimensionName[];
  weakest: DimensionName[];
  tips: Array<{ dimension: DimensionName; tip: string }>;
}

export interface LoadedBenchmarks {
  standards: BenchmarkStandards;
  warnings: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const isScore = (value: unknown): value is number => typeof value === 'number' && value >= 0 && value <= 10;

/**
 * Standards from `<rubricsDir>/benchmarks.yaml` layered over the defaults.
 * Entries that are not a known dimension with a 0–10 value are ignored with a warning.
 */
export function loadBenchmarks(rubricsDir: string): LoadedBenchmarks {
  const standards: BenchmarkStandards = {
    dimensions: { ...DEFAULT_BENCHMARKS.dimensions },
    composite: DEFAULT_BENCHMARKS.composite,
  };
  const path = join(rubricsDir, BENCHMARKS_FILE);
  if (!existsSync(path)) {
    return { standards, warnings: [] };
  }

  let content: unknown;
  try {
    content = yaml.load(readFileSync(path, 'utf-8'));
  } catch (e) {
    return { standards, warnings: [`Benchmarks ${path} could not be parsed (${e instanceof Error ? e.message : String(e)}); using defaults`] };
  }
  if (!isRecord(content)) {
    return { standards, warnings: [`Benchmarks ${path} must be a mapping; using defaults`] };
  }

  const warnings: string[] = [];
  if (content.composite !== undefined) {
    if (isScore(content.composite)) {
      standards.composite = content.composite;
    } else {
      warnings.push(`Ignoring composite benchmark in ${path}: expected a number between 0 and 10`);
    }
  }
  if (isRecord(content.dimensions)) {
    for (const [name, value] of Object.entries(content.dimensions)) {
      if (isDimensionName(name) && isScore(value)) {
        standards.dimensions[name] = value;
      } else {
        warnings.push(`Ignoring benchmark "${name}" in ${path}`);
      }
    }
  }

  return { standards, warnings };
}

export function benchmarkStatus(delta: number): BenchmarkStatus {
  if (delta >= 1) return 'well-above';
  if (delta >= 0) return 'above';
  if (delta >= -1) return 'slightly-below';
  return 'below';
}

function compare(values: readonly number[], benchmark: number): Comparison {
  const average = round2(values.reduce((sum, v) => sum + v, 0) / values.length);
  const delta = round2(average - benchmark);
  return { average, benchmark, delta, status: benchmarkStatus(delta) };
}

/** Averages over the given scorecards compared with the standards; null without scorecards. */
export function compareToBenchmarks(
  scorecards: readonly Scorecard[],
  subject: string,
  standards: BenchmarkStandards = DEFAULT_BENCHMARKS,
): BenchmarkComparison | null {
  if (scorecards.length === 0) return null;

  const dimensions: DimensionComparison[] = [];
  for (const name of DIMENSIONS) {
    const values = scorecards.flatMap(c => c.dimensions.filter(d => d.name === name).map(d => d.score));
    if (values.length > 0) {
      dimensions.push({ name, ...compare(values, standards.dimensions[name]) });
    }
  }

  const byDelta = [...dimensions].sort((a, b) => b.delta - a.delta);
  const below = dimensions.filter(d => d.delta < 0);

  return {
    subject,
    runs: scorecards.length,
    composite: compare(scorecards.map(c => c.finalComposite), standards.composite),
    dimensions,
    strongest: byDelta.slice(0, 3).map(d => d.name),
    weakest: [...byDelta].reverse().slice(0, 3).map(d => d.name),
    tips: below.map(d => ({ dimension: d.name, tip: IMPROVEMENT_TIPS[d.name] })),
  };
}

const STATUS_LABELS: Readonly<Record<BenchmarkStatus, string>> = {
  'well-above': 'well above',
  above: 'above',
  'slightly-below': 'slightly below',
  below: 'below',
};

function formatStatus(status: BenchmarkStatus): string {
  const label = STATUS_LABELS[status];
  if (status === 'well-above' || status === 'above') return style.success(label);
  if (status === 'slightly-below') return style.warning(label);
  return style.error(label);
}

function signed(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}`;
}

export function formatBenchmark(comparison: BenchmarkComparison): string {
  const lines: string[] = [];

  lines.push('');
  lines.push(`  ${style.bold(`${icons.trace} Benchmark for ${comparison.subject}`)} ${style.muted(`(${comparison.runs} runs)`)}`);
  lines.push(style.primary(`  ${box.dHorizontal.repeat(60)}`));
  lines.push('');

  const c = comparison.composite;
  lines.push(`  ${'Composite'.padEnd(14)} ${scoreColor(c.average)(c.average.toFixed(2).padStart(5))} ${style.muted(`vs ${c.benchmark.toFixed(1)}`)} ${signed(c.delta).padStart(6)}  ${formatStatus(c.status)}`);
  lines.push(style.dim(`  ${box.horizontal.repeat(60)}`));

  for (const d of comparison.dimensions) {
    lines.push(`  ${d.name.padEnd(14)} ${scoreColor(d.average)(d.average.toFixed(2).padStart(5))} ${style.muted(`vs ${d.benchmark.toFixed(1)}`)} ${signed(d.delta).padStart(6)}  ${formatStatus(d.status)}`);
  }
  lines.push('');

  lines.push(`  ${style.dim('Strongest:')} ${comparison.strongest.join(', ')}`);
  lines.push(`  ${style.dim('Weakest:')}   ${comparison.weakest.join(', ')}`);
  lines.push('');

  if (comparison.tips.length > 0) {
    lines.push(`  ${style.bold(`${icons.bulb} Improvement tips`)}`);
    for (const { dimension, tip } of comparison.tips) {
      lines.push(`   ${style.dim(icons.arrowRight)} ${style.bold(dimension)}: ${tip}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
