import { box, icons, scoreColor, style } from '../cli/theme.js';
import type { Scorecard } from '../history/scorecard-schema.js';
import { DIMENSIONS, type DimensionName } from '../rubrics/types.js';
import { round2 } from '../scoring/math.js';

export const TREND_POINTS = 3;
export const TREND_THRESHOLD = 0.5;

export type Trend = 'up' | 'down' | 'flat' | 'insufficient';

export interface DimensionSummary {
  name: DimensionName;
  average: number;
  latest: number;
  trend: Trend;
}

export interface HistoryEntry {
  file: string;
  subject: string;
  createdAt: string;
  finalComposite: number;
  grade: string;
  mode: string;
  outcome: string;
}

export interface HistoryReport {
  subject: string | null;
  count: number;
  averageComposite: number | null;
  compositeTrend: Trend;
  dimensions: DimensionSummary[];
  entries: HistoryEntry[];
}

/**
 * Direction over the most recent points. `values` are newest first; the
 * newest is compared to the oldest of the last three.
 */
export function trendOf(values: readonly number[]): Trend {
  const recent = values.slice(0, TREND_POINTS);
  const newest = recent[0];
  const oldest = recent[recent.length - 1];
  if (recent.length < 2 || newest === undefined || oldest === undefined) {
    return 'insufficient';
  }

  const delta = newest - oldest;
  if (delta > TREND_THRESHOLD) return 'up';
  if (delta < -TREND_THRESHOLD) return 'down';
  return 'flat';
}

const average = (values: readonly number[]): number => round2(values.reduce((sum, v) => sum + v, 0) / values.length);

/** Records must be sorted newest first, as the scorecard store returns them. */
export function buildHistoryReport(
  records: ReadonlyArray<{ file: string; scorecard: Scorecard }>,
  subject: string | null = null,
  limit = 10,
): HistoryReport {
  const window = records.slice(0, limit);
  const cards = window.map(r => r.scorecard);
  const composites = cards.map(c => c.finalComposite);

  const dimensions: DimensionSummary[] = [];
  for (const name of DIMENSIONS) {
    const values = cards.flatMap(c => c.dimensions.filter(d => d.name === name).map(d => d.score));
    const latest = values[0];
    if (latest === undefined) continue;
    dimensions.push({ name, average: average(values), latest, trend: trendOf(values) });
  }

  return {
    subject,
    count: cards.length,
    averageComposite: composites.length > 0 ? average(composites) : null,
    compositeTrend: trendOf(composites),
    dimensions,
    entries: window.map(({ file, scorecard }) => ({
      file,
      subject: scorecard.subject,
      createdAt: scorecard.createdAt,
      finalComposite: scorecard.finalComposite,
      grade: scorecard.grade,
      mode: scorecard.mode,
      outcome: scorecard.decision.outcome,
    })),
  };
}

function trendIcon(trend: Trend): string {
  switch (trend) {
    case 'up':
      return style.success(icons.up);
    case 'down':
      return style.error(icons.down);
    case 'flat':
      return style.muted(icons.flat);
    default:
      return style.dim('·');
  }
}

export function formatHistoryReport(report: HistoryReport): string {
  const lines: string[] = [];
  const title = report.subject ? `History for ${report.subject}` : 'Recent scorecards';

  lines.push('');
  lines.push(`  ${style.bold(`${icons.list} ${title}`)}`);
  lines.push(style.primary(`  ${box.dHorizontal.repeat(70)}`));
  lines.push('');

  if (report.count === 0) {
    lines.push(`  ${style.dim('No scorecards recorded yet.')}`);
    lines.push('');
    return lines.join('\n');
  }

  lines.push(`  ${style.dim('Date'.padEnd(22))}${style.dim('Subject'.padEnd(22))}${style.dim('Score'.padStart(7))}  ${style.dim('Grade'.padEnd(6))}${style.dim('Mode'.padEnd(8))}${style.dim('Result')}`);
  lines.push(style.dim(`  ${box.horizontal.repeat(70)}`));
  for (const entry of report.entries) {
    const date = new Date(entry.createdAt).toLocaleString().padEnd(22);
    const score = scoreColor(entry.finalComposite)(entry.finalComposite.toFixed(2).padStart(7));
    const outcome = entry.outcome === 'pass' ? style.success(icons.success) : style.error(icons.error);
    lines.push(`  ${style.muted(date)}${entry.subject.slice(0, 20).padEnd(22)}${score}  ${entry.grade.padEnd(6)}${entry.mode.padEnd(8)}${outcome}`);
  }
  lines.push('');

  if (report.averageComposite !== null) {
    lines.push(`  ${style.dim('Average:')} ${style.number(report.averageComposite.toFixed(2))} ${trendIcon(report.compositeTrend)}`);
  }
  lines.push('');

  for (const d of report.dimensions) {
    const avg = scoreColor(d.average)(d.average.toFixed(2).padStart(5));
    lines.push(`  ${d.name.padEnd(14)} ${avg} ${style.muted(`latest ${d.latest.toFixed(1)}`)} ${trendIcon(d.trend)}`);
  }
  lines.push('');

  return lines.join('\n');
}
