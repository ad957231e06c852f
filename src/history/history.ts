import type { DimensionScore } from '../scoring/types.js';
import { TRANSCRIPT_DIMENSIONS } from '../scoring/dimension-scorer.js';
import { DIMENSIONS } from '../rubrics/types.js';
import type { Scorecard } from './scorecard-schema.js';
import type { ScorecardStore } from './scorecard-store.js';
import type { Anomaly, DimensionStats, HistoryStats } from './types.js';

export const HISTORY_WINDOW = 10;
export const ANOMALY_STD_MULTIPLIER = 2;

export interface HistoryWindow {
  records: Scorecard[];
  stats: HistoryStats;
  warnings: string[];
}

function statsOf(values: readonly number[]): DimensionStats {
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const std = values.length >= 2
    ? Math.sqrt(values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length)
    : null;
  return { mean, std, count: values.length };
}

export function computeStats(records: readonly Scorecard[]): HistoryStats {
  const dimensions: HistoryStats['dimensions'] = {};
  for (const name of DIMENSIONS) {
    const values = records.flatMap(r => r.dimensions.filter(d => d.name === name).map(d => d.score));
    if (values.length > 0) {
      dimensions[name] = statsOf(values);
    }
  }
  return { windowSize: records.length, dimensions };
}

/** The most recent prior scorecards of a subject, newest first. */
export async function loadHistory(
  store: ScorecardStore,
  subject: string,
  windowSize: number = HISTORY_WINDOW,
): Promise<HistoryWindow> {
  const { records, warnings } = await store.list(subject);
  const window = records.slice(0, windowSize).map(r => r.scorecard);
  return { records: window, stats: computeStats(window), warnings };
}

/**
 * Transcript dimensions whose score sits more than two standard deviations
 * from the historical mean. Needs at least two prior points per dimension.
 */
export function detectAnomalies(current: readonly DimensionScore[], stats: HistoryStats): Anomaly[] {
  const anomalies: Anomaly[] = [];
  for (const name of TRANSCRIPT_DIMENSIONS) {
    const score = current.find(d => d.name === name)?.score;
    const baseline = stats.dimensions[name];
    if (score === undefined || !baseline || baseline.std === null) continue;

    if (Math.abs(score - baseline.mean) > ANOMALY_STD_MULTIPLIER * baseline.std) {
      anomalies.push({ dimension: name, score, mean: baseline.mean, std: baseline.std });
    }
  }
  return anomalies;
}
