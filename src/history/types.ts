import type { DimensionName } from '../rubrics/types.js';

export interface DimensionStats {
  mean: number;
  /** Population standard deviation; null with fewer than two data points. */
  std: number | null;
  count: number;
}

export interface HistoryStats {
  windowSize: number;
  dimensions: Partial<Record<DimensionName, DimensionStats>>;
}

export interface Anomaly {
  dimension: DimensionName;
  score: number;
  mean: number;
  std: number;
}
