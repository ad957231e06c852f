export type { Anomaly, DimensionStats, HistoryStats } from './types.js';
export { SCHEMA_VERSION, ScorecardRecord, type Scorecard } from './scorecard-schema.js';
export {
  ScorecardStore,
  fileTimestamp,
  scorecardFileName,
  type ScorecardListing,
  type StoredScorecard,
} from './scorecard-store.js';
export {
  ANOMALY_STD_MULTIPLIER,
  HISTORY_WINDOW,
  computeStats,
  detectAnomalies,
  loadHistory,
  type HistoryWindow,
} from './history.js';
