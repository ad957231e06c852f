import type { DimensionName } from '../rubrics/types.js';
import type { Grade } from '../scoring/types.js';

export type EvaluationMode = 'manual' | 'auto';

export type DecisionOutcome = 'pass' | 'block';

export type BlockTrigger = 'threshold' | 'critical';

export interface BlockReason {
  trigger: BlockTrigger;
  composite: number;
  grade: Grade;
  threshold: number;
  criticalIssues: DimensionName[];
}

export interface Decision {
  outcome: DecisionOutcome;
  reason: BlockReason | null;
}
