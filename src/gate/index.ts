export type { BlockReason, BlockTrigger, Decision, DecisionOutcome, EvaluationMode } from './types.js';
export { AUTO_JUDGE_RULES, decide, shouldAutoJudge, type AutoJudgeVerdict, type DecisionInput } from './decision.js';
