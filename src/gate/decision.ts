import type { Config } from '../config/schema.js';
import type { DimensionName } from '../rubrics/types.js';
import type { Grade } from '../scoring/types.js';
import type { BlockReason, Decision, EvaluationMode } from './types.js';

export type AutoJudgeVerdict = 'judge' | 'skip';

interface PolicyRule {
  name: string;
  applies: (config: Config, subject: string) => boolean;
  verdict: AutoJudgeVerdict;
}

/** Tried in order; the first rule that applies decides. */
export const AUTO_JUDGE_RULES: readonly PolicyRule[] = [
  { name: 'disabled', applies: config => !config.auto_judge.enabled, verdict: 'skip' },
  { name: 'never', applies: (config, subject) => config.auto_judge.never.includes(subject), verdict: 'skip' },
  { name: 'always', applies: (config, subject) => config.auto_judge.always.includes(subject), verdict: 'judge' },
  { name: 'unlisted', applies: () => true, verdict: 'skip' },
];

export function shouldAutoJudge(config: Config, subject: string): { verdict: AutoJudgeVerdict; rule: string } {
  const rule = AUTO_JUDGE_RULES.find(r => r.applies(config, subject));
  return rule ? { verdict: rule.verdict, rule: rule.name } : { verdict: 'skip', rule: 'unlisted' };
}

export interface DecisionInput {
  mode: EvaluationMode;
  subject: string;
  composite: number;
  grade: Grade;
  criticalIssues: DimensionName[];
}

/**
 * Manual evaluations are advisory and always pass. Automatic evaluations
 * block below the threshold unless the subject is on the never list.
 */
export function decide(input: DecisionInput, config: Config): Decision {
  if (input.mode === 'manual') {
    return { outcome: 'pass', reason: null };
  }

  const { threshold, never, block_on_critical } = config.auto_judge;
  if (never.includes(input.subject)) {
    return { outcome: 'pass', reason: null };
  }

  const reason = (trigger: BlockReason['trigger']): Decision => ({
    outcome: 'block',
    reason: {
      trigger,
      composite: input.composite,
      grade: input.grade,
      threshold,
      criticalIssues: input.criticalIssues,
    },
  });

  if (input.composite < threshold) {
    return reason('threshold');
  }
  if (block_on_critical && input.criticalIssues.length > 0) {
    return reason('critical');
  }
  return { outcome: 'pass', reason: null };
}
