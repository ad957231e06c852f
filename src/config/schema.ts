/**
 * Project configuration stored at `.skillgrade/config.json`.
 * Keys are snake_case on disk and in memory.
 */
import { z } from 'zod/v4';

export const AutoJudgeConfig = z.object({
  /** Master switch for automatic evaluation from lifecycle hooks. */
  enabled: z.boolean().default(true),
  /** Subjects evaluated automatically on every execution. */
  always: z.array(z.string().min(1)).default([]),
  /** Subjects never evaluated automatically and never blocked. */
  never: z.array(z.string().min(1)).default([]),
  /** Automatic evaluations below this final composite block. */
  threshold: z.number().min(0).max(10).default(5.0),
  /** Also block automatic evaluations that report critical-issue dimensions. */
  block_on_critical: z.boolean().default(false),
});
export type AutoJudgeConfig = z.infer<typeof AutoJudgeConfig>;

export const ManualJudgeConfig = z.object({
  /** Print evidence excerpts under each dimension in manual reports. */
  show_evidence: z.boolean().default(false),
});
export type ManualJudgeConfig = z.infer<typeof ManualJudgeConfig>;

export const ScoringConfig = z.object({
  default_rubric: z.string().min(1).default('default'),
  /** Per-dimension weight overrides applied on top of the resolved rubric. */
  dimensions: z.record(z.string(), z.number().min(0).max(1)).default({}),
});
export type ScoringConfig = z.infer<typeof ScoringConfig>;

export const Config = z
  .object({
    auto_judge: AutoJudgeConfig.default({
      enabled: true,
      always: [],
      never: [],
      threshold: 5.0,
      block_on_critical: false,
    }),
    manual_judge: ManualJudgeConfig.default({ show_evidence: false }),
    scoring: ScoringConfig.default({ default_rubric: 'default', dimensions: {} }),
  })
  .refine(c => !c.auto_judge.always.some(subject => c.auto_judge.never.includes(subject)), {
    message: 'a subject cannot be listed in both auto_judge.always and auto_judge.never',
  });
export type Config = z.infer<typeof Config>;

export function defaultConfig(): Config {
  return Config.parse({});
}
