/**
 * On-disk scorecard record. Every persisted evaluation is one of these, and
 * history reads validate against it before a record is used.
 */
import { z } from 'zod/v4';
import { DIMENSIONS } from '../rubrics/types.js';
import { GRADES } from '../scoring/types.js';

export const SCHEMA_VERSION = 1;

const DimensionNameSchema = z.enum(DIMENSIONS);

const EvidenceSnippetSchema = z.object({
  signal: z.string(),
  line: z.number().int().nonnegative(),
  excerpt: z.string(),
});

const DimensionScoreSchema = z.object({
  name: DimensionNameSchema,
  score: z.number().min(1).max(10),
  weight: z.number().min(0).max(1),
  justification: z.string(),
  evidence: z.array(EvidenceSnippetSchema),
});

const AdjustmentSchema = z.object({
  id: z.string(),
  description: z.string(),
  evidence: z.string(),
  amount: z.number().nonnegative(),
  applied: z.boolean(),
});

const BlockReasonSchema = z.object({
  trigger: z.enum(['threshold', 'critical']),
  composite: z.number(),
  grade: z.enum(GRADES),
  threshold: z.number(),
  criticalIssues: z.array(DimensionNameSchema),
});

export const ScorecardRecord = z.object({
  schemaVersion: z.literal(SCHEMA_VERSION),
  subject: z.string().min(1),
  createdAt: z.iso.datetime(),
  mode: z.enum(['manual', 'auto']),
  rubric: z.object({
    name: z.string(),
    source: z.string(),
    matchedBy: z.enum(['override', 'exact', 'prefix', 'default']),
  }),
  transcript: z.object({
    path: z.string(),
    events: z.number().int().nonnegative(),
  }),
  dimensions: z.array(DimensionScoreSchema),
  rawComposite: z.number(),
  redFlags: z.array(AdjustmentSchema),
  bonuses: z.array(AdjustmentSchema),
  adjustmentNotes: z.array(z.string()),
  finalComposite: z.number().min(1).max(10),
  grade: z.enum(GRADES),
  gradeLabel: z.string(),
  criticalIssues: z.array(DimensionNameSchema),
  recommendations: z.array(z.string()).min(1).max(3),
  summary: z.string(),
  oneLiner: z.string(),
  history: z.object({
    windowSize: z.number().int().nonnegative(),
    anomalous: z.boolean(),
    anomalies: z.array(
      z.object({
        dimension: DimensionNameSchema,
        score: z.number(),
        mean: z.number(),
        std: z.number(),
      }),
    ),
  }),
  decision: z.object({
    outcome: z.enum(['pass', 'block']),
    reason: BlockReasonSchema.nullable(),
  }),
  warnings: z.array(z.string()),
});

export type Scorecard = z.infer<typeof ScorecardRecord>;
