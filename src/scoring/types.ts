import type { EvidenceSnippet } from '../evidence/types.js';
import type { DimensionName } from '../rubrics/types.js';

export interface DimensionScore {
  name: DimensionName;
  /** 1.0–10.0 at one decimal. */
  score: number;
  weight: number;
  justification: string;
  evidence: EvidenceSnippet[];
}

export interface TriggeredSignal {
  id: string;
  description: string;
  evidence: string;
}

/** A detected red flag or bonus. Items beyond the cap carry amount 0 and applied false. */
export interface Adjustment extends TriggeredSignal {
  amount: number;
  applied: boolean;
}

export interface CompositeResult {
  raw: number;
  redFlags: Adjustment[];
  bonuses: Adjustment[];
  deduction: number;
  bonus: number;
  notes: string[];
  final: number;
}

export const GRADES = ['A+', 'A', 'A-', 'B+', 'B', 'B-', 'C+', 'C', 'C-', 'D', 'F'] as const;

export type Grade = (typeof GRADES)[number];

export interface GradeBand {
  grade: Grade;
  label: string;
  /** Inclusive lower bound. */
  min: number;
  /** Exclusive upper bound, except for the top band. */
  max: number;
}
