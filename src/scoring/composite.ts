import { BONUS_SIGNALS, RED_FLAG_SIGNALS, detectSignal } from '../evidence/signals.js';
import type { EvidenceMap } from '../evidence/types.js';
import type { Rubric, RubricTrigger } from '../rubrics/types.js';
import { clampScore, round1, round2 } from './math.js';
import type { Adjustment, CompositeResult, DimensionScore, TriggeredSignal } from './types.js';

export const RED_FLAG_PENALTY = 0.5;
export const MAX_RED_FLAGS = 4;
export const BONUS_AWARD = 0.25;
export const MAX_BONUSES = 4;

export interface Triggers {
  redFlags: TriggeredSignal[];
  bonuses: TriggeredSignal[];
}

function triggered(
  triggers: readonly RubricTrigger[],
  catalogue: typeof RED_FLAG_SIGNALS,
  evidence: EvidenceMap,
): TriggeredSignal[] {
  return triggers.flatMap(trigger => {
    const hit = detectSignal(catalogue, trigger.signal, evidence);
    return hit ? [{ id: trigger.id, description: trigger.description, evidence: hit.evidence }] : [];
  });
}

/** Red flags and bonuses the rubric declares, in rubric order, that the evidence triggers. */
export function detectTriggers(rubric: Rubric, evidence: EvidenceMap): Triggers {
  return {
    redFlags: triggered(rubric.redFlags, RED_FLAG_SIGNALS, evidence),
    bonuses: triggered(rubric.bonuses, BONUS_SIGNALS, evidence),
  };
}

function itemize(detected: readonly TriggeredSignal[], amount: number, cap: number): Adjustment[] {
  return detected.map((signal, i) => ({
    ...signal,
    amount: i < cap ? amount : 0,
    applied: i < cap,
  }));
}

export function rawComposite(dimensions: readonly DimensionScore[]): number {
  return round1(dimensions.reduce((sum, d) => sum + d.score * d.weight, 0));
}

/**
 * Weighted sum, then capped red-flag deductions, then capped bonuses. The
 * value is clamped to [1.0, 10.0] after each stage.
 */
export function computeComposite(dimensions: readonly DimensionScore[], triggers: Triggers): CompositeResult {
  const raw = rawComposite(dimensions);
  const redFlags = itemize(triggers.redFlags, RED_FLAG_PENALTY, MAX_RED_FLAGS);
  const bonuses = itemize(triggers.bonuses, BONUS_AWARD, MAX_BONUSES);

  const deduction = redFlags.reduce((sum, f) => sum + f.amount, 0);
  const bonus = bonuses.reduce((sum, b) => sum + b.amount, 0);

  const notes: string[] = [];
  if (redFlags.length > MAX_RED_FLAGS) {
    notes.push(`${redFlags.length} flags detected, capped at ${MAX_RED_FLAGS} applied`);
  }
  if (bonuses.length > MAX_BONUSES) {
    notes.push(`${bonuses.length} bonuses detected, capped at ${MAX_BONUSES} applied`);
  }

  const afterDeduction = clampScore(raw - deduction);
  const final = round2(clampScore(afterDeduction + bonus));

  return { raw, redFlags, bonuses, deduction, bonus, notes, final };
}

export const CRITICAL_THRESHOLD = 5.0;

export function criticalIssues(dimensions: readonly DimensionScore[]): DimensionScore['name'][] {
  return dimensions.filter(d => d.score < CRITICAL_THRESHOLD).map(d => d.name);
}
