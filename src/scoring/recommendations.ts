import type { DimensionName } from '../rubrics/types.js';
import type { CompositeResult, DimensionScore, GradeBand } from './types.js';

export const RECOMMENDATION_THRESHOLD = 8.0;
export const MAX_RECOMMENDATIONS = 3;
export const BASELINE_RECOMMENDATION = 'Maintain current quality baseline; no dimension scored below 8.0';

const ADVICE: Readonly<Record<DimensionName, string>> = {
  correctness: 'resolve every error before finishing and verify the result with tests or checks',
  completeness: 'address each requested item explicitly, including edge cases',
  adherence: 'follow the declared steps in order and respect stated constraints',
  actionability: 'deliver finished files or code instead of placeholders and follow-up notes',
  efficiency: 'plan before calling tools and avoid repeating failed commands',
  safety: 'confirm destructive actions first and keep credentials out of the output',
  consistency: 'keep output quality steady across executions of the same subject',
};

export function displayName(name: DimensionName): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}

/** Up to three recommendations for the lowest dimensions below 8.0, lowest first. */
export function buildRecommendations(dimensions: readonly DimensionScore[]): string[] {
  const weak = [...dimensions]
    .filter(d => d.score < RECOMMENDATION_THRESHOLD)
    .sort((a, b) => a.score - b.score)
    .slice(0, MAX_RECOMMENDATIONS);

  if (weak.length === 0) {
    return [BASELINE_RECOMMENDATION];
  }
  return weak.map(d => `${displayName(d.name)} (${d.score.toFixed(1)}): ${ADVICE[d.name]}`);
}

export function buildOneLiner(dimensions: readonly DimensionScore[], critical: readonly DimensionName[]): string {
  if (critical.length > 0) {
    return `Critical issues in ${critical.join(', ')}.`;
  }
  const lowest = [...dimensions].sort((a, b) => a.score - b.score)[0];
  if (!lowest || lowest.score >= RECOMMENDATION_THRESHOLD) {
    return 'All dimensions at 8.0 or above.';
  }
  return `Weakest dimension: ${lowest.name} (${lowest.score.toFixed(1)}).`;
}

export function buildSummary(
  dimensions: readonly DimensionScore[],
  composite: CompositeResult,
  grade: GradeBand,
): string {
  const sorted = [...dimensions].sort((a, b) => b.score - a.score);
  const strongest = sorted[0];
  const weakest = sorted[sorted.length - 1];
  const appliedFlags = composite.redFlags.filter(f => f.applied).length;
  const appliedBonuses = composite.bonuses.filter(b => b.applied).length;

  const parts = [`Scored ${composite.final.toFixed(2)}/10 (${grade.grade}, ${grade.label}).`];
  if (strongest && weakest) {
    parts.push(
      `Strongest: ${strongest.name} (${strongest.score.toFixed(1)}); weakest: ${weakest.name} (${weakest.score.toFixed(1)}).`,
    );
  }
  parts.push(`${appliedFlags} red flag(s) and ${appliedBonuses} bonus(es) applied to a raw composite of ${composite.raw.toFixed(1)}.`);
  return parts.join(' ');
}
