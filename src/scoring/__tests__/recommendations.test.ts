import { describe, expect, it } from 'vitest';
import { dimensionScores } from '../../__tests__/fixtures.js';
import { computeComposite } from '../composite.js';
import { mapGrade } from '../grade.js';
import { BASELINE_RECOMMENDATION, buildOneLiner, buildRecommendations, buildSummary } from '../recommendations.js';

describe('buildRecommendations', () => {
  it('addresses the three lowest dimensions below 8.0', () => {
    const recommendations = buildRecommendations(
      dimensionScores({ correctness: 2, completeness: 6, safety: 7.5, efficiency: 7.9 }),
    );
    expect(recommendations).toEqual([
      'Correctness (2.0): resolve every error before finishing and verify the result with tests or checks',
      'Completeness (6.0): address each requested item explicitly, including edge cases',
      'Safety (7.5): confirm destructive actions first and keep credentials out of the output',
    ]);
  });

  it('falls back to the baseline recommendation', () => {
    expect(buildRecommendations(dimensionScores({}))).toEqual([BASELINE_RECOMMENDATION]);
  });
});

describe('buildOneLiner', () => {
  it('names critical issues first', () => {
    expect(buildOneLiner(dimensionScores({ correctness: 2 }), ['correctness'])).toBe('Critical issues in correctness.');
  });

  it('names the weakest dimension below 8.0', () => {
    expect(buildOneLiner(dimensionScores({ safety: 7.5 }), [])).toBe('Weakest dimension: safety (7.5).');
  });

  it('reports an even run', () => {
    expect(buildOneLiner(dimensionScores({}), [])).toBe('All dimensions at 8.0 or above.');
  });
});

describe('buildSummary', () => {
  it('describes the composite and the extremes', () => {
    const dimensions = dimensionScores({ correctness: 10, safety: 6 });
    const composite = computeComposite(dimensions, { redFlags: [], bonuses: [] });
    expect(buildSummary(dimensions, composite, mapGrade(composite.final))).toBe(
      'Scored 8.30/10 (B+, Good). Strongest: correctness (10.0); weakest: safety (6.0). ' +
        '0 red flag(s) and 0 bonus(es) applied to a raw composite of 8.3.',
    );
  });
});
