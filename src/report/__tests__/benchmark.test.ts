import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { scorecard, tempDir, writeText } from '../../__tests__/fixtures.js';
import { BUNDLED_RUBRICS_DIR } from '../../rubrics/resolver.js';
import { DEFAULT_BENCHMARKS, benchmarkStatus, compareToBenchmarks, loadBenchmarks } from '../benchmark.js';

describe('benchmarkStatus', () => {
  it.each([
    [1, 'well-above'],
    [0.99, 'above'],
    [0, 'above'],
    [-0.01, 'slightly-below'],
    [-1, 'slightly-below'],
    [-1.01, 'below'],
  ])('maps a delta of %s to %s', (delta, status) => {
    expect(benchmarkStatus(delta)).toBe(status);
  });
});

describe('compareToBenchmarks', () => {
  it('averages scorecards against the standards', () => {
    const comparison = compareToBenchmarks(
      [
        scorecard('deploy', '2026-05-02T10:00:00.000Z', { correctness: 9, safety: 7 }),
        scorecard('deploy', '2026-05-01T10:00:00.000Z', { correctness: 8, safety: 8 }),
      ],
      'deploy',
    );

    expect(comparison?.runs).toBe(2);
    expect(comparison?.composite).toEqual({ average: 8, benchmark: 7.5, delta: 0.5, status: 'above' });
    expect(comparison?.dimensions.find(d => d.name === 'correctness')).toEqual({
      name: 'correctness',
      average: 8.5,
      benchmark: 8,
      delta: 0.5,
      status: 'above',
    });
    expect(comparison?.dimensions.find(d => d.name === 'safety')).toEqual({
      name: 'safety',
      average: 7.5,
      benchmark: 9,
      delta: -1.5,
      status: 'below',
    });
    expect(comparison?.strongest).toEqual(['actionability', 'efficiency', 'consistency']);
    expect(comparison?.weakest).toEqual(['safety', 'adherence', 'completeness']);
    expect(comparison?.tips.map(t => t.dimension)).toEqual(['safety']);
  });

  it('returns null without scorecards', () => {
    expect(compareToBenchmarks([], 'deploy')).toBeNull();
  });
});

describe('loadBenchmarks', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = tempDir());
  });

  afterEach(() => {
    cleanup();
  });

  it('uses the defaults without a benchmarks file', () => {
    expect(loadBenchmarks(dir)).toEqual({ standards: DEFAULT_BENCHMARKS, warnings: [] });
  });

  it('matches the bundled benchmarks file', () => {
    expect(loadBenchmarks(BUNDLED_RUBRICS_DIR)).toEqual({ standards: DEFAULT_BENCHMARKS, warnings: [] });
  });

  it('layers valid entries over the defaults', () => {
    const path = writeText(dir, 'benchmarks.yaml', 'composite: 8\ndimensions:\n  safety: 9.5\n  style: 5\n');
    const { standards, warnings } = loadBenchmarks(dir);
    expect(standards.composite).toBe(8);
    expect(standards.dimensions.safety).toBe(9.5);
    expect(standards.dimensions.correctness).toBe(8);
    expect(warnings).toEqual([`Ignoring benchmark "style" in ${path}`]);
  });
});
