import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Scorecard } from '../history/scorecard-schema.js';
import { BUNDLED_RUBRICS_DIR } from '../rubrics/resolver.js';
import { loadRubric } from '../rubrics/rubric-loader.js';
import { DIMENSIONS, type DimensionName, type Rubric } from '../rubrics/types.js';
import type { DimensionScore } from '../scoring/types.js';
import type { Transcript, TranscriptEventKind } from '../transcript/types.js';

export const DEFAULT_WEIGHTS: Readonly<Record<DimensionName, number>> = {
  correctness: 0.25,
  completeness: 0.2,
  adherence: 0.15,
  actionability: 0.15,
  efficiency: 0.1,
  safety: 0.1,
  consistency: 0.05,
};

export function tempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'skillgrade-test-'));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

export function writeText(dir: string, name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content, 'utf-8');
  return path;
}

export function dimensionScores(
  scores: Partial<Record<DimensionName, number>>,
  fallback = 8.0,
): DimensionScore[] {
  return DIMENSIONS.map(name => ({
    name,
    score: scores[name] ?? fallback,
    weight: DEFAULT_WEIGHTS[name],
    justification: 'fixture',
    evidence: [],
  }));
}

export function scorecard(subject: string, createdAt: string, scores: Partial<Record<DimensionName, number>> = {}): Scorecard {
  const dimensions = dimensionScores(scores);
  return {
    schemaVersion: 1,
    subject,
    createdAt,
    mode: 'manual',
    rubric: { name: 'default', source: 'rubrics/default.yaml', matchedBy: 'default' },
    transcript: { path: 'run.txt', events: 3 },
    dimensions,
    rawComposite: 8.0,
    redFlags: [],
    bonuses: [],
    adjustmentNotes: [],
    finalComposite: 8.0,
    grade: 'B+',
    gradeLabel: 'Good',
    criticalIssues: [],
    recommendations: ['Maintain current quality baseline; no dimension scored below 8.0'],
    summary: 'fixture',
    oneLiner: 'All dimensions at 8.0 or above.',
    history: { windowSize: 0, anomalous: false, anomalies: [] },
    decision: { outcome: 'pass', reason: null },
    warnings: [],
  };
}

/** Events numbered from line 1 in the order given. */
export function transcriptOf(...events: Array<readonly [TranscriptEventKind, string]>): Transcript {
  return {
    source: 'fixture.txt',
    events: events.map(([kind, text], i) => ({ line: i + 1, kind, text })),
  };
}

export function bundledDefaultRubric(): Rubric {
  return loadRubric(join(BUNDLED_RUBRICS_DIR, 'default.yaml')).rubric;
}
