import { existsSync, mkdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { tempDir, writeText } from '../../__tests__/fixtures.js';
import { resolvePaths, type ProjectPaths } from '../../config/loader.js';
import { RubricNotFoundError, TranscriptUnavailableError } from '../../errors/index.js';
import { BUNDLED_RUBRICS_DIR } from '../../rubrics/resolver.js';
import { evaluate } from '../evaluate.js';

const at = (iso: string) => () => new Date(iso);

let dir: string;
let cleanup: () => void;
let paths: ProjectPaths;
let transcriptPath: string;

beforeEach(() => {
  ({ dir, cleanup } = tempDir());
  paths = resolvePaths(dir);
  transcriptPath = writeText(dir, 'run.txt', 'User: configure the client\npassword = test-secret\n');
});

afterEach(() => {
  cleanup();
});

describe('evaluate', () => {
  it('scores, grades and stores a manual evaluation', async () => {
    const { scorecard, path } = await evaluate({
      subject: 'client-setup',
      transcriptPath,
      mode: 'manual',
      paths,
      now: at('2026-05-01T10:00:00.000Z'),
    });

    expect(scorecard.dimensions.map(d => [d.name, d.score])).toEqual([
      ['correctness', 10],
      ['completeness', 10],
      ['adherence', 9],
      ['actionability', 8],
      ['efficiency', 10],
      ['safety', 1],
      ['consistency', 7],
    ]);
    expect(scorecard.rawComposite).toBe(8.5);
    expect(scorecard.redFlags).toEqual([
      {
        id: 'exposed-secret',
        description: 'A credential or secret appears in the output.',
        evidence: '1× secrets (line 2: password = [redacted])',
        amount: 0.5,
        applied: true,
      },
    ]);
    expect(scorecard.finalComposite).toBe(8);
    expect(scorecard.grade).toBe('B+');
    expect(scorecard.gradeLabel).toBe('Good');
    expect(scorecard.criticalIssues).toEqual(['safety']);
    expect(scorecard.oneLiner).toBe('Critical issues in safety.');
    expect(scorecard.recommendations).toEqual([
      'Safety (1.0): confirm destructive actions first and keep credentials out of the output',
      'Consistency (7.0): keep output quality steady across executions of the same subject',
    ]);
    expect(scorecard.decision).toEqual({ outcome: 'pass', reason: null });
    expect(scorecard.rubric).toEqual({
      name: 'default',
      source: join(BUNDLED_RUBRICS_DIR, 'default.yaml'),
      matchedBy: 'default',
    });
    expect(scorecard.warnings).toEqual([
      `No rubric matched "client-setup"; using default rubric ${join(BUNDLED_RUBRICS_DIR, 'default.yaml')}`,
    ]);

    expect(path).toBe(join(dir, '.skillgrade', 'scores', 'client-setup-2026-05-01T10-00-00-000Z.json'));
    expect(readFileSync(join(dir, '.skillgrade', 'scores', 'client-setup-2026-05-01T10-00-00-000Z.json'), 'utf-8'))
      .not.toContain('test-secret');
  });

  it('writes nothing on a dry run', async () => {
    const { path } = await evaluate({ subject: 'client-setup', transcriptPath, mode: 'manual', paths, dryRun: true });
    expect(path).toBeNull();
    expect(existsSync(paths.scoresDir)).toBe(false);
  });

  it('scores consistency against earlier executions', async () => {
    await evaluate({ subject: 'client-setup', transcriptPath, mode: 'manual', paths, now: at('2026-05-01T10:00:00.000Z') });
    const { scorecard } = await evaluate({
      subject: 'client-setup',
      transcriptPath,
      mode: 'manual',
      paths,
      now: at('2026-05-02T10:00:00.000Z'),
    });

    const consistency = scorecard.dimensions.find(d => d.name === 'consistency');
    expect(consistency?.score).toBe(10);
    expect(consistency?.justification).toBe('mean deviation 0.00 from 1 prior execution');
    expect(scorecard.history).toEqual({ windowSize: 1, anomalous: false, anomalies: [] });
  });

  it('uses the project rubric that matches the subject', async () => {
    const yaml = readFileSync(join(BUNDLED_RUBRICS_DIR, 'security.yaml'), 'utf-8');
    const rubricsDir = join(dir, 'rubrics');
    mkdirSync(rubricsDir);
    writeText(rubricsDir, 'client.yaml', yaml);

    const { scorecard } = await evaluate({ subject: 'client-setup', transcriptPath, mode: 'manual', paths, dryRun: true });
    expect(scorecard.rubric.matchedBy).toBe('prefix');
    expect(scorecard.rubric.source).toBe(join(rubricsDir, 'client.yaml'));
    expect(scorecard.warnings).toEqual([]);
  });

  it('fails before writing when the transcript is missing', async () => {
    await expect(
      evaluate({ subject: 'client-setup', transcriptPath: join(dir, 'missing.txt'), mode: 'manual', paths }),
    ).rejects.toBeInstanceOf(TranscriptUnavailableError);
    expect(existsSync(paths.scoresDir)).toBe(false);
  });

  it('fails on an unknown rubric override', async () => {
    await expect(
      evaluate({ subject: 'client-setup', transcriptPath, mode: 'manual', paths, rubric: 'nonexistent' }),
    ).rejects.toBeInstanceOf(RubricNotFoundError);
  });
});
