import { describe, expect, it } from 'vitest';
import { bundledDefaultRubric, transcriptOf } from '../../__tests__/fixtures.js';
import { InvalidRubricError } from '../../errors/index.js';
import { excerptOf, extractEvidence, signalCount } from '../extractors.js';

const rubric = bundledDefaultRubric();

describe('excerptOf', () => {
  it('picks the matching line and collapses whitespace', () => {
    expect(excerptOf('first line\n  build   failed  here', l => l.includes('failed'))).toBe('build failed here');
  });

  it('clips long lines', () => {
    const excerpt = excerptOf('x'.repeat(200));
    expect(excerpt).toHaveLength(120);
    expect(excerpt.endsWith('…')).toBe(true);
  });
});

describe('extractEvidence', () => {
  it('counts resolved and unresolved errors', () => {
    const resolved = extractEvidence(
      transcriptOf(
        ['prompt', 'User: fix the parser'],
        ['response', 'Running tests failed with TypeError'],
        ['tool_use', '$ npm test'],
        ['response', 'All tests passed after the change.'],
      ),
      rubric,
    );
    expect(signalCount(resolved.correctness, 'events')).toBe(4);
    expect(signalCount(resolved.correctness, 'errors')).toBe(1);
    expect(signalCount(resolved.correctness, 'unresolvedErrors')).toBe(0);
    expect(signalCount(resolved.correctness, 'verifications')).toBe(1);

    const unresolved = extractEvidence(
      transcriptOf(['prompt', 'User: deploy it'], ['response', 'Build failed: cannot find module'], ['response', 'I stopped here.']),
      rubric,
    );
    expect(signalCount(unresolved.correctness, 'unresolvedErrors')).toBe(1);
    expect(unresolved.correctness.snippets).toContainEqual({
      signal: 'unresolvedErrors',
      line: 2,
      excerpt: 'Build failed: cannot find module',
    });
  });

  it('does not let an error line resolve itself', () => {
    const evidence = extractEvidence(
      transcriptOf(['prompt', 'User: run the suite'], ['tool_result', 'Build failed: 12 passing, 1 failing']),
      rubric,
    );
    expect(signalCount(evidence.correctness, 'errors')).toBe(1);
    expect(signalCount(evidence.correctness, 'unresolvedErrors')).toBe(1);
  });

  it('matches requested items against the output', () => {
    const evidence = extractEvidence(
      transcriptOf(
        ['prompt', 'User: Update the docs.\n- parse config files\n- validate schemas'],
        ['response', 'I now parse config files and handle edge cases.'],
      ),
      rubric,
    );
    expect(signalCount(evidence.completeness, 'requirements')).toBe(2);
    expect(signalCount(evidence.completeness, 'satisfiedRequirements')).toBe(1);
    expect(signalCount(evidence.completeness, 'unsatisfiedRequirements')).toBe(1);
    expect(signalCount(evidence.completeness, 'edgeCases')).toBe(1);
    expect(signalCount(evidence.efficiency, 'requirements')).toBe(2);
  });

  it('reads actionability signals from output', () => {
    const evidence = extractEvidence(
      transcriptOf(
        ['prompt', 'User: add a helper'],
        ['response', '## Summary\n```ts\nconst x = 1;\n```\nTODO: add tests'],
        ['tool_use', 'Write(src/helper.ts)'],
      ),
      rubric,
    );
    const bundle = evidence.actionability;
    expect(signalCount(bundle, 'furtherWork')).toBe(1);
    expect(signalCount(bundle, 'placeholders')).toBe(0);
    expect(signalCount(bundle, 'artifacts')).toBe(1);
    expect(signalCount(bundle, 'codeBlocks')).toBe(1);
    expect(signalCount(bundle, 'structuredOutput')).toBe(1);
    expect(bundle.snippets).toContainEqual({ signal: 'furtherWork', line: 2, excerpt: 'TODO: add tests' });
    expect(signalCount(evidence.efficiency, 'toolCalls')).toBe(1);
  });

  it('requires confirmation shortly before destructive actions', () => {
    const unconfirmed = extractEvidence(
      transcriptOf(['prompt', 'User: clean the build dir'], ['tool_use', '$ rm -rf dist']),
      rubric,
    );
    expect(signalCount(unconfirmed.safety, 'destructive')).toBe(1);
    expect(signalCount(unconfirmed.safety, 'unconfirmedDestructive')).toBe(1);

    const confirmed = extractEvidence(
      transcriptOf(
        ['prompt', 'User: clean the build dir'],
        ['response', 'Are you sure you want to delete dist? (y/n)'],
        ['prompt', 'User: yes'],
        ['tool_use', '$ rm -rf dist'],
      ),
      rubric,
    );
    expect(signalCount(confirmed.safety, 'destructive')).toBe(1);
    expect(signalCount(confirmed.safety, 'unconfirmedDestructive')).toBe(0);
  });

  it('redacts secrets in their evidence', () => {
    const evidence = extractEvidence(
      transcriptOf(
        ['prompt', 'User: configure the client'],
        ['response', 'password = test-secret'],
        ['response', 'Read token = abcdef123 from process.env instead'],
      ),
      rubric,
    );
    expect(signalCount(evidence.safety, 'secrets')).toBe(1);
    expect(evidence.safety.snippets).toEqual([{ signal: 'secrets', line: 2, excerpt: 'password = [redacted]' }]);
  });

  it('leaves consistency evidence empty', () => {
    const evidence = extractEvidence(transcriptOf(['response', 'done']), rubric);
    expect(evidence.consistency).toEqual({ dimension: 'consistency', signals: {}, snippets: [] });
  });

  it('fails when the rubric lacks a dimension', () => {
    const partial = { ...rubric, dimensions: rubric.dimensions.filter(d => d.name !== 'safety') };
    expect(() => extractEvidence(transcriptOf(['response', 'done']), partial)).toThrow(InvalidRubricError);
  });
});
