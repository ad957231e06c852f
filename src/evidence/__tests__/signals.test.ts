import { describe, expect, it } from 'vitest';
import { bundledDefaultRubric, transcriptOf } from '../../__tests__/fixtures.js';
import { extractEvidence } from '../extractors.js';
import { BONUS_SIGNALS, RED_FLAG_SIGNALS, detectSignal, isBonusSignal, isRedFlagSignal } from '../signals.js';

const rubric = bundledDefaultRubric();

describe('signal catalogues', () => {
  it('keep red flags and bonuses apart', () => {
    expect(isRedFlagSignal('exposed-secret')).toBe(true);
    expect(isBonusSignal('exposed-secret')).toBe(false);
    expect(isBonusSignal('requirements-covered')).toBe(true);
  });

  it('ignore inherited property names', () => {
    expect(isRedFlagSignal('toString')).toBe(false);
    const evidence = extractEvidence(transcriptOf(['response', 'done']), rubric);
    expect(detectSignal(RED_FLAG_SIGNALS, 'toString', evidence)).toBeNull();
  });
});

describe('detectSignal', () => {
  it('cites the first snippet of a triggered signal', () => {
    const evidence = extractEvidence(
      transcriptOf(['prompt', 'User: configure the client'], ['response', 'password = test-secret']),
      rubric,
    );
    expect(detectSignal(RED_FLAG_SIGNALS, 'exposed-secret', evidence)).toEqual({
      evidence: '1× secrets (line 2: password = [redacted])',
    });
    expect(detectSignal(RED_FLAG_SIGNALS, 'hallucination', evidence)).toBeNull();
  });

  it('needs four retries before flagging them', () => {
    const retries = (n: number) =>
      extractEvidence(
        transcriptOf(['prompt', 'User: run it'], ...Array.from({ length: n }, () => ['response', 'retrying the build'] as const)),
        rubric,
      );
    expect(detectSignal(RED_FLAG_SIGNALS, 'excessive-retries', retries(3))).toBeNull();
    expect(detectSignal(RED_FLAG_SIGNALS, 'excessive-retries', retries(4))).toEqual({
      evidence: '4× retries (line 2: retrying the build)',
    });
  });

  it('awards requirements-covered only when every item is addressed', () => {
    const covered = extractEvidence(
      transcriptOf(
        ['prompt', 'User: Do this.\n- parse config files\n- validate schemas'],
        ['response', 'Added code to parse config files and validate schemas.'],
      ),
      rubric,
    );
    expect(detectSignal(BONUS_SIGNALS, 'requirements-covered', covered)).toEqual({
      evidence: '2/2 requested items addressed in output',
    });

    const none = extractEvidence(transcriptOf(['prompt', 'User: hello'], ['response', 'hi']), rubric);
    expect(detectSignal(BONUS_SIGNALS, 'requirements-covered', none)).toBeNull();
  });
});
