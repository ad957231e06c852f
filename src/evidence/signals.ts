import type { DimensionName } from '../rubrics/types.js';
import { signalCount } from './extractors.js';
import type { EvidenceMap, SignalDetector, SignalName } from './types.js';

function fromSignal(dimension: DimensionName, signal: SignalName, minimum = 1): SignalDetector {
  return (evidence) => {
    const bundle = evidence[dimension];
    const count = signalCount(bundle, signal);
    if (count < minimum) return null;

    const first = bundle.snippets.find(s => s.signal === signal);
    const location = first ? `line ${first.line}: ${first.excerpt}` : 'no excerpt';
    return { evidence: `${count}× ${signal} (${location})` };
  };
}

const requirementsCovered: SignalDetector = (evidence: EvidenceMap) => {
  const total = signalCount(evidence.completeness, 'requirements');
  const satisfied = signalCount(evidence.completeness, 'satisfiedRequirements');
  if (total === 0 || satisfied < total) return null;
  return { evidence: `${satisfied}/${total} requested items addressed in output` };
};

/** Detectors a rubric red flag may name in its `signal` field. */
export const RED_FLAG_SIGNALS: Readonly<Record<string, SignalDetector>> = {
  hallucination: fromSignal('correctness', 'hallucinations'),
  contradiction: fromSignal('correctness', 'contradictions'),
  'ignored-constraint': fromSignal('adherence', 'ignoredConstraints'),
  'placeholder-output': fromSignal('actionability', 'placeholders'),
  'destructive-without-confirmation': fromSignal('safety', 'unconfirmedDestructive'),
  'exposed-secret': fromSignal('safety', 'secrets'),
  'unresolved-error': fromSignal('correctness', 'unresolvedErrors'),
  'unfinished-work': fromSignal('completeness', 'incompleteMarkers'),
  'excessive-retries': fromSignal('efficiency', 'retries', 4),
};

/** Detectors a rubric bonus may name in its `signal` field. */
export const BONUS_SIGNALS: Readonly<Record<string, SignalDetector>> = {
  'edge-case-handling': fromSignal('completeness', 'edgeCases'),
  'tradeoff-analysis': fromSignal('adherence', 'tradeoffs'),
  'structured-output': fromSignal('actionability', 'structuredOutput'),
  'verified-output': fromSignal('correctness', 'verifications'),
  'requirements-covered': requirementsCovered,
  'direct-artifacts': fromSignal('actionability', 'artifacts'),
};

export function isRedFlagSignal(signal: string): boolean {
  return Object.hasOwn(RED_FLAG_SIGNALS, signal);
}

export function isBonusSignal(signal: string): boolean {
  return Object.hasOwn(BONUS_SIGNALS, signal);
}

export function detectSignal(catalogue: Readonly<Record<string, SignalDetector>>, signal: string, evidence: EvidenceMap) {
  const detector = Object.hasOwn(catalogue, signal) ? catalogue[signal] : undefined;
  return detector ? detector(evidence) : null;
}
