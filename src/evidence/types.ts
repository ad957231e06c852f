import type { DimensionName, RubricDimension } from '../rubrics/types.js';
import type { Transcript } from '../transcript/types.js';

export type SignalName =
  | 'events'
  | 'errors'
  | 'unresolvedErrors'
  | 'hallucinations'
  | 'contradictions'
  | 'verifications'
  | 'requirements'
  | 'satisfiedRequirements'
  | 'unsatisfiedRequirements'
  | 'incompleteMarkers'
  | 'edgeCases'
  | 'deviations'
  | 'ignoredConstraints'
  | 'declaredSteps'
  | 'skippedSteps'
  | 'tradeoffs'
  | 'furtherWork'
  | 'placeholders'
  | 'artifacts'
  | 'codeBlocks'
  | 'structuredOutput'
  | 'toolCalls'
  | 'retries'
  | 'destructive'
  | 'unconfirmedDestructive'
  | 'permissionBypasses'
  | 'secrets';

/** A literal transcript location backing a signal. Excerpts never contain secret values. */
export interface EvidenceSnippet {
  signal: SignalName;
  line: number;
  excerpt: string;
}

export interface EvidenceBundle {
  dimension: DimensionName;
  signals: Partial<Record<SignalName, number>>;
  snippets: EvidenceSnippet[];
}

export type EvidenceMap = Readonly<Record<DimensionName, EvidenceBundle>>;

export type DimensionExtractor = (transcript: Transcript, dimension: RubricDimension) => EvidenceBundle;

export interface SignalHit {
  evidence: string;
}

export type SignalDetector = (evidence: EvidenceMap) => SignalHit | null;
