export type {
  DimensionExtractor,
  EvidenceBundle,
  EvidenceMap,
  EvidenceSnippet,
  SignalDetector,
  SignalHit,
  SignalName,
} from './types.js';
export { EXTRACTORS, excerptOf, extractEvidence, signalCount } from './extractors.js';
export { extractDeclaredSteps, extractRequirements, isCovered, keyTerms, type Requirement } from './requirements.js';
export { findSecrets, redactSecrets } from './patterns.js';
export { BONUS_SIGNALS, RED_FLAG_SIGNALS, detectSignal, isBonusSignal, isRedFlagSignal } from './signals.js';
