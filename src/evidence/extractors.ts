import { InvalidRubricError } from '../errors/index.js';
import type { DimensionName, Rubric } from '../rubrics/types.js';
import type { Transcript, TranscriptEvent } from '../transcript/types.js';
import {
  ARTIFACT_MARKER,
  CODE_FENCE,
  CONFIRMATION_MARKER,
  CONFIRMATION_WINDOW,
  CONTRADICTION_MARKER,
  DESTRUCTIVE_MARKER,
  DEVIATION_MARKER,
  EDGE_CASE_MARKER,
  ERROR_MARKER,
  FURTHER_WORK_MARKER,
  HALLUCINATION_MARKER,
  IGNORED_CONSTRAINT_MARKER,
  INCOMPLETE_MARKER,
  PERMISSION_BYPASS_MARKER,
  PLACEHOLDER_MARKER,
  RESOLUTION_MARKER,
  RETRY_MARKER,
  STRUCTURE_MARKER,
  TRADEOFF_MARKER,
  VERIFICATION_MARKER,
  findSecrets,
  redactSecrets,
} from './patterns.js';
import { extractDeclaredSteps, extractRequirements, isCovered, type Requirement } from './requirements.js';
import type { DimensionExtractor, EvidenceBundle, EvidenceMap, EvidenceSnippet, SignalName } from './types.js';

const MAX_SNIPPETS_PER_SIGNAL = 5;
const EXCERPT_LENGTH = 120;

type LineTest = (text: string) => boolean;

const matches = (pattern: RegExp): LineTest => text => pattern.test(text);
const hasSecret: LineTest = text => findSecrets(text).length > 0;

function clip(text: string): string {
  const safe = redactSecrets(text.trim()).replace(/\s+/g, ' ');
  return safe.length > EXCERPT_LENGTH ? `${safe.slice(0, EXCERPT_LENGTH - 1)}…` : safe;
}

/** The line of an event that triggered a signal, redacted and clipped. */
export function excerptOf(text: string, test?: LineTest): string {
  const lines = text.split('\n');
  const hit = test ? lines.find(l => test(l)) : undefined;
  return clip(hit ?? lines.find(l => l.trim()) ?? text);
}

class BundleBuilder {
  private readonly signals: Partial<Record<SignalName, number>> = {};
  private readonly snippets: EvidenceSnippet[] = [];

  constructor(private readonly dimension: DimensionName) {}

  count(signal: SignalName, value: number): this {
    this.signals[signal] = value;
    return this;
  }

  cite(signal: SignalName, events: readonly TranscriptEvent[], test?: LineTest): this {
    this.signals[signal] = events.length;
    for (const event of events.slice(0, MAX_SNIPPETS_PER_SIGNAL)) {
      this.snippets.push({ signal, line: event.line, excerpt: excerptOf(event.text, test) });
    }
    return this;
  }

  citeRequirements(signal: SignalName, items: readonly Requirement[]): this {
    this.signals[signal] = items.length;
    for (const item of items.slice(0, MAX_SNIPPETS_PER_SIGNAL)) {
      this.snippets.push({ signal, line: item.line, excerpt: clip(item.text) });
    }
    return this;
  }

  build(): EvidenceBundle {
    return { dimension: this.dimension, signals: { ...this.signals }, snippets: [...this.snippets] };
  }
}

function outputEvents(transcript: Transcript): TranscriptEvent[] {
  return transcript.events.filter(e => e.kind !== 'prompt');
}

function promptEvents(transcript: Transcript): TranscriptEvent[] {
  return transcript.events.filter(e => e.kind === 'prompt');
}

function where(events: readonly TranscriptEvent[], test: LineTest): TranscriptEvent[] {
  return events.filter(e => test(e.text));
}

function outputText(outputs: readonly TranscriptEvent[]): string {
  return outputs.map(e => e.text).join('\n').toLowerCase();
}

export function signalCount(bundle: EvidenceBundle, signal: SignalName): number {
  return bundle.signals[signal] ?? 0;
}

const extractCorrectness: DimensionExtractor = (transcript) => {
  const outputs = outputEvents(transcript);
  const errors = where(outputs, matches(ERROR_MARKER));
  const unresolved = errors.filter(error =>
    !outputs.slice(outputs.indexOf(error) + 1).some(later => RESOLUTION_MARKER.test(later.text)),
  );

  return new BundleBuilder('correctness')
    .count('events', transcript.events.length)
    .cite('errors', errors, matches(ERROR_MARKER))
    .cite('unresolvedErrors', unresolved, matches(ERROR_MARKER))
    .cite('hallucinations', where(outputs, matches(HALLUCINATION_MARKER)), matches(HALLUCINATION_MARKER))
    .cite('contradictions', where(outputs, matches(CONTRADICTION_MARKER)), matches(CONTRADICTION_MARKER))
    .cite('verifications', where(outputs, matches(VERIFICATION_MARKER)), matches(VERIFICATION_MARKER))
    .build();
};

const extractCompleteness: DimensionExtractor = (transcript) => {
  const outputs = outputEvents(transcript);
  const text = outputText(outputs);
  const requirements = extractRequirements(promptEvents(transcript));

  return new BundleBuilder('completeness')
    .citeRequirements('requirements', requirements)
    .citeRequirements('satisfiedRequirements', requirements.filter(r => isCovered(r.terms, text)))
    .citeRequirements('unsatisfiedRequirements', requirements.filter(r => !isCovered(r.terms, text)))
    .cite('incompleteMarkers', where(outputs, matches(INCOMPLETE_MARKER)), matches(INCOMPLETE_MARKER))
    .cite('edgeCases', where(outputs, matches(EDGE_CASE_MARKER)), matches(EDGE_CASE_MARKER))
    .build();
};

const extractAdherence: DimensionExtractor = (transcript) => {
  const outputs = outputEvents(transcript);
  const text = outputText(outputs);
  const steps = extractDeclaredSteps(promptEvents(transcript));

  return new BundleBuilder('adherence')
    .cite('deviations', where(outputs, matches(DEVIATION_MARKER)), matches(DEVIATION_MARKER))
    .cite('ignoredConstraints', where(outputs, matches(IGNORED_CONSTRAINT_MARKER)), matches(IGNORED_CONSTRAINT_MARKER))
    .citeRequirements('declaredSteps', steps)
    .citeRequirements('skippedSteps', steps.filter(s => !isCovered(s.terms, text)))
    .cite('tradeoffs', where(outputs, matches(TRADEOFF_MARKER)), matches(TRADEOFF_MARKER))
    .build();
};

const extractActionability: DimensionExtractor = (transcript) => {
  const outputs = outputEvents(transcript);
  const responses = outputs.filter(e => e.kind === 'response');
  const fences = outputs.reduce((sum, e) => sum + [...e.text.matchAll(CODE_FENCE)].length, 0);

  return new BundleBuilder('actionability')
    .cite('furtherWork', where(outputs, matches(FURTHER_WORK_MARKER)), matches(FURTHER_WORK_MARKER))
    .cite('placeholders', where(outputs, matches(PLACEHOLDER_MARKER)), matches(PLACEHOLDER_MARKER))
    .cite('artifacts', where(outputs, matches(ARTIFACT_MARKER)), matches(ARTIFACT_MARKER))
    .count('codeBlocks', Math.floor(fences / 2))
    .cite('structuredOutput', where(responses, matches(STRUCTURE_MARKER)))
    .build();
};

const extractEfficiency: DimensionExtractor = (transcript) => {
  const outputs = outputEvents(transcript);

  return new BundleBuilder('efficiency')
    .count('events', transcript.events.length)
    .cite('toolCalls', transcript.events.filter(e => e.kind === 'tool_use'))
    .cite('retries', where(outputs, matches(RETRY_MARKER)), matches(RETRY_MARKER))
    .citeRequirements('requirements', extractRequirements(promptEvents(transcript)))
    .build();
};

const extractSafety: DimensionExtractor = (transcript) => {
  const all = transcript.events;
  const outputs = outputEvents(transcript);
  const destructive = where(outputs, matches(DESTRUCTIVE_MARKER));
  const unconfirmed = destructive.filter(event => {
    const i = all.indexOf(event);
    return !all.slice(Math.max(0, i - CONFIRMATION_WINDOW), i).some(prior => CONFIRMATION_MARKER.test(prior.text));
  });

  return new BundleBuilder('safety')
    .cite('destructive', destructive, matches(DESTRUCTIVE_MARKER))
    .cite('unconfirmedDestructive', unconfirmed, matches(DESTRUCTIVE_MARKER))
    .cite('permissionBypasses', where(outputs, matches(PERMISSION_BYPASS_MARKER)), matches(PERMISSION_BYPASS_MARKER))
    .cite('secrets', where(outputs, hasSecret), hasSecret)
    .build();
};

// Consistency is scored from history; the transcript contributes nothing.
const extractConsistency: DimensionExtractor = () => new BundleBuilder('consistency').build();

export const EXTRACTORS: Readonly<Record<DimensionName, DimensionExtractor>> = {
  correctness: extractCorrectness,
  completeness: extractCompleteness,
  adherence: extractAdherence,
  actionability: extractActionability,
  efficiency: extractEfficiency,
  safety: extractSafety,
  consistency: extractConsistency,
};

export function extractEvidence(transcript: Transcript, rubric: Rubric): EvidenceMap {
  const run = (name: DimensionName): EvidenceBundle => {
    const dimension = rubric.dimensions.find(d => d.name === name);
    if (!dimension) {
      throw new InvalidRubricError(rubric.name, `missing dimension "${name}"`);
    }
    return EXTRACTORS[name](transcript, dimension);
  };

  return {
    correctness: run('correctness'),
    completeness: run('completeness'),
    adherence: run('adherence'),
    actionability: run('actionability'),
    efficiency: run('efficiency'),
    safety: run('safety'),
    consistency: run('consistency'),
  };
}
