import type { TranscriptEvent } from '../transcript/types.js';

export interface Requirement {
  line: number;
  text: string;
  terms: string[];
}

const PROMPT_PREFIX = /^\s*(?:user|human|prompt)\s*:\s*/i;
const LIST_ITEM = /^\s*(?:[-*•]|\d+[.)])\s+(.+)$/;
const DIRECTIVE = /\b(?:must|should|need to|needs to|make sure|ensure|please)\b/i;
const DECLARED_STEP = /^\s*(?:#+\s*)?step\s+\d+\s*[:.)-]\s*(.+)$/i;
const TERM = /[a-z][a-z0-9_-]{3,}/g;

const STOPWORDS = new Set([
  'must', 'should', 'need', 'needs', 'make', 'sure', 'ensure', 'please',
  'also', 'that', 'this', 'with', 'from', 'into', 'have', 'will', 'when',
  'then', 'than', 'them', 'they', 'their', 'there', 'what', 'which', 'your',
  'about', 'these', 'those', 'each', 'some', 'only', 'just', 'like', 'been',
  'were', 'does', 'done', 'using', 'used', 'user',
]);

export function keyTerms(text: string): string[] {
  const words = text.toLowerCase().match(TERM) ?? [];
  return [...new Set(words.filter(w => !STOPWORDS.has(w)))];
}

/** At least half of the key terms must appear in the output text (already lower-cased). */
export function isCovered(terms: readonly string[], outputText: string): boolean {
  if (terms.length === 0) return true;
  const hits = terms.filter(t => outputText.includes(t)).length;
  return hits * 2 >= terms.length;
}

function promptLines(prompts: readonly TranscriptEvent[]): Array<{ line: number; text: string }> {
  return prompts.flatMap(event =>
    event.text.split('\n').map(text => ({ line: event.line, text: text.replace(PROMPT_PREFIX, '') })),
  );
}

function dedupe(requirements: Requirement[]): Requirement[] {
  const seen = new Set<string>();
  return requirements.filter(r => {
    const key = r.text.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Requested items: list items and directive sentences in the prompt events.
 * Declared steps are excluded; they are tracked by extractDeclaredSteps.
 */
export function extractRequirements(prompts: readonly TranscriptEvent[]): Requirement[] {
  const found: Requirement[] = [];

  for (const { line, text } of promptLines(prompts)) {
    if (DECLARED_STEP.test(text)) continue;

    const item = text.match(LIST_ITEM)?.[1];
    const candidates = item !== undefined
      ? [item]
      : text.split(/(?<=[.!?])\s+/).filter(sentence => DIRECTIVE.test(sentence));

    for (const candidate of candidates) {
      const trimmed = candidate.trim();
      const terms = keyTerms(trimmed);
      if (terms.length > 0) {
        found.push({ line, text: trimmed, terms });
      }
    }
  }

  return dedupe(found);
}

export function extractDeclaredSteps(prompts: readonly TranscriptEvent[]): Requirement[] {
  const steps: Requirement[] = [];
  for (const { line, text } of promptLines(prompts)) {
    const body = text.match(DECLARED_STEP)?.[1]?.trim();
    if (body) {
      steps.push({ line, text: body, terms: keyTerms(body) });
    }
  }
  return dedupe(steps);
}
