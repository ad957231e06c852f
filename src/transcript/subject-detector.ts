import { existsSync, readFileSync } from 'fs';

interface SubjectRule {
  name: string;
  detect: (raw: string) => string | null;
}

function lastMatch(pattern: RegExp): (raw: string) => string | null {
  return (raw) => {
    const matches = [...raw.matchAll(pattern)];
    const last = matches[matches.length - 1];
    return last?.[1] ?? null;
  };
}

/** Tried in order; the first rule that finds a name wins. */
export const SUBJECT_RULES: readonly SubjectRule[] = [
  { name: 'skill-file', detect: lastMatch(/skills\/([^/\s"'\\]+)\/SKILL\.md/g) },
  { name: 'skill-tool', detect: lastMatch(/Skill tool invoked: ([A-Za-z0-9_-]+)/g) },
  { name: 'skill-field', detect: lastMatch(/"skill":\s?"([A-Za-z0-9_-]+)"/g) },
  {
    name: 'slash-command',
    detect: (raw) => raw.match(/^\/([A-Za-z0-9_-]+)/m)?.[1] ?? null,
  },
];

export function detectSubject(raw: string): string | null {
  for (const rule of SUBJECT_RULES) {
    const subject = rule.detect(raw);
    if (subject) return subject;
  }
  return null;
}

export function detectSubjectFromFile(path: string): string | null {
  if (!existsSync(path)) return null;
  return detectSubject(readFileSync(path, 'utf-8'));
}
