import { join } from 'path';
import { describe, expect, it } from 'vitest';
import { detectSubject, detectSubjectFromFile } from '../subject-detector.js';

describe('detectSubject', () => {
  it('takes the last skill file referenced', () => {
    const raw = 'Read(.claude/skills/planning/SKILL.md)\nRead(.claude/skills/code-review/SKILL.md)';
    expect(detectSubject(raw)).toBe('code-review');
  });

  it('reads the skill tool marker', () => {
    expect(detectSubject('Skill tool invoked: debugging\n/deploy')).toBe('debugging');
  });

  it('reads a skill field from JSON records', () => {
    expect(detectSubject('{"type":"tool_use","input":{"skill":"security-audit"}}')).toBe('security-audit');
  });

  it('falls back to a leading slash command', () => {
    expect(detectSubject('some preamble\n/deploy now please')).toBe('deploy');
  });

  it('returns null when nothing identifies the subject', () => {
    expect(detectSubject('User: hello\nHi there.')).toBeNull();
  });

  it('returns null for a missing file', () => {
    expect(detectSubjectFromFile(join('does', 'not', 'exist.txt'))).toBeNull();
  });
});
