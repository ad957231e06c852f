import { describe, expect, it } from 'vitest';
import { extractDeclaredSteps, extractRequirements, isCovered, keyTerms } from '../requirements.js';
import type { TranscriptEvent } from '../../transcript/types.js';

const prompt: TranscriptEvent = {
  line: 1,
  kind: 'prompt',
  text: [
    'User: Build a CLI.',
    '- parse config files',
    '- validate schemas',
    'The tool must log warnings.',
    'Step 1: read the docs',
    '- parse config files',
  ].join('\n'),
};

describe('keyTerms', () => {
  it('drops stopwords, short words and duplicates', () => {
    expect(keyTerms('Please ensure the Parser handles parser errors')).toEqual(['parser', 'handles', 'errors']);
  });
});

describe('isCovered', () => {
  it('needs at least half of the terms', () => {
    expect(isCovered(['parse', 'config', 'files'], 'we parse config now')).toBe(true);
    expect(isCovered(['validate', 'schemas'], 'nothing relevant')).toBe(false);
  });

  it('treats an empty term list as covered', () => {
    expect(isCovered([], '')).toBe(true);
  });
});

describe('extractRequirements', () => {
  it('collects list items and directive sentences once each', () => {
    expect(extractRequirements([prompt])).toEqual([
      { line: 1, text: 'parse config files', terms: ['parse', 'config', 'files'] },
      { line: 1, text: 'validate schemas', terms: ['validate', 'schemas'] },
      { line: 1, text: 'The tool must log warnings.', terms: ['tool', 'warnings'] },
    ]);
  });

  it('returns nothing for a prompt without requests', () => {
    expect(extractRequirements([{ line: 1, kind: 'prompt', text: 'User: hello there' }])).toEqual([]);
  });
});

describe('extractDeclaredSteps', () => {
  it('collects numbered steps', () => {
    expect(extractDeclaredSteps([prompt])).toEqual([{ line: 1, text: 'read the docs', terms: ['read', 'docs'] }]);
  });
});
