import { readFileSync } from 'fs';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { tempDir, writeText } from '../../__tests__/fixtures.js';
import { loadConfig, resolvePaths, saveConfig } from '../loader.js';
import { setAutoJudgeEnabled, setSubjectPolicy, setThreshold, subjectPolicy } from '../policy.js';
import { Config, defaultConfig } from '../schema.js';

let dir: string;
let cleanup: () => void;

beforeEach(() => {
  ({ dir, cleanup } = tempDir());
});

afterEach(() => {
  cleanup();
});

describe('defaultConfig', () => {
  it('fills every section', () => {
    expect(defaultConfig()).toEqual({
      auto_judge: { enabled: true, always: [], never: [], threshold: 5.0, block_on_critical: false },
      manual_judge: { show_evidence: false },
      scoring: { default_rubric: 'default', dimensions: {} },
    });
  });

  it('fills defaults inside a partial section', () => {
    const config = Config.parse({ auto_judge: { threshold: 7 } });
    expect(config.auto_judge).toEqual({ enabled: true, always: [], never: [], threshold: 7, block_on_critical: false });
  });

  it('rejects a subject listed as both always and never', () => {
    expect(Config.safeParse({ auto_judge: { always: ['deploy'], never: ['deploy'] } }).success).toBe(false);
  });
});

describe('resolvePaths', () => {
  it('keeps state under the project root', () => {
    const paths = resolvePaths(dir);
    expect(paths.configPath).toBe(join(dir, '.skillgrade', 'config.json'));
    expect(paths.scoresDir).toBe(join(dir, '.skillgrade', 'scores'));
    expect(paths.rubricsDir).toBe(join(dir, 'rubrics'));
  });
});

describe('loadConfig', () => {
  it('returns defaults for a missing file', async () => {
    const loaded = await loadConfig(join(dir, 'config.json'));
    expect(loaded).toEqual({ config: defaultConfig(), warnings: [] });
  });

  it('warns and falls back on malformed JSON', async () => {
    const path = writeText(dir, 'config.json', '{ not json');
    const loaded = await loadConfig(path);
    expect(loaded.config).toEqual(defaultConfig());
    expect(loaded.warnings).toHaveLength(1);
    expect(loaded.warnings[0]?.startsWith(`Config ${path} could not be read (`)).toBe(true);
  });

  it('warns and falls back on invalid values', async () => {
    const path = writeText(dir, 'config.json', JSON.stringify({ auto_judge: { threshold: 11 } }));
    const loaded = await loadConfig(path);
    expect(loaded.config).toEqual(defaultConfig());
    expect(loaded.warnings[0]?.startsWith(`Config ${path} is invalid (auto_judge.threshold: `)).toBe(true);
  });

  it('round-trips through saveConfig', async () => {
    const path = join(dir, '.skillgrade', 'config.json');
    const config = setThreshold(setSubjectPolicy(defaultConfig(), 'deploy', 'always'), 6.5);
    await saveConfig(path, config);

    expect(readFileSync(path, 'utf-8').endsWith('}\n')).toBe(true);
    expect((await loadConfig(path)).config).toEqual(config);
  });
});

describe('policy helpers', () => {
  it('moves a subject between always and never', () => {
    const always = setSubjectPolicy(defaultConfig(), 'deploy', 'always');
    expect(subjectPolicy(always, 'deploy')).toBe('always');

    const never = setSubjectPolicy(always, 'deploy', 'never');
    expect(never.auto_judge.always).toEqual([]);
    expect(never.auto_judge.never).toEqual(['deploy']);

    const cleared = setSubjectPolicy(never, 'deploy', 'none');
    expect(subjectPolicy(cleared, 'deploy')).toBe('none');
  });

  it('does not mutate its input', () => {
    const config = defaultConfig();
    setSubjectPolicy(config, 'deploy', 'always');
    setAutoJudgeEnabled(config, false);
    expect(config).toEqual(defaultConfig());
  });

  it('rejects thresholds outside 0-10', () => {
    expect(() => setThreshold(defaultConfig(), 10.5)).toThrow(RangeError);
    expect(setThreshold(defaultConfig(), 0).auto_judge.threshold).toBe(0);
  });
});
