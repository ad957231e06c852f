import type { Config } from './schema.js';

export type SubjectPolicy = 'always' | 'never' | 'none';

export function subjectPolicy(config: Config, subject: string): SubjectPolicy {
  if (config.auto_judge.always.includes(subject)) return 'always';
  if (config.auto_judge.never.includes(subject)) return 'never';
  return 'none';
}

/** Returns a new config; `always` and `never` stay mutually exclusive. */
export function setSubjectPolicy(config: Config, subject: string, policy: SubjectPolicy): Config {
  const always = config.auto_judge.always.filter(s => s !== subject);
  const never = config.auto_judge.never.filter(s => s !== subject);

  if (policy === 'always') always.push(subject);
  if (policy === 'never') never.push(subject);

  return { ...config, auto_judge: { ...config.auto_judge, always, never } };
}

export function setAutoJudgeEnabled(config: Config, enabled: boolean): Config {
  return { ...config, auto_judge: { ...config.auto_judge, enabled } };
}

export function setThreshold(config: Config, threshold: number): Config {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 10) {
    throw new RangeError(`Threshold must be between 0 and 10, got ${threshold}`);
  }
  return { ...config, auto_judge: { ...config.auto_judge, threshold } };
}
