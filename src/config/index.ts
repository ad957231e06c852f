export { AutoJudgeConfig, Config, ManualJudgeConfig, ScoringConfig, defaultConfig } from './schema.js';
export { STATE_DIR, formatIssues, loadConfig, resolvePaths, saveConfig, type LoadedConfig, type ProjectPaths } from './loader.js';
export { setAutoJudgeEnabled, setSubjectPolicy, setThreshold, subjectPolicy, type SubjectPolicy } from './policy.js';
